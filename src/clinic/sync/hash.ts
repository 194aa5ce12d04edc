import { createHash } from "crypto";

/**
 * Stable key for an upload batch. Ids are sorted so the same set of readings
 * always maps to the same key, whatever order the store returned them in.
 */
export function batchKey(ids: readonly string[]): string {
  const sorted = [...ids].sort();
  return createHash("sha256").update(JSON.stringify(sorted)).digest("hex");
}
