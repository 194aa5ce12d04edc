import { logger } from "@/clinic/logger";

// Tests assert on values, not log output.
logger.silent = true;
