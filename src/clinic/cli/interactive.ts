import * as p from "@clack/prompts";
import type { Appointment } from "@/clinic/types";
import type { ClinicEngine } from "@/clinic";
import { ClinicSyncError, errorMessage } from "@/clinic/errors";

type Action = "refresh" | "book" | "reschedule" | "cancel" | "complete" | "summary" | "sync" | "quit";

const ACTIONS: { value: Action; label: string }[] = [
  { value: "refresh", label: "Refresh the day" },
  { value: "book", label: "Book an appointment" },
  { value: "reschedule", label: "Reschedule an appointment" },
  { value: "cancel", label: "Cancel an appointment" },
  { value: "complete", label: "Mark an appointment completed" },
  { value: "summary", label: "Show a patient summary" },
  { value: "sync", label: "Upload pending readings now" },
  { value: "quit", label: "Quit" },
];

interface DayView {
  date: string;
  clinic?: string;
  location?: string;
}

async function ask(message: string, options?: { initialValue?: string; placeholder?: string; optional?: boolean }): Promise<string | null> {
  const value = await p.text({
    message,
    initialValue: options?.initialValue,
    placeholder: options?.placeholder,
    validate: (v) => (!options?.optional && !v.trim() ? "Required" : undefined),
  });
  if (p.isCancel(value)) return null;
  return value.trim();
}

function formatLine(a: Appointment): string {
  const time = `${a.startTime.slice(11, 16)}–${a.endTime.slice(11, 16)}`;
  return `${time}  ${a.clinic}/${a.location}  ${a.subjectName}  [${a.status}]  ${a.id ?? "(no id)"}`;
}

function describeFailure(error: unknown): string {
  if (error instanceof ClinicSyncError) {
    const hint = error.retryable ? " You can try again once the connection is back." : "";
    return `${error.message}.${hint}`;
  }
  return errorMessage(error);
}

async function showDay(engine: ClinicEngine, view: DayView): Promise<void> {
  const spinner = p.spinner();
  spinner.start("Loading appointments...");
  try {
    const appointments = await engine.scheduling.queryDay(view.date, view.clinic, view.location);
    spinner.stop(`${appointments.length} appointment(s) on ${view.date}.`);
    for (const a of appointments) {
      p.log.message(`  ${formatLine(a)}`);
    }
  } catch (error) {
    spinner.stop("Could not load appointments.");
    p.log.error(describeFailure(error));
  }
}

async function bookFlow(engine: ClinicEngine, view: DayView): Promise<void> {
  const subjectId = await ask("Patient ID");
  if (subjectId === null) return;
  const subjectName = await ask("Patient name");
  if (subjectName === null) return;
  const clinic = await ask("Clinic", { initialValue: view.clinic });
  if (clinic === null) return;
  const location = await ask("Location", { initialValue: view.location });
  if (location === null) return;
  const start = await ask("Start (HH:mm)", { placeholder: "09:00" });
  if (start === null) return;
  const end = await ask("End (HH:mm)", { placeholder: "09:30" });
  if (end === null) return;

  try {
    const booked = await engine.scheduling.book({
      subjectId,
      subjectName,
      clinic,
      location,
      startTime: `${view.date}T${start}`,
      endTime: `${view.date}T${end}`,
    });
    p.log.success(`Booked ${booked.id}.`);
  } catch (error) {
    p.log.error(describeFailure(error));
  }
}

async function rescheduleFlow(engine: ClinicEngine, view: DayView): Promise<void> {
  const id = await ask("Appointment ID");
  if (id === null) return;
  const start = await ask("New start (YYYY-MM-DDTHH:mm)", { initialValue: `${view.date}T` });
  if (start === null) return;
  const end = await ask("New end (YYYY-MM-DDTHH:mm)", { initialValue: `${view.date}T` });
  if (end === null) return;

  try {
    await engine.scheduling.reschedule(id, start, end);
    p.log.success(`Rescheduled ${id}.`);
  } catch (error) {
    p.log.error(describeFailure(error));
  }
}

async function statusFlow(engine: ClinicEngine, action: "cancel" | "complete"): Promise<void> {
  const id = await ask("Appointment ID");
  if (id === null) return;
  const confirmed = await p.confirm({ message: `${action === "cancel" ? "Cancel" : "Complete"} ${id}?` });
  if (p.isCancel(confirmed) || !confirmed) return;

  try {
    if (action === "cancel") {
      await engine.scheduling.cancel(id);
    } else {
      await engine.scheduling.complete(id);
    }
    p.log.success(`${id} is now ${action === "cancel" ? "cancelled" : "completed"}.`);
  } catch (error) {
    p.log.error(describeFailure(error));
  }
}

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(", ") : "none recorded";
}

async function summaryFlow(engine: ClinicEngine): Promise<void> {
  const subjectId = await ask("Patient ID");
  if (subjectId === null) return;

  try {
    const summary = engine.records.summary(subjectId);
    p.log.message(
      [
        `Conditions:  ${listOrNone(summary.conditions)}`,
        `Allergies:   ${listOrNone(summary.allergies)}`,
        `Medications: ${listOrNone(summary.medications)}`,
      ].join("\n")
    );
    const latest = summary.latestReading;
    if (latest) {
      p.log.message(
        `Latest vitals (${latest.capturedAt}): ${latest.heartRateBpm} bpm, ` +
          `${latest.bodyTemperatureC} °C, ${latest.bloodGlucoseMmolL} mmol/L`
      );
    } else {
      p.log.message("No vitals captured yet.");
    }
  } catch (error) {
    p.log.error(describeFailure(error));
  }
}

async function syncFlow(engine: ClinicEngine): Promise<void> {
  const spinner = p.spinner();
  spinner.start("Uploading pending readings...");
  const summary = await engine.worker.run();
  switch (summary.status) {
    case "noop":
      spinner.stop("Nothing to upload.");
      break;
    case "synced":
      spinner.stop(`${summary.uploaded} reading(s) uploaded.`);
      break;
    case "retry":
      spinner.stop("Upload failed; it will be retried on the next run.");
      if (summary.error) p.log.warn(summary.error);
      break;
  }
}

export async function runInteractiveSession(engine: ClinicEngine): Promise<void> {
  p.intro("Clinic Scheduler");

  const date = await ask("Day (YYYY-MM-DD)", { initialValue: new Date().toISOString().slice(0, 10) });
  if (date === null) {
    p.outro("Cancelled.");
    return;
  }
  const clinic = await ask("Clinic filter (blank for all)", { optional: true });
  if (clinic === null) return;
  const location = await ask("Location filter (blank for all)", { optional: true });
  if (location === null) return;

  const view: DayView = { date, clinic: clinic || undefined, location: location || undefined };
  await showDay(engine, view);

  for (;;) {
    const choice = await p.select({ message: "What next?", options: ACTIONS });
    if (p.isCancel(choice)) break;
    const action = ACTIONS.find((a) => a.value === choice)?.value ?? "quit";
    if (action === "quit") break;

    switch (action) {
      case "refresh":
        await showDay(engine, view);
        break;
      case "book":
        await bookFlow(engine, view);
        break;
      case "reschedule":
        await rescheduleFlow(engine, view);
        break;
      case "cancel":
      case "complete":
        await statusFlow(engine, action);
        break;
      case "summary":
        await summaryFlow(engine);
        break;
      case "sync":
        await syncFlow(engine);
        break;
    }
  }

  p.outro("Done!");
}
