import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

// Never written to a log line: names, free text and readings.
const PHI_FIELDS = [
  "subjectName",
  "note",
  "heartRateBpm",
  "bodyTemperatureC",
  "bloodGlucoseMmolL",
  "conditions",
  "allergies",
  "medications",
];
const MAX_MESSAGE_LENGTH = 200;

export const scrubPhi = winston.format((info) => {
  for (const field of PHI_FIELDS) {
    delete info[field];
  }
  if (typeof info.message === "string" && info.message.length > MAX_MESSAGE_LENGTH) {
    info.message = `${info.message.slice(0, MAX_MESSAGE_LENGTH)}…`;
  }
  return info;
});

export const logger = winston.createLogger({
  level: process.env.CLINIC_LOG_LEVEL || "info",
  format: isProduction
    ? winston.format.combine(
        scrubPhi(),
        winston.format.timestamp(),
        winston.format.json()
      )
    : winston.format.combine(
        scrubPhi(),
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, ...rest }) => {
          const ctx = context ? `[${context}]` : "";
          const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
          return `${timestamp} ${level} ${ctx} ${message}${extra}`;
        })
      ),
  transports: [new winston.transports.Console()],
});

export function createChildLogger(context: string) {
  return logger.child({ context });
}
