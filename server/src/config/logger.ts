// server/src/config/logger.ts
/** Winston logger: JSON output, PII redaction (nested too), and stream for morgan (dev HTTP logs). */
import { createLogger, format, transports } from "winston";

import { env } from "./env.js";

const SENSITIVE = /authorization|password|token|secret|cvv|card/i;

export function redact(value: unknown, depth = 0): unknown {
  if (depth > 4 || value === null || typeof value !== "object") return value;
  if (value instanceof Date) return value;
  if (Array.isArray(value)) return value.map((v) => redact(v, depth + 1));
  return redactFields(value, depth);
}

function redactFields(value: object, depth: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SENSITIVE.test(k) ? "[redacted]" : redact(v, depth + 1);
  }
  return out;
}

export const logger = createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === "test",
  defaultMeta: { service: "car-rental-api" },
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.printf((info) => {
      const { timestamp, level, message, ...rest } = info;
      const payload = { timestamp, level, message, ...redactFields(rest, 0) };
      return JSON.stringify(payload);
    })
  ),
  transports: [new transports.Console()],
});

// morgan writes whole lines; trim the trailing newline
export const httpLogStream = {
  write: (line: string) => {
    logger.http(line.trim(), { source: "http" });
  },
};
