import winston from "winston";

/**
 * Process-wide diagnostic logger. User-facing command output goes through
 * `output/output.ts`; this logger carries operational detail (daemon calls,
 * git invocations, reconciliation decisions) and writes to stderr.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "warn",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "vuln-pkg" },
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}
