import winston from "winston";

export type AppLogger = winston.Logger;

export type AppLoggerOptions = {
  serviceName?: string;
  level?: string;
  /** Mutes every transport; tests use it to keep runner output clean. */
  silent?: boolean;
  /** Also write JSON lines to this file. Off when unset. */
  logFile?: string;
};

/**
 * Creates the application logger (winston).
 *
 * Output:
 * - development: colorized console lines with the metadata appended as JSON;
 * - production (`NODE_ENV=production`): one JSON object per console line;
 * - with `logFile`: the same records as JSON lines in that file, whatever the mode.
 *
 * Options:
 * - `level` falls back to `LOG_LEVEL`, then `info` in production and `debug` otherwise;
 * - `silent` mutes every transport.
 *
 * The analyzer hands each category task a child logger carrying `categoryId`.
 */
export function createAppLogger(opts?: AppLoggerOptions): AppLogger {
  const serviceName = opts?.serviceName ?? "premed-coverage-validator";
  const isProd = process.env.NODE_ENV === "production";

  const baseFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.metadata({
      fillExcept: ["message", "level", "timestamp", "service"],
    })
  );

  const consoleFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info) => {
          const meta = isNonEmptyRecord(info.metadata) ? ` ${JSON.stringify(info.metadata)}` : "";
          return `${String(info.timestamp)} ${info.level} [${serviceName}] ${String(info.message)}${meta}`;
        })
      );

  const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];
  if (opts?.logFile) {
    transports.push(new winston.transports.File({ filename: opts.logFile, format: winston.format.json() }));
  }

  return winston.createLogger({
    level: opts?.level ?? process.env.LOG_LEVEL ?? (isProd ? "info" : "debug"),
    defaultMeta: { service: serviceName },
    format: baseFormat,
    silent: opts?.silent ?? false,
    transports,
  });
}

function isNonEmptyRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && Object.keys(value).length > 0;
}
