import winston, { format } from "winston";
import { LogLevel } from "./config";

const { combine, timestamp, label, printf, splat } = format;

const lineFormat = printf(({ level, message, label, timestamp }) => {
  return `${timestamp} [${label}] ${level}: ${message}`;
});

export type Logger = Pick<winston.Logger, "debug" | "info" | "warn" | "error">;

export function createLogger(level: LogLevel = "info"): winston.Logger {
  return winston.createLogger({
    level,
    format: combine(label({ label: "leo-semantic" }), timestamp(), splat(), lineFormat),
    transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })],
  });
}

/** Shared logger; the CLI raises or lowers its level from `LOG_LEVEL` */
const logger = createLogger();

export default logger;
