export type OutputFormat = "text" | "json";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Config = {
  logLevel: LogLevel;
  /** Directory holding the package's `src/`; imports are searched from here */
  packageRoot?: string;
  format: OutputFormat;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new ConfigError(`Invalid log level: ${value}. Must be one of ${LOG_LEVELS.join(", ")}.`);
  }
  return level;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === "json" || value === "text") {
    return value;
  }
  throw new ConfigError(`Invalid format: ${value}. Must be 'text' or 'json'.`);
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const config: Config = {
    logLevel: env.LOG_LEVEL ? parseLogLevel(env.LOG_LEVEL) : "info",
    format: "text",
  };
  if (env.LEO_PACKAGE_ROOT) {
    config.packageRoot = env.LEO_PACKAGE_ROOT;
  }
  return config;
}
