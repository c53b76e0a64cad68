import pino, { type Logger } from "pino";

export interface LoggingConfig {
  level: string;
  pretty: boolean;
}

/** Components that log under their own `module` binding. */
export type LogModule = "cli" | "rag" | "extract" | "cache" | "source" | "index" | "answer";

// Provider keys travel in options and request headers; never print them.
const REDACTED_PATHS = ["apiKey", "*.apiKey", "headers.Authorization", "*.headers.Authorization"];

let loggerInstance: Logger | null = null;

function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: "folio",
    level: config.level,
    base: undefined,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    transport: config.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "name",
            messageFormat: "{if module}[{module}] {end}{msg}",
          },
        }
      : undefined,
  });
}

export function loggingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  return {
    level: env["LOG_LEVEL"] || "info",
    pretty: env["LOG_PRETTY"] === "true" || env["LOG_PRETTY"] === "1",
  };
}

export function configureLogger(config: LoggingConfig): Logger {
  loggerInstance = createLogger(config);
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger({ ...loggingConfigFromEnv(), pretty: false });
  }
  return loggerInstance;
}

/** Child of `parent`, or of the process logger, tagged with the component. */
export function moduleLogger(module: LogModule, parent: Logger = getLogger()): Logger {
  return parent.child({ module });
}
