import pino, { type Logger, type LoggerOptions } from "pino";
import { getBoolean, getNodeEnv, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for the dashboard's server side.
 * - Local dev: pretty-printed logs for readability
 * - Production: JSON lines on stdout
 */
const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isProduction() ? "info" : "debug"),
  base: {
    service: "news-dashboard",
    env: getNodeEnv(),
  },
  redact: {
    paths: ["*.password", "*.secret", "*.token", "*.apiKey"],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const usePretty = getBoolean("LOG_PRETTY", !isProduction() && !isTest());

const rootLogger: Logger = usePretty
  ? pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
        },
      },
    })
  : pino(baseOptions);

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

export default rootLogger;
