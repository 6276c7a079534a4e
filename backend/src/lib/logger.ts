import pino from "pino";
import { config } from "./config";

/**
 * Creates the process logger. JSON lines go to stdout; with LOG_PRETTY set they
 * are routed through pino-pretty instead.
 */
export function createLogger(level: string = config.logLevel, pretty: boolean = config.logPretty): pino.Logger {
  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    });
  }

  return pino({ level, base: { service: "proposal-trace-graph" } });
}

export const logger = createLogger();
