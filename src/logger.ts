import type { Logger as PinoLogger } from "pino";
import pino from "pino";
import config from "./config/env.js";

export type Logger = PinoLogger;

/**
 * Single logger instance for the CLI, the import script and the MCP server.
 * Everything goes to stderr: stdout carries the MCP stdio transport.
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = this.createLogger();
    }
    return this.instance;
  }

  private static createLogger(): Logger {
    if (config.NODE_ENV === "test") {
      return pino({ level: "silent" });
    }

    if (config.NODE_ENV === "development") {
      return pino({
        level: config.LOG_LEVEL,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            destination: 2,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      });
    }

    return pino(
      {
        level: config.LOG_LEVEL,
        timestamp: pino.stdTimeFunctions.isoTime,
        serializers: {
          err: pino.stdSerializers.err,
        },
        formatters: {
          level: (label) => ({ level: label }),
        },
        base: { service: "erdb" },
      },
      pino.destination(2),
    );
  }

  static createChild(bindings: Record<string, unknown>): Logger {
    return this.getInstance().child(bindings);
  }
}

const logger = LoggerFactory.getInstance();

export default logger;
export { LoggerFactory };
