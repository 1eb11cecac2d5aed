import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = { name: "tidebot", level };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, mkdir: true }));
  }

  if (!isJson) {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
    };
  }

  return pino(options);
}
