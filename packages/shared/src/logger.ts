import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

type LoggerOptions = {
  level?: string;
  destination?: DestinationStream;
};

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const settings = {
    name,
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}
