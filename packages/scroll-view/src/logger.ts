import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type ScrollViewLogger = Logger;

export function createLogger(level: string = "silent", destination?: DestinationStream): ScrollViewLogger {
  const options: LoggerOptions = {
    level,
    base: {
      component: "scroll-view"
    }
  };

  return destination ? pino(options, destination) : pino(options);
}

let defaultLogger: ScrollViewLogger | undefined;

/**
 * Shared silent logger used when callers do not inject one.
 */
export function getDefaultLogger(): ScrollViewLogger {
  defaultLogger ??= createLogger("silent");
  return defaultLogger;
}
