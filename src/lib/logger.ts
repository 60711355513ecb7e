export type LogLevel = "debug" | "warn" | "error";

export type SessionLogger = {
  [Level in LogLevel]: (message: string, ...details: unknown[]) => void;
};

type ConsoleSink = Pick<Console, LogLevel>;

export function createLogger(scope: string, sink: ConsoleSink = console): SessionLogger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => sink.debug(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => sink.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => sink.error(`${prefix} ${message}`, ...details),
  };
}

export const silentLogger: SessionLogger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};
