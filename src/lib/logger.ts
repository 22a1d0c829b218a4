export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type LogSink = Pick<Console, "log" | "error">;

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function createLogger(level: LogLevel, sink: LogSink = console): Logger {
  const enabled = (messageLevel: Exclude<LogLevel, "silent">) => RANK[messageLevel] >= RANK[level];

  return {
    debug: (message) => {
      if (enabled("debug")) {
        sink.log(message);
      }
    },
    info: (message) => {
      if (enabled("info")) {
        sink.log(message);
      }
    },
    warn: (message) => {
      if (enabled("warn")) {
        sink.error(`Warning: ${message}`);
      }
    },
    error: (message) => {
      if (enabled("error")) {
        sink.error(`Error: ${message}`);
      }
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
