export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, "silent">;

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

export type LogSink = (line: string) => void;

const levelRank: Readonly<Record<LogLevel, number>> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const writeToStderr: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Logs go to stderr so that stdout carries only the rendered report.
 */
export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const emitter =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (levelRank[messageLevel] <= levelRank[level]) {
        sink(`[deepxcheck] ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return {
    error: emitter("error"),
    warn: emitter("warn"),
    info: emitter("info"),
    debug: emitter("debug"),
  };
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? "info";
};
