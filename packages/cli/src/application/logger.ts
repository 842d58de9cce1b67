export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, "silent">;

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

/** Receives one fully formatted line, newline included. */
export type LogSink = (line: string) => void;

export type LoggerOptions = {
  level: LogLevel;
  sink: LogSink;
  prefix?: string;
};

export const DEFAULT_LOG_PREFIX = "[deliverypulse]";

// Position in LOG_LEVELS doubles as verbosity.
const verbosity = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const createLogger = ({ level, sink, prefix = DEFAULT_LOG_PREFIX }: LoggerOptions): Logger => {
  const emitter =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (verbosity(messageLevel) <= verbosity(level)) {
        sink(`${prefix} ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return {
    error: emitter("error"),
    warn: emitter("warn"),
    info: emitter("info"),
    debug: emitter("debug"),
  };
};

export const createSilentLogger = (): Logger => createLogger({ level: "silent", sink: () => {} });

export const createStderrLogger = (level: LogLevel): Logger =>
  createLogger({
    level,
    sink: (line) => {
      process.stderr.write(line);
    },
  });

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const parseLogLevel = (value: string | undefined, fallback: LogLevel = "info"): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return normalized !== undefined && isLogLevel(normalized) ? normalized : fallback;
};
