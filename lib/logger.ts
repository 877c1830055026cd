export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

let threshold: LogLevel = (() => {
  const fromEnv = process.env["LOG_LEVEL"]?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "warn";
})();

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

export const getLogLevel = () => threshold;

export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
};

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

/** Console logger that prefixes every line with `[scope]`. */
export const createLogger = (scope: string): Logger => ({
  debug: (message, ...details) => {
    if (enabled("debug")) console.debug(`[${scope}] ${message}`, ...details);
  },
  info: (message, ...details) => {
    if (enabled("info")) console.log(`[${scope}] ${message}`, ...details);
  },
  warn: (message, ...details) => {
    if (enabled("warn")) console.warn(`[${scope}] ${message}`, ...details);
  },
  error: (message, ...details) => {
    if (enabled("error")) console.error(`[${scope}] ${message}`, ...details);
  },
});
