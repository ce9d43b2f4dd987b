type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Own keys only: names like "constructor" are inherited from Object.prototype
const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

// Read on every call so a CLI flag or test can change it after import
const threshold = (): number => {
  const configured = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return LEVEL_ORDER[isLogLevel(configured) ? configured : "info"];
};

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  if (LEVEL_ORDER[level] < threshold()) return;
  const timestamp = new Date().toISOString();
  const payload = meta ? ` ${JSON.stringify(meta)}` : "";
  // eslint-disable-next-line no-console
  console[level](`[${timestamp}] [${level.toUpperCase()}] ${message}${payload}`);
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log("debug", message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log("info", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log("warn", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log("error", message, meta),
};
