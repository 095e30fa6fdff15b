export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export const parseLevel = (raw: string | undefined | null): LogLevel | null => {
  if (!raw) {
    return null;
  }
  const value = raw.toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return null;
};

const GLOBAL_LEVEL: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  WORLDGEN: "info",
  ROADS: "info",
  LAVA: "info",
  CONTENT: "info"
};

// LOG_SCOPE_<SCOPE> wins over the table, the table over LOG_LEVEL.
export const scopeLevel = (scope: string): LogLevel => {
  const key = scope.toUpperCase();
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) {
    return fromEnv;
  }
  return PER_SCOPE_DEFAULTS[key] ?? GLOBAL_LEVEL;
};

export const logEnabled = (scope: string, level: LogLevel): boolean => {
  return ORDER.indexOf(level) >= ORDER.indexOf(scopeLevel(scope));
};
