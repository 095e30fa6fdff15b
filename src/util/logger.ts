import { logEnabled } from "./log-config";
import type { LogLevel } from "./log-config";

export type LogSink = (line: string, ...rest: unknown[]) => void;

const timestamp = (): string => {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
};

const formatValue = (value: unknown): unknown => {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack
    };
  }
  return value;
};

const sinkFor = (level: LogLevel): LogSink => {
  switch (level) {
    case "error":
      return console.error;
    case "warn":
      return console.warn;
    default:
      return console.log;
  }
};

export class Logger {
  private readonly scopeName: string;

  private constructor(scopeName: string) {
    this.scopeName = scopeName;
  }

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  get name(): string {
    return this.scopeName;
  }

  debug(message: string, ...rest: unknown[]): void {
    this.write("debug", message, rest);
  }

  info(message: string, ...rest: unknown[]): void {
    this.write("info", message, rest);
  }

  warn(message: string, ...rest: unknown[]): void {
    this.write("warn", message, rest);
  }

  error(message: string, ...rest: unknown[]): void {
    this.write("error", message, rest);
  }

  private write(level: LogLevel, message: string, rest: unknown[]): void {
    if (!logEnabled(this.scopeName, level)) {
      return;
    }
    const line = `${timestamp()} [${this.scopeName}:${level.toUpperCase()}] ${message}`;
    sinkFor(level)(line, ...rest.map(formatValue));
  }
}
