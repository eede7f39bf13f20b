export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export type WritableLevel = Exclude<LogLevel, "silent">;

export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const satisfies readonly LogLevel[];

export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 三種呼叫方式：
 * - `logger.info("訊息")`
 * - `logger.info({ event: "start" }, "訊息")`
 * - `logger.info({ event: "start" })\`訊息 ${value}\``
 */
export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，name 會加入路徑 (a:b:c)，context 會被繼承 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: WritableLevel;
  path: string;
  event?: string;
  msg: string;
  err?: SerializedError;
  [key: string]: unknown;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export type EmojiMap = Partial<Record<string, string>>;
