import kleur from "kleur";

import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogRecord,
  LogTransport,
  Logger,
  SerializedError,
  TemplateLog,
  WritableLevel,
} from "./Logger";

const levelRank: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

const consoleOf: Record<WritableLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null) {
    const type = "type" in error ? error.type : undefined;
    const message = "message" in error ? error.message : undefined;
    return {
      name: typeof type === "string" ? type : "NonError",
      message: typeof message === "string" ? message : safeStringify(error),
    };
  }
  return { name: "NonError", message: String(error) };
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export class LoggerConsole implements Logger, AsyncDisposable {
  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly path: readonly string[] = []
  ) {}

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): TemplateLog;
  trace(a?: LogContext | string, b?: string): TemplateLog | undefined {
    return this.log("trace", a, b);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): TemplateLog;
  debug(a?: LogContext | string, b?: string): TemplateLog | undefined {
    return this.log("debug", a, b);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): TemplateLog;
  info(a?: LogContext | string, b?: string): TemplateLog | undefined {
    return this.log("info", a, b);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): TemplateLog;
  warn(a?: LogContext | string, b?: string): TemplateLog | undefined {
    return this.log("warn", a, b);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): TemplateLog;
  error(a?: LogContext | string, b?: string): TemplateLog | undefined {
    return this.log("error", a, b);
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, name]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  /** transport 會與所有 extend/append 出來的 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  isLevelEnabled(level: WritableLevel) {
    return levelRank[level] >= levelRank[this.level];
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private log(
    level: WritableLevel,
    contextOrMessage: LogContext | string | undefined,
    message: string | undefined
  ): TemplateLog | undefined {
    if (typeof contextOrMessage === "string") {
      this.write(level, {}, contextOrMessage, contextOrMessage);
      return undefined;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      this.write(level, context, message, message);
      return undefined;
    }
    return (strings, ...values) => {
      let plain = strings[0] ?? "";
      let colored = plain;
      const valueContext: Record<string, unknown> = {};
      values.forEach((value, i) => {
        const text = String(value);
        const tail = strings[i + 1] ?? "";
        plain += text + tail;
        colored += kleur.green(text) + tail;
        valueContext[`__${i}`] = value;
      });
      this.write(level, { ...context, ...valueContext }, plain, colored);
    };
  }

  private resolveEmoji(level: WritableLevel, context: LogContext) {
    if (context.emoji) return context.emoji;
    const byEvent = context.event ? this.emojiMap[context.event] : undefined;
    if (byEvent) return byEvent;
    if (level !== "info" && this.emojiMap[level]) return this.emojiMap[level];
    return this.context.emoji ?? this.emojiMap[level] ?? "";
  }

  private write(
    level: WritableLevel,
    context: LogContext,
    plain: string,
    colored: string
  ) {
    if (!this.isLevelEnabled(level)) return;

    const merged: LogContext = { ...this.context, ...context };
    const { event, emoji: _emoji, error, ...rest } = merged;
    const err =
      error !== undefined
        ? serializeError(error)
        : level === "error"
          ? serializeError(new Error(plain))
          : undefined;

    const head = [...this.path, event ?? level].join(":");
    const emoji = this.resolveEmoji(level, context);
    const extra = Object.keys(rest).length > 0 ? ` ${safeStringify(rest)}` : "";
    const line = `${emoji ? `${emoji} ` : ""}${head}: ${colored}${extra}`;

    const out = consoleOf[level];
    out(line);
    if (error !== undefined && err) {
      out(err.stack ?? `${err.name}: ${err.message}`);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...rest,
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: plain,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}
