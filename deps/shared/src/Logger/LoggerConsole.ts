import kleur from "kleur";

import {
  type EmitLevel,
  type EmojiMap,
  type LogContext,
  type LogLevel,
  type LogRecord,
  type LogTransport,
  type Logger,
  type SerializedError,
  type TemplateLog,
  logLevels,
} from "./Logger";

const levelColor: Record<EmitLevel, (text: string) => string> = {
  trace: kleur.gray,
  debug: kleur.cyan,
  info: kleur.blue,
  warn: kleur.yellow,
  error: kleur.red,
};

const consoleMethod: Record<EmitLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export class LoggerConsole implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {}

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 關閉所有 transport；extend 出來的 logger 共用同一組 */
  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await Promise.all(transports.map((t) => t[Symbol.asyncDispose]()));
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  trace(context: LogContext, message: string): void;
  trace(message: string): void;
  trace(context?: LogContext): TemplateLog;
  trace(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("trace", a, b);
  }

  debug(context: LogContext, message: string): void;
  debug(message: string): void;
  debug(context?: LogContext): TemplateLog;
  debug(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("debug", a, b);
  }

  info(context: LogContext, message: string): void;
  info(message: string): void;
  info(context?: LogContext): TemplateLog;
  info(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("info", a, b);
  }

  warn(context: LogContext, message: string): void;
  warn(message: string): void;
  warn(context?: LogContext): TemplateLog;
  warn(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("warn", a, b);
  }

  error(context: LogContext, message: string): void;
  error(message: string): void;
  error(context?: LogContext): TemplateLog;
  error(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("error", a, b);
  }

  private dispatch(
    level: EmitLevel,
    a: LogContext | string | undefined,
    b: string | undefined
  ): TemplateLog | undefined {
    if (typeof a === "string") {
      this.emit(level, {}, a);
      return;
    }
    const context = a ?? {};
    if (b !== undefined) {
      this.emit(level, context, b);
      return;
    }
    return (strings, ...values) => {
      const { message, highlighted, params } = renderTemplate(strings, values);
      this.emit(level, { ...context, ...params }, message, highlighted);
    };
  }

  private emit(
    level: EmitLevel,
    callContext: LogContext,
    message: string,
    highlighted: string = message
  ) {
    if (!this.enabled(level)) return;

    const { event, emoji, error, ...rest } = {
      ...withoutEmoji(this.context),
      ...callContext,
    };
    const serialized = serializeError(error);
    const fields: Record<string, unknown> =
      error !== undefined && !serialized ? { ...rest, error } : { ...rest };
    const eventName = event ?? level;
    const prefix = [...this.path, eventName].join(":");
    const icon = this.resolveEmoji(level, callContext.emoji, event);
    const json = safeStringify(fields);
    const line = [
      icon,
      levelColor[level](level.toUpperCase().padEnd(5)),
      `${prefix}: ${highlighted}`,
      json === "{}" ? "" : kleur.gray(json),
    ]
      .filter((part) => part !== "")
      .join(" ");

    consoleMethod[level](line);
    if (serialized) {
      consoleMethod[level](serialized.stack ?? serialized.message);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...fields,
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event: eventName,
      msg: message,
    };
    if (serialized) record.err = serialized;
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  /**
   * emoji 優先順序：呼叫時指定 → 事件對應 → 非 info 等級對應 → 繼承的 context → 等級對應
   */
  private resolveEmoji(
    level: EmitLevel,
    callEmoji: string | undefined,
    event: string | undefined
  ) {
    if (callEmoji) return callEmoji;
    const byEvent = event ? this.emojiMap[event] : undefined;
    if (byEvent) return byEvent;
    const byLevel = this.emojiMap[level];
    if (level !== "info" && byLevel) return byLevel;
    const inherited = this.context.emoji;
    if (inherited) return inherited;
    return byLevel ?? "";
  }

  private enabled(level: EmitLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }
}

function withoutEmoji(context: LogContext): LogContext {
  const { emoji: _emoji, ...rest } = context;
  return rest;
}

function renderTemplate(strings: TemplateStringsArray, values: unknown[]) {
  let message = strings[0] ?? "";
  let highlighted = message;
  const params: Record<string, unknown> = {};
  values.forEach((value, index) => {
    const text = typeof value === "string" ? value : safeStringify(value);
    const tail = strings[index + 1] ?? "";
    message += text + tail;
    highlighted += kleur.green(text) + tail;
    params[`__${index}`] = value;
  });
  return { message, highlighted, params };
}

function serializeError(error: unknown): SerializedError | undefined {
  if (!(error instanceof Error)) return undefined;
  return { name: error.name, message: error.message, stack: error.stack };
}

function safeStringify(value: unknown): string {
  try {
    return (
      JSON.stringify(value, (_key, v: unknown) => {
        if (v instanceof Error) return serializeError(v);
        if (typeof v === "bigint") return v.toString();
        return v;
      }) ?? String(value)
    );
  } catch {
    return String(value);
  }
}
