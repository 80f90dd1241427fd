export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;

export type LogLevel = (typeof logLevels)[number];
export type EmitLevel = Exclude<LogLevel, "silent">;

export type LogContext = {
  /** 事件名稱，會顯示在訊息前綴 */
  event?: string;
  /** 覆寫本次輸出的 emoji */
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type EmojiMap = Partial<Record<string, string>>;

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 延伸命名空間，並合併 context */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變命名空間 */
  append(context: LogContext): Logger;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: EmitLevel;
  path: string;
  event: string;
  msg: string;
  err?: SerializedError;
  [key: string]: unknown;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}
