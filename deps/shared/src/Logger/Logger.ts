export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogTemplate = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): LogTemplate;
}

export type LogRecordError = {
  name: string;
  message: string;
  stack?: string;
};

/** 交給 Transport 的結構化紀錄 */
export type LogRecord = {
  time: Date;
  level: LogLevel;
  path: string[];
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: LogRecordError;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export interface Logger extends AsyncDisposable {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 新增命名空間（以 `:` 串接）並繼承上下文 */
  extend(namespace: string, context?: LogContext): Logger;
  /** 只合併上下文，不改變命名空間 */
  append(context: LogContext): Logger;
  attachTransport(transport: LogTransport): void;
}

export type EmojiMap = Partial<Record<string, string>>;

export const defaultEmojiMap: EmojiMap = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  start: "🏁",
  done: "✅",
};
