import { format } from "date-fns";
import kleur from "kleur";

import { dispose } from "../utils/Disposeable";
import {
  type EmojiMap,
  type LogContext,
  type LogLevel,
  type LogRecord,
  type LogRecordError,
  type LogTemplate,
  type LogTransport,
  type Logger,
  defaultEmojiMap,
  logLevels,
} from "./Logger";

type Message = { text: string; plain: string };

const consoleByLevel: Record<LogLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export class LoggerConsole implements Logger {
  private readonly inheritedEmoji: string | undefined;
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly transports: LogTransport[] = []
  ) {
    const { emoji, ...rest } = context;
    this.inheritedEmoji = emoji;
    this.context = rest;
  }

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): LogTemplate;
  trace(context?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("trace", this.trace, context, message);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): LogTemplate;
  debug(context?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("debug", this.debug, context, message);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): LogTemplate;
  info(context?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("info", this.info, context, message);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): LogTemplate;
  warn(context?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("warn", this.warn, context, message);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): LogTemplate;
  error(context?: LogContext | string, message?: string): LogTemplate | void {
    return this.dispatch("error", this.error, context, message);
  }

  extend(namespace: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, namespace],
      this.inherit(context),
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      this.inherit(context),
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await dispose(...transports);
  }

  private inherit(context: LogContext): LogContext {
    return {
      ...this.context,
      ...context,
      emoji: context.emoji ?? this.inheritedEmoji,
    };
  }

  private dispatch(
    level: LogLevel,
    caller: (...args: never[]) => unknown,
    context?: LogContext | string,
    message?: string
  ): LogTemplate | undefined {
    if (!this.isEnabled(level)) return () => {};

    // error 沒帶 Error 時仍要能指出呼叫位置
    let callSite: string | undefined;
    if (level === "error") {
      const holder = new Error();
      Error.captureStackTrace(holder, caller);
      callSite = holder.stack;
    }

    if (typeof context === "string") {
      this.write(level, {}, { text: context, plain: context }, callSite);
      return undefined;
    }
    const base = context ?? {};
    if (message !== undefined) {
      this.write(level, base, { text: message, plain: message }, callSite);
      return undefined;
    }
    return (strings: TemplateStringsArray, ...values: unknown[]) => {
      const templateContext: Record<string, unknown> = {};
      let text = strings[0] ?? "";
      let plain = text;
      values.forEach((value, i) => {
        const rest = strings[i + 1] ?? "";
        templateContext[`__${i}`] = value;
        text += kleur.green(formatValue(value)) + rest;
        plain += formatValue(value) + rest;
      });
      this.write(
        level,
        { ...base, ...templateContext },
        { text, plain },
        callSite
      );
    };
  }

  private isEnabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private write(
    level: LogLevel,
    context: LogContext,
    message: Message,
    callSite: string | undefined
  ) {
    const { event, emoji, error, ...rest } = context;
    const fields: Record<string, unknown> = { ...this.context, ...rest };

    let err: LogRecordError | undefined;
    if (error instanceof Error) {
      err = { name: error.name, message: error.message, stack: error.stack };
    } else {
      if (error !== undefined) fields.error = error;
      if (callSite !== undefined) {
        err = {
          name: "Error",
          message: message.plain,
          stack: replaceStackHeader(callSite, `Error: ${message.plain}`),
        };
      }
    }

    const record: LogRecord = {
      time: new Date(),
      level,
      path: this.path,
      event,
      msg: message.plain,
      context: fields,
      err,
    };

    const icon =
      emoji ??
      (event ? this.emojiMap[event] : undefined) ??
      (level === "warn" || level === "error"
        ? this.emojiMap[level]
        : undefined) ??
      this.inheritedEmoji ??
      this.emojiMap[level] ??
      "";
    const label = [...this.path, event ?? level].join(":");
    const json =
      Object.keys(fields).length > 0
        ? " " + kleur.gray(JSON.stringify(fields, jsonReplacer))
        : "";
    const time = kleur.dim(format(record.time, "HH:mm:ss.SSS"));
    let line = `${time} ${icon} ${label}: ${message.text}${json}`;
    if (level === "error" && err?.stack) line += `\n${err.stack}`;

    consoleByLevel[level](line);
    for (const transport of this.transports) transport.write(record);
  }
}

function replaceStackHeader(stack: string, header: string) {
  const newline = stack.indexOf("\n");
  return newline === -1 ? header : header + stack.slice(newline);
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value, jsonReplacer);
  }
  return String(value);
}

export function jsonReplacer(_key: string, value: unknown) {
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (typeof value === "bigint") return value.toString();
  return value;
}
