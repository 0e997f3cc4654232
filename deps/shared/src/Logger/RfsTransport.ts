import kleur from "kleur";
import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";
import { jsonReplacer } from "./LoggerConsole";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON Lines 寫入輪替檔案；檔案無法寫入時停用自己，不影響主流程 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private failure: Error | undefined;
  private readonly failed: Promise<void>;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 5,
      ...options.rfs,
    });
    this.failed = new Promise((resolve) => {
      this.stream.on("error", (error: Error) => {
        if (this.failure === undefined) {
          console.error(
            `${kleur.red("✖")} 無法寫入日誌檔 ${options.filename}: ${error.message}`
          );
          this.failure = error;
        }
        resolve();
      });
    });
  }

  get disabled() {
    return this.failure !== undefined;
  }

  write(record: LogRecord) {
    if (this.disabled) return;
    const line = {
      time: record.time.toISOString(),
      level: record.level,
      path: record.path.join(":"),
      event: record.event,
      msg: record.msg,
      ...record.context,
      err: record.err,
    };
    this.stream.write(JSON.stringify(line, jsonReplacer) + "\n");
  }

  async [Symbol.asyncDispose]() {
    if (this.disabled || this.stream.writableEnded) return;
    // 結束途中出錯時 end 的 callback 不一定會被呼叫
    await Promise.race([
      new Promise<void>((resolve) => this.stream.end(() => resolve())),
      this.failed,
    ]);
  }
}
