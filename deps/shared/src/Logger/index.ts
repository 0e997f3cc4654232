import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { type Logger, defaultEmojiMap, logLevels } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole } from "./LoggerConsole";
export { RfsTransport } from "./RfsTransport";

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(t.Union(logLevels.map((level) => t.Literal(level)))),
    LOG_FILE: t.Optional(t.String()),
    LOG_DIR: t.Optional(t.String()),
  })
);

/**
 * 依環境變數建立預設 Logger：
 * - LOG_LEVEL：最低輸出等級，預設 info
 * - LOG_FILE / LOG_DIR：有設定 LOG_FILE 時另外寫入輪替檔案（LOG_DIR 預設 logs）
 */
export function createDefaultLoggerFromEnv(): Logger {
  const { LOG_LEVEL, LOG_FILE, LOG_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL ?? "info", [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({ filename: LOG_FILE, rfs: { path: LOG_DIR ?? "logs" } })
    );
  }
  return logger;
}
