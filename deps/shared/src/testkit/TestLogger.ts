import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import {
  type LogRecord,
  type LogTransport,
  LoggerConsole,
  logLevels,
} from "../Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Optional(
      t.Union(logLevels.map((level) => t.Literal(level)))
    ),
  })
);

export function buildTestLogger() {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL ?? "warn").extend("test");
}

/** 收集紀錄供測試斷言 */
export class MemoryTransport implements LogTransport {
  readonly records: LogRecord[] = [];

  write(record: LogRecord) {
    this.records.push(record);
  }

  ofLevel(level: LogRecord["level"]) {
    return this.records.filter((r) => r.level === level);
  }

  async [Symbol.asyncDispose]() {
    this.records.length = 0;
  }
}
