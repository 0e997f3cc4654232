import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { runCli } from "./cli";

const logger = createDefaultLoggerFromEnv();

try {
  process.exitCode = await runCli(process.argv, logger);
} finally {
  await dispose(logger);
}
