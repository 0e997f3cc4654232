import { cac } from "cac";

import type { Logger } from "~shared/Logger";

import { registerMerge } from "./app/Merge";

/**
 * 解析參數並執行命令，回傳程序結束代碼。
 * 完全沒有參數時輸出說明；缺少輸入檔等參數錯誤回傳 1。
 */
export async function runCli(argv: string[], logger: Logger): Promise<number> {
  try {
    const cli = cac("pdf-merge");
    registerMerge(cli, logger);
    cli.help();
    const parsed = cli.parse(argv, { run: false });

    // --help 時 cac 已輸出說明
    if (parsed.options.help) return 0;
    if (argv.length <= 2 || !cli.matchedCommand) {
      cli.outputHelp();
      return 0;
    }

    const code: unknown = await cli.runMatchedCommand();
    return typeof code === "number" ? code : 0;
  } catch (error) {
    logger.error({ error }, "執行命令時發生錯誤");
    return 1;
  }
}
