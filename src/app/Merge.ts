import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getMergeConfig } from "@/config";
import { FileProbeDefault } from "@/services/FileProbe";
import {
  type OutputPathResolver,
  OutputPathResolverDefault,
} from "@/services/OutputPathResolver";
import { type PdfMerger, PdfMergerPdfLib } from "@/services/PdfMerger";
import { validateFilePath } from "@/utils/FilePathValidator";
import { expandHome } from "@/utils/helper";

// mri 會把純數字轉成 number，重複的選項變成陣列
export type MergeOptions = {
  outfile: unknown;
  maxAttempts: unknown;
};

export type MergeDeps = {
  logger: Logger;
  resolver: OutputPathResolver;
  merger: PdfMerger;
};

export function registerMerge(cli: CAC, baseLogger: Logger) {
  const config = getMergeConfig();
  cli
    .command("<...inputfiles>", "依序合併多個 PDF 檔案")
    .option(
      "-o, --outfile <path>",
      "輸出檔案或資料夾（以 / 結尾或既有資料夾時使用預設檔名）",
      { default: config.defaultFileName }
    )
    .option("--max-attempts <n>", "輸出檔名衝突時最多重新命名幾次", {
      default: config.maxRenameAttempts,
    })
    .example("pdf-merge a.pdf b.pdf -o out/")
    .action(async (inputFiles: string[], options: MergeOptions) => {
      const logger = baseLogger.extend("merge");
      const fileProbe = new FileProbeDefault();
      const outfile =
        lastRawOptionValue(cli.rawArgs, ["-o", "--outfile"]) ?? options.outfile;
      return runMerge(inputFiles, { ...options, outfile }, {
        logger,
        resolver: new OutputPathResolverDefault({
          fileProbe,
          logger,
          defaultFileName: config.defaultFileName,
        }),
        merger: new PdfMergerPdfLib({ logger }),
      });
    });
}

/**
 * 驗證參數 → 解析輸出路徑 → 合併。
 * 回傳程序結束代碼：成功 0，任何失敗 1。
 */
export async function runMerge(
  inputFiles: readonly string[],
  options: MergeOptions,
  { logger, resolver, merger }: MergeDeps
): Promise<number> {
  const maxAttempts = Number(options.maxAttempts);
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    logger.error({
      emoji: "❌",
      maxAttempts: options.maxAttempts,
    })`--max-attempts 必須是正整數`;
    return 1;
  }

  const requestedOutfile = normalizePathOption(options.outfile);
  if (requestedOutfile === undefined) {
    logger.error({
      emoji: "❌",
      outfile: options.outfile,
    })`--outfile 必須是路徑`;
    return 1;
  }

  const inputs = inputFiles.map((input) => expandHome(String(input)));
  const outfile = expandHome(requestedOutfile);
  for (const filePath of [...inputs, outfile]) {
    const validation = validateFilePath(filePath);
    if (isErr(validation)) {
      logger.error({
        emoji: "❌",
        error: validation.error,
      })`路徑不合法: ${validation.error.message}`;
      return 1;
    }
  }

  logger.info({ emoji: "📥", count: inputs.length })`輸入檔案：`;
  inputs.forEach((input, i) => {
    logger.info({ emoji: "📄" })`  ${i + 1}. ${input}`;
  });
  logger.info({ emoji: "📤" })`輸出：${outfile}`;

  const resolved = await resolver.resolve(outfile, { maxAttempts });
  if (isErr(resolved)) {
    logger.error({
      emoji: "🧨",
      error: resolved.error,
    })`${resolved.error.message}`;
    return 1;
  }
  if (resolved.value.attempts > 0) {
    logger.warn({
      emoji: "✏️",
      attempts: resolved.value.attempts,
    })`${outfile} 已存在，改寫入 ${resolved.value.path}`;
  }

  const merged = await merger.merge(resolved.value.path, inputs);
  if (isErr(merged)) {
    logger.error({
      emoji: "❌",
      error: merged.error,
    })`合併失敗，未產生輸出檔：${merged.error.message}`;
    return 1;
  }

  logger.info({
    event: "done",
    outputPath: merged.value.outputPath,
    pages: merged.value.pageCount,
  })`已合併 ${inputs.length} 個檔案，共 ${merged.value.pageCount} 頁 → ${merged.value.outputPath}`;
  return 0;
}

/** 重複指定時以最後一個為準；數字轉回字串 */
export function normalizePathOption(value: unknown): string | undefined {
  const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
  if (typeof last === "string") return last;
  if (typeof last === "number") return String(last);
  return undefined;
}

/**
 * 從原始參數取回選項的字面值（保留 007 這類開頭的 0）。
 * 支援 `-o value`、`--outfile value` 與 `--outfile=value`，遇到 `--` 停止。
 */
export function lastRawOptionValue(
  rawArgs: readonly string[],
  names: readonly string[]
): string | undefined {
  let found: string | undefined;
  for (let i = 0; i < rawArgs.length; i++) {
    const token = rawArgs[i];
    if (token === undefined || token === "--") break;
    const next = rawArgs[i + 1];
    if (names.includes(token) && next !== undefined) {
      found = next;
      i++;
      continue;
    }
    for (const name of names) {
      if (name.startsWith("--") && token.startsWith(`${name}=`)) {
        found = token.slice(name.length + 1);
      }
    }
  }
  return found;
}
