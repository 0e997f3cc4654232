import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import {
  DEFAULT_MERGE_OUTPUT_FILE_NAME,
  MAX_NUM_OF_RENAME_ATTEMPTS,
} from "@/constants";
import type { FileProbe } from "@/services/FileProbe";
import { endsWithSeparator } from "@/utils/helper";

import type {
  OutputPathResolver,
  ResolveOptions,
  ResolvedOutputPath,
  TooManyRenameAttemptsError,
} from "./OutputPathResolver";

/**
 * 拆出「資料夾前綴」與檔名，前綴原樣保留（含最後的分隔符號）。
 *   out/merged.pdf → ["out/", "merged.pdf"]
 *   merged.pdf     → ["", "merged.pdf"]
 */
function splitDirectory(filePath: string): [string, string] {
  const index = Math.max(
    filePath.lastIndexOf("/"),
    filePath.lastIndexOf(path.sep)
  );
  return [filePath.slice(0, index + 1), filePath.slice(index + 1)];
}

/**
 * archive.tar.gz + 3 → archive3.tar.gz
 * 數字接在第一段之後，而不是最後一個副檔名之前。
 */
export function numberedFileName(fileName: string, attempt: number) {
  const [first = "", ...rest] = fileName.split(".");
  return [`${first}${attempt}`, ...rest].join(".");
}

export class OutputPathResolverDefault implements OutputPathResolver {
  private readonly fileProbe: FileProbe;
  private readonly defaultFileName: string;
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(deps: {
    fileProbe: FileProbe;
    logger: Logger;
    defaultFileName?: string;
    maxAttempts?: number;
  }) {
    this.fileProbe = deps.fileProbe;
    this.defaultFileName =
      deps.defaultFileName ?? DEFAULT_MERGE_OUTPUT_FILE_NAME;
    this.maxAttempts = deps.maxAttempts ?? MAX_NUM_OF_RENAME_ATTEMPTS;
    this.logger = deps.logger.extend("OutputPathResolverDefault");
  }

  async resolve(
    requestedPath: string,
    options?: ResolveOptions
  ): Promise<Result<ResolvedOutputPath, TooManyRenameAttemptsError>> {
    const defaultFileName = options?.defaultFileName ?? this.defaultFileName;
    const maxAttempts = options?.maxAttempts ?? this.maxAttempts;

    const workingPath = await this.toFilePath(requestedPath, defaultFileName);
    if (!(await this.fileProbe.exists(workingPath))) {
      return ok({ path: workingPath, attempts: 0 });
    }

    const [directory, fileName] = splitDirectory(workingPath);
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const candidate = directory + numberedFileName(fileName, attempt);
      if (!(await this.fileProbe.exists(candidate))) {
        this.logger.debug({
          emoji: "✏️",
          from: workingPath,
          to: candidate,
        })`輸出檔已存在，改用 ${candidate}`;
        return ok({ path: candidate, attempts: attempt });
      }
    }

    const attempts = maxAttempts + 1;
    return err<TooManyRenameAttemptsError>({
      type: "TOO_MANY_RENAME_ATTEMPTS",
      message: `'${workingPath}' 已超過最大重新命名次數（嘗試 ${attempts} 次，上限 ${maxAttempts}）`,
      attempts,
      maxAttempts,
      requestedPath,
      fileName: workingPath,
    });
  }

  /** 結尾為分隔符號或既有資料夾時，補上預設檔名 */
  private async toFilePath(requestedPath: string, defaultFileName: string) {
    if (endsWithSeparator(requestedPath)) {
      return requestedPath + defaultFileName;
    }
    if (await this.fileProbe.isDirectory(requestedPath)) {
      return requestedPath + path.sep + defaultFileName;
    }
    return requestedPath;
  }
}
