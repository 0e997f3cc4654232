import type { Result } from "~shared/utils/Result";

export interface PdfMerger {
  /**
   * 依輸入順序將所有頁面附加到新文件後寫入 outputPath。
   * 任何一個輸入失敗都不會產生輸出檔。
   */
  merge(
    outputPath: string,
    inputPaths: readonly string[]
  ): Promise<Result<MergeSummary, MergeError>>;
}

export type MergeSummary = {
  outputPath: string;
  pageCount: number;
  inputs: Array<{ path: string; pageCount: number }>;
};

export type MergeError =
  | {
      type: "INPUT_READ_FAILED" | "INPUT_PARSE_FAILED";
      inputPath: string;
      message: string;
    }
  | {
      type: "OUTPUT_DIR_FAILED" | "OUTPUT_WRITE_FAILED";
      outputPath: string;
      message: string;
    };
