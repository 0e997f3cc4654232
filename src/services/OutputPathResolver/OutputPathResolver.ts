import type { Result } from "~shared/utils/Result";

export interface OutputPathResolver {
  /**
   * 將使用者要求的輸出路徑（可能是資料夾）轉為目前不存在的具體檔案路徑。
   * 已存在時在檔名第一段後加上遞增數字，超過重試上限則回傳錯誤。
   */
  resolve(
    requestedPath: string,
    options?: ResolveOptions
  ): Promise<Result<ResolvedOutputPath, TooManyRenameAttemptsError>>;
}

export type ResolveOptions = {
  defaultFileName?: string;
  maxAttempts?: number;
};

export type ResolvedOutputPath = {
  path: string;
  attempts: number; // 0 表示沿用原路徑
};

export type TooManyRenameAttemptsError = {
  type: "TOO_MANY_RENAME_ATTEMPTS";
  message: string;
  attempts: number;
  maxAttempts: number;
  requestedPath: string;
  fileName: string;
};
