export interface FileProbe {
  /** 路徑上是否已有任何項目（檔案、資料夾皆算） */
  exists(filePath: string): Promise<boolean>;
  isDirectory(filePath: string): Promise<boolean>;
}
