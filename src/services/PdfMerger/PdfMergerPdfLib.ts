import {
  type FileHandle,
  mkdir,
  open,
  rm,
  writeFile,
} from "node:fs/promises";
import path from "node:path";
import { PDFDocument, type PDFPage } from "pdf-lib";

import type { Logger } from "~shared/Logger";
import {
  type Result,
  err,
  errorMessage,
  isErr,
  ok,
  tryCatch,
} from "~shared/utils/Result";

import { isAlreadyExists } from "@/utils/helper";

import type { MergeError, MergeSummary, PdfMerger } from "./PdfMerger";

export class PdfMergerPdfLib implements PdfMerger {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("PdfMergerPdfLib");
  }

  async merge(
    outputPath: string,
    inputPaths: readonly string[]
  ): Promise<Result<MergeSummary, MergeError>> {
    const result = await PDFDocument.create();
    const inputs: MergeSummary["inputs"] = [];

    // 依序處理，頁面順序必須與輸入順序一致
    for (const inputPath of inputPaths) {
      const bytes = await readInput(inputPath);
      if (!bytes.ok) return bytes;

      let pages: PDFPage[];
      try {
        const source = await PDFDocument.load(bytes.value);
        pages = await result.copyPages(source, source.getPageIndices());
      } catch (e) {
        return err<MergeError>({
          type: "INPUT_PARSE_FAILED",
          inputPath,
          message: `無法解析 PDF: ${inputPath} (${errorMessage(e)})`,
        });
      }

      for (const page of pages) result.addPage(page);
      inputs.push({ path: inputPath, pageCount: pages.length });
      this.logger.debug({
        emoji: "📄",
        inputPath,
        pages: pages.length,
      })`已附加 ${inputPath}`;
    }

    // dirname("merged.pdf") 為 "."，即目前目錄
    const directory = path.dirname(outputPath);
    const made = await tryCatch(
      mkdir(directory, { recursive: true }),
      (e): MergeError => ({
        type: "OUTPUT_DIR_FAILED",
        outputPath,
        message: `無法建立輸出資料夾 ${directory}: ${errorMessage(e)}`,
      })
    );
    if (isErr(made)) return made;

    const output = await tryCatch(
      result.save(),
      (e): MergeError => ({
        type: "OUTPUT_WRITE_FAILED",
        outputPath,
        message: `無法產生 PDF: ${errorMessage(e)}`,
      })
    );
    if (isErr(output)) return output;

    // wx：解析後才出現的同名檔案也不覆蓋
    try {
      await writeFile(outputPath, output.value, { flag: "wx" });
    } catch (e) {
      // 檔案是 wx 建立的才刪，避免留下寫到一半的輸出
      if (!isAlreadyExists(e)) await rm(outputPath, { force: true });
      return err<MergeError>({
        type: "OUTPUT_WRITE_FAILED",
        outputPath,
        message: `無法寫入 ${outputPath}: ${errorMessage(e)}`,
      });
    }

    return ok({ outputPath, pageCount: result.getPageCount(), inputs });
  }
}

async function readInput(
  inputPath: string
): Promise<Result<Uint8Array, MergeError>> {
  const fail = (e: unknown) =>
    err<MergeError>({
      type: "INPUT_READ_FAILED",
      inputPath,
      message: `無法讀取 ${inputPath}: ${errorMessage(e)}`,
    });

  let handle: FileHandle;
  try {
    handle = await open(inputPath, "r");
  } catch (e) {
    return fail(e);
  }
  try {
    return ok(await handle.readFile());
  } catch (e) {
    return fail(e);
  } finally {
    await handle.close();
  }
}
