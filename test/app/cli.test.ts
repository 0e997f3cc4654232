import { mkdir, rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { MemoryTransport, buildTestLogger } from "~shared/testkit/TestLogger";

import { lastRawOptionValue, normalizePathOption } from "@/app/Merge";
import { runCli } from "@/cli";
import { exists } from "@/utils/helper";

import { readPageWidths, writePdf } from "~test/helpers/pdfFixture";

const tmpDir = resolve("test/tmp/cli");
const originalCwd = process.cwd();

function buildLogger() {
  const logger = buildTestLogger();
  const memory = new MemoryTransport();
  logger.attachTransport(memory);
  return { logger, memory };
}

function argv(...args: string[]) {
  return ["node", "pdf-merge", ...args];
}

describe("runCli", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    process.chdir(originalCwd);
    vi.restoreAllMocks();
  });

  test("沒有任何參數時輸出說明，結束代碼 0", async () => {
    const { logger } = buildLogger();
    expect(await runCli(argv(), logger)).toBe(0);
    expect(console.log).toHaveBeenCalled();
  });

  test("--help 結束代碼 0 且不合併", async () => {
    const { logger } = buildLogger();
    process.chdir(tmpDir);
    expect(await runCli(argv("a.pdf", "--help"), logger)).toBe(0);
    expect(await exists(join(tmpDir, "merged.pdf"))).toBe(false);
  });

  test("只給選項、缺少輸入檔 → 記錄錯誤，結束代碼 1", async () => {
    const { logger, memory } = buildLogger();
    expect(await runCli(argv("-o", "out/"), logger)).toBe(1);

    const [error] = memory.ofLevel("error");
    expect(error?.err?.message).toContain("missing required args");
  });

  test("合併成功，結束代碼 0", async () => {
    const a = await writePdf(join(tmpDir, "a.pdf"), [121]);
    const b = await writePdf(join(tmpDir, "b.pdf"), [122]);
    const { logger } = buildLogger();
    const out = join(tmpDir, "out", "book.pdf");

    expect(await runCli(argv(a, b, "-o", out), logger)).toBe(0);
    expect(await readPageWidths(out)).toEqual([121, 122]);
  });

  test("純數字的輸出路徑維持原字面值", async () => {
    const a = await writePdf(join(tmpDir, "a.pdf"), [130]);
    const { logger } = buildLogger();
    process.chdir(tmpDir);

    expect(await runCli(argv(a, "-o", "2024"), logger)).toBe(0);
    expect(await readPageWidths(join(tmpDir, "2024"))).toEqual([130]);

    expect(await runCli(argv(a, "--outfile", "007"), logger)).toBe(0);
    expect(await exists(join(tmpDir, "007"))).toBe(true);
    expect(await exists(join(tmpDir, "7"))).toBe(false);
  });

  test("重複指定 -o 以最後一個為準", async () => {
    const a = await writePdf(join(tmpDir, "a.pdf"), [140]);
    const { logger } = buildLogger();
    process.chdir(tmpDir);

    expect(await runCli(argv(a, "-o", "first.pdf", "-o", "2025"), logger)).toBe(0);
    expect(await exists(join(tmpDir, "2025"))).toBe(true);
    expect(await exists(join(tmpDir, "first.pdf"))).toBe(false);
  });
});

describe("normalizePathOption", () => {
  test("字串、數字與陣列", () => {
    expect(normalizePathOption("out/")).toBe("out/");
    expect(normalizePathOption(2024)).toBe("2024");
    expect(normalizePathOption(["a.pdf", 7])).toBe("7");
  });

  test("其他型別回傳 undefined", () => {
    expect(normalizePathOption(true)).toBeUndefined();
    expect(normalizePathOption(undefined)).toBeUndefined();
    expect(normalizePathOption([])).toBeUndefined();
  });
});

describe("lastRawOptionValue", () => {
  const names = ["-o", "--outfile"];

  test("取最後一次指定的字面值", () => {
    expect(lastRawOptionValue(argv("a.pdf", "-o", "007"), names)).toBe("007");
    expect(
      lastRawOptionValue(argv("-o", "x.pdf", "--outfile=0010"), names)
    ).toBe("0010");
    expect(lastRawOptionValue(argv("a.pdf"), names)).toBeUndefined();
  });

  test("-- 之後不再解析", () => {
    expect(lastRawOptionValue(argv("--", "-o", "x.pdf"), names)).toBeUndefined();
  });
});
