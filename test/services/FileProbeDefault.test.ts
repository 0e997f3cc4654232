import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeAll, describe, expect, test } from "vitest";

import { FileProbeDefault } from "@/services/FileProbe";

const tmpDir = "test/tmp/probe";

describe("FileProbeDefault", () => {
  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "dir"), { recursive: true });
    await writeFile(join(tmpDir, "file.pdf"), "x");
  });

  test("檔案與資料夾都算存在", async () => {
    const probe = new FileProbeDefault();
    expect(await probe.exists(join(tmpDir, "file.pdf"))).toBe(true);
    expect(await probe.exists(join(tmpDir, "dir"))).toBe(true);
    expect(await probe.exists(join(tmpDir, "none.pdf"))).toBe(false);
  });

  test("只有資料夾是 directory", async () => {
    const probe = new FileProbeDefault();
    expect(await probe.isDirectory(join(tmpDir, "dir"))).toBe(true);
    expect(await probe.isDirectory(join(tmpDir, "file.pdf"))).toBe(false);
    expect(await probe.isDirectory(join(tmpDir, "none"))).toBe(false);
  });

  test("上層是檔案時視為不存在", async () => {
    const probe = new FileProbeDefault();
    expect(await probe.exists(join(tmpDir, "file.pdf", "child"))).toBe(false);
  });
});
