import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";

import {
  endsWithSeparator,
  expandHome,
  isAlreadyExists,
  isNotFound,
} from "@/utils/helper";

describe("helper", () => {
  test("expandHome 展開 ~/", () => {
    expect(expandHome("~/docs/a.pdf")).toBe(
      path.join(os.homedir(), "docs/a.pdf")
    );
    expect(expandHome("~")).toBe(os.homedir());
    expect(expandHome("docs/~/a.pdf")).toBe("docs/~/a.pdf");
  });

  test("endsWithSeparator", () => {
    expect(endsWithSeparator("out/")).toBe(true);
    expect(endsWithSeparator("out")).toBe(false);
  });

  test("isNotFound 只認 ENOENT 與 ENOTDIR", () => {
    const enoent = Object.assign(new Error("missing"), { code: "ENOENT" });
    const eacces = Object.assign(new Error("denied"), { code: "EACCES" });
    expect(isNotFound(enoent)).toBe(true);
    expect(isNotFound(eacces)).toBe(false);
    expect(isNotFound("ENOENT")).toBe(false);
  });

  test("isAlreadyExists 只認 EEXIST", () => {
    const eexist = Object.assign(new Error("exists"), { code: "EEXIST" });
    expect(isAlreadyExists(eexist)).toBe(true);
    expect(isAlreadyExists(new Error("plain"))).toBe(false);
  });
});
