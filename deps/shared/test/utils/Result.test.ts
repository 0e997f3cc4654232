import { describe, expect, test } from "vitest";

import { err, isErr, isOk, ok, tryCatch } from "~shared/utils/Result";

describe("Result", () => {
  test("ok / err 與判斷函式", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(ok()).toEqual({ ok: true, value: undefined });
    expect(err("boom")).toEqual({ ok: false, error: "boom" });
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(err("boom"))).toBe(true);
  });

  test("tryCatch 將拒絕轉為 Err", async () => {
    const failed = await tryCatch(Promise.reject(new Error("壞了")), (e) =>
      e instanceof Error ? e.message : "unknown"
    );
    expect(failed).toEqual({ ok: false, error: "壞了" });

    const passed = await tryCatch(Promise.resolve(3), () => "unused");
    expect(passed).toEqual({ ok: true, value: 3 });
  });
});
