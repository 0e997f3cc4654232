import { type StaticDecode, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * 以 TypeBox schema 解析環境變數。
 * 不在 schema 內的變數會被忽略；值不合法時拋出 ConfigError。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  source: () => Record<string, string | undefined> = () => process.env
): () => StaticDecode<T> {
  return () => {
    const raw: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = source()[key];
      if (value !== undefined && value !== "") raw[key] = value;
    }
    if (!Value.Check(schema, raw)) {
      const issues = [...Value.Errors(schema, raw)].map(
        (e) => `${e.path}: ${e.message}`
      );
      throw new ConfigError(`環境變數設定不合法: ${issues.join("; ")}`, issues);
    }
    try {
      return Value.Decode(schema, raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`環境變數設定不合法: ${message}`, [message]);
    }
  };
}

export function envBoolean() {
  return t
    .Transform(
      t.Union([
        t.Literal("true"),
        t.Literal("false"),
        t.Literal("1"),
        t.Literal("0"),
      ])
    )
    .Decode((v) => v === "true" || v === "1")
    .Encode((v): "true" | "false" => (v ? "true" : "false"));
}

export function envInteger(options?: { minimum?: number }) {
  const minimum = options?.minimum ?? Number.MIN_SAFE_INTEGER;
  return t
    .Transform(t.String({ pattern: "^-?\\d+$" }))
    .Decode((v) => {
      const n = Number.parseInt(v, 10);
      if (n < minimum) throw new Error(`必須 >= ${minimum}`);
      return n;
    })
    .Encode((v) => String(v));
}
