import { type StaticDecode, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * 以 typebox schema 解析 `process.env`，套用預設值並轉型。
 * 回傳的 factory 會快取第一次成功的結果。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  source: () => Record<string, string | undefined> = () => process.env
) {
  let cached: StaticDecode<T> | undefined;
  return (): StaticDecode<T> => {
    if (cached) return cached;
    cached = Value.Parse(schema, pickKeys(schema, source()));
    return cached;
  };
}

/** "true" / "1" / "false" / "0" 皆可 */
export function envBoolean() {
  return t.Boolean();
}

export function envNumber(options?: { default?: number; minimum?: number }) {
  return t.Number(options);
}

function pickKeys(schema: TObject, env: Record<string, string | undefined>) {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(schema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") picked[key] = value;
  }
  return picked;
}
