import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    readonly key: string,
    message: string
  ) {
    super(`環境變數 ${key} 設定錯誤: ${message}`);
    this.name = "ConfigError";
  }
}

/** 環境變數中的 "true" / "false" / "1" / "0" 會經 Value.Convert 轉為 boolean */
export function envBoolean() {
  return t.Boolean();
}

export function envNumber() {
  return t.Number();
}

type Env = Record<string, string | undefined>;

export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Env = process.env
): () => Static<T> {
  return () => {
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const raw = env[key];
      if (raw !== undefined && raw !== "") picked[key] = raw;
    }
    const value = Value.Convert(schema, Value.Default(schema, picked));
    if (!Value.Check(schema, value)) {
      const first = Value.Errors(schema, value).First();
      throw new ConfigError(
        first ? first.path.replace(/^\//, "") : "?",
        first ? first.message : "unknown"
      );
    }
    return value;
  };
}
