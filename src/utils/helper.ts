import os from "node:os";
import path from "node:path";

import type { LogLevel } from "~shared/Logger";

export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** cac 對重複的 -v 會給出 boolean 陣列（-vv → [true, true]） */
export function countVerbosity(value: unknown): number {
  if (Array.isArray(value)) return value.filter(Boolean).length;
  if (typeof value === "number") return Math.max(0, Math.trunc(value));
  return value ? 1 : 0;
}

/** 0 → 沿用環境設定；1 → debug；2 以上 → trace */
export function levelOfVerbosity(verbosity: number): LogLevel | undefined {
  if (verbosity <= 0) return undefined;
  if (verbosity === 1) return "debug";
  return "trace";
}
