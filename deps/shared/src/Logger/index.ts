import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { ConfigError, buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { type EmojiMap, type LogLevel, logLevels } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole, serializeError } from "./LoggerConsole";

export const logLevelSchema = t.Union(logLevels.map((l) => t.Literal(l)));

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(logLevelSchema),
    LOG_FILE: t.Optional(t.String()),
  })
);

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  debug: "🐛",
  trace: "🔬",
};

export function createDefaultLoggerFromEnv(overrides?: { level?: LogLevel }) {
  const config = getLoggerConfig();
  const logger = new LoggerConsole(
    overrides?.level ?? config.LOG_LEVEL ?? "info",
    [],
    {},
    defaultEmojiMap
  );
  if (config.LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(config.LOG_FILE),
        rfs: { path: path.dirname(config.LOG_FILE) },
      })
    );
  }
  return logger;
}

/**
 * 用於最外層錯誤處理：環境變數本身有誤時改用預設 logger，
 * 避免在 catch 中再次丟出同一個 ConfigError。
 */
export function createLoggerFromEnvOrFallback() {
  try {
    return createDefaultLoggerFromEnv();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    const logger = new LoggerConsole("warn", [], {}, defaultEmojiMap);
    logger.warn({ error })`環境變數設定錯誤，改用預設 logger`;
    return logger;
  }
}
