import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";
import { LoggerConsole, defaultEmojiMap, logLevelSchema } from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Optional(logLevelSchema),
  })
);

/** 測試預設不輸出，需要除錯時設定 TEST_LOG_LEVEL=debug */
export function buildTestLogger() {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL ?? "silent", [], {}, defaultEmojiMap);
}
