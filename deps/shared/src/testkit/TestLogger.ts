import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole, defaultEmojiMap, logLevels } from "../Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Union(
      logLevels.map((level) => t.Literal(level)),
      { default: "silent" }
    ),
  })
);

/** 測試用 logger，預設不輸出；設定 TEST_LOG_LEVEL 可開啟。 */
export function buildTestLogger() {
  return new LoggerConsole(
    getTestLoggerConfig().TEST_LOG_LEVEL,
    ["test"],
    {},
    defaultEmojiMap
  );
}
