import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { type EmojiMap, logLevels } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      logLevels.map((level) => t.Literal(level)),
      { default: "info" }
    ),
    LOG_FILE: t.Optional(t.String()),
    LOG_DIR: t.String({ default: "logs" }),
  })
);

/**
 * 依環境變數建立預設 logger；設定 LOG_FILE 時另外寫入每日輪替的檔案。
 */
export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE, LOG_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: LOG_FILE,
        rfs: { path: LOG_DIR, interval: "1d", maxFiles: 14 },
      })
    );
  }
  return logger;
}
