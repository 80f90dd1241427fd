import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { Logger } from "~shared/Logger";

import { mediaExtensions } from "@/constants";
import type { RunControl } from "@/services/PipelineRunner/RunControl";

export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export const defaultOutputDir = "~/Pictures/Organized";
export const defaultTrashDir = "~/Pictures/Trash";

/** `jpg, .MP4` → `[".jpg", ".mp4"]`；未指定時為全部支援格式 */
export function parseExtensionList(value: string | undefined): readonly string[] {
  if (!value) return mediaExtensions;
  return value
    .split(",")
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext !== "")
    .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`));
}

/** `a.jpg` → `a_1.jpg` */
export function withCounterSuffix(filename: string, counter: number) {
  const ext = path.extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  return `${stem}_${counter}${ext}`;
}

export async function confirm(logger: Logger, question: string) {
  const rl = createInterface({ input, output });
  const ans = (await rl.question(question)).trim().toLowerCase();
  rl.close();
  logger.debug({ answer: ans })`確認回覆`;
  return ans === "y" || ans === "yes";
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * 終端機按鍵控制：`p` 暫停/繼續，`q` 或 Ctrl-C 取消。
 * 非 TTY 時只處理 SIGINT。回傳解除綁定的函式。
 */
export function bindRunControlKeys(control: RunControl, logger: Logger) {
  const cancel = () => {
    if (control.cancelled) return;
    logger.warn({ emoji: "⏹️" })`收到取消要求，完成目前檔案後停止`;
    control.cancel();
  };

  if (!input.isTTY) {
    process.on("SIGINT", cancel);
    return () => {
      process.off("SIGINT", cancel);
    };
  }

  const onKey = (key: string) => {
    if (key === "p") {
      if (control.paused) {
        logger.info({ emoji: "▶️" })`恢復執行`;
        control.resume();
      } else {
        logger.info({ emoji: "⏸️" })`完成目前檔案後暫停，按 p 繼續`;
        control.pause();
      }
    } else if (key === "q" || key === "\u0003") {
      cancel();
    }
  };

  input.setRawMode(true);
  input.setEncoding("utf8");
  input.on("data", onKey);
  input.resume();
  return () => {
    input.off("data", onKey);
    input.setRawMode(false);
    input.pause();
  };
}
