import { constants, copyFile, mkdir, rename, rm, unlink } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { Destination } from "@/types";
import { exists, withCounterSuffix } from "@/utils/helper";

import type { MoveError, Relocator } from "./Relocator";

const MAX_SUFFIX = 9999;

export class RelocatorFileSystem implements Relocator {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("RelocatorFileSystem");
  }

  async place(
    sourcePath: string,
    destination: Destination
  ): Promise<Result<string, MoveError>> {
    try {
      await mkdir(destination.directory, { recursive: true });
      const target = await this.freeTarget(sourcePath, destination);
      if (target === path.resolve(sourcePath)) {
        return ok(target);
      }
      await moveFile(sourcePath, target);
      this.logger.debug({ from: sourcePath, to: target })`已搬移`;
      return ok(target);
    } catch (e) {
      return err({
        type: "MOVE_FAILURE",
        message: `${sourcePath} → ${destination.directory}: ${messageOf(e)}`,
      });
    }
  }

  async quarantine(
    sourcePath: string,
    trashRoot: string
  ): Promise<Result<string, MoveError>> {
    return this.place(sourcePath, {
      directory: trashRoot,
      filename: path.basename(sourcePath),
    });
  }

  private async freeTarget(sourcePath: string, destination: Destination) {
    const source = path.resolve(sourcePath);
    for (let counter = 0; counter <= MAX_SUFFIX; counter++) {
      const filename =
        counter === 0
          ? destination.filename
          : withCounterSuffix(destination.filename, counter);
      const candidate = path.resolve(destination.directory, filename);
      // 檔案已在目的地
      if (candidate === source) return candidate;
      if (!(await exists(candidate))) return candidate;
    }
    throw new Error(`同名檔案過多: ${destination.filename}`);
  }
}

/**
 * 同一檔案系統直接 rename；跨檔案系統時改為複製後刪除來源。
 */
async function moveFile(from: string, to: string) {
  try {
    await rename(from, to);
    return;
  } catch (e) {
    if (!isCrossDevice(e)) throw e;
  }
  await copyFile(from, to, constants.COPYFILE_EXCL);
  try {
    await unlink(from);
  } catch (e) {
    await rm(to, { force: true });
    throw e;
  }
}

function isCrossDevice(e: unknown) {
  return e instanceof Error && "code" in e && e.code === "EXDEV";
}

function messageOf(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
