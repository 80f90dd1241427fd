import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { imageExtensions, mediaExtensions, videoExtensions } from "@/constants";
import type { MediaFile, MediaKind } from "@/types";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

const imageSet: ReadonlySet<string> = new Set(imageExtensions);
const videoSet: ReadonlySet<string> = new Set(videoExtensions);

export function normalizeExtension(ext: string) {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

export function classifyMediaKind(
  extension: string,
  included: ReadonlySet<string>
): MediaKind {
  if (!included.has(extension)) return "unsupported";
  if (imageSet.has(extension)) return "image";
  if (videoSet.has(extension)) return "video";
  return "unsupported";
}

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<MediaFile[], ScanError>> {
    const isRecursive = options?.recursive ?? true;
    const includedList: readonly string[] =
      options?.includedExtensions ?? mediaExtensions;
    const included = new Set(includedList.map(normalizeExtension));
    try {
      const dirents = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = dirents
        .filter((d) => d.isFile())
        .map((d) => path.resolve(d.parentPath, d.name))
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

      const files = await Promise.all(
        fullPaths.map(async (filePath): Promise<MediaFile> => {
          const stats = await stat(filePath);
          const extension = path.extname(filePath).toLowerCase();
          return {
            path: filePath,
            extension,
            kind: classifyMediaKind(extension, included),
            size: stats.size,
            modifiedAt: stats.mtime,
          };
        })
      );
      return ok(files);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
