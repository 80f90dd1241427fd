import { type ExifTool, exiftool as sharedExifTool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type { Exif, ExifTags, ReadError } from "./Exif";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  constructor(private readonly exiftool: ExifTool = sharedExifTool) {}

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    if (!(await exists(filePath))) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `找不到檔案: ${filePath}`,
      });
    }
    try {
      const tags = await this.exiftool.read(filePath);
      const flat: ExifTags = { ...tags };
      if (Object.keys(flat).length === 0) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無 EXIF 資料: ${filePath}`,
        });
      }
      return ok({ filePath, tags: flat });
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.exiftool.end();
  }
}
