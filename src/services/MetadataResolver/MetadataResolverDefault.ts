import { format } from "date-fns";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { CANONICAL_TIMESTAMP_FORMAT } from "@/constants";
import type { CaptureMetadata, MediaFile } from "@/types";

import type { ExifTags } from "../ExifService/Exif";
import { toCanonicalTimestamp } from "../ExifService/ExifDateTimeHelper";
import type { ExifService } from "../ExifService/ExifService";
import { gpsFromTags } from "./GpsHelper";
import type { ExtractionError, MetadataResolver } from "./MetadataResolver";

export const imageDateTags = [
  "DateTimeOriginal",
  "CreateDate",
  "ModifyDate",
] as const;

/** 錄製日期 → 軌道標記日期 → 編碼日期 */
export const videoDateTags = [
  "CreationDate",
  "MediaCreateDate",
  "TrackCreateDate",
  "CreateDate",
] as const;

export class MetadataResolverDefault implements MetadataResolver {
  private readonly exifService: ExifService;
  private readonly logger: Logger;

  constructor(deps: { exifService: ExifService; logger: Logger }) {
    this.exifService = deps.exifService;
    this.logger = deps.logger.extend("MetadataResolverDefault");
  }

  async extract(
    file: MediaFile
  ): Promise<Result<CaptureMetadata, ExtractionError>> {
    if (file.kind === "unsupported") {
      return err({
        type: "EXTRACTION_FAILURE",
        message: `不支援的格式: ${file.path}`,
      });
    }

    const read = await this.exifService.readExif(file.path);
    let tags: ExifTags = {};
    if (read.ok) {
      tags = read.value.tags;
    } else if (read.error.type !== "NO_EXIF_DATA") {
      return err({ type: "EXTRACTION_FAILURE", message: read.error.message });
    }

    const preferred = file.kind === "image" ? imageDateTags : videoDateTags;
    const timestamp = firstTimestamp(tags, preferred);
    const gps = file.kind === "image" ? gpsFromTags(tags) : undefined;

    if (!timestamp) {
      this.logger.debug({
        filePath: file.path,
      })`無拍攝時間 tag，改用檔案修改時間`;
    }

    return ok({
      timestamp:
        timestamp ?? format(file.modifiedAt, CANONICAL_TIMESTAMP_FORMAT),
      gps,
    });
  }
}

function firstTimestamp(tags: ExifTags, keys: readonly string[]) {
  for (const key of keys) {
    const timestamp = toCanonicalTimestamp(tags[key]);
    if (timestamp) return timestamp;
  }
  return undefined;
}
