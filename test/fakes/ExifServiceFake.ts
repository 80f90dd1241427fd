import { type Result, err, ok } from "~shared/utils/Result";

import type { Exif, ExifTags, ReadError } from "@/services/ExifService/Exif";
import type { ExifService } from "@/services/ExifService/ExifService";

export class ExifServiceFake implements ExifService {
  private readonly records: Map<string, Result<Exif, ReadError>> = new Map();
  readonly calls: string[] = [];

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    this.calls.push(filePath);
    const record = this.records.get(filePath);
    if (!record) {
      return err({
        type: "NO_EXIF_DATA",
        message: `No metadata: ${filePath}`,
      });
    }
    return record;
  }

  setTags(filePath: string, tags: ExifTags) {
    this.records.set(filePath, ok({ filePath, tags }));
  }

  setReadError(filePath: string, error: ReadError) {
    this.records.set(filePath, err(error));
  }
}
