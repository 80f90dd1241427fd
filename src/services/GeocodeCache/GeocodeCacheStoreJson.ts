import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type {
  GeocodeCacheStore,
  GeocodeEntries,
  StoreReadError,
  StoreWriteError,
} from "./GeocodeCacheStore";

const geocodeEntriesSchema = t.Record(t.String(), t.String());

export class GeocodeCacheStoreJson implements GeocodeCacheStore {
  constructor(private readonly filePath: string) {}

  async read(): Promise<Result<GeocodeEntries, StoreReadError>> {
    if (!(await exists(this.filePath))) {
      return ok({});
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, "utf8"));
    } catch {
      return err("READ_ERROR");
    }
    if (!Value.Check(geocodeEntriesSchema, raw)) {
      return err("INVALID_CONTENT");
    }
    return ok(raw);
  }

  /** 先寫暫存檔再改名 */
  async write(entries: GeocodeEntries): Promise<Result<null, StoreWriteError>> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(entries, null, 2), "utf8");
      await rename(tmpPath, this.filePath);
      return ok(null);
    } catch {
      return err("WRITE_ERROR");
    }
  }
}
