import type { Result } from "~shared/utils/Result";

/** key = `lat,lon`（小數 5 位）→ 地點標籤 */
export type GeocodeEntries = Record<string, string>;

export type StoreReadError = "READ_ERROR" | "INVALID_CONTENT";
export type StoreWriteError = "WRITE_ERROR";

export interface GeocodeCacheStore {
  /** 檔案不存在時視為空快取 */
  read(): Promise<Result<GeocodeEntries, StoreReadError>>;
  write(entries: GeocodeEntries): Promise<Result<null, StoreWriteError>>;
}
