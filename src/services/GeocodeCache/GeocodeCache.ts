import type { GpsCoordinates, ResolvedLocation } from "@/types";

export type GeocodeCacheStats = {
  hits: number;
  misses: number;
  lookups: number;
  failures: number;
};

export interface GeocodeCache {
  /** 從保存處載入既有快取；內容毀損時以空快取開始 */
  load(): Promise<void>;

  /**
   * 將座標轉為地點標籤，永不失敗。
   * 無座標或查詢失敗時回傳 `{ label: "Unknown_Location", found: false }`。
   */
  resolve(coordinates?: GpsCoordinates): Promise<ResolvedLocation>;

  stats(): GeocodeCacheStats;
}
