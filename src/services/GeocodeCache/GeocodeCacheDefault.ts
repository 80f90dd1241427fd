import { setTimeout as sleep } from "node:timers/promises";

import type { Logger } from "~shared/Logger";

import { UNKNOWN_LOCATION } from "@/constants";
import type { GpsCoordinates, ResolvedLocation } from "@/types";

import type { GeocodeAddress, ReverseGeocoder } from "../ReverseGeocoder";
import type { GeocodeCache, GeocodeCacheStats } from "./GeocodeCache";
import type { GeocodeCacheStore, GeocodeEntries } from "./GeocodeCacheStore";

const notFound: ResolvedLocation = { label: UNKNOWN_LOCATION, found: false };

export function toCacheKey(coordinates: GpsCoordinates) {
  return `${coordinates.latitude.toFixed(5)},${coordinates.longitude.toFixed(5)}`;
}

/**
 * 地標 → 城市、行政區、國家 → 只有國家 → Unknown_Location
 */
export function buildLocationLabel(address: GeocodeAddress) {
  if (address.landmark) return address.landmark;
  if (address.city) {
    return [address.city, address.region, address.country]
      .filter((part) => part !== undefined && part !== "")
      .join(", ");
  }
  if (address.country) return address.country;
  return UNKNOWN_LOCATION;
}

export class GeocodeCacheDefault implements GeocodeCache {
  private readonly geocoder: ReverseGeocoder;
  private readonly store: GeocodeCacheStore;
  private readonly logger: Logger;
  private readonly attempts: number;
  private readonly backoffMs: number;
  private readonly wait: (ms: number) => Promise<unknown>;

  private entries: GeocodeEntries = {};
  private loaded = false;
  private readonly counters: GeocodeCacheStats = {
    hits: 0,
    misses: 0,
    lookups: 0,
    failures: 0,
  };

  constructor(deps: {
    geocoder: ReverseGeocoder;
    store: GeocodeCacheStore;
    logger: Logger;
    /** 每個 key 最多查詢次數，預設 3 */
    attempts?: number;
    /** 兩次查詢之間的固定等待，預設 1000ms */
    backoffMs?: number;
    wait?: (ms: number) => Promise<unknown>;
  }) {
    this.geocoder = deps.geocoder;
    this.store = deps.store;
    this.logger = deps.logger.extend("GeocodeCacheDefault");
    this.attempts = Math.max(1, deps.attempts ?? 3);
    this.backoffMs = deps.backoffMs ?? 1000;
    this.wait = deps.wait ?? ((ms) => sleep(ms));
  }

  async load() {
    const result = await this.store.read();
    this.loaded = true;
    if (!result.ok) {
      this.logger.warn({
        emoji: "🧹",
        error: result.error,
      })`地點快取無法讀取，以空快取開始`;
      this.entries = {};
      return;
    }
    this.entries = { ...result.value };
    this.logger.debug({
      count: Object.keys(this.entries).length,
    })`地點快取已載入`;
  }

  async resolve(coordinates?: GpsCoordinates): Promise<ResolvedLocation> {
    if (!coordinates) return notFound;
    if (!this.loaded) await this.load();

    const key = toCacheKey(coordinates);
    const cached = this.entries[key];
    if (cached !== undefined) {
      this.counters.hits++;
      return { label: cached, found: true };
    }
    this.counters.misses++;

    const address = await this.lookup(key, coordinates);
    if (!address) {
      this.counters.failures++;
      return notFound;
    }

    const label = buildLocationLabel(address);
    this.entries[key] = label;
    const saved = await this.store.write(this.entries);
    if (!saved.ok) {
      this.logger.error({
        key,
        error: saved.error,
      })`地點快取寫入失敗，本次執行仍使用記憶體中的結果`;
    }
    return { label, found: true };
  }

  stats(): GeocodeCacheStats {
    return { ...this.counters };
  }

  private async lookup(key: string, coordinates: GpsCoordinates) {
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      this.counters.lookups++;
      try {
        const result = await this.geocoder.reverse(coordinates);
        if (result.ok) return result.value;
        this.logger.warn({
          key,
          attempt,
          error: result.error,
        })`反向地理編碼失敗 (${attempt}/${this.attempts})`;
      } catch (error) {
        this.logger.warn({
          key,
          attempt,
          error,
        })`反向地理編碼發生例外 (${attempt}/${this.attempts})`;
      }
      if (attempt < this.attempts) await this.wait(this.backoffMs);
    }
    return undefined;
  }
}
