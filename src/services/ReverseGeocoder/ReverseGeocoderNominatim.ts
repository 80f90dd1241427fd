import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { type Result, err, ok } from "~shared/utils/Result";

import type { GpsCoordinates } from "@/types";

import type {
  GeocodeAddress,
  GeocodeError,
  ReverseGeocoder,
} from "./ReverseGeocoder";

const reverseResponseSchema = t.Object({
  name: t.Optional(t.String()),
  category: t.Optional(t.String()),
  address: t.Optional(t.Record(t.String(), t.String())),
  error: t.Optional(t.String()),
});

type ReverseResponse = typeof reverseResponseSchema.static;

const landmarkKeys = [
  "attraction",
  "tourism",
  "historic",
  "leisure",
  "amenity",
  "man_made",
];
const landmarkCategories = new Set(landmarkKeys);
const cityKeys = ["city", "town", "village", "hamlet", "municipality"];
const regionKeys = ["state", "province", "region", "county"];

/**
 * OpenStreetMap Nominatim `/reverse` 用戶端。
 * 服務要求帶可識別的 User-Agent，且每秒不超過一次請求。
 */
export class ReverseGeocoderNominatim implements ReverseGeocoder {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly language: string;

  constructor(options: {
    baseUrl: string;
    userAgent: string;
    timeoutMs?: number;
    language?: string;
  }) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.language = options.language ?? "en";
  }

  async reverse(
    coordinates: GpsCoordinates
  ): Promise<Result<GeocodeAddress, GeocodeError>> {
    const url = new URL(`${this.baseUrl}/reverse`);
    url.searchParams.set("format", "jsonv2");
    url.searchParams.set("lat", String(coordinates.latitude));
    url.searchParams.set("lon", String(coordinates.longitude));
    url.searchParams.set("zoom", "18");
    url.searchParams.set("addressdetails", "1");
    url.searchParams.set("accept-language", this.language);

    let body: unknown;
    try {
      const response = await fetch(url, {
        headers: { "User-Agent": this.userAgent, Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        return err({
          type: "SERVICE_ERROR",
          message: `HTTP ${response.status} ${response.statusText}`,
        });
      }
      body = await response.json();
    } catch (e) {
      if (e instanceof Error && e.name === "TimeoutError") {
        return err({
          type: "TIMEOUT",
          message: `逾時 (${this.timeoutMs}ms)`,
        });
      }
      return err({
        type: "SERVICE_ERROR",
        message: e instanceof Error ? e.message : String(e),
      });
    }

    if (!Value.Check(reverseResponseSchema, body)) {
      return err({ type: "SERVICE_ERROR", message: "無法解析回應內容" });
    }
    return ok(toAddress(body));
  }
}

export function toAddress(response: ReverseResponse): GeocodeAddress {
  // 例如海上座標，服務回傳 { error: "Unable to geocode" }
  if (response.error) return {};
  const address = response.address ?? {};
  const pick = (keys: string[]) =>
    keys.map((key) => address[key]).find((v) => v !== undefined && v !== "");
  const namedLandmark =
    response.category && landmarkCategories.has(response.category)
      ? response.name || undefined
      : undefined;
  return {
    landmark: pick(landmarkKeys) ?? namedLandmark,
    city: pick(cityKeys),
    region: pick(regionKeys),
    country: pick(["country"]),
  };
}
