import type { Result } from "~shared/utils/Result";

import type { GpsCoordinates } from "@/types";

/** 反向地理編碼取得的地址片段，皆可能缺少 */
export type GeocodeAddress = {
  /** 地標、景點名稱 */
  landmark?: string;
  city?: string;
  region?: string;
  country?: string;
};

export type GeocodeError =
  | { type: "TIMEOUT"; message: string }
  | { type: "SERVICE_ERROR"; message: string };

export interface ReverseGeocoder {
  reverse(
    coordinates: GpsCoordinates
  ): Promise<Result<GeocodeAddress, GeocodeError>>;
}
