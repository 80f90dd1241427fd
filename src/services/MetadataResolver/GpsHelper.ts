import type { GpsCoordinates } from "@/types";

import type { ExifTags } from "../ExifService/Exif";

const NUMBER_RE = /^[+-]?\d+(?:\.\d+)?$/;
const DMS_RE =
  /^(\d+(?:\.\d+)?)\s*(?:deg|°)\s*(\d+(?:\.\d+)?)\s*'\s*(\d+(?:\.\d+)?)\s*"?\s*([NSEW])?$/i;
const TRIPLE_RE = /^(\d+(?:\.\d+)?)[,\s]+(\d+(?:\.\d+)?)[,\s]+(\d+(?:\.\d+)?)$/;

type Hemisphere = "N" | "S" | "E" | "W";

function hemisphereOf(ref: unknown): Hemisphere | undefined {
  if (typeof ref !== "string") return undefined;
  const first = ref.trim().charAt(0).toUpperCase();
  if (first === "N" || first === "S" || first === "E" || first === "W") {
    return first;
  }
  return undefined;
}

function signed(value: number, hemisphere: Hemisphere | undefined) {
  if (hemisphere === "S" || hemisphere === "W") return -Math.abs(value);
  if (hemisphere === "N" || hemisphere === "E") return Math.abs(value);
  return value;
}

function fromDms(d: number, m: number, s: number) {
  return d + m / 60 + s / 3600;
}

/**
 * 將座標轉為帶正負號的十進位度數（南緯、西經為負）。
 * 接受數字、`40 deg 48' 39.37" N`、`40 48 39.37`、`[40, 48, 39.37]`；
 * 格式不符時回傳 undefined。
 */
export function toDecimalDegrees(
  value: unknown,
  ref?: unknown
): number | undefined {
  const refHemisphere = hemisphereOf(ref);

  if (typeof value === "number") {
    return Number.isFinite(value) ? signed(value, refHemisphere) : undefined;
  }

  if (Array.isArray(value)) {
    if (value.length !== 3) return undefined;
    const [d, m, s] = value.map(Number);
    if (![d, m, s].every(Number.isFinite)) return undefined;
    return signed(fromDms(d, m, s), refHemisphere);
  }

  if (typeof value !== "string") return undefined;
  const text = value.trim();

  if (NUMBER_RE.test(text)) {
    return signed(Number(text), refHemisphere);
  }

  const dms = DMS_RE.exec(text);
  if (dms) {
    const decimal = fromDms(Number(dms[1]), Number(dms[2]), Number(dms[3]));
    return signed(decimal, refHemisphere ?? hemisphereOf(dms[4]));
  }

  const triple = TRIPLE_RE.exec(text);
  if (triple) {
    const decimal = fromDms(
      Number(triple[1]),
      Number(triple[2]),
      Number(triple[3])
    );
    return signed(decimal, refHemisphere);
  }
  return undefined;
}

export function gpsFromTags(tags: ExifTags): GpsCoordinates | undefined {
  const latitude = toDecimalDegrees(tags.GPSLatitude, tags.GPSLatitudeRef);
  const longitude = toDecimalDegrees(tags.GPSLongitude, tags.GPSLongitudeRef);
  if (latitude === undefined || longitude === undefined) return undefined;
  // 0,0 多半是裝置未定位時寫入的預設值
  if (latitude === 0 && longitude === 0) return undefined;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return undefined;
  return { latitude, longitude };
}
