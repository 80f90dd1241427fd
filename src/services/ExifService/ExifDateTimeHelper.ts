import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { isValid, parse } from "date-fns";

import { CANONICAL_TIMESTAMP_FORMAT } from "@/constants";

/** ExifDateTime / ExifDate 的結構；只取日曆欄位，不做時區換算 */
const exifDateLike = t.Object({
  year: t.Number(),
  month: t.Number(),
  day: t.Number(),
  hour: t.Optional(t.Number()),
  minute: t.Optional(t.Number()),
  second: t.Optional(t.Number()),
});

const EXIF_RE = /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/;
const ISO_LIKE_RE = /^(?:UTC\s+)?(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/;

/**
 * 將各種日期表示轉為 `YYYY:MM:DD HH:MM:SS`（拍攝地當地時間）。
 * 規則：
 * 1) ExifDateTime / ExifDate：直接取年月日時分秒。
 * 2) 字串：接受 EXIF 格式與影片容器常見的 `[UTC ]YYYY-MM-DD HH:MM:SS`，忽略小數秒與時區尾碼。
 * 3) 全零或不合法的日期回傳 undefined。
 */
export function toCanonicalTimestamp(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;

  if (typeof value === "string") {
    const m = EXIF_RE.exec(value.trim()) ?? ISO_LIKE_RE.exec(value.trim());
    if (!m) return undefined;
    return validated(
      Number(m[1]),
      Number(m[2]),
      Number(m[3]),
      Number(m[4]),
      Number(m[5]),
      Number(m[6])
    );
  }

  if (Value.Check(exifDateLike, value)) {
    return validated(
      value.year,
      value.month,
      value.day,
      value.hour ?? 0,
      value.minute ?? 0,
      value.second ?? 0
    );
  }
  return undefined;
}

function validated(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
) {
  if (year === 0) return undefined;
  const text = `${pad(year, 4)}:${pad(month)}:${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(Math.floor(second))}`;
  const parsed = parse(text, CANONICAL_TIMESTAMP_FORMAT, new Date(0));
  return isValid(parsed) ? text : undefined;
}

function pad(n: number, width = 2) {
  return String(n).padStart(width, "0");
}
