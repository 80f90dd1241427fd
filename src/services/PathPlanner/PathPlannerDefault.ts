import { format, isValid, parse } from "date-fns";
import path from "node:path";

import {
  CANONICAL_TIMESTAMP_FORMAT,
  UNKNOWN_LOCATION,
  namingConventions,
} from "@/constants";
import type { Destination, NamingConvention } from "@/types";

import type { PathPlanner, PlanInput } from "./PathPlanner";

export function isNamingConvention(value: string): value is NamingConvention {
  return namingConventions.some((convention) => convention === value);
}

/**
 * 空白轉底線、去除逗號與檔名不允許的字元，連續底線合併。
 */
export function sanitizeLocation(label: string) {
  const cleaned = label
    .trim()
    .replace(/\s+/g, "_")
    .replace(/,/g, "")
    .replace(/[\\/:*?"<>|]/g, "")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
  return cleaned === "" ? UNKNOWN_LOCATION : cleaned;
}

const CANONICAL_RE = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

type DateParts = { year: string; month: string; stamp: string };

/**
 * 直接取字串中的日曆欄位，不經過本地時區的 Date，
 * 夏令時間跳過的時刻也維持原樣。
 */
function timestampParts(timestamp: string): DateParts | undefined {
  const m = CANONICAL_RE.exec(timestamp);
  if (!m) return undefined;
  if (!isValid(parse(timestamp, CANONICAL_TIMESTAMP_FORMAT, new Date(0)))) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = m;
  return {
    year,
    month,
    stamp: `${year}${month}${day}_${hour}${minute}${second}`,
  };
}

function modifiedParts(date: Date): DateParts {
  return {
    year: format(date, "yyyy"),
    month: format(date, "MM"),
    stamp: format(date, "yyyyMMdd_HHmmss"),
  };
}

export class PathPlannerDefault implements PathPlanner {
  plan(input: PlanInput): Destination {
    const captured = input.timestamp
      ? timestampParts(input.timestamp)
      : undefined;
    const date = captured ?? modifiedParts(input.file.modifiedAt);
    const dateStr = date.stamp;
    const location = input.location.found
      ? sanitizeLocation(input.location.label)
      : UNKNOWN_LOCATION;

    let stem: string;
    switch (input.namingConvention) {
      case "Date":
        stem = dateStr;
        break;
      case "Location":
        stem = location;
        break;
      case "Dynamic":
        stem = input.location.found ? `${dateStr}_${location}` : dateStr;
        break;
      case "Date_Location":
      default:
        stem = `${dateStr}_${location}`;
    }

    return {
      directory: path.join(
        input.outputRoot,
        date.year,
        `${date.year}-${date.month}`
      ),
      filename: `${stem}${path.extname(input.file.path)}`,
    };
  }
}
