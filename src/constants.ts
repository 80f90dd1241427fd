export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".tiff",
  ".bmp",
  ".heic",
] as const;

export const videoExtensions = [
  ".mp4",
  ".mov",
  ".avi",
  ".mkv",
  ".wmv",
] as const;

export const mediaExtensions = [...imageExtensions, ...videoExtensions] as const;

/** 無法取得地點時使用的標籤 */
export const UNKNOWN_LOCATION = "Unknown_Location";

export const namingConventions = [
  "Date_Location",
  "Date",
  "Location",
  "Dynamic",
] as const;

export const duplicateStrategies = ["exact", "perceptual"] as const;

/** 拍攝時間的標準字串格式（date-fns pattern） */
export const CANONICAL_TIMESTAMP_FORMAT = "yyyy:MM:dd HH:mm:ss";
