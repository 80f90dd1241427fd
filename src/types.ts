import type {
  duplicateStrategies,
  namingConventions,
} from "@/constants";

export type MediaKind = "image" | "video" | "unsupported";

export type MediaFile = {
  /** 來源檔案絕對路徑 */
  path: string;
  /** 小寫、含點的副檔名，例如 `.jpg` */
  extension: string;
  kind: MediaKind;
  size: number;
  modifiedAt: Date;
};

export type DuplicateStrategy = (typeof duplicateStrategies)[number];

export type Fingerprint = {
  strategy: DuplicateStrategy;
  digest: string;
};

export type GpsCoordinates = {
  latitude: number;
  longitude: number;
};

export type CaptureMetadata = {
  /** `YYYY:MM:DD HH:MM:SS` */
  timestamp?: string;
  gps?: GpsCoordinates;
};

export type ResolvedLocation = {
  label: string;
  found: boolean;
};

export type NamingConvention = (typeof namingConventions)[number];

export type Destination = {
  directory: string;
  filename: string;
};
