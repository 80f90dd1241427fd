import type { Result } from "~shared/utils/Result";

import type { MediaFile } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  recursive?: boolean;
  /** 視為可處理的副檔名；未列入者標記為 unsupported */
  includedExtensions?: readonly string[];
};

export interface FileSystemScanner {
  /**
   * 列出 rootPath 下所有一般檔案，依路徑排序並分類。
   */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<MediaFile[], ScanError>>;
}
