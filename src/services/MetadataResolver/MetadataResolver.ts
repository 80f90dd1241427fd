import type { Result } from "~shared/utils/Result";

import type { CaptureMetadata, MediaFile } from "@/types";

export type ExtractionError = {
  type: "EXTRACTION_FAILURE";
  message: string;
};

export interface MetadataResolver {
  /**
   * 取得拍攝時間與 GPS。
   * 相片依 DateTimeOriginal → CreateDate → ModifyDate，影片依容器日期；
   * 都沒有時退回檔案修改時間。影片不取 GPS。
   */
  extract(file: MediaFile): Promise<Result<CaptureMetadata, ExtractionError>>;
}
