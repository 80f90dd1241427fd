import type { Result } from "~shared/utils/Result";

import type { Exif, ReadError } from "./Exif";

export interface ExifService {
  /**
   * 讀取相片 EXIF 或影片容器的 tag，原樣回傳不做轉換。
   * 沒有任何 tag 時回傳 NO_EXIF_DATA，由呼叫端決定是否退回其他來源。
   */
  readExif(filePath: string): Promise<Result<Exif, ReadError>>;
}
