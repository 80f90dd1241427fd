/** 扁平的 tag → value 對照，值的型別依 tag 而異 */
export type ExifTags = Record<string, unknown>;

export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 原始 tag，例如 DateTimeOriginal、GPSLatitude、GPSLatitudeRef */
  tags: ExifTags;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
