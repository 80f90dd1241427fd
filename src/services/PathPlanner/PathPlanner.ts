import type {
  Destination,
  MediaFile,
  NamingConvention,
  ResolvedLocation,
} from "@/types";

export type PlanInput = {
  /** `YYYY:MM:DD HH:MM:SS`；缺少或無法解析時使用檔案修改時間 */
  timestamp?: string;
  location: ResolvedLocation;
  file: Pick<MediaFile, "path" | "modifiedAt">;
  outputRoot: string;
  namingConvention: NamingConvention;
};

export interface PathPlanner {
  /**
   * 純函式：相同輸入永遠得到相同的目的地，不做任何 I/O。
   * 目錄固定為 `<outputRoot>/<yyyy>/<yyyy-MM>`，副檔名沿用來源檔案。
   */
  plan(input: PlanInput): Destination;
}
