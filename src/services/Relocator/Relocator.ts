import type { Result } from "~shared/utils/Result";

import type { Destination } from "@/types";

export type MoveError = { type: "MOVE_FAILURE"; message: string };

export interface Relocator {
  /**
   * 將檔案搬到 `destination.directory/destination.filename`，必要時建立目錄。
   * 目標已存在時加上 `_1`、`_2`… 後綴，不覆蓋。
   * 失敗時來源檔案保持原狀。
   */
  place(
    sourcePath: string,
    destination: Destination
  ): Promise<Result<string, MoveError>>;

  /** 將重複檔案以原檔名搬進垃圾桶目錄，同樣不覆蓋 */
  quarantine(
    sourcePath: string,
    trashRoot: string
  ): Promise<Result<string, MoveError>>;
}
