import type { Result } from "~shared/utils/Result";

import type { DuplicateStrategy, Fingerprint } from "@/types";

export type HashError =
  | { type: "IO_FAILURE"; message: string }
  | { type: "UNSUPPORTED_CONTENT"; message: string };

export interface ContentHasher {
  /**
   * 依策略計算檔案指紋；只讀取，不修改檔案。
   * 失敗時回傳錯誤，由呼叫端決定如何處理。
   */
  fingerprint(
    filePath: string,
    strategy: DuplicateStrategy
  ): Promise<Result<Fingerprint, HashError>>;
}
