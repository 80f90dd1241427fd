import type { Fingerprint } from "@/types";

export type Classification = "Original" | "Duplicate";

export interface DuplicateRegistry {
  /**
   * 第一次出現的指紋為 Original 並記錄；之後相同的指紋皆為 Duplicate。
   * 查詢與寫入必須是同一步，不可拆開。
   */
  classify(fingerprint: Fingerprint): Classification;

  /** 目前已記錄的指紋數 */
  readonly size: number;
}
