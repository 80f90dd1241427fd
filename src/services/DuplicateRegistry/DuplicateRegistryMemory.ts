import type { Fingerprint } from "@/types";

import type { Classification, DuplicateRegistry } from "./DuplicateRegistry";

/**
 * 單次執行範圍的指紋集合，不跨執行保存。
 */
export class DuplicateRegistryMemory implements DuplicateRegistry {
  private readonly seen = new Set<string>();

  classify(fingerprint: Fingerprint): Classification {
    const key = `${fingerprint.strategy}:${fingerprint.digest}`;
    if (this.seen.has(key)) return "Duplicate";
    this.seen.add(key);
    return "Original";
  }

  get size() {
    return this.seen.size;
  }
}
