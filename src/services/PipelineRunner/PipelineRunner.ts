import type {
  DuplicateStrategy,
  MediaKind,
  NamingConvention,
} from "@/types";

import type { GeocodeCacheStats } from "../GeocodeCache/GeocodeCache";
import type { RunSignal } from "./RunControl";

export type RunPhase =
  | "Idle"
  | "Running"
  | "Paused"
  | "Completed"
  | "Cancelled"
  | "Failed";

export type TerminalPhase = Extract<RunPhase, "Completed" | "Cancelled" | "Failed">;

export type RunOptions = {
  duplicateStrategy: DuplicateStrategy;
  namingConvention: NamingConvention;
  /** 例如 `[".jpg", ".mp4"]`；未列入的檔案視為不支援 */
  includedExtensions: readonly string[];
};

/** 由執行端單向送出，呼叫端自行決定顯示方式 */
export type RunCallbacks = {
  onLog?: (message: string) => void;
  onProgress?: (percent: number) => void;
  onStatus?: (message: string) => void;
};

export type RunRequest = {
  inputDir: string;
  outputDir: string;
  trashDir: string;
  options: RunOptions;
  callbacks?: RunCallbacks;
  controls?: RunSignal;
};

export type FileOutcomeStatus = "moved" | "duplicate" | "skipped" | "failed";

export type FileIssueType =
  | "IO_FAILURE"
  | "UNSUPPORTED_CONTENT"
  | "EXTRACTION_FAILURE"
  | "MOVE_FAILURE";

export type FileOutcome = {
  source: string;
  kind: MediaKind;
  status: FileOutcomeStatus;
  target?: string;
  issue?: FileIssueType;
  reason?: string;
};

export type RunReport = {
  state: TerminalPhase;
  total: number;
  processed: number;
  moved: number;
  duplicates: number;
  skipped: number;
  failed: number;
  outcomes: FileOutcome[];
  geocode: GeocodeCacheStats;
  startedAt: string;
  finishedAt: string;
  error?: string;
};

export type RunState = {
  phase: RunPhase;
  processed: number;
  total: number;
  paused: boolean;
  cancelled: boolean;
  status: string;
};

export interface PipelineRunner {
  /**
   * 依序處理 inputDir 下所有檔案：重複檢查 → metadata → 地點 → 目的地 → 搬移。
   * 單一檔案的錯誤只記錄並略過；只有非預期的例外會讓整次執行變成 Failed。
   */
  run(request: RunRequest): Promise<RunReport>;

  /** 目前執行狀態的快照 */
  getState(): RunState;
}
