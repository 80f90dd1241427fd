import { mkdir, stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { UNKNOWN_LOCATION } from "@/constants";
import type { MediaFile, ResolvedLocation } from "@/types";

import type { ContentHasher } from "../ContentHasher/ContentHasher";
import type { DuplicateRegistry } from "../DuplicateRegistry/DuplicateRegistry";
import { DuplicateRegistryMemory } from "../DuplicateRegistry/DuplicateRegistryMemory";
import type { FileSystemScanner } from "../FileSystemScanner/FileSystemScanner";
import type { GeocodeCache } from "../GeocodeCache/GeocodeCache";
import type { MetadataResolver } from "../MetadataResolver/MetadataResolver";
import type { PathPlanner } from "../PathPlanner/PathPlanner";
import type { Relocator } from "../Relocator/Relocator";
import type {
  FileOutcome,
  PipelineRunner,
  RunCallbacks,
  RunReport,
  RunRequest,
  RunState,
  TerminalPhase,
} from "./PipelineRunner";
import { RunControl, type RunSignal } from "./RunControl";

const notFound: ResolvedLocation = { label: UNKNOWN_LOCATION, found: false };

type RunContext = {
  request: RunRequest;
  callbacks: RunCallbacks;
  registry: DuplicateRegistry;
  logger: Logger;
};

export class PipelineRunnerDefault implements PipelineRunner {
  private readonly scanner: FileSystemScanner;
  private readonly hasher: ContentHasher;
  private readonly metadataResolver: MetadataResolver;
  private readonly geocodeCache: GeocodeCache;
  private readonly pathPlanner: PathPlanner;
  private readonly relocator: Relocator;
  private readonly createRegistry: () => DuplicateRegistry;
  private readonly logger: Logger;

  private state: RunState = idleState();
  private running = false;

  constructor(deps: {
    scanner: FileSystemScanner;
    hasher: ContentHasher;
    metadataResolver: MetadataResolver;
    geocodeCache: GeocodeCache;
    pathPlanner: PathPlanner;
    relocator: Relocator;
    logger: Logger;
    createRegistry?: () => DuplicateRegistry;
  }) {
    this.scanner = deps.scanner;
    this.hasher = deps.hasher;
    this.metadataResolver = deps.metadataResolver;
    this.geocodeCache = deps.geocodeCache;
    this.pathPlanner = deps.pathPlanner;
    this.relocator = deps.relocator;
    this.createRegistry =
      deps.createRegistry ?? (() => new DuplicateRegistryMemory());
    this.logger = deps.logger.extend("PipelineRunnerDefault");
  }

  getState(): RunState {
    return { ...this.state };
  }

  async run(request: RunRequest): Promise<RunReport> {
    if (this.running) {
      throw new Error("已有整理作業執行中");
    }
    this.running = true;

    const control: RunSignal = request.controls ?? new RunControl();
    const callbacks = request.callbacks ?? {};
    const logger = this.logger.extend("run", { inputDir: request.inputDir });
    const startedAt = new Date();
    const outcomes: FileOutcome[] = [];
    this.state = { ...idleState(), phase: "Running" };

    const unsubscribe = control.onChange(({ paused, cancelled }) => {
      this.state.paused = paused;
      this.state.cancelled = cancelled;
    });

    const finish = (phase: TerminalPhase, error?: string): RunReport => {
      this.state.phase = phase;
      this.state.status = phase;
      return buildReport(phase, this.state, outcomes, {
        geocode: this.geocodeCache.stats(),
        startedAt,
        error,
      });
    };

    try {
      const invalid = await validateDirectories(request);
      if (invalid) {
        logger.error({ emoji: "❌" })`目錄驗證失敗：${invalid}`;
        callbacks.onLog?.(`目錄驗證失敗：${invalid}`);
        return finish("Failed", invalid);
      }

      logger.info({
        event: "start",
        outputDir: request.outputDir,
        trashDir: request.trashDir,
        options: request.options,
      })`開始整理：${request.inputDir} → ${request.outputDir}`;
      await this.geocodeCache.load();

      const scanned = await this.scanner.scan(request.inputDir, {
        includedExtensions: request.options.includedExtensions,
      });
      if (isErr(scanned)) {
        logger.error({ error: scanned.error })`掃描來源目錄失敗`;
        callbacks.onLog?.(`掃描來源目錄失敗：${scanned.error.message}`);
        return finish("Failed", scanned.error.message);
      }
      const files = scanned.value;
      this.state.total = files.length;
      logger.info({ emoji: "🔎", count: files.length })`掃描完成，共 ${files.length} 個檔案`;
      callbacks.onProgress?.(percentOf(0, files.length));

      const context: RunContext = {
        request,
        callbacks,
        registry: this.createRegistry(),
        logger,
      };

      for (const file of files) {
        if (control.cancelled) break;
        if (control.paused) {
          this.state.phase = "Paused";
          this.state.status = "已暫停";
          logger.info({ emoji: "⏸️" })`已暫停，等待恢復`;
          callbacks.onStatus?.("已暫停");
          await control.waitIfPaused();
          if (control.cancelled) break;
          this.state.phase = "Running";
          logger.info({ emoji: "▶️" })`繼續處理`;
        }

        const name = path.basename(file.path);
        this.state.status = name;
        outcomes.push(await this.processFile(file, context));

        this.state.processed++;
        callbacks.onProgress?.(percentOf(this.state.processed, files.length));
        callbacks.onStatus?.(name);
      }

      if (control.cancelled) {
        logger.warn({ emoji: "⏹️", processed: this.state.processed })`已取消，已處理的檔案維持在新位置`;
        callbacks.onLog?.("已取消");
        return finish("Cancelled");
      }

      logger.info({ event: "done", processed: this.state.processed })`整理完成`;
      callbacks.onLog?.("整理完成");
      return finish("Completed");
    } catch (error) {
      logger.error({ error })`整理過程發生非預期錯誤，中止`;
      const message = error instanceof Error ? error.message : String(error);
      callbacks.onLog?.(`整理失敗：${message}`);
      return finish("Failed", message);
    } finally {
      unsubscribe();
      this.running = false;
    }
  }

  private async processFile(
    file: MediaFile,
    context: RunContext
  ): Promise<FileOutcome> {
    const { request, callbacks, registry } = context;
    const logger = context.logger.append({ filePath: file.path });
    const report = (outcome: FileOutcome, message: string) => {
      callbacks.onLog?.(message);
      return outcome;
    };

    if (file.kind === "unsupported") {
      logger.warn({ emoji: "🚫" })`不支援的格式，略過`;
      return report(
        {
          source: file.path,
          kind: file.kind,
          status: "skipped",
          issue: "UNSUPPORTED_CONTENT",
          reason: `不支援的副檔名 ${file.extension || "(無)"}`,
        },
        `不支援的格式：${file.path}`
      );
    }

    // 感知雜湊只適用於影像，影片一律比對位元組
    const strategy =
      file.kind === "image" ? request.options.duplicateStrategy : "exact";
    const fingerprint = await this.hasher.fingerprint(file.path, strategy);
    if (isErr(fingerprint)) {
      logger.warn({ error: fingerprint.error })`指紋計算失敗，視為非重複`;
      callbacks.onLog?.(`指紋計算失敗（視為非重複）：${file.path}`);
    } else if (registry.classify(fingerprint.value) === "Duplicate") {
      const quarantined = await this.relocator.quarantine(
        file.path,
        request.trashDir
      );
      if (isErr(quarantined)) {
        logger.error({ error: quarantined.error })`重複檔案搬移失敗`;
        return report(
          {
            source: file.path,
            kind: file.kind,
            status: "failed",
            issue: "MOVE_FAILURE",
            reason: quarantined.error.message,
          },
          `重複檔案搬移失敗：${file.path}`
        );
      }
      logger.info({ emoji: "🗑️", to: quarantined.value })`重複檔案移至垃圾桶`;
      return report(
        {
          source: file.path,
          kind: file.kind,
          status: "duplicate",
          target: quarantined.value,
        },
        `重複檔案移至垃圾桶：${file.path}`
      );
    }

    const metadata = await this.metadataResolver.extract(file);
    if (isErr(metadata)) {
      logger.warn({ error: metadata.error })`metadata 讀取失敗，略過`;
      return report(
        {
          source: file.path,
          kind: file.kind,
          status: "skipped",
          issue: "EXTRACTION_FAILURE",
          reason: metadata.error.message,
        },
        `略過（metadata 讀取失敗）：${file.path}`
      );
    }

    const location =
      file.kind === "image"
        ? await this.geocodeCache.resolve(metadata.value.gps)
        : notFound;

    const destination = this.pathPlanner.plan({
      timestamp: metadata.value.timestamp,
      location,
      file,
      outputRoot: request.outputDir,
      namingConvention: request.options.namingConvention,
    });

    const placed = await this.relocator.place(file.path, destination);
    if (isErr(placed)) {
      logger.error({ error: placed.error })`搬移失敗`;
      return report(
        {
          source: file.path,
          kind: file.kind,
          status: "failed",
          issue: "MOVE_FAILURE",
          reason: placed.error.message,
        },
        `搬移失敗：${file.path}`
      );
    }

    const label = file.kind === "image" ? "相片" : "影片";
    logger.info({ emoji: "📦", to: placed.value })`${label}已整理`;
    return report(
      {
        source: file.path,
        kind: file.kind,
        status: "moved",
        target: placed.value,
      },
      `${label}已整理：${placed.value}`
    );
  }
}

function idleState(): RunState {
  return {
    phase: "Idle",
    processed: 0,
    total: 0,
    paused: false,
    cancelled: false,
    status: "",
  };
}

function percentOf(processed: number, total: number) {
  if (total === 0) return 100;
  return Math.round((processed / total) * 100);
}

/** 回傳錯誤訊息；通過時回傳 undefined，並建立輸出與垃圾桶目錄 */
async function validateDirectories(request: RunRequest) {
  const input = path.resolve(request.inputDir);
  try {
    const stats = await stat(input);
    if (!stats.isDirectory()) return `輸入路徑不是目錄: ${input}`;
  } catch {
    return `輸入目錄不存在: ${input}`;
  }
  for (const [name, dir] of [
    ["輸出", request.outputDir],
    ["垃圾桶", request.trashDir],
  ] as const) {
    if (path.resolve(dir) === input) return `${name}目錄不可與輸入目錄相同`;
  }
  await mkdir(request.outputDir, { recursive: true });
  await mkdir(request.trashDir, { recursive: true });
  return undefined;
}

function buildReport(
  phase: TerminalPhase,
  state: RunState,
  outcomes: FileOutcome[],
  extra: Pick<RunReport, "geocode" | "error"> & { startedAt: Date }
): RunReport {
  const count = (status: FileOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).length;
  return {
    state: phase,
    total: state.total,
    processed: state.processed,
    moved: count("moved"),
    duplicates: count("duplicate"),
    skipped: count("skipped"),
    failed: count("failed"),
    outcomes,
    geocode: extra.geocode,
    startedAt: extra.startedAt.toISOString(),
    finishedAt: new Date().toISOString(),
    ...(extra.error ? { error: extra.error } : {}),
  };
}
