import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { getAppConfig } from "@/config";
import { duplicateStrategies } from "@/constants";
import { ContentHasherDefault } from "@/services/ContentHasher";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  GeocodeCacheDefault,
  GeocodeCacheStoreJson,
} from "@/services/GeocodeCache";
import { MetadataResolverDefault } from "@/services/MetadataResolver";
import {
  isNamingConvention,
  PathPlannerDefault,
} from "@/services/PathPlanner";
import {
  PipelineRunnerDefault,
  RunControl,
} from "@/services/PipelineRunner";
import { RelocatorFileSystem } from "@/services/Relocator";
import { ReverseGeocoderNominatim } from "@/services/ReverseGeocoder";
import type { DuplicateStrategy, NamingConvention } from "@/types";
import {
  bindRunControlKeys,
  confirm,
  defaultOutputDir,
  defaultTrashDir,
  expandHome,
  parseExtensionList,
} from "@/utils/helper";

type OrganizeOptions = {
  output?: string;
  trash?: string;
  strategy?: string;
  naming?: string;
  ext?: string;
  yes?: boolean;
};

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command("organize <input>", "依拍攝時間與地點整理相片與影片，重複檔移至垃圾桶")
    .option("--output <path>", `整理後的目錄，預設 ${defaultOutputDir}`)
    .option("--trash <path>", `重複檔案的目錄，預設 ${defaultTrashDir}`)
    .option("--strategy <strategy>", "重複判定：exact | perceptual", {
      default: "exact",
    })
    .option(
      "--naming <convention>",
      "檔名格式：Date_Location | Date | Location | Dynamic",
      { default: "Date_Location" }
    )
    .option("--ext <list>", "只處理這些副檔名，以逗號分隔，例如 .jpg,.mp4")
    .option("--yes", "略過確認，直接執行", { default: false })
    .action(async (input: string, options: OrganizeOptions) => {
      const logger = baseLogger.extend("organize", { input });
      const config = getAppConfig();
      const reporter = new DumpWriterDefault(logger, config.REPORT_DIR);

      const inputDir = expandHome(input);
      const outputDir = expandHome(options.output ?? defaultOutputDir);
      const trashDir = expandHome(options.trash ?? defaultTrashDir);

      const duplicateStrategy = parseStrategy(options.strategy);
      if (!duplicateStrategy) {
        logger.error({ emoji: "❌" })`不支援的重複判定方式：${options.strategy}`;
        process.exitCode = 1;
        return;
      }
      const namingConvention = resolveNaming(logger, options.naming);
      const includedExtensions = parseExtensionList(options.ext);

      logger.info({
        emoji: "📁",
        duplicateStrategy,
        namingConvention,
        includedExtensions,
      })`來源: ${inputDir} → 目標: ${outputDir}，垃圾桶: ${trashDir}`;

      const proceed =
        options.yes ||
        (await confirm(logger, `即將搬移 ${inputDir} 內的檔案，是否繼續？ [y/N] `));
      if (!proceed) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      const exifService = new ExifServiceExifTool();
      const control = new RunControl();
      const unbind = bindRunControlKeys(control, logger);
      try {
        const runner = new PipelineRunnerDefault({
          scanner: new FileSystemScannerDefault(),
          hasher: new ContentHasherDefault(),
          metadataResolver: new MetadataResolverDefault({
            exifService,
            logger,
          }),
          geocodeCache: new GeocodeCacheDefault({
            geocoder: new ReverseGeocoderNominatim({
              baseUrl: config.NOMINATIM_URL,
              userAgent: config.NOMINATIM_USER_AGENT,
              timeoutMs: config.GEOCODE_TIMEOUT_MS,
            }),
            store: new GeocodeCacheStoreJson(config.GEOCODE_CACHE_PATH),
            logger,
            attempts: config.GEOCODE_ATTEMPTS,
            backoffMs: config.GEOCODE_BACKOFF_MS,
          }),
          pathPlanner: new PathPlannerDefault(),
          relocator: new RelocatorFileSystem({ logger }),
          logger,
        });

        let reported = -1;
        const report = await runner.run({
          inputDir,
          outputDir,
          trashDir,
          options: { duplicateStrategy, namingConvention, includedExtensions },
          controls: control,
          callbacks: {
            onProgress: (percent) => {
              const step = Math.floor(percent / 10) * 10;
              if (step <= reported) return;
              reported = step;
              logger.info({ emoji: "⏳", percent })`進度 ${step}%`;
            },
            onStatus: (message) => {
              logger.debug({ event: "status" })`${message}`;
            },
          },
        });

        await reporter.dump("organize", report);
        const summary = {
          moved: report.moved,
          duplicates: report.duplicates,
          skipped: report.skipped,
          failed: report.failed,
        };
        if (report.state === "Failed") {
          logger.error({ emoji: "❌", ...summary })`整理失敗：${report.error ?? "未知錯誤"}`;
          process.exitCode = 1;
          return;
        }
        logger.info({
          event: "done",
          emoji: report.state === "Completed" ? "✅" : "⏹️",
          ...summary,
        })`${report.state === "Completed" ? "整理完成" : "已取消"}：搬移 ${report.moved}、重複 ${report.duplicates}、略過 ${report.skipped}、失敗 ${report.failed}`;
      } finally {
        unbind();
        await dispose(exifService);
      }
    });
}

function parseStrategy(value: string | undefined): DuplicateStrategy | undefined {
  const strategy = value ?? "exact";
  return duplicateStrategies.find((s) => s === strategy);
}

function resolveNaming(logger: Logger, value: string | undefined): NamingConvention {
  if (value === undefined) return "Date_Location";
  if (isNamingConvention(value)) return value;
  logger.warn({ emoji: "🟡" })`不認得的檔名格式 ${value}，改用 Date_Location`;
  return "Date_Location";
}
