import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import path, { join } from "node:path";
import sharp from "sharp";
import { beforeEach, describe, expect, test, vi } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { ContentHasherDefault } from "@/services/ContentHasher";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { GeocodeCacheDefault } from "@/services/GeocodeCache";
import { MetadataResolverDefault } from "@/services/MetadataResolver";
import { type PathPlanner, PathPlannerDefault } from "@/services/PathPlanner";
import {
  PipelineRunnerDefault,
  type RunOptions,
  type RunRequest,
  RunControl,
} from "@/services/PipelineRunner";
import { RelocatorFileSystem } from "@/services/Relocator";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { GeocodeCacheStoreMemory } from "~test/fakes/GeocodeCacheStoreMemory";
import { ReverseGeocoderFake } from "~test/fakes/ReverseGeocoderFake";

const tmpDir = path.resolve("test/tmp/pipeline");
const inDir = join(tmpDir, "in");
const outDir = join(tmpDir, "out");
const trashDir = join(tmpDir, "trash");

const options: RunOptions = {
  duplicateStrategy: "exact",
  namingConvention: "Date_Location",
  includedExtensions: [".jpg", ".png", ".mp4"],
};

function setup(pathPlanner: PathPlanner = new PathPlannerDefault()) {
  const logger = buildTestLogger();
  const exifService = new ExifServiceFake();
  const geocoder = new ReverseGeocoderFake({ city: "Lincoln", country: "USA" });
  const runner = new PipelineRunnerDefault({
    scanner: new FileSystemScannerDefault(),
    hasher: new ContentHasherDefault(),
    metadataResolver: new MetadataResolverDefault({ exifService, logger }),
    geocodeCache: new GeocodeCacheDefault({
      geocoder,
      store: new GeocodeCacheStoreMemory(),
      logger,
      wait: async () => {},
    }),
    pathPlanner,
    relocator: new RelocatorFileSystem({ logger }),
    logger,
  });
  return { runner, exifService, geocoder };
}

async function listFiles(dir: string) {
  const entries = await readdir(dir, { recursive: true, withFileTypes: true });
  return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
}

function request(overrides: Partial<RunRequest> = {}): RunRequest {
  return { inputDir: inDir, outputDir: outDir, trashDir, options, ...overrides };
}

beforeEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(inDir, { recursive: true });
});

describe("PipelineRunnerDefault", () => {
  test("重複檔移至垃圾桶，其餘依日期地點整理", async () => {
    await writeFile(join(inDir, "IMG_0001.jpg"), "same");
    await writeFile(join(inDir, "IMG_0002.jpg"), "same");
    await writeFile(join(inDir, "IMG_0003.jpg"), "broken");
    await writeFile(join(inDir, "clip.mp4"), "video");
    await writeFile(join(inDir, "notes.txt"), "text");

    const { runner, exifService, geocoder } = setup();
    exifService.setTags(join(inDir, "IMG_0001.jpg"), {
      DateTimeOriginal: "2023:05:01 14:30:00",
      GPSLatitude: 40.8109,
      GPSLatitudeRef: "N",
      GPSLongitude: 96.6901,
      GPSLongitudeRef: "W",
    });
    exifService.setReadError(join(inDir, "IMG_0003.jpg"), {
      type: "READ_FAILED",
      message: "corrupt",
    });
    exifService.setTags(join(inDir, "clip.mp4"), {
      CreationDate: "2021:07:04 09:05:07",
      GPSLatitude: 10,
      GPSLongitude: 20,
    });

    const progress: number[] = [];
    const statuses: string[] = [];
    const logs: string[] = [];
    const report = await runner.run(
      request({
        callbacks: {
          onProgress: (p) => progress.push(p),
          onStatus: (s) => statuses.push(s),
          onLog: (m) => logs.push(m),
        },
      })
    );

    expect(report).toMatchObject({
      state: "Completed",
      total: 5,
      processed: 5,
      moved: 2,
      duplicates: 1,
      skipped: 2,
      failed: 0,
      geocode: { hits: 0, misses: 1, lookups: 1, failures: 0 },
    });
    expect(report.outcomes).toEqual([
      {
        source: join(inDir, "IMG_0001.jpg"),
        kind: "image",
        status: "moved",
        target: join(outDir, "2023", "2023-05", "20230501_143000_Lincoln_USA.jpg"),
      },
      {
        source: join(inDir, "IMG_0002.jpg"),
        kind: "image",
        status: "duplicate",
        target: join(trashDir, "IMG_0002.jpg"),
      },
      {
        source: join(inDir, "IMG_0003.jpg"),
        kind: "image",
        status: "skipped",
        issue: "EXTRACTION_FAILURE",
        reason: "corrupt",
      },
      {
        source: join(inDir, "clip.mp4"),
        kind: "video",
        status: "moved",
        target: join(
          outDir,
          "2021",
          "2021-07",
          "20210704_090507_Unknown_Location.mp4"
        ),
      },
      {
        source: join(inDir, "notes.txt"),
        kind: "unsupported",
        status: "skipped",
        issue: "UNSUPPORTED_CONTENT",
        reason: "不支援的副檔名 .txt",
      },
    ]);
    expect(progress).toEqual([0, 20, 40, 60, 80, 100]);
    expect(statuses).toEqual([
      "IMG_0001.jpg",
      "IMG_0002.jpg",
      "IMG_0003.jpg",
      "clip.mp4",
      "notes.txt",
    ]);
    expect(logs.at(-1)).toBe("整理完成");
    expect(geocoder.calls).toEqual([{ latitude: 40.8109, longitude: -96.6901 }]);
    expect(exifService.calls).toEqual([
      join(inDir, "IMG_0001.jpg"),
      join(inDir, "IMG_0003.jpg"),
      join(inDir, "clip.mp4"),
    ]);
    expect((await readdir(inDir)).sort()).toEqual(["IMG_0003.jpg", "notes.txt"]);
    expect(runner.getState()).toMatchObject({ phase: "Completed", processed: 5 });
  });

  test("以整理後的輸出再跑一次，檔案不會遺失", async () => {
    await writeFile(join(inDir, "a.jpg"), "same");
    await writeFile(join(inDir, "b.jpg"), "same");
    await writeFile(join(inDir, "c.jpg"), "c");
    await writeFile(join(inDir, "d.jpg"), "d");

    const first = await setup().runner.run(request());
    expect(first).toMatchObject({ state: "Completed", moved: 3, duplicates: 1 });

    const out2Dir = join(tmpDir, "out2");
    const second = await setup().runner.run(
      request({ inputDir: outDir, outputDir: out2Dir })
    );

    expect(second).toMatchObject({
      state: "Completed",
      total: 3,
      moved: 3,
      duplicates: 0,
      skipped: 0,
      failed: 0,
    });
    expect(await listFiles(inDir)).toEqual([]);
    expect(await listFiles(outDir)).toEqual([]);
    expect(await listFiles(out2Dir)).toHaveLength(3);
    expect(await listFiles(trashDir)).toEqual(["b.jpg"]);
  });

  test("perceptual：尺寸不同的相同影像視為重複", async () => {
    const solid = (width: number, height: number) =>
      sharp({
        create: { width, height, channels: 3, background: "#336699" },
      });
    await solid(64, 48).png().toFile(join(inDir, "a.png"));
    await solid(32, 24).jpeg().toFile(join(inDir, "b.jpg"));

    const { runner } = setup();
    const report = await runner.run(
      request({ options: { ...options, duplicateStrategy: "perceptual" } })
    );

    expect(report.outcomes.map((o) => [path.basename(o.source), o.status])).toEqual([
      ["a.png", "moved"],
      ["b.jpg", "duplicate"],
    ]);
  });

  test("暫停時完成目前檔案後停下，恢復後繼續", async () => {
    for (const name of ["a.jpg", "b.jpg", "c.jpg"]) {
      await writeFile(join(inDir, name), name);
    }
    const { runner } = setup();
    const control = new RunControl();

    const running = runner.run(
      request({
        controls: control,
        callbacks: {
          onStatus: (name) => {
            if (name === "a.jpg") control.pause();
          },
        },
      })
    );

    await vi.waitFor(() => {
      expect(runner.getState().phase).toBe("Paused");
    });
    expect(runner.getState()).toMatchObject({ processed: 1, paused: true });
    expect((await readdir(inDir)).sort()).toEqual(["b.jpg", "c.jpg"]);
    await expect(runner.run(request())).rejects.toThrow("已有整理作業執行中");

    control.resume();
    const report = await running;

    expect(report).toMatchObject({ state: "Completed", processed: 3, moved: 3 });
    expect(await readdir(inDir)).toEqual([]);
  });

  test("暫停中取消 → Cancelled，已處理的檔案留在新位置", async () => {
    for (const name of ["a.jpg", "b.jpg", "c.jpg"]) {
      await writeFile(join(inDir, name), name);
    }
    const { runner } = setup();
    const control = new RunControl();

    const running = runner.run(
      request({
        controls: control,
        callbacks: {
          onStatus: (name) => {
            if (name === "a.jpg") control.pause();
          },
        },
      })
    );
    await vi.waitFor(() => {
      expect(runner.getState().phase).toBe("Paused");
    });
    control.cancel();
    const report = await running;

    expect(report).toMatchObject({
      state: "Cancelled",
      total: 3,
      processed: 1,
      moved: 1,
    });
    expect(report.outcomes).toHaveLength(1);
    expect((await readdir(inDir)).sort()).toEqual(["b.jpg", "c.jpg"]);
  });

  test("開始前已取消 → 不處理任何檔案", async () => {
    await writeFile(join(inDir, "a.jpg"), "a");
    const { runner } = setup();
    const control = new RunControl();
    control.cancel();

    const report = await runner.run(request({ controls: control }));

    expect(report).toMatchObject({ state: "Cancelled", processed: 0 });
    expect(await readdir(inDir)).toEqual(["a.jpg"]);
  });

  test("輸入目錄不存在 → Failed", async () => {
    const { runner } = setup();
    const missing = join(tmpDir, "missing");
    const report = await runner.run(request({ inputDir: missing }));
    expect(report).toMatchObject({
      state: "Failed",
      total: 0,
      error: `輸入目錄不存在: ${missing}`,
    });
  });

  test("輸出目錄與輸入相同 → Failed，不動任何檔案", async () => {
    await writeFile(join(inDir, "a.jpg"), "a");
    const { runner } = setup();
    const report = await runner.run(request({ outputDir: inDir }));
    expect(report).toMatchObject({
      state: "Failed",
      error: "輸出目錄不可與輸入目錄相同",
    });
    expect(await readdir(inDir)).toEqual(["a.jpg"]);
  });

  test("非預期例外 → Failed 並保留已產生的結果", async () => {
    await writeFile(join(inDir, "a.jpg"), "a");
    await writeFile(join(inDir, "b.txt"), "b");
    const exploding: PathPlanner = {
      plan: () => {
        throw new Error("planner exploded");
      },
    };
    const { runner } = setup(exploding);

    const report = await runner.run(request());

    expect(report).toMatchObject({
      state: "Failed",
      processed: 0,
      error: "planner exploded",
    });
    expect(runner.getState().phase).toBe("Failed");
  });

  test("沒有檔案時直接完成，進度為 100", async () => {
    const { runner } = setup();
    const progress: number[] = [];
    const report = await runner.run(
      request({ callbacks: { onProgress: (p) => progress.push(p) } })
    );
    expect(report).toMatchObject({ state: "Completed", total: 0 });
    expect(progress).toEqual([100]);
  });
});
