import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { MetadataResolverDefault } from "@/services/MetadataResolver";
import type { MediaFile, MediaKind } from "@/types";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";

const modifiedAt = new Date(2022, 0, 15, 8, 9, 10);

function media(path: string, kind: MediaKind): MediaFile {
  return { path, extension: ".jpg", kind, size: 1, modifiedAt };
}

function setup() {
  const exifService = new ExifServiceFake();
  const resolver = new MetadataResolverDefault({
    exifService,
    logger: buildTestLogger(),
  });
  return { exifService, resolver };
}

describe("MetadataResolverDefault", () => {
  test("相片取 DateTimeOriginal 與 GPS", async () => {
    const { exifService, resolver } = setup();
    exifService.setTags("/in/IMG_0001.jpg", {
      DateTimeOriginal: "2023:05:01 14:30:00",
      CreateDate: "2020:01:01 00:00:00",
      GPSLatitude: 40.8109,
      GPSLatitudeRef: "N",
      GPSLongitude: 96.6901,
      GPSLongitudeRef: "W",
    });

    const result = await resolver.extract(media("/in/IMG_0001.jpg", "image"));

    expectOk(result);
    expect(result.value).toEqual({
      timestamp: "2023:05:01 14:30:00",
      gps: { latitude: 40.8109, longitude: -96.6901 },
    });
  });

  test("DateTimeOriginal 無效時退回 CreateDate，再退回 ModifyDate", async () => {
    const { exifService, resolver } = setup();
    exifService.setTags("/in/a.jpg", {
      DateTimeOriginal: "0000:00:00 00:00:00",
      CreateDate: "2021:02:03 04:05:06",
    });
    exifService.setTags("/in/b.jpg", { ModifyDate: "2019:12:31 23:59:59" });

    const a = await resolver.extract(media("/in/a.jpg", "image"));
    const b = await resolver.extract(media("/in/b.jpg", "image"));

    expectOk(a);
    expectOk(b);
    expect(a.value.timestamp).toBe("2021:02:03 04:05:06");
    expect(b.value).toEqual({ timestamp: "2019:12:31 23:59:59", gps: undefined });
  });

  test("沒有日期 tag 時使用檔案修改時間", async () => {
    const { resolver } = setup();
    const result = await resolver.extract(media("/in/plain.jpg", "image"));
    expectOk(result);
    expect(result.value.timestamp).toBe("2022:01:15 08:09:10");
  });

  test("影片依容器日期順序，且不取 GPS", async () => {
    const { exifService, resolver } = setup();
    exifService.setTags("/in/clip.mov", {
      CreateDate: "2020:01:01 00:00:00",
      MediaCreateDate: "UTC 2021-07-04 09:05:07",
      GPSLatitude: 10,
      GPSLongitude: 20,
    });

    const result = await resolver.extract(media("/in/clip.mov", "video"));

    expectOk(result);
    expect(result.value).toEqual({
      timestamp: "2021:07:04 09:05:07",
      gps: undefined,
    });
  });

  test("讀取失敗 → EXTRACTION_FAILURE", async () => {
    const { exifService, resolver } = setup();
    exifService.setReadError("/in/broken.jpg", {
      type: "READ_FAILED",
      message: "corrupt",
    });

    const result = await resolver.extract(media("/in/broken.jpg", "image"));

    expectErr(result);
    expect(result.error).toEqual({
      type: "EXTRACTION_FAILURE",
      message: "corrupt",
    });
  });

  test("不支援的檔案不讀取 metadata", async () => {
    const { exifService, resolver } = setup();
    const result = await resolver.extract(media("/in/x.txt", "unsupported"));
    expectErr(result);
    expect(exifService.calls).toEqual([]);
  });
});
