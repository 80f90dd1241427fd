import { join } from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";

import { PathPlannerDefault, sanitizeLocation } from "@/services/PathPlanner";
import type { PlanInput } from "@/services/PathPlanner";

const modifiedAt = new Date(2022, 0, 15, 8, 9, 10);

function input(overrides: Partial<PlanInput> = {}): PlanInput {
  return {
    timestamp: "2023:05:01 14:30:00",
    location: { label: "Lincoln, USA", found: true },
    file: { path: "/in/IMG_0001.jpg", modifiedAt },
    outputRoot: "output",
    namingConvention: "Date_Location",
    ...overrides,
  };
}

describe("PathPlannerDefault", () => {
  const planner = new PathPlannerDefault();

  test("依拍攝年月分目錄，檔名為日期加地點", () => {
    expect(planner.plan(input())).toEqual({
      directory: join("output", "2023", "2023-05"),
      filename: "20230501_143000_Lincoln_USA.jpg",
    });
  });

  test("相同輸入永遠得到相同結果", () => {
    expect(planner.plan(input())).toEqual(planner.plan(input()));
  });

  test.each([
    ["Date", true, "20230501_143000.jpg"],
    ["Location", true, "Lincoln_USA.jpg"],
    ["Dynamic", true, "20230501_143000_Lincoln_USA.jpg"],
    ["Dynamic", false, "20230501_143000.jpg"],
    ["Date_Location", false, "20230501_143000_Unknown_Location.jpg"],
    ["Location", false, "Unknown_Location.jpg"],
  ] as const)("%s（found=%s）→ %s", (namingConvention, found, filename) => {
    const planned = planner.plan(
      input({ namingConvention, location: { label: "Lincoln, USA", found } })
    );
    expect(planned.filename).toBe(filename);
  });

  test("副檔名原樣保留", () => {
    const planned = planner.plan(
      input({ file: { path: "/in/MOV_0002.MOV", modifiedAt } })
    );
    expect(planned.filename).toBe("20230501_143000_Lincoln_USA.MOV");
  });

  test.each([[undefined], ["garbage"], ["2023:02:30 10:00:00"]])(
    "拍攝時間 %s 無法使用時以修改時間決定",
    (timestamp) => {
      expect(planner.plan(input({ timestamp }))).toEqual({
        directory: join("output", "2022", "2022-01"),
        filename: "20220115_080910_Lincoln_USA.jpg",
      });
    }
  );
});

describe("PathPlannerDefault 與本地時區無關", () => {
  const planner = new PathPlannerDefault();

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("夏令時間跳過的時刻仍照拍攝時間命名", () => {
    vi.stubEnv("TZ", "America/Chicago");
    expect(
      planner.plan(input({ timestamp: "2023:03:12 02:30:00" }))
    ).toEqual({
      directory: join("output", "2023", "2023-03"),
      filename: "20230312_023000_Lincoln_USA.jpg",
    });
  });

  test("整天被跳過的日期仍照原日期命名", () => {
    vi.stubEnv("TZ", "Pacific/Apia");
    expect(
      planner.plan(input({ timestamp: "2011:12:30 00:30:00" }))
    ).toEqual({
      directory: join("output", "2011", "2011-12"),
      filename: "20111230_003000_Lincoln_USA.jpg",
    });
  });
});

describe("sanitizeLocation", () => {
  test.each([
    ["  São Paulo, SP, Brazil ", "São_Paulo_SP_Brazil"],
    [`AC/DC: "Live"?`, "ACDC_Live"],
    ["a , b", "a_b"],
    [", ,", "Unknown_Location"],
  ])("%s → %s", (label, expected) => {
    expect(sanitizeLocation(label)).toBe(expected);
  });
});
