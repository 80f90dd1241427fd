import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import path, { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { RelocatorFileSystem } from "@/services/Relocator";
import { exists } from "@/utils/helper";

const tmpDir = "test/tmp/relocator";
const inDir = join(tmpDir, "in");
const outDir = join(tmpDir, "out");
const trashDir = join(tmpDir, "trash");

const relocator = new RelocatorFileSystem({ logger: buildTestLogger() });

beforeEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(join(inDir, "sub"), { recursive: true });
  await writeFile(join(inDir, "a.jpg"), "a");
  await writeFile(join(inDir, "b.jpg"), "b");
  await writeFile(join(inDir, "sub", "a.jpg"), "sub-a");
});

describe("RelocatorFileSystem", () => {
  test("建立目的地目錄並搬移", async () => {
    const directory = join(outDir, "2023", "2023-05");
    const result = await relocator.place(join(inDir, "a.jpg"), {
      directory,
      filename: "20230501_143000_Lincoln_USA.jpg",
    });

    expectOk(result);
    expect(result.value).toBe(
      path.resolve(directory, "20230501_143000_Lincoln_USA.jpg")
    );
    expect(await readFile(result.value, "utf8")).toBe("a");
    expect(await exists(join(inDir, "a.jpg"))).toBe(false);
  });

  test("目標已存在時加上 _1、_2 後綴，不覆蓋", async () => {
    const destination = { directory: outDir, filename: "same.jpg" };
    const first = await relocator.place(join(inDir, "a.jpg"), destination);
    const second = await relocator.place(join(inDir, "b.jpg"), destination);
    const third = await relocator.place(join(inDir, "sub", "a.jpg"), destination);

    expectOk(first);
    expectOk(second);
    expectOk(third);
    expect([first.value, second.value, third.value].map((p) => path.basename(p))).toEqual([
      "same.jpg",
      "same_1.jpg",
      "same_2.jpg",
    ]);
    expect(await readFile(join(outDir, "same.jpg"), "utf8")).toBe("a");
    expect(await readFile(join(outDir, "same_2.jpg"), "utf8")).toBe("sub-a");
  });

  test("quarantine 以原檔名放入垃圾桶，同名時加後綴", async () => {
    const first = await relocator.quarantine(join(inDir, "a.jpg"), trashDir);
    const second = await relocator.quarantine(join(inDir, "sub", "a.jpg"), trashDir);

    expectOk(first);
    expectOk(second);
    expect((await readdir(trashDir)).sort()).toEqual(["a.jpg", "a_1.jpg"]);
    expect(await readFile(join(trashDir, "a_1.jpg"), "utf8")).toBe("sub-a");
  });

  test("已在目的地的檔案不搬動", async () => {
    const result = await relocator.place(join(inDir, "b.jpg"), {
      directory: inDir,
      filename: "b.jpg",
    });
    expectOk(result);
    expect(result.value).toBe(path.resolve(inDir, "b.jpg"));
    expect(await readdir(inDir)).toContain("b.jpg");
  });

  test("來源不存在 → MOVE_FAILURE，不留下目的地檔案", async () => {
    const result = await relocator.place(join(inDir, "missing.jpg"), {
      directory: outDir,
      filename: "x.jpg",
    });
    expectErr(result);
    expect(result.error.type).toBe("MOVE_FAILURE");
    expect(await readdir(outDir)).toEqual([]);
  });
});
