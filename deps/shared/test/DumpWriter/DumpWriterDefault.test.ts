import { readFile, rm } from "node:fs/promises";
import { describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { buildTestLogger } from "~shared/testkit/TestLogger";

const tmpDir = "test/tmp/dump";

describe("DumpWriterDefault", () => {
  test("以時間戳記與名稱寫出 JSON", async () => {
    await rm(tmpDir, { recursive: true, force: true });
    const writer = new DumpWriterDefault(buildTestLogger(), tmpDir);

    const filePath = await writer.dump("run report", { moved: 2 });

    expect(filePath).toMatch(/^test\/tmp\/dump\/\d{8}-\d{6}-run_report\.json$/);
    expect(JSON.parse(await readFile(filePath, "utf8"))).toEqual({ moved: 2 });
  });
});
