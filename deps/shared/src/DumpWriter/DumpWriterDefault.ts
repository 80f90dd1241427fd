import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly dir: string = "dist/dumps"
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const stamp = format(new Date(), "yyyyMMdd-HHmmss");
    const filePath = path.join(this.dir, `${stamp}-${sanitize(name)}.json`);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", filePath })`已輸出 ${name} → ${filePath}`;
    return filePath;
  }
}

function sanitize(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}
