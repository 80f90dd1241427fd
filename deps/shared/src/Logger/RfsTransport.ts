import { once } from "node:events";
import {
  type Options as RfsOptions,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 JSON lines 寫入輪替檔案。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private closed = false;

  constructor(options: { filename: string; rfs?: RfsOptions }) {
    this.stream = createStream(options.filename, options.rfs);
  }

  write(record: LogRecord) {
    if (this.closed) return;
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    if (this.closed) return;
    this.closed = true;
    const finished = once(this.stream, "finish");
    this.stream.end();
    await finished;
  }
}
