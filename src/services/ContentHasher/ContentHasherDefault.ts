import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import sharp from "sharp";

import { type Result, err, ok } from "~shared/utils/Result";

import type { DuplicateStrategy, Fingerprint } from "@/types";

import type { ContentHasher, HashError } from "./ContentHasher";

const CHUNK_SIZE = 64 * 1024;

/** dHash：9x8 灰階縮圖，每列比較相鄰像素，共 64 bits */
const DHASH_WIDTH = 9;
const DHASH_HEIGHT = 8;

export class ContentHasherDefault implements ContentHasher {
  constructor(private readonly algorithm: string = "sha256") {}

  async fingerprint(
    filePath: string,
    strategy: DuplicateStrategy
  ): Promise<Result<Fingerprint, HashError>> {
    try {
      await stat(filePath);
    } catch (e) {
      return err({ type: "IO_FAILURE", message: messageOf(e) });
    }

    if (strategy === "perceptual") {
      return this.perceptual(filePath);
    }
    try {
      const digest = await streamHash(filePath, this.algorithm);
      return ok({ strategy, digest });
    } catch (e) {
      return err({ type: "IO_FAILURE", message: messageOf(e) });
    }
  }

  private async perceptual(
    filePath: string
  ): Promise<Result<Fingerprint, HashError>> {
    try {
      const { data, info } = await sharp(filePath)
        .removeAlpha()
        .grayscale()
        .resize(DHASH_WIDTH, DHASH_HEIGHT, { fit: "fill" })
        .raw()
        .toBuffer({ resolveWithObject: true });
      return ok({
        strategy: "perceptual",
        digest: differenceHash(data, info.width, info.height, info.channels),
      });
    } catch (e) {
      return err({
        type: "UNSUPPORTED_CONTENT",
        message: `無法解碼為影像: ${messageOf(e)}`,
      });
    }
  }
}

export function streamHash(filePath: string, algorithm: string) {
  return new Promise<string>((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
    stream.on("error", reject);
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}

export function differenceHash(
  pixels: Uint8Array,
  width: number,
  height: number,
  channels: number
) {
  const at = (x: number, y: number) => pixels[(y * width + x) * channels] ?? 0;
  let hex = "";
  let nibble = 0;
  let bits = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width - 1; x++) {
      nibble = (nibble << 1) | (at(x, y) > at(x + 1, y) ? 1 : 0);
      bits++;
      if (bits === 4) {
        hex += nibble.toString(16);
        nibble = 0;
        bits = 0;
      }
    }
  }
  return hex;
}

function messageOf(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
