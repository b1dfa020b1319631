import sharp from "sharp";
import type { ImageInfo } from "./types";

export type EncodedFormat = "webp";

export interface ImageEncoder {
  inspect(bytes: Buffer): Promise<ImageInfo | null>;
  encode(bytes: Buffer, format: EncodedFormat): Promise<Buffer>;
}

export const WEBP_QUALITY = 80;

export class SharpImageEncoder implements ImageEncoder {
  async inspect(bytes: Buffer): Promise<ImageInfo | null> {
    try {
      const metadata = await sharp(bytes).metadata();
      if (!metadata.width || !metadata.height || !metadata.format) return null;
      return { width: metadata.width, height: metadata.height, format: metadata.format };
    } catch {
      // not an image sharp can decode
      return null;
    }
  }

  async encode(bytes: Buffer, format: EncodedFormat): Promise<Buffer> {
    const pipeline = sharp(bytes, { animated: true });
    return format === "webp" ? pipeline.webp({ quality: WEBP_QUALITY }).toBuffer() : pipeline.toBuffer();
  }
}
