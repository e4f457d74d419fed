/**
 * Image loading for inference: any file sharp can decode -> a bounded JPEG.
 */

import path from "node:path";
import sharp from "sharp";

import { errorMessage, type Logger } from "~/lib/log/logger";

/** Extensions picked up when tagging a plain folder */
export const SUPPORTED_IMAGE_EXTENSIONS = /\.(jpe?g|png|webp|tiff?|heic|hif|dng)$/i;

export function isSupportedImage(filename: string): boolean {
  return SUPPORTED_IMAGE_EXTENSIONS.test(path.extname(filename));
}

export type ImageLoaderOptions = {
  maxSize: number;
  jpegQuality: number;
};

export interface ImageLoader {
  // Bounded JPEG bytes, or null when the file cannot be decoded.
  load(filePath: string): Promise<Buffer | null>;
}

export class SharpImageLoader implements ImageLoader {
  constructor(
    private readonly options: ImageLoaderOptions,
    private readonly logger: Logger,
  ) {}

  async load(filePath: string): Promise<Buffer | null> {
    try {
      return await sharp(filePath, { failOn: "error" })
        .rotate()
        .resize(this.options.maxSize, this.options.maxSize, {
          fit: "inside",
          withoutEnlargement: true,
        })
        .jpeg({ quality: this.options.jpegQuality })
        .toBuffer();
    } catch (err) {
      this.logger.warn(`image=${filePath} decode=failed err=${errorMessage(err)}`);
      return null;
    }
  }
}
