/**
 * Image stacking
 * Combines the pages of an image group into one tall bitmap for OCR
 */

import sharp from "sharp";
import { ExtractionError } from "./errors";

// Decoded pages must not outlive their group
sharp.cache(false);

export interface ImageSize {
  width: number;
  height: number;
}

export interface CanvasLayout extends ImageSize {
  tops: number[]; // Vertical offset of each page, in input order
}

export interface CombinedImage extends ImageSize {
  buffer: Buffer; // PNG
  pages: number;
}

const WHITE = { r: 255, g: 255, b: 255, alpha: 1 };

/**
 * Stack pages top-to-bottom: width is the widest page, height the sum of all
 */
export function computeCanvasLayout(sizes: readonly ImageSize[]): CanvasLayout {
  const tops: number[] = [];
  let width = 0;
  let height = 0;

  for (const size of sizes) {
    tops.push(height);
    height += size.height;
    width = Math.max(width, size.width);
  }

  return { width, height, tops };
}

/**
 * Decode every page in the given order and stack them at left offset 0
 *
 * @throws ExtractionError naming the first page that cannot be decoded
 */
export async function combineImages(paths: readonly string[]): Promise<CombinedImage> {
  if (paths.length === 0) {
    throw new RangeError("Cannot combine an empty image group");
  }

  const pages: Array<ImageSize & { input: Buffer }> = [];

  try {
    for (const path of paths) {
      try {
        const { data, info } = await sharp(path)
          .png()
          .toBuffer({ resolveWithObject: true });
        pages.push({ input: data, width: info.width, height: info.height });
      } catch (error) {
        throw new ExtractionError(path, error);
      }
    }

    const layout = computeCanvasLayout(pages);

    const buffer = await sharp({
      create: {
        width: layout.width,
        height: layout.height,
        channels: 4,
        background: WHITE,
      },
    })
      .composite(
        pages.map((page, index) => ({
          input: page.input,
          top: layout.tops[index],
          left: 0,
        })),
      )
      .png()
      .toBuffer();

    return {
      buffer,
      width: layout.width,
      height: layout.height,
      pages: pages.length,
    };
  } finally {
    pages.length = 0;
  }
}
