import type { Bitmap, Dimensions, ResizeScale } from "@instantframe/shared";

import { allocBitmap, CHANNELS } from "./bitmap";

/** floor(W * fw) x floor(H * fh), never below 1x1. */
export function scaledSize(width: number, height: number, scale: ResizeScale): Dimensions {
  return {
    width: Math.max(1, Math.floor(width * scale.width)),
    height: Math.max(1, Math.floor(height * scale.height)),
  };
}

/**
 * Linear resampling into a new bitmap of exactly width x height.
 * Destination (x, y) samples the source at (x * srcW / dstW, y * srcH / dstH);
 * the right and bottom neighbours are clamped to the last column and row.
 */
export function resizeBilinear(src: Bitmap, width: number, height: number): Bitmap {
  const out = allocBitmap(width, height);
  const xRatio = src.width / width;
  const yRatio = src.height / height;
  const lastX = src.width - 1;
  const lastY = src.height - 1;
  const stride = src.width * CHANNELS;
  const s = src.data;
  const d = out.data;

  let o = 0;
  for (let y = 0; y < height; y++) {
    const sy = y * yRatio;
    const y0 = Math.min(Math.floor(sy), lastY);
    const y1 = Math.min(y0 + 1, lastY);
    const fy = sy - y0;
    const row0 = y0 * stride;
    const row1 = y1 * stride;

    for (let x = 0; x < width; x++) {
      const sx = x * xRatio;
      const x0 = Math.min(Math.floor(sx), lastX);
      const x1 = Math.min(x0 + 1, lastX);
      const fx = sx - x0;
      const c0 = x0 * CHANNELS;
      const c1 = x1 * CHANNELS;

      for (let c = 0; c < CHANNELS; c++) {
        const top = s[row0 + c0 + c] * (1 - fx) + s[row0 + c1 + c] * fx;
        const bottom = s[row1 + c0 + c] * (1 - fx) + s[row1 + c1 + c] * fx;
        d[o++] = Math.round(top * (1 - fy) + bottom * fy);
      }
    }
  }
  return out;
}
