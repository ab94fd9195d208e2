import type { Bitmap, Rgb } from "@instantframe/shared";

export const CHANNELS = 3;

export function allocBitmap(width: number, height: number): Bitmap {
  return {
    width,
    height,
    data: new Uint8Array(width * height * CHANNELS),
  };
}

export function pixelOffset(bitmap: Bitmap, x: number, y: number): number {
  return (y * bitmap.width + x) * CHANNELS;
}

export function inBounds(bitmap: Bitmap, x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < bitmap.width && y < bitmap.height;
}

export function getPixel(bitmap: Bitmap, x: number, y: number): Rgb {
  const i = pixelOffset(bitmap, x, y);
  return { r: bitmap.data[i], g: bitmap.data[i + 1], b: bitmap.data[i + 2] };
}

export function setPixel(bitmap: Bitmap, x: number, y: number, color: Rgb): void {
  const i = pixelOffset(bitmap, x, y);
  bitmap.data[i] = color.r;
  bitmap.data[i + 1] = color.g;
  bitmap.data[i + 2] = color.b;
}

export function fillBitmap(bitmap: Bitmap, color: Rgb): void {
  const { data } = bitmap;
  for (let i = 0; i < data.length; i += CHANNELS) {
    data[i] = color.r;
    data[i + 1] = color.g;
    data[i + 2] = color.b;
  }
}

/** Fill [left, left+width) x [top, top+height), clipped to the bitmap. */
export function fillRect(
  bitmap: Bitmap,
  left: number,
  top: number,
  width: number,
  height: number,
  color: Rgb
): void {
  const x0 = Math.max(0, left);
  const y0 = Math.max(0, top);
  const x1 = Math.min(bitmap.width, left + width);
  const y1 = Math.min(bitmap.height, top + height);
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      setPixel(bitmap, x, y, color);
    }
  }
}

/**
 * Copy `src` onto `dst` with its top-left corner at (left, top).
 * Source pixels replace destination pixels; rows are clipped to `dst`.
 */
export function blit(dst: Bitmap, src: Bitmap, left: number, top: number): void {
  const x0 = Math.max(0, -left);
  const x1 = Math.min(src.width, dst.width - left);
  if (x1 <= x0) return;
  for (let y = 0; y < src.height; y++) {
    const dy = top + y;
    if (dy < 0 || dy >= dst.height) continue;
    const from = pixelOffset(src, x0, y);
    const to = pixelOffset(src, x1, y);
    dst.data.set(src.data.subarray(from, to), pixelOffset(dst, left + x0, dy));
  }
}

/**
 * Visit every pixel of the one-pixel outline lying `distance` pixels outside
 * the rectangle [left, left+width) x [top, top+height); a negative distance
 * walks inside it. Each pixel is visited once; pixels off the bitmap are
 * skipped, and a ring that collapses past the centre visits nothing.
 */
export function forEachRingPixel(
  bitmap: Bitmap,
  left: number,
  top: number,
  width: number,
  height: number,
  distance: number,
  visit: (offset: number) => void
): void {
  const x0 = left - distance;
  const y0 = top - distance;
  const x1 = left + width - 1 + distance;
  const y1 = top + height - 1 + distance;

  const touch = (x: number, y: number) => {
    if (inBounds(bitmap, x, y)) visit(pixelOffset(bitmap, x, y));
  };

  for (let x = x0; x <= x1; x++) {
    touch(x, y0);
    if (y1 !== y0) touch(x, y1);
  }
  for (let y = y0 + 1; y < y1; y++) {
    touch(x0, y);
    if (x1 !== x0) touch(x1, y);
  }
}
