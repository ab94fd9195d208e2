import type { Bitmap, FrameGeometry, FramePalette } from "@instantframe/shared";

import { allocBitmap, blit, fillBitmap, fillRect, forEachRingPixel, setPixel } from "./bitmap";

/** Grey level of the outermost shadow ring. */
export const SHADOW_PEAK = 150;

export interface FrameLayout {
  frameWidth: number;
  frameHeight: number;
  totalWidth: number;
  totalHeight: number;
  photoLeft: number;
  photoTop: number;
  photoWidth: number;
  photoHeight: number;
}

export function computeFrameLayout(photoWidth: number, photoHeight: number, geometry: FrameGeometry): FrameLayout {
  const frameWidth = photoWidth + geometry.sideBorder * 2;
  const frameHeight = photoHeight + geometry.topBorder + geometry.bottomBorder;
  return {
    frameWidth,
    frameHeight,
    totalWidth: frameWidth + geometry.outerMargin * 2,
    totalHeight: frameHeight + geometry.outerMargin * 2,
    photoLeft: geometry.outerMargin + geometry.sideBorder,
    photoTop: geometry.outerMargin + geometry.topBorder,
    photoWidth,
    photoHeight,
  };
}

/**
 * True when frame-relative pixel (fx, fy) falls outside the quarter circle
 * of its corner. Pixels away from the corners are never cut.
 */
export function isCornerCutout(
  fx: number,
  fy: number,
  frameWidth: number,
  frameHeight: number,
  radius: number,
  step: number
): boolean {
  const left = fx < radius;
  const right = fx >= frameWidth - radius;
  const top = fy < radius;
  const bottom = fy >= frameHeight - radius;

  let dx: number;
  let dy: number;
  if (left && top) {
    dx = radius - fx;
    dy = radius - fy;
  } else if (right && top) {
    dx = fx - (frameWidth - radius - 1);
    dy = radius - fy;
  } else if (left && bottom) {
    dx = radius - fx;
    dy = fy - (frameHeight - radius - 1);
  } else if (right && bottom) {
    dx = fx - (frameWidth - radius - 1);
    dy = fy - (frameHeight - radius - 1);
  } else {
    return false;
  }

  const distance = dx * dx + dy * dy;
  const stepped = Math.floor(distance / step) * step;
  return stepped > radius * radius;
}

function maskCorners(canvas: Bitmap, layout: FrameLayout, geometry: FrameGeometry, palette: FramePalette) {
  const { cornerRadius: radius, cornerStep: step, outerMargin } = geometry;
  if (radius <= 0) return;
  const { frameWidth, frameHeight } = layout;

  // Only the four radius x radius blocks can be cut.
  const xs = [0, Math.max(0, frameWidth - radius)];
  const ys = [0, Math.max(0, frameHeight - radius)];
  for (const by of ys) {
    for (const bx of xs) {
      for (let fy = by; fy < Math.min(frameHeight, by + radius); fy++) {
        for (let fx = bx; fx < Math.min(frameWidth, bx + radius); fx++) {
          if (isCornerCutout(fx, fy, frameWidth, frameHeight, radius, step)) {
            setPixel(canvas, outerMargin + fx, outerMargin + fy, palette.margin);
          }
        }
      }
    }
  }
}

/**
 * Grey bands along the inside edge of the photo rectangle: ring `i` is
 * trunc(SHADOW_PEAK * (shadowSize - i) / shadowSize). Painted before the
 * photo is pasted, which covers them.
 */
export function paintShadow(canvas: Bitmap, layout: FrameLayout, shadowSize: number): void {
  const { data } = canvas;
  for (let i = 0; i < shadowSize; i++) {
    const shade = Math.trunc((SHADOW_PEAK * (shadowSize - i)) / shadowSize);
    forEachRingPixel(
      canvas,
      layout.photoLeft,
      layout.photoTop,
      layout.photoWidth,
      layout.photoHeight,
      -i,
      (o) => {
        data[o] = shade;
        data[o + 1] = shade;
        data[o + 2] = shade;
      }
    );
  }
}

function paintBorder(canvas: Bitmap, layout: FrameLayout, thickness: number, palette: FramePalette) {
  const { data } = canvas;
  const { r, g, b } = palette.border;
  for (let i = 0; i < thickness; i++) {
    forEachRingPixel(
      canvas,
      layout.photoLeft,
      layout.photoTop,
      layout.photoWidth,
      layout.photoHeight,
      i + 1,
      (o) => {
        data[o] = r;
        data[o + 1] = g;
        data[o + 2] = b;
      }
    );
  }
}

/**
 * Place `photo` in an instant-film frame on a new canvas:
 * margin fill, white frame, rounded corners, shadow, photo, border outline.
 */
export function composeFrame(photo: Bitmap, geometry: FrameGeometry, palette: FramePalette): Bitmap {
  const layout = computeFrameLayout(photo.width, photo.height, geometry);
  const canvas = allocBitmap(layout.totalWidth, layout.totalHeight);

  fillBitmap(canvas, palette.margin);
  fillRect(canvas, geometry.outerMargin, geometry.outerMargin, layout.frameWidth, layout.frameHeight, palette.frame);
  maskCorners(canvas, layout, geometry, palette);
  paintShadow(canvas, layout, geometry.shadowSize);
  blit(canvas, photo, layout.photoLeft, layout.photoTop);
  paintBorder(canvas, layout, geometry.borderThickness, palette);

  return canvas;
}
