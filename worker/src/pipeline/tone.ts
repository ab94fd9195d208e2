import type { Bitmap } from "@instantframe/shared";

import { CHANNELS } from "./bitmap";

/** Mean channel value above which a pixel counts as glare. */
export const HIGHLIGHT_THRESHOLD = 200;
const BLUE_GAIN = 0.6;
const GLARE_CUT = 0.4;

export type Triple = [number, number, number];

function clampChannel(v: number): number {
  return Math.trunc(Math.min(255, Math.max(0, v)));
}

/** Midpoint expansion around 128, before clamping. */
export function boostContrast(channel: number, intensity: number): number {
  return (channel - 128) * (1 + intensity) + 128;
}

/**
 * Darken all three channels when their mean exceeds HIGHLIGHT_THRESHOLD.
 * Takes the channels as they stand after the contrast and blue steps.
 */
export function suppressHighlights(r: number, g: number, b: number, intensity: number): Triple {
  if ((r + g + b) / 3 <= HIGHLIGHT_THRESHOLD) {
    return [r, g, b];
  }
  const factor = 1 - intensity * GLARE_CUT;
  return [clampChannel(r * factor), clampChannel(g * factor), clampChannel(b * factor)];
}

export function tonePixel(r: number, g: number, b: number, intensity: number): Triple {
  const r1 = clampChannel(boostContrast(r, intensity));
  const g1 = clampChannel(boostContrast(g, intensity));
  let b1 = clampChannel(boostContrast(b, intensity));
  b1 = clampChannel(b1 * (1 + intensity * BLUE_GAIN));
  return suppressHighlights(r1, g1, b1, intensity);
}

/**
 * Contrast boost, blue enhancement and glare reduction, applied to every
 * pixel in place. Returns the same bitmap.
 */
export function applyTone(bitmap: Bitmap, intensity: number): Bitmap {
  const { data } = bitmap;
  for (let i = 0; i < data.length; i += CHANNELS) {
    const [r, g, b] = tonePixel(data[i], data[i + 1], data[i + 2], intensity);
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
  }
  return bitmap;
}
