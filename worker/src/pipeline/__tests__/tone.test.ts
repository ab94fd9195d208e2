import { allocBitmap, fillBitmap, getPixel } from "../bitmap";
import { applyTone, boostContrast, suppressHighlights, tonePixel } from "../tone";

describe("tone adjustment", () => {
  test("keeps every channel within 0..255 across intensities", () => {
    const values = [0, 1, 64, 127, 128, 129, 190, 210, 254, 255];
    for (const intensity of [0, 0.25, 0.5, 0.7, 1]) {
      for (const r of values) {
        for (const g of values) {
          for (const b of values) {
            for (const c of tonePixel(r, g, b, intensity)) {
              expect(Number.isInteger(c)).toBe(true);
              expect(c).toBeGreaterThanOrEqual(0);
              expect(c).toBeLessThanOrEqual(255);
            }
          }
        }
      }
    }
  });

  test("intensity 0 is the identity", () => {
    const bitmap = allocBitmap(16, 16);
    for (let i = 0; i < bitmap.data.length; i++) {
      bitmap.data[i] = (i * 37) % 256;
    }
    const before = Uint8Array.from(bitmap.data);
    applyTone(bitmap, 0);
    expect(Array.from(bitmap.data)).toEqual(Array.from(before));
  });

  test("contrast above the midpoint never drops as intensity rises", () => {
    let previous = -Infinity;
    for (let step = 0; step <= 20; step++) {
      const value = boostContrast(150, step / 20);
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
    expect(boostContrast(150, 1)).toBe(172);
  });

  test("highlight suppression triggers only above a mean of 200", () => {
    expect(suppressHighlights(210, 210, 210, 0.7)).toEqual([151, 151, 151]);
    expect(suppressHighlights(190, 190, 190, 0.7)).toEqual([190, 190, 190]);
    expect(suppressHighlights(200, 200, 200, 0.7)).toEqual([200, 200, 200]);
  });

  test("brightness is judged after the contrast and blue steps", () => {
    // 210 -> 255 after contrast, mean 255 -> darkened
    expect(tonePixel(210, 210, 210, 0.7)).toEqual([183, 183, 183]);
    // 190 -> 233, blue 330 -> 255, mean 240.3 -> darkened as well
    expect(tonePixel(190, 190, 190, 0.7)).toEqual([167, 167, 183]);
    // mid grey stays under the threshold
    expect(tonePixel(128, 128, 128, 0.7)).toEqual([128, 128, 181]);
  });

  test("boosts blue on a sky-coloured pixel", () => {
    // r,g: (100-128)*1.7+128 = 80.4; b: 255 after contrast, stays 255
    expect(tonePixel(100, 100, 220, 0.7)).toEqual([80, 80, 255]);
    // b: (140-128)*1.7+128 = 148.4 -> 148; 148*1.42 = 210.16 -> 210
    expect(tonePixel(120, 120, 140, 0.7)).toEqual([114, 114, 210]);
  });

  test("mutates in place and returns the same bitmap", () => {
    const bitmap = allocBitmap(3, 2);
    fillBitmap(bitmap, { r: 100, g: 100, b: 220 });
    const out = applyTone(bitmap, 0.7);
    expect(out).toBe(bitmap);
    expect(out.width).toBe(3);
    expect(out.height).toBe(2);
    expect(getPixel(out, 2, 1)).toEqual({ r: 80, g: 80, b: 255 });
  });

  test("out-of-range intensity stays within channel bounds", () => {
    // glare factor 1 - 3 * 0.4 is negative, clamped to 0
    expect(tonePixel(255, 255, 255, 3)).toEqual([0, 0, 0]);
    // negative intensity flattens contrast; glare factor 1.04 brightens
    expect(tonePixel(255, 255, 255, -0.1)).toEqual([251, 251, 236]);
  });
});
