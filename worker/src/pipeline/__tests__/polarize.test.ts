import fs from "fs";
import os from "os";
import path from "path";
import sharp from "sharp";
import { DEFAULT_EFFECT_PARAMETERS, EncodeFailure, resolveEffectParams } from "@instantframe/shared";

import { allocBitmap, fillBitmap, getPixel } from "../bitmap";
import * as codec from "../codec";
import { polarizeBitmap, polarizeFile, polarizeImage } from "../polarize";

const SKY = { r: 100, g: 100, b: 220 };

const makeJpeg = (width: number, height: number, background = SKY) =>
  sharp({ create: { width, height, channels: 3, background } })
    .jpeg({ quality: 95 })
    .toBuffer();

describe("polarizeBitmap", () => {
  test("frames a 1000x1500 sky-blue photo", () => {
    const bitmap = allocBitmap(1000, 1500);
    fillBitmap(bitmap, SKY);
    const params = resolveEffectParams({ resizeScale: { width: 1, height: 1 } });
    const { outerMargin, topBorder, borderThickness } = params.frame;

    const out = polarizeBitmap(bitmap, params);

    expect(out.width).toBe(1000 + 2 * 70 + 2 * 50);
    expect(out.height).toBe(1500 + 70 + 200 + 2 * 50);
    expect(out.width).toBeGreaterThan(1000);
    expect(out.height).toBeGreaterThan(1500);

    // white top band down to the border outline
    const x = Math.floor(out.width / 2);
    const photoTop = outerMargin + topBorder;
    for (let y = outerMargin; y <= photoTop - borderThickness - 1; y++) {
      expect(getPixel(out, x, y)).toEqual({ r: 255, g: 255, b: 255 });
    }
    expect(getPixel(out, x, photoTop - 2)).toEqual({ r: 180, g: 180, b: 180 });
    expect(getPixel(out, x, photoTop - 1)).toEqual({ r: 180, g: 180, b: 180 });
    // the shadow under the photo's edge is covered by the photo
    expect(getPixel(out, x, photoTop)).toEqual({ r: 80, g: 80, b: 255 });

    // blue 220 -> 255 after contrast, above 220 * 1.42 before the clamp
    const centre = getPixel(out, x, photoTop + 750);
    expect(centre).toEqual({ r: 80, g: 80, b: 255 });
    expect(getPixel(out, 0, 0)).toEqual({ r: 0, g: 0, b: 0 });
  }, 30000);

  test("applies the preset's downscale before framing", () => {
    const bitmap = allocBitmap(1000, 1500);
    const out = polarizeBitmap(bitmap, DEFAULT_EFFECT_PARAMETERS);
    expect(out.width).toBe(850 + 140 + 100);
    expect(out.height).toBe(975 + 270 + 100);
  }, 30000);

  test("rejects parameters that would disable the corner mask", () => {
    const params = { ...DEFAULT_EFFECT_PARAMETERS, frame: { ...DEFAULT_EFFECT_PARAMETERS.frame, cornerStep: 0 } };
    expect(() => polarizeBitmap(allocBitmap(4, 4), params)).toThrow("cornerStep");
  });
});

describe("polarizeImage", () => {
  test("returns a framed JPEG with a suggested path", async () => {
    const input = await makeJpeg(1000, 1500);
    const result = await polarizeImage(input, { sourcePath: "/photos/1712000000000.jpg" });

    expect(result.kind).toBe("polarized");
    if (result.kind !== "polarized") return;
    expect(result.source).toEqual({ width: 1000, height: 1500 });
    expect(result.width).toBe(1090);
    expect(result.height).toBe(1345);
    expect(result.suggestedPath).toBe(path.join("/photos", "1712000000000_polarized.jpg"));

    const { data, info } = await sharp(result.bytes).raw().toBuffer({ resolveWithObject: true });
    expect(info.width).toBe(1090);
    expect(info.height).toBe(1345);
    // centre of the photo, JPEG-rounded on both ends
    const i = (Math.floor(1345 / 2) * info.width + Math.floor(1090 / 2)) * info.channels;
    expect(Math.abs(data[i] - 80)).toBeLessThanOrEqual(6);
    expect(data[i + 2]).toBeGreaterThanOrEqual(245);
  }, 30000);

  test("hands undecodable bytes back unchanged", async () => {
    const input = Buffer.from("this is a shopping list, not a photo");
    const result = await polarizeImage(input);
    expect(result.kind).toBe("passthrough");
    expect(result.bytes).toBe(input);
    if (result.kind === "passthrough") {
      expect(result.failure.code).toBe("decode_failure");
    }
  });

  test("omits the suggested path without a source path", async () => {
    const result = await polarizeImage(await makeJpeg(20, 20));
    expect(result.kind).toBe("polarized");
    if (result.kind === "polarized") {
      expect(result.suggestedPath).toBeUndefined();
    }
  });

  test("surfaces encode failures", async () => {
    const input = await makeJpeg(20, 20);
    const encodeSpy = jest
      .spyOn(codec, "encodeJpeg")
      .mockRejectedValueOnce(new EncodeFailure("The framed image could not be encoded: out of memory"));

    await expect(polarizeImage(input)).rejects.toBeInstanceOf(EncodeFailure);
    expect(encodeSpy).toHaveBeenCalledWith(expect.objectContaining({ width: 17 + 240, height: 13 + 370 }), 95);
    encodeSpy.mockRestore();
  });

  test("validates parameters before decoding", async () => {
    const params = { ...DEFAULT_EFFECT_PARAMETERS, jpegQuality: 0 };
    await expect(polarizeImage(Buffer.from("not a photo"), { params })).rejects.toThrow(RangeError);
  });
});

describe("polarizeFile", () => {
  test("writes the framed photo beside the input", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "polarize-file-"));
    const input = path.join(dir, "shot.jpg");
    fs.writeFileSync(input, await makeJpeg(60, 40));

    const output = await polarizeFile(input, { marker: "_instant" });

    expect(output).toBe(path.join(dir, "shot_instant.jpg"));
    const meta = await sharp(output).metadata();
    expect(meta.width).toBe(Math.floor(60 * 0.85) + 240);
    expect(meta.height).toBe(Math.floor(40 * 0.65) + 370);
  });

  test("returns the input path for a file that is not an image", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "polarize-file-"));
    const input = path.join(dir, "notes.jpg");
    fs.writeFileSync(input, "plain text");

    await expect(polarizeFile(input)).resolves.toBe(input);
    expect(fs.readdirSync(dir)).toEqual(["notes.jpg"]);
  });

  test("refuses a marker that would overwrite the input", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "polarize-file-"));
    const input = path.join(dir, "shot.jpg");
    const original = await makeJpeg(30, 30);
    fs.writeFileSync(input, original);

    await expect(polarizeFile(input, { marker: "" })).rejects.toThrow("overwrite");
    expect(fs.readFileSync(input).equals(original)).toBe(true);
  });
});
