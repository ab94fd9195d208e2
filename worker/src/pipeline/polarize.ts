/**
 * Polarized instant-photo effect: source bytes -> toned, framed JPEG.
 *
 * Stage order:
 * 1. decode (sharp)
 * 2. tone: contrast boost, blue enhancement, glare reduction (in place)
 * 3. resize by the preset's scale factors (bilinear)
 * 4. frame: margin, rounded white frame, shadow, photo, border
 * 5. encode JPEG (sharp)
 *
 * Bytes that do not decode are handed back untouched. Encode failures reject
 * with EncodeFailure and the caller decides what to keep.
 */

import fs from "fs/promises";
import path from "path";
import {
  DEFAULT_EFFECT_PARAMETERS,
  DecodeFailure,
  validateEffectParams,
  type Bitmap,
  type Dimensions,
  type EffectParameters,
} from "@instantframe/shared";

import { vLog, nLog } from "../logger";
import { DEFAULT_OUTPUT_MARKER, polarizedOutputPath } from "../utils/images";
import { decodeImage, encodeJpeg } from "./codec";
import { composeFrame } from "./frame";
import { resizeBilinear, scaledSize } from "./resize";
import { applyTone } from "./tone";

export interface PolarizeOptions {
  params?: EffectParameters;
  /** Where the input came from; used to suggest where the output should go. */
  sourcePath?: string;
  marker?: string;
}

export type PolarizeResult =
  | {
      kind: "polarized";
      bytes: Buffer;
      width: number;
      height: number;
      source: Dimensions;
      suggestedPath?: string;
    }
  | {
      kind: "passthrough";
      bytes: Buffer;
      failure: DecodeFailure;
    };

/**
 * Tone, resize and frame an already decoded bitmap. The input's pixels are
 * overwritten by the tone step; the returned canvas is a new bitmap.
 */
export function polarizeBitmap(bitmap: Bitmap, params: EffectParameters = DEFAULT_EFFECT_PARAMETERS): Bitmap {
  validateEffectParams(params);
  let t = Date.now();
  applyTone(bitmap, params.intensity);
  vLog(`[polarize] tone ${bitmap.width}x${bitmap.height} intensity=${params.intensity} in ${Date.now() - t}ms`);

  t = Date.now();
  const target = scaledSize(bitmap.width, bitmap.height, params.resizeScale);
  const resized = resizeBilinear(bitmap, target.width, target.height);
  vLog(`[polarize] resize -> ${resized.width}x${resized.height} in ${Date.now() - t}ms`);

  t = Date.now();
  const framed = composeFrame(resized, params.frame, params.palette);
  vLog(`[polarize] frame -> ${framed.width}x${framed.height} cornerStep=${params.frame.cornerStep} in ${Date.now() - t}ms`);
  return framed;
}

export async function polarizeImage(input: Buffer, options: PolarizeOptions = {}): Promise<PolarizeResult> {
  const params = validateEffectParams(options.params ?? DEFAULT_EFFECT_PARAMETERS);

  let bitmap: Bitmap;
  try {
    bitmap = await decodeImage(input);
  } catch (err) {
    if (err instanceof DecodeFailure) {
      nLog(`[polarize] ⚠️ ${err.message}; returning input unchanged`);
      return { kind: "passthrough", bytes: input, failure: err };
    }
    throw err;
  }

  const source = { width: bitmap.width, height: bitmap.height };
  const framed = polarizeBitmap(bitmap, params);

  const t = Date.now();
  const bytes = await encodeJpeg(framed, params.jpegQuality);
  vLog(`[polarize] encode quality=${params.jpegQuality} ${bytes.length} bytes in ${Date.now() - t}ms`);

  return {
    kind: "polarized",
    bytes,
    width: framed.width,
    height: framed.height,
    source,
    suggestedPath: options.sourcePath
      ? polarizedOutputPath(options.sourcePath, options.marker ?? DEFAULT_OUTPUT_MARKER)
      : undefined,
  };
}

/**
 * Read `inputPath`, write the framed photo beside it and resolve to the
 * written path. Resolves to `inputPath` itself when the file is not an image.
 * Rejects when the marker would make the output path the input path.
 */
export async function polarizeFile(
  inputPath: string,
  options: Omit<PolarizeOptions, "sourcePath"> = {}
): Promise<string> {
  const outputPath = polarizedOutputPath(inputPath, options.marker ?? DEFAULT_OUTPUT_MARKER);
  if (path.resolve(outputPath) === path.resolve(inputPath)) {
    throw new RangeError(`output marker "${options.marker}" would overwrite ${inputPath}`);
  }

  const input = await fs.readFile(inputPath);
  const result = await polarizeImage(input, { params: options.params });
  if (result.kind === "passthrough") {
    return inputPath;
  }
  await fs.writeFile(outputPath, result.bytes);
  nLog(`[polarize] ✅ ${inputPath} -> ${outputPath} (${result.width}x${result.height})`);
  return outputPath;
}
