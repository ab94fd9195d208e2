import sharp from "sharp";
import { DecodeFailure, EncodeFailure, describeError, type Bitmap } from "@instantframe/shared";

import { CHANNELS } from "./bitmap";

/**
 * Decode JPEG/PNG/WebP/etc. bytes into an RGB bitmap.
 * EXIF orientation is applied and any alpha channel dropped.
 */
export async function decodeImage(bytes: Buffer): Promise<Bitmap> {
  try {
    const { data, info } = await sharp(bytes)
      .rotate()
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== CHANNELS) {
      throw new Error(`expected ${CHANNELS} channels, decoder produced ${info.channels}`);
    }
    return {
      width: info.width,
      height: info.height,
      data: new Uint8Array(data),
    };
  } catch (err) {
    throw new DecodeFailure(`The source image could not be decoded: ${describeError(err)}`, { cause: err });
  }
}

export async function encodeJpeg(bitmap: Bitmap, quality: number): Promise<Buffer> {
  try {
    const pixels = Buffer.from(bitmap.data.buffer, bitmap.data.byteOffset, bitmap.data.byteLength);
    return await sharp(pixels, {
      raw: { width: bitmap.width, height: bitmap.height, channels: CHANNELS },
    })
      .jpeg({ quality })
      .toBuffer();
  } catch (err) {
    throw new EncodeFailure(`The framed image could not be encoded: ${describeError(err)}`, { cause: err });
  }
}
