import { EncodeFailure, type EffectParameters } from "@instantframe/shared";

import { eLog, nLog } from "../logger";
import { polarizeImage } from "../pipeline/polarize";
import { captureFileName, DEFAULT_OUTPUT_MARKER } from "../utils/images";
import type { CaptureOutcome, CaptureSource, PhotoSink } from "./types";

export interface CaptureOptions {
  params?: EffectParameters;
  marker?: string;
}

/**
 * Take one photo, run the effect and store the result.
 *
 * Shots are named after their capture time: "<epoch-ms>_polarized.jpg" when
 * the effect succeeds, "<epoch-ms>.jpg" when the raw capture is kept instead
 * (undecodable input, or a canvas that could not be encoded).
 */
export async function captureAndPolarize(
  source: CaptureSource,
  sink: PhotoSink,
  options: CaptureOptions = {}
): Promise<CaptureOutcome> {
  const marker = options.marker ?? DEFAULT_OUTPUT_MARKER;
  const shot = await source.capture();
  const rawName = captureFileName(shot.capturedAt);

  try {
    const result = await polarizeImage(shot.bytes, { params: options.params });
    if (result.kind === "passthrough") {
      const location = await sink.save(rawName, shot.bytes);
      nLog(`[capture] kept raw capture ${location}`);
      return { kind: "raw", location, reason: result.failure.code, error: result.failure };
    }

    const location = await sink.save(captureFileName(shot.capturedAt, marker), result.bytes);
    nLog(`[capture] ✅ saved ${location} (${result.width}x${result.height})`);
    return { kind: "polarized", location, width: result.width, height: result.height };
  } catch (err) {
    if (!(err instanceof EncodeFailure)) {
      throw err;
    }
    eLog("[capture] ❌ effect failed, keeping raw capture:", err.message);
    const location = await sink.save(rawName, shot.bytes);
    return { kind: "raw", location, reason: err.code, error: err };
  }
}
