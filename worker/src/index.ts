export { polarizeImage, polarizeBitmap, polarizeFile } from "./pipeline/polarize";
export type { PolarizeOptions, PolarizeResult } from "./pipeline/polarize";
export { applyTone, tonePixel, boostContrast, suppressHighlights } from "./pipeline/tone";
export { resizeBilinear, scaledSize } from "./pipeline/resize";
export { composeFrame, computeFrameLayout, isCornerCutout } from "./pipeline/frame";
export type { FrameLayout } from "./pipeline/frame";
export { decodeImage, encodeJpeg } from "./pipeline/codec";
export { captureAndPolarize } from "./capture/captureFlow";
export type { CaptureOptions } from "./capture/captureFlow";
export { FileCaptureSource, FileSystemPhotoSink } from "./capture/fileSystem";
export type { CaptureOutcome, CaptureSource, CapturedPhoto, PhotoSink } from "./capture/types";
export { loadEffectConfig } from "./config/effectProfiles";
export type { EffectConfig } from "./config/effectProfiles";
export { polarizedOutputPath } from "./utils/images";
