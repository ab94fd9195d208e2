/**
 * Pixel buffers and effect parameters shared by the pipeline and its callers.
 */

/** Row-major RGB, three bytes per pixel, no padding between rows. */
export interface Bitmap {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

/** Fractional downscale applied to the toned photo before it is framed. */
export interface ResizeScale {
  width: number;
  height: number;
}

/** All values are pixel counts except `cornerStep`. */
export interface FrameGeometry {
  topBorder: number;
  sideBorder: number;
  bottomBorder: number;
  cornerRadius: number;
  outerMargin: number;
  shadowSize: number;
  borderThickness: number;
  /**
   * Quantization step for the corner mask's squared distance.
   * 1 draws a smooth arc; larger values give a faceted corner.
   */
  cornerStep: number;
}

export interface FramePalette {
  /** Everything outside the rounded frame, including the corner cutouts. */
  margin: Rgb;
  frame: Rgb;
  border: Rgb;
}

export interface EffectParameters {
  intensity: number;
  resizeScale: ResizeScale;
  frame: FrameGeometry;
  palette: FramePalette;
  jpegQuality: number;
}

export type PresetName = "instant" | "compact" | "tall";

export type EffectOverrides = {
  intensity?: number;
  resizeScale?: Partial<ResizeScale>;
  frame?: Partial<FrameGeometry>;
  palette?: Partial<FramePalette>;
  jpegQuality?: number;
};
