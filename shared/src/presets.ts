import type {
  EffectOverrides,
  EffectParameters,
  FrameGeometry,
  FramePalette,
  PresetName,
  ResizeScale,
  Rgb,
} from "./types";

export const DEFAULT_INTENSITY = 0.7;
export const DEFAULT_JPEG_QUALITY = 95;
export const DEFAULT_PRESET: PresetName = "instant";

export const DEFAULT_PALETTE: FramePalette = {
  margin: { r: 0, g: 0, b: 0 },
  frame: { r: 255, g: 255, b: 255 },
  border: { r: 180, g: 180, b: 180 },
};

const INSTANT_FRAME: FrameGeometry = {
  topBorder: 70,
  sideBorder: 70,
  bottomBorder: 200, // room to write on
  cornerRadius: 35,
  outerMargin: 50,
  shadowSize: 3,
  borderThickness: 2,
  cornerStep: 1,
};

/**
 * Each preset is one of the frame variants the camera app shipped.
 * Only `instant` uses the faceted corner.
 */
export const EFFECT_PRESETS: Record<PresetName, { label: string; resizeScale: ResizeScale; frame: FrameGeometry }> = {
  instant: {
    label: "Instant film, stepped corners",
    resizeScale: { width: 0.85, height: 0.65 },
    frame: { ...INSTANT_FRAME, cornerStep: 6 },
  },
  compact: {
    label: "Compact print",
    resizeScale: { width: 0.65, height: 0.45 },
    frame: { ...INSTANT_FRAME },
  },
  tall: {
    label: "Tall print",
    resizeScale: { width: 0.65, height: 1.0 },
    frame: { ...INSTANT_FRAME },
  },
};

export const PRESET_NAMES: PresetName[] = ["instant", "compact", "tall"];

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(EFFECT_PRESETS, value);
}

function assertNonNegativeInt(name: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, received ${value}`);
  }
}

function assertColor(name: string, color: Rgb | undefined) {
  if (!color) {
    throw new RangeError(`palette.${name} must be an RGB colour, received ${color}`);
  }
  for (const channel of [color.r, color.g, color.b]) {
    if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
      throw new RangeError(`palette.${name} channels must be integers in 0..255, received (${color.r}, ${color.g}, ${color.b})`);
    }
  }
}

export function validateEffectParams(params: EffectParameters): EffectParameters {
  if (!Number.isFinite(params.intensity)) {
    throw new RangeError(`intensity must be a finite number, received ${params.intensity}`);
  }
  const { width, height } = params.resizeScale;
  if (!(Number.isFinite(width) && width > 0) || !(Number.isFinite(height) && height > 0)) {
    throw new RangeError(`resizeScale factors must be positive, received ${width}x${height}`);
  }
  const frame = params.frame;
  assertNonNegativeInt("topBorder", frame.topBorder);
  assertNonNegativeInt("sideBorder", frame.sideBorder);
  assertNonNegativeInt("bottomBorder", frame.bottomBorder);
  assertNonNegativeInt("cornerRadius", frame.cornerRadius);
  assertNonNegativeInt("outerMargin", frame.outerMargin);
  assertNonNegativeInt("shadowSize", frame.shadowSize);
  assertNonNegativeInt("borderThickness", frame.borderThickness);
  if (!Number.isInteger(frame.cornerStep) || frame.cornerStep < 1) {
    throw new RangeError(`cornerStep must be an integer >= 1, received ${frame.cornerStep}`);
  }
  if (!Number.isInteger(params.jpegQuality) || params.jpegQuality < 1 || params.jpegQuality > 100) {
    throw new RangeError(`jpegQuality must be an integer between 1 and 100, received ${params.jpegQuality}`);
  }
  assertColor("margin", params.palette.margin);
  assertColor("frame", params.palette.frame);
  assertColor("border", params.palette.border);
  return params;
}

/**
 * Merge partial overrides onto a preset. Colours are replaced whole, geometry
 * and scale field by field.
 */
export function resolveEffectParams(
  overrides: EffectOverrides = {},
  preset: PresetName = DEFAULT_PRESET
): EffectParameters {
  const base = EFFECT_PRESETS[preset];
  return validateEffectParams({
    intensity: overrides.intensity ?? DEFAULT_INTENSITY,
    resizeScale: { ...base.resizeScale, ...overrides.resizeScale },
    frame: { ...base.frame, ...overrides.frame },
    palette: { ...DEFAULT_PALETTE, ...overrides.palette },
    jpegQuality: overrides.jpegQuality ?? DEFAULT_JPEG_QUALITY,
  });
}

export const DEFAULT_EFFECT_PARAMETERS: EffectParameters = resolveEffectParams();
