import {
  DEFAULT_PRESET,
  isPresetName,
  resolveEffectParams,
  type EffectParameters,
  type EffectOverrides,
  type PresetName,
} from "@instantframe/shared";

import { getEnvFloat, getEnvInt, getEnvString } from "../utils/env";
import { DEFAULT_OUTPUT_MARKER } from "../utils/images";

export interface EffectConfig {
  preset: PresetName;
  params: EffectParameters;
  marker: string;
}

function parsePreset(value: string | undefined): PresetName {
  const normalized = value?.trim().toLowerCase();
  if (isPresetName(normalized)) {
    return normalized;
  }
  return DEFAULT_PRESET;
}

/**
 * Load the effect configuration from environment variables.
 *
 * POLARIZE_PRESET        instant | compact | tall (default instant)
 * POLARIZE_INTENSITY     float, default 0.7
 * POLARIZE_JPEG_QUALITY  integer 1..100, default 95
 * POLARIZE_CORNER_STEP   integer >= 1, default from the preset
 * POLARIZE_OUTPUT_MARKER file name marker, default "_polarized"
 *
 * Unparseable numbers fall back to their defaults; parseable but out-of-range
 * values throw a RangeError from resolveEffectParams.
 */
export function loadEffectConfig(): EffectConfig {
  const preset = parsePreset(process.env.POLARIZE_PRESET);
  const overrides: EffectOverrides = {};

  const intensity = getEnvFloat("POLARIZE_INTENSITY", Number.NaN);
  if (Number.isFinite(intensity)) overrides.intensity = intensity;

  const quality = getEnvInt("POLARIZE_JPEG_QUALITY", Number.NaN);
  if (!Number.isNaN(quality)) overrides.jpegQuality = quality;

  const cornerStep = getEnvInt("POLARIZE_CORNER_STEP", Number.NaN);
  if (!Number.isNaN(cornerStep)) overrides.frame = { cornerStep };

  return {
    preset,
    params: resolveEffectParams(overrides, preset),
    marker: getEnvString("POLARIZE_OUTPUT_MARKER", DEFAULT_OUTPUT_MARKER),
  };
}
