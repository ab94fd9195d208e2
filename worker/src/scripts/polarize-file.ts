/**
 * Apply the polarized frame to image files on disk.
 * Run with: npx tsx src/scripts/polarize-file.ts <image> [more images...]
 *
 * Effect settings come from POLARIZE_* variables (see config/effectProfiles.ts),
 * optionally loaded from a .env file.
 */

import "dotenv/config";
import { EFFECT_PRESETS, PRESET_NAMES } from "@instantframe/shared";

import { loadEffectConfig } from "../config/effectProfiles";
import { polarizeFile } from "../pipeline/polarize";

async function main() {
  const inputs = process.argv.slice(2);
  if (inputs.length === 0) {
    console.error("Usage: polarize-file <image> [more images...]");
    console.error(`Presets (POLARIZE_PRESET): ${PRESET_NAMES.join(", ")}`);
    process.exitCode = 1;
    return;
  }

  const { preset, params, marker } = loadEffectConfig();
  console.log(`[polarize-file] preset=${preset} (${EFFECT_PRESETS[preset].label}) intensity=${params.intensity} quality=${params.jpegQuality}`);

  for (const input of inputs) {
    const output = await polarizeFile(input, { params, marker });
    if (output === input) {
      console.log(`[polarize-file] ${input} is not a readable image, left as is`);
    }
  }
}

main().catch((err) => {
  console.error("[polarize-file] ❌", err);
  process.exitCode = 1;
});
