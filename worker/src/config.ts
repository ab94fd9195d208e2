/**
 * Worker Configuration
 *
 * Process-wide switches, read once at startup. Effect parameters live in
 * config/effectProfiles.ts.
 */

import { getEnvBoolean } from "./utils/env";

/**
 * PIPELINE_DEBUG
 *
 * When enabled, every stage reports its timing and the canvas geometry
 * through vLog().
 */
export const PIPELINE_DEBUG = getEnvBoolean("PIPELINE_DEBUG");

/**
 * PIPELINE_QUIET
 *
 * Mutes the normal progress lines. Errors are still written.
 */
export const PIPELINE_QUIET = getEnvBoolean("PIPELINE_QUIET");
