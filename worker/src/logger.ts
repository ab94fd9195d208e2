/**
 * Pipeline Logging Utilities
 *
 * - vLog() is for stage timings and geometry, emitted only with PIPELINE_DEBUG=1
 * - nLog() is for normal progress lines, muted with PIPELINE_QUIET=1
 * - eLog() always writes to stderr
 *
 * Prefix every message with a bracketed tag, e.g. "[polarize]".
 */

import { PIPELINE_DEBUG, PIPELINE_QUIET } from "./config";

export function vLog(...args: unknown[]) {
  if (PIPELINE_DEBUG) {
    console.log(...args);
  }
}

export function nLog(...args: unknown[]) {
  if (!PIPELINE_QUIET) {
    console.log(...args);
  }
}

export function eLog(...args: unknown[]) {
  console.error(...args);
}
