import path from "path";

export const DEFAULT_OUTPUT_MARKER = "_polarized";

export function siblingOutPath(srcPath: string, suffix: string, ext: string = ".jpg"): string {
  const dir = path.dirname(srcPath);
  const base = path.basename(srcPath, path.extname(srcPath));
  return path.join(dir, `${base}${suffix}${ext}`);
}

/**
 * "/photos/1712.jpg" -> "/photos/1712_polarized.jpg".
 * Output is always JPEG, so the extension is replaced rather than kept.
 */
export function polarizedOutputPath(srcPath: string, marker: string = DEFAULT_OUTPUT_MARKER): string {
  return siblingOutPath(srcPath, marker, ".jpg");
}

/** Bare file name for a capture taken at `capturedAt`. */
export function captureFileName(capturedAt: Date, marker: string = ""): string {
  return `${capturedAt.getTime()}${marker}.jpg`;
}
