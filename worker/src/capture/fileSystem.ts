import fs from "fs/promises";
import path from "path";

import type { CaptureSource, CapturedPhoto, PhotoSink } from "./types";

/** Treats an image already on disk as the shot; its mtime is the capture time. */
export class FileCaptureSource implements CaptureSource {
  constructor(private readonly filePath: string) {}

  async capture(): Promise<CapturedPhoto> {
    const [bytes, stat] = await Promise.all([fs.readFile(this.filePath), fs.stat(this.filePath)]);
    return { bytes, capturedAt: stat.mtime };
  }
}

export class FileSystemPhotoSink implements PhotoSink {
  constructor(private readonly directory: string) {}

  async save(name: string, bytes: Buffer): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const target = path.join(this.directory, name);
    await fs.writeFile(target, bytes);
    return target;
  }
}
