export interface CapturedPhoto {
  bytes: Buffer;
  capturedAt: Date;
}

/** Anything that can hand over one freshly taken photo. */
export interface CaptureSource {
  capture(): Promise<CapturedPhoto>;
}

/** Stores a finished photo under `name` and resolves to where it ended up. */
export interface PhotoSink {
  save(name: string, bytes: Buffer): Promise<string>;
}

export type CaptureOutcome =
  | {
      kind: "polarized";
      location: string;
      width: number;
      height: number;
    }
  | {
      kind: "raw";
      location: string;
      reason: "decode_failure" | "encode_failure";
      error: Error;
    };
