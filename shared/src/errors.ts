export type PipelineErrorCode = "decode_failure" | "encode_failure";

export class PipelineError extends Error {
  code: PipelineErrorCode;
  constructor(message: string, code: PipelineErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

/** Input bytes are not an image sharp can read. Callers keep the original bytes. */
export class DecodeFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "decode_failure", options);
    this.name = "DecodeFailure";
  }
}

/** The finished canvas could not be serialized. */
export class EncodeFailure extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "encode_failure", options);
    this.name = "EncodeFailure";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
