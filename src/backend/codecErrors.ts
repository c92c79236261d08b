export type EncodeErrorKind = "unaligned-pixels" | "untiled-pixels" | "invalid-pixel" | "invalid-strategy" | "io";

export type DecodeErrorKind = "inconsistent-entry" | "out-of-bounds" | "length-mismatch" | "io";

// Malformed input or a failing sink while compressing. Whatever was written to the sink before the failure is
// garbage and has to be discarded by the caller.
export class EncodeError extends Error {
  constructor(
    public readonly kind: EncodeErrorKind,
    message: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "EncodeError";
  }
}

export class DecodeError extends Error {
  constructor(
    public readonly kind: DecodeErrorKind,
    message: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "DecodeError";
  }
}
