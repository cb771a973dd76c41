// Error taxonomy shared by every hdlcd package.

/** Discriminant for {@link HdlcdError}. */
export type HdlcdErrorKind =
  | "eof"
  | "invalid_argument"
  | "unsupported"
  | "unknown_content_id"
  | "io"
  | "closed";

/**
 * Error raised by the packet layer and the device session.
 *
 * Stream errors (`eof`, `io`, `closed`) end the current iteration and mean the
 * session has to be reopened. The rest signal programming errors.
 */
export class HdlcdError extends Error {
  constructor(
    public readonly kind: HdlcdErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HdlcdError";
  }

  static eof(context: string): HdlcdError {
    return new HdlcdError("eof", `Unexpected EOF while trying to read ${context}`);
  }

  static invalidArgument(message: string): HdlcdError {
    return new HdlcdError("invalid_argument", message);
  }

  static unsupported(message: string): HdlcdError {
    return new HdlcdError("unsupported", message);
  }

  static unknownContentId(contentId: number): HdlcdError {
    return new HdlcdError("unknown_content_id", `No packet variant registered for content id ${contentId}`);
  }

  static io(message: string, cause?: unknown): HdlcdError {
    return new HdlcdError("io", message, { cause });
  }

  static closed(): HdlcdError {
    return new HdlcdError("closed", "device session closed");
  }

  /** True for errors that end a stream: the connection cannot be used afterwards. */
  isStreamError(): boolean {
    return this.kind === "eof" || this.kind === "io" || this.kind === "closed";
  }
}

export function isHdlcdError(err: unknown, kind?: HdlcdErrorKind): err is HdlcdError {
  return err instanceof HdlcdError && (kind === undefined || err.kind === kind);
}
