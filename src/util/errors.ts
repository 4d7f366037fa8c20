/**
 * Errors raised while transforming a single record. The pipeline catches all
 * of them at the record boundary.
 */

/** Length-delimited stream is truncated, overruns the buffer, or has a bad prefix. */
export class FramingError extends Error {
  constructor(
    message: string,
    /** Byte offset in the stream where framing broke. */
    readonly offset: number
  ) {
    super(message);
    this.name = 'FramingError';
  }
}

/** A frame's bytes are not a valid ExportMetricsServiceRequest. */
export class SchemaDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaDecodeError';
  }
}

/** A request could not be serialized back to protobuf. */
export class SchemaEncodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaEncodeError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
