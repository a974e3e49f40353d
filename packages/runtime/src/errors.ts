/**
 * Typed Error System for nvrpc
 *
 * Every error raised by the codec, the RPC session and the binding generator
 * extends NvrpcError, so callers can rely on `instanceof` checks and switch on
 * a stable error code.
 */

import { markerName } from './msgpack/markers';
import type { ValueKind } from './value';

/**
 * Error codes for programmatic error handling.
 * Organized by error category prefix:
 * - TRANSPORT_* : Short reads, failed writes, closed streams
 * - CODEC_*     : Structural mismatches and invalid payloads
 * - GRAMMAR_*   : Manifest type-name tokens that do not parse
 * - MANIFEST_*  : Manifest acquisition and projection failures
 * - RPC_*       : Errors reported by the remote side or by framing
 * - BINDINGS_*  : Generated bindings that fail validation
 */
export enum ErrorCode {
  TRANSPORT_UNEXPECTED_EOF = 'TRANSPORT_UNEXPECTED_EOF',
  TRANSPORT_WRITE_FAILED = 'TRANSPORT_WRITE_FAILED',
  TRANSPORT_CLOSED = 'TRANSPORT_CLOSED',

  CODEC_MARKER_MISMATCH = 'CODEC_MARKER_MISMATCH',
  CODEC_INVALID_UTF8 = 'CODEC_INVALID_UTF8',
  CODEC_VALUE_OUT_OF_RANGE = 'CODEC_VALUE_OUT_OF_RANGE',
  CODEC_LENGTH_MISMATCH = 'CODEC_LENGTH_MISMATCH',
  CODEC_UNKNOWN_HANDLE_KIND = 'CODEC_UNKNOWN_HANDLE_KIND',
  CODEC_TRAILING_BYTES = 'CODEC_TRAILING_BYTES',
  CODEC_NESTING_TOO_DEEP = 'CODEC_NESTING_TOO_DEEP',

  GRAMMAR_INVALID_TYPE_NAME = 'GRAMMAR_INVALID_TYPE_NAME',

  MANIFEST_UNAVAILABLE = 'MANIFEST_UNAVAILABLE',
  MANIFEST_INVALID = 'MANIFEST_INVALID',

  RPC_REMOTE_ERROR = 'RPC_REMOTE_ERROR',
  RPC_PROTOCOL_ERROR = 'RPC_PROTOCOL_ERROR',

  BINDINGS_INVALID = 'BINDINGS_INVALID',
}

/**
 * Base error class for all nvrpc errors.
 *
 * @example
 * ```typescript
 * try {
 *   await nvim_get_current_line(session);
 * } catch (error) {
 *   if (hasErrorCode(error, ErrorCode.TRANSPORT_CLOSED)) {
 *     // reconnect
 *   }
 * }
 * ```
 */
export class NvrpcError extends Error {
  /**
   * Error code for programmatic error identification
   */
  readonly code: ErrorCode;

  /**
   * Additional context data related to the error
   */
  readonly context?: Record<string, unknown>;

  /**
   * Original error that caused this error
   */
  readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { context?: Record<string, unknown>; cause?: Error }
  ) {
    super(message);
    this.name = 'NvrpcError';
    this.code = code;
    this.context = options?.context;
    this.cause = options?.cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a JSON-serializable representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when bytes cannot be read from or written to the underlying
 * stream. The value being decoded or encoded is abandoned.
 */
export class TransportError extends NvrpcError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(code, message, { context, cause });
    this.name = 'TransportError';
  }

  static unexpectedEof(needed: number, available: number): TransportError {
    return new TransportError(
      ErrorCode.TRANSPORT_UNEXPECTED_EOF,
      `Unexpected end of input: needed ${needed} bytes, but only ${available} available`,
      { neededBytes: needed, availableBytes: available }
    );
  }

  static closed(reason = 'stream closed'): TransportError {
    return new TransportError(ErrorCode.TRANSPORT_CLOSED, `Transport closed: ${reason}`, { reason });
  }

  static writeFailed(cause: Error): TransportError {
    return new TransportError(
      ErrorCode.TRANSPORT_WRITE_FAILED,
      `Failed to write to transport: ${cause.message}`,
      undefined,
      cause
    );
  }
}

/**
 * Category reported when the reader accepts any value but the marker is not
 * one it can decode (bin, never-used).
 */
export const ANY_VALUE = 'value';

export type ExpectedCategory = ValueKind | typeof ANY_VALUE;

/**
 * Error thrown when a decoded marker does not belong to the expected value
 * category. This is the only structural check the codec performs.
 *
 * @example
 * ```typescript
 * new MarkerMismatchError(ValueKind.Boolean, 0xa3);
 * // message: "Expected boolean, found marker 0xa3 (fixstr(3))"
 * ```
 */
export class MarkerMismatchError extends NvrpcError {
  readonly expected: ExpectedCategory;
  readonly marker: number;

  constructor(expected: ExpectedCategory, marker: number, details?: string) {
    const hex = `0x${marker.toString(16).padStart(2, '0')}`;
    const detailsInfo = details ? `: ${details}` : '';
    super(
      ErrorCode.CODEC_MARKER_MISMATCH,
      `Expected ${expected}, found marker ${hex} (${markerName(marker)})${detailsInfo}`,
      { context: { expected, marker, details } }
    );
    this.name = 'MarkerMismatchError';
    this.expected = expected;
    this.marker = marker;
  }
}

/**
 * Error thrown when a payload is well framed but its content cannot be
 * represented: invalid UTF-8, integers out of range, wrong lengths.
 */
export class EncodingError extends NvrpcError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(code, message, { context, cause });
    this.name = 'EncodingError';
  }

  static invalidUtf8(byteLength: number, cause?: Error): EncodingError {
    return new EncodingError(
      ErrorCode.CODEC_INVALID_UTF8,
      `String payload of ${byteLength} bytes is not valid UTF-8`,
      { byteLength },
      cause
    );
  }

  static outOfRange(what: string, value: unknown): EncodingError {
    return new EncodingError(
      ErrorCode.CODEC_VALUE_OUT_OF_RANGE,
      `${what} is out of range: ${String(value)}`,
      { what, value: String(value) }
    );
  }

  static lengthMismatch(expected: number, actual: number): EncodingError {
    return new EncodingError(
      ErrorCode.CODEC_LENGTH_MISMATCH,
      `Expected a sequence of ${expected} items, got ${actual}`,
      { expected, actual }
    );
  }

  static trailingBytes(count: number): EncodingError {
    return new EncodingError(
      ErrorCode.CODEC_TRAILING_BYTES,
      `Expected a single value, but ${count} trailing bytes remain`,
      { trailingBytes: count }
    );
  }

  static unknownHandleKind(kind: string): EncodingError {
    return new EncodingError(
      ErrorCode.CODEC_UNKNOWN_HANDLE_KIND,
      `Handle kind '${kind}' is not registered`,
      { kind }
    );
  }

  static nestingTooDeep(limit: number): EncodingError {
    return new EncodingError(
      ErrorCode.CODEC_NESTING_TOO_DEEP,
      `Collections are nested more than ${limit} levels deep`,
      { limit }
    );
  }
}

/**
 * Error thrown by the manifest type-name grammar.
 */
export class TypeNameError extends NvrpcError {
  readonly token: string;
  readonly position: number;

  constructor(token: string, position: number, reason: string) {
    super(
      ErrorCode.GRAMMAR_INVALID_TYPE_NAME,
      `Invalid type name ${JSON.stringify(token)} at ${position}: ${reason}`,
      { context: { token, position, reason } }
    );
    this.name = 'TypeNameError';
    this.token = token;
    this.position = position;
  }
}

/**
 * Error thrown when the manifest cannot be obtained or does not have the
 * expected shape. Fatal for the whole generation pass.
 */
export class ManifestError extends NvrpcError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(code, message, { context, cause });
    this.name = 'ManifestError';
  }

  static invalid(path: string, expected: string, cause?: Error): ManifestError {
    const causeInfo = cause ? ` (${cause.message})` : '';
    return new ManifestError(
      ErrorCode.MANIFEST_INVALID,
      `Invalid manifest at '${path}': expected ${expected}${causeInfo}`,
      { path, expected },
      cause
    );
  }

  static unavailable(source: string, cause?: Error): ManifestError {
    const causeInfo = cause ? `: ${cause.message}` : '';
    return new ManifestError(
      ErrorCode.MANIFEST_UNAVAILABLE,
      `Could not obtain manifest from ${source}${causeInfo}`,
      { source },
      cause
    );
  }
}

/**
 * Error reported by the remote side in a response's error slot.
 * `errorType` is the id from the manifest's error type table.
 */
export class RemoteError extends NvrpcError {
  readonly method: string;
  readonly errorType: number | undefined;

  constructor(method: string, errorType: number | undefined, message: string) {
    super(ErrorCode.RPC_REMOTE_ERROR, `${method}: ${message}`, {
      context: { method, errorType },
    });
    this.name = 'RemoteError';
    this.method = method;
    this.errorType = errorType;
  }
}

/**
 * Utility function to check if an error is an nvrpc error
 */
export function isNvrpcError(error: unknown): error is NvrpcError {
  return error instanceof NvrpcError;
}

/**
 * Utility function to check if an error matches a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isNvrpcError(error) && error.code === code;
}

/**
 * Narrows an unknown thrown value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
