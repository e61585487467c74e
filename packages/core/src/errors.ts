/**
 * Kinds of failure a request can end with
 */
export enum ErrorKind {
  TRANSPORT = "TRANSPORT",
  INVALID_STATUS = "INVALID_STATUS",
  PARSE = "PARSE",
  NO_PARSER = "NO_PARSER",
  CANCELLED = "CANCELLED",
  UNKNOWN = "UNKNOWN",
}

/**
 * Base class for NetKit errors
 */
export class NetkitError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode?: number;

  constructor(
    message: string,
    kind: ErrorKind,
    options?: {
      cause?: unknown;
      statusCode?: number;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = "NetkitError";
    this.kind = kind;
    this.statusCode = options?.statusCode;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NetkitError);
    }
  }

  /**
   * Convert to JSON
   */
  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The transport reported a failure (connection refused, timeout, abort...)
 */
export class TransportError extends NetkitError {
  constructor(cause: unknown) {
    super(`Transport error: ${describe(cause)}`, ErrorKind.TRANSPORT, {
      cause,
    });
    this.name = "TransportError";
  }
}

/**
 * The response status code was rejected by the request's validator
 */
export class InvalidStatusError extends NetkitError {
  readonly body: string;

  constructor(statusCode: number, body: string) {
    super(
      `Server error. Status code: ${statusCode}. Server response: ${body}`,
      ErrorKind.INVALID_STATUS,
      { statusCode },
    );
    this.name = "InvalidStatusError";
    this.body = body;
  }
}

/**
 * The request's parser failed on the response body
 */
export class ParseError extends NetkitError {
  constructor(cause: unknown) {
    super(`Parsing error: ${describe(cause)}`, ErrorKind.PARSE, { cause });
    this.name = "ParseError";
  }
}

/**
 * A response arrived but the request has no parser to decode it
 */
export class NoParserError extends NetkitError {
  constructor() {
    super("No parser provided", ErrorKind.NO_PARSER);
    this.name = "NoParserError";
  }
}

export class CancelledError extends NetkitError {
  constructor(message: string = "Cancelled") {
    super(message, ErrorKind.CANCELLED);
    this.name = "CancelledError";
  }
}

export class UnknownError extends NetkitError {
  constructor(cause?: unknown) {
    super("Unknown error", ErrorKind.UNKNOWN, { cause });
    this.name = "UnknownError";
  }
}

// --- Helper functions ---

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof NetkitError && error.kind === ErrorKind.TRANSPORT;
}

export function isInvalidStatusError(
  error: unknown,
): error is InvalidStatusError {
  return error instanceof InvalidStatusError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof NetkitError && error.kind === ErrorKind.PARSE;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof NetkitError && error.kind === ErrorKind.CANCELLED;
}

/**
 * Classify an error reported by a transport into a NetkitError
 */
export function classifyError(error: unknown): NetkitError {
  // Already a NetkitError (e.g. a task reporting its own cancellation)
  if (error instanceof NetkitError) {
    return error;
  }

  if (error instanceof Error) {
    return new TransportError(error);
  }

  return new UnknownError(error);
}
