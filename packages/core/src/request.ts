import { randomUUID } from "crypto";
import type {
  Parser,
  ResponseValidator,
  TransportRequest,
} from "./types";

/**
 * A request as submitted to the coordinator.
 *
 * Requests sharing an `identifier` are coalesced into one transfer; `callId`
 * is unique per request and targets cancellation and delivery.
 */
export interface NetworkRequest<T> {
  readonly identifier: string;
  readonly callId: string;
  readonly transportRequest: TransportRequest;
  /** Number of retries after the first failed attempt */
  retryLimit: number;
  displayLabel: string;
  /** When set, the transfer resolves with these bytes instead of calling the transport */
  mockData?: Uint8Array;
  parser?: Parser<T>;
  validator: ResponseValidator;
  failCount: number;
  /** Milliseconds since epoch of the latest (re)submission */
  submissionTime: number;
}

export interface NetworkRequestOptions<T> {
  retryLimit?: number;
  displayLabel?: string;
  mockData?: Uint8Array;
  parser?: Parser<T>;
  validator?: ResponseValidator;
}

/** Accepts 200-299 inclusive */
export const defaultValidator: ResponseValidator = (statusCode) =>
  statusCode >= 200 && statusCode <= 299;

export function createRequest<T>(
  identifier: string,
  transportRequest: TransportRequest,
  options: NetworkRequestOptions<T> = {},
): NetworkRequest<T> {
  const retryLimit = options.retryLimit ?? 0;
  if (!Number.isInteger(retryLimit) || retryLimit < 0) {
    throw new RangeError(
      `retryLimit must be a non-negative integer, got ${retryLimit}`,
    );
  }

  return {
    identifier,
    callId: randomUUID(),
    transportRequest,
    retryLimit,
    displayLabel: options.displayLabel ?? "",
    mockData: options.mockData,
    parser: options.parser,
    validator: options.validator ?? defaultValidator,
    failCount: 0,
    submissionTime: Date.now(),
  };
}

/**
 * Short label used in log lines: call id prefix and display label
 */
export function requestLabel<T>(request: NetworkRequest<T>): string {
  return `${request.callId.slice(0, 5)} ${request.displayLabel}`;
}

/**
 * Parser decoding a UTF-8 JSON body
 */
export function jsonParser<T>(): Parser<T> {
  return (data) => {
    if (data === undefined) {
      throw new Error("No data to parse");
    }
    return JSON.parse(new TextDecoder().decode(data)) as T;
  };
}
