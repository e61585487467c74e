import type { NetkitError } from "./errors";

/**
 * What a transport needs to perform one exchange
 */
export interface TransportRequest {
  url: string;
  /** HTTP method (default: GET) */
  method?: string;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

/**
 * Response metadata reported by a transport
 */
export interface ResponseInfo {
  statusCode: number;
  headers: Record<string, string>;
  url?: string;
}

/**
 * Called exactly once per transport invocation, unless the invocation was
 * cancelled before it started.
 */
export type TransportCompletion = (
  data: Uint8Array | undefined,
  response: ResponseInfo | undefined,
  error: Error | undefined,
) => void;

export interface Cancellable {
  cancel(): void;
}

/**
 * Performs raw exchanges. Shared read-only by every task.
 */
export interface Transport {
  perform(request: TransportRequest, onComplete: TransportCompletion): Cancellable;
}

export type Parser<T> = (data: Uint8Array | undefined) => T;

export type ResponseValidator = (statusCode: number) => boolean;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface NetworkResponse<T> {
  result: Result<T, NetkitError>;
  response?: ResponseInfo;
}

export type ResponseCallback<T> = (response: NetworkResponse<T>) => void;

/**
 * Schedules a callback on the execution context a caller chose for delivery
 */
export type DeliveryContext = (callback: () => void) => void;

export function isSuccess<T>(response: NetworkResponse<T>): boolean {
  return response.result.ok;
}

export function successValue<T>(response: NetworkResponse<T>): T | undefined {
  return response.result.ok ? response.result.value : undefined;
}

export function failureOf<T>(
  response: NetworkResponse<T>,
): NetkitError | undefined {
  return response.result.ok ? undefined : response.result.error;
}
