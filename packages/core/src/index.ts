/**
 * NetKit Core
 *
 * Request coordination shared by every NetKit transport:
 * - Coalescing of concurrent requests by identifier
 * - Fan-out of one result to every waiting caller
 * - Bounded retries with a fixed delay
 * - Per-caller and global cancellation
 * - Bounded-concurrency worker pool
 */

// Coordinator
export { Coordinator } from "./coordinator";
export type { CoordinatorConfig, TransferObserver } from "./coordinator";

// Tasks and pool
export { AsyncTask, TaskState } from "./async-task";
export { WorkerPool, DEFAULT_WORKER_POOL_CONFIG } from "./worker-pool";
export type { PoolTask, WorkerPoolConfig } from "./worker-pool";
export { StaticTransport } from "./static-transport";

// Registry
export { GroupedRegistry } from "./grouped-registry";

// Requests
export {
  createRequest,
  defaultValidator,
  jsonParser,
  requestLabel,
} from "./request";
export type { NetworkRequest, NetworkRequestOptions } from "./request";

// Retry
export { DEFAULT_RETRY_CONFIG, shouldRetry, nextAttempt } from "./retry";
export type { RetryConfig } from "./retry";

// Errors
export {
  NetkitError,
  TransportError,
  InvalidStatusError,
  ParseError,
  NoParserError,
  CancelledError,
  UnknownError,
  ErrorKind,
  isTransportError,
  isInvalidStatusError,
  isParseError,
  isCancelledError,
  classifyError,
} from "./errors";

// Logging
export { consoleLogger, silentLogger } from "./logger";
export type { LoggingDelegate } from "./logger";

// Delivery
export { microtaskContext, macrotaskContext, inlineContext } from "./delivery";

// Types
export { isSuccess, successValue, failureOf } from "./types";
export type {
  TransportRequest,
  ResponseInfo,
  TransportCompletion,
  Cancellable,
  Transport,
  Parser,
  ResponseValidator,
  Result,
  NetworkResponse,
  ResponseCallback,
  DeliveryContext,
} from "./types";
