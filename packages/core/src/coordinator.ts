import { AsyncTask } from "./async-task";
import {
  CancelledError,
  InvalidStatusError,
  NetkitError,
  NoParserError,
  ParseError,
  UnknownError,
  classifyError,
} from "./errors";
import { GroupedRegistry } from "./grouped-registry";
import { consoleLogger, type LoggingDelegate } from "./logger";
import { requestLabel, type NetworkRequest } from "./request";
import {
  DEFAULT_RETRY_CONFIG,
  nextAttempt,
  shouldRetry,
  type RetryConfig,
} from "./retry";
import { StaticTransport } from "./static-transport";
import type {
  DeliveryContext,
  NetworkResponse,
  Parser,
  ResponseCallback,
  ResponseInfo,
  Result,
  Transport,
} from "./types";
import { WorkerPool } from "./worker-pool";

/**
 * Outcome of a transfer, before each waiter decodes it with its own parser
 */
type Settlement =
  | { kind: "data"; data: Uint8Array | undefined; response?: ResponseInfo }
  | { kind: "failure"; error: NetkitError; response?: ResponseInfo };

/**
 * A registered caller. The closure captured at registration resolves the
 * settlement back to the caller's own result type.
 */
interface Waiter {
  settle(settlement: Settlement): void;
}

/**
 * Optional hooks around the transfer lifecycle
 */
export interface TransferObserver {
  /** A transfer has been handed to the pool */
  willStartTransfer?(request: NetworkRequest<unknown>): void;
  /** A response passed validation and is about to be parsed */
  didReceiveData?(
    request: NetworkRequest<unknown>,
    data: Uint8Array | undefined,
  ): void;
  /** A failed transfer has been scheduled for another attempt */
  didScheduleRetry?(request: NetworkRequest<unknown>, error: NetkitError): void;
}

export interface CoordinatorConfig {
  transport: Transport;
  /** Maximum transfers running at once (default: 6) */
  concurrency?: number;
  retry?: Partial<RetryConfig>;
  /** Falls back to console output when absent */
  logger?: LoggingDelegate;
  observer?: TransferObserver;
}

function decode<T>(
  parser: Parser<T> | undefined,
  data: Uint8Array | undefined,
): Result<T, NetkitError> {
  if (!parser) {
    return { ok: false, error: new NoParserError() };
  }
  try {
    return { ok: true, value: parser(data) };
  } catch (error) {
    return { ok: false, error: new ParseError(error) };
  }
}

function bodyText(data: Uint8Array | undefined): string {
  return data ? new TextDecoder().decode(data) : "";
}

/**
 * Coalesces requests by identifier into a single transfer, retries failed
 * transfers and fans the final result out to every waiting caller.
 *
 * Every read-modify-write of the registry and the task table happens
 * synchronously, so each public operation and each completion is atomic with
 * respect to the others.
 */
export class Coordinator {
  private registry = new GroupedRegistry<string, string, Waiter>();
  private inflight: Map<string, AsyncTask> = new Map();
  private pendingRetries: Map<string, ReturnType<typeof setTimeout>> =
    new Map();
  private pool: WorkerPool;
  private transport: Transport;
  private retryConfig: RetryConfig;
  private observer: TransferObserver;

  /** Non-owning; console output when unset */
  loggingDelegate: LoggingDelegate | undefined;

  constructor(config: CoordinatorConfig) {
    this.transport = config.transport;
    this.pool = new WorkerPool(
      config.concurrency === undefined
        ? {}
        : { concurrency: config.concurrency },
    );
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
    this.loggingDelegate = config.logger;
    this.observer = config.observer ?? {};
  }

  /**
   * Submit a request. The callback receives exactly one response, on the
   * given delivery context.
   */
  submit<T>(
    request: NetworkRequest<T>,
    context: DeliveryContext,
    callback: ResponseCallback<T>,
  ): void {
    const local: NetworkRequest<T> = { ...request, submissionTime: Date.now() };
    this.log(`START REQUEST: ${requestLabel(local)}`);

    const active = this.isActive(local.identifier);
    this.registry.add(
      local.identifier,
      local.callId,
      this.createWaiter(local, context, callback),
    );
    if (active) {
      return;
    }

    this.startTransfer(local);
  }

  /**
   * Cancel one caller's interest. The transfer keeps running while other
   * callers still wait for it.
   */
  cancelOne<T>(request: NetworkRequest<T>): void {
    const waiter = this.registry.removeByUniqueKey(request.callId);
    if (waiter) {
      this.settleWaiter(waiter, {
        kind: "failure",
        error: new CancelledError(),
      });
    }

    if (!this.registry.has(request.identifier)) {
      this.inflight.get(request.identifier)?.cancel();
      this.inflight.delete(request.identifier);
      this.clearPendingRetry(request.identifier);
    }
  }

  /**
   * Tear everything down. Registered callers are dropped without a callback.
   */
  cancelAll(): void {
    this.registry.drainAll();
    this.pool.cancelAll();
    this.inflight.clear();
    for (const timer of this.pendingRetries.values()) {
      clearTimeout(timer);
    }
    this.pendingRetries.clear();
  }

  /**
   * Is a transfer running for this identifier?
   */
  isInflight(identifier: string): boolean {
    return this.inflight.has(identifier);
  }

  hasWaiters(identifier: string): boolean {
    return this.registry.has(identifier);
  }

  private isActive(identifier: string): boolean {
    return (
      this.registry.has(identifier) ||
      this.inflight.has(identifier) ||
      this.pendingRetries.has(identifier)
    );
  }

  private createWaiter<T>(
    request: NetworkRequest<T>,
    context: DeliveryContext,
    callback: ResponseCallback<T>,
  ): Waiter {
    return {
      settle: (settlement) => {
        const response: NetworkResponse<T> =
          settlement.kind === "failure"
            ? {
                result: { ok: false, error: settlement.error },
                response: settlement.response,
              }
            : {
                result: decode(request.parser, settlement.data),
                response: settlement.response,
              };

        context(() => {
          try {
            callback(response);
          } catch (error) {
            this.log(
              `Completion callback for ${requestLabel(request)} threw: ${String(error)}`,
              true,
            );
          }
        });
      },
    };
  }

  private settleWaiter(waiter: Waiter, settlement: Settlement): void {
    try {
      waiter.settle(settlement);
    } catch (error) {
      this.log(`Failed to deliver a response: ${String(error)}`, true);
    }
  }

  private startTransfer<T>(request: NetworkRequest<T>): void {
    const transport = request.mockData
      ? new StaticTransport(request.mockData)
      : this.transport;

    const task: AsyncTask = new AsyncTask(
      transport,
      request.transportRequest,
      (data, response, error) => {
        // Let the pool reclaim the slot before decoding
        queueMicrotask(() =>
          this.completeTransfer(request, task, data, response, error),
        );
      },
    );

    this.inflight.set(request.identifier, task);
    this.pool.enqueue(task);
    this.notify("willStartTransfer", () =>
      this.observer.willStartTransfer?.(request),
    );
  }

  private completeTransfer<T>(
    request: NetworkRequest<T>,
    task: AsyncTask,
    data: Uint8Array | undefined,
    response: ResponseInfo | undefined,
    error: Error | undefined,
  ): void {
    // Cancelled or superseded: nobody is waiting on this task any more
    if (this.inflight.get(request.identifier) !== task) {
      return;
    }
    this.inflight.delete(request.identifier);

    const settlement = this.classify(request, data, response, error);

    if (
      settlement.kind === "failure" &&
      shouldRetry(
        request.failCount,
        request.retryLimit,
        this.registry.has(request.identifier),
      )
    ) {
      this.scheduleRetry(request, settlement.error);
      return;
    }

    this.fireCompletions(request, settlement);
  }

  private classify<T>(
    request: NetworkRequest<T>,
    data: Uint8Array | undefined,
    response: ResponseInfo | undefined,
    error: Error | undefined,
  ): Settlement {
    if (response) {
      let accepted: boolean;
      try {
        accepted = request.validator(response.statusCode);
      } catch (validationError) {
        return {
          kind: "failure",
          error: new UnknownError(validationError),
          response,
        };
      }
      if (!accepted) {
        return {
          kind: "failure",
          error: new InvalidStatusError(response.statusCode, bodyText(data)),
          response,
        };
      }
    }

    if (error) {
      return { kind: "failure", error: classifyError(error), response };
    }

    this.notify("didReceiveData", () =>
      this.observer.didReceiveData?.(request, data),
    );

    const decoded = decode(request.parser, data);
    if (!decoded.ok) {
      return { kind: "failure", error: decoded.error, response };
    }
    return { kind: "data", data, response };
  }

  private scheduleRetry<T>(
    request: NetworkRequest<T>,
    error: NetkitError,
  ): void {
    const { identifier } = request;
    this.log(
      `RETRY REQUEST: ${requestLabel(request)} attempt ${request.failCount + 1} of ${request.retryLimit} in ${this.retryConfig.retryDelayMs} ms. ${error.message}`,
    );
    const timer = setTimeout(() => {
      this.pendingRetries.delete(identifier);
      // Every waiter may have cancelled during the delay
      if (!this.registry.has(identifier)) {
        return;
      }
      this.startTransfer(nextAttempt(request, Date.now()));
    }, this.retryConfig.retryDelayMs);

    this.pendingRetries.set(identifier, timer);
    this.notify("didScheduleRetry", () =>
      this.observer.didScheduleRetry?.(request, error),
    );
  }

  private clearPendingRetry(identifier: string): void {
    const timer = this.pendingRetries.get(identifier);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.pendingRetries.delete(identifier);
    }
  }

  private fireCompletions<T>(
    request: NetworkRequest<T>,
    settlement: Settlement,
  ): void {
    const succeeded = settlement.kind === "data";
    const duration = Date.now() - request.submissionTime;
    this.log(
      `END REQUEST: ${requestLabel(request)} took ${duration.toFixed(0)} ms. ${succeeded ? "SUCCESS" : "FAILURE"}`,
      !succeeded,
    );

    for (const waiter of this.registry.drainGroup(request.identifier)) {
      this.settleWaiter(waiter, settlement);
    }
  }

  /**
   * Observer hooks never interrupt the coordinator's own bookkeeping
   */
  private notify(hook: keyof TransferObserver, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.log(`Observer hook ${hook} threw: ${String(error)}`, true);
    }
  }

  private log(message: string, isError: boolean = false): void {
    (this.loggingDelegate ?? consoleLogger).log(message, isError);
  }
}
