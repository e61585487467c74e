import { EventEmitter } from "events";
import {
  Coordinator,
  consoleLogger,
  createRequest,
  jsonParser,
  microtaskContext,
  requestLabel,
} from "@netkit/core";
import type {
  DeliveryContext,
  LoggingDelegate,
  NetkitError,
  NetworkRequest,
  NetworkRequestOptions,
  NetworkResponse,
  ResponseCallback,
  RetryConfig,
  TransportRequest,
} from "@netkit/core";
import {
  asCurl,
  asJSONString,
  readDebugFlags,
  writeResponseToDisk,
  type DebugFlags,
} from "./debug";
import { DEFAULT_FETCH_TRANSPORT_CONFIG, FetchTransport } from "./fetch-transport";

export interface NetworkClientConfig {
  timeout?: number; // Per-exchange timeout in ms (default: 30000)
  concurrency?: number; // Transfers running at once (default: 6)
  retry?: Partial<RetryConfig>; // Retry configuration
  debug?: Partial<DebugFlags>; // Overrides flags read from argv and env
  logger?: LoggingDelegate; // Console output when absent
  fetch?: typeof fetch; // Defaults to the global fetch
}

export interface RetryEvent {
  request: NetworkRequest<unknown>;
  attempt: number;
  error: NetkitError;
}

/**
 * Fetch-backed client. Requests sharing an identifier are coalesced into one
 * exchange.
 *
 * Events:
 * - `transfer-start` (request): an exchange is handed to the pool
 * - `retry` (RetryEvent): a failed exchange will be attempted again
 * - `response` (request, response): a response was delivered to a caller
 */
export class NetworkClient extends EventEmitter {
  private coordinator: Coordinator;
  private debug: DebugFlags;
  private logger: LoggingDelegate | undefined;

  constructor(config: NetworkClientConfig = {}) {
    super();
    this.debug = { ...readDebugFlags(), ...config.debug };
    this.logger = config.logger;

    const transport = new FetchTransport({
      timeout: config.timeout ?? DEFAULT_FETCH_TRANSPORT_CONFIG.timeout,
      fetch: config.fetch,
      logger: config.logger,
    });

    this.coordinator = new Coordinator({
      transport,
      concurrency: config.concurrency,
      retry: config.retry,
      logger: config.logger,
      observer: {
        willStartTransfer: (request) => this.handleTransferStart(request),
        didReceiveData: (request, data) => this.handleData(request, data),
        didScheduleRetry: (request, error) => {
          const event: RetryEvent = {
            request,
            attempt: request.failCount + 1,
            error,
          };
          this.emitSafely("retry", event);
        },
      },
    });
  }

  /**
   * Build a request. Bodies are decoded as JSON unless a parser is given.
   */
  createRequest<T>(
    identifier: string,
    transportRequest: TransportRequest,
    options: NetworkRequestOptions<T> = {},
  ): NetworkRequest<T> {
    return createRequest<T>(identifier, transportRequest, {
      ...options,
      parser: options.parser ?? jsonParser<T>(),
    });
  }

  /**
   * Submit a request; the callback runs once on the given delivery context
   */
  execute<T>(
    request: NetworkRequest<T>,
    callback: ResponseCallback<T>,
    context: DeliveryContext = microtaskContext,
  ): void {
    this.coordinator.submit(request, context, (response) => {
      callback(response);
      this.emitSafely("response", request, response);
    });
  }

  /**
   * Submit a request and wait for its response. Never rejects: failures,
   * cancellation included, are carried in the response's result.
   */
  fetch<T>(request: NetworkRequest<T>): Promise<NetworkResponse<T>> {
    return new Promise((resolve) => {
      this.execute(request, resolve);
    });
  }

  cancel<T>(request: NetworkRequest<T>): void {
    this.coordinator.cancelOne(request);
  }

  /**
   * Cancel every exchange. Pending callers are dropped without a response.
   */
  cancelAll(): void {
    this.coordinator.cancelAll();
  }

  isInflight(identifier: string): boolean {
    return this.coordinator.isInflight(identifier);
  }

  hasWaiters(identifier: string): boolean {
    return this.coordinator.hasWaiters(identifier);
  }

  private handleTransferStart(request: NetworkRequest<unknown>): void {
    this.emitSafely("transfer-start", request);
    if (this.debug.logCurl && !request.mockData) {
      this.log(asCurl(request.transportRequest));
    }
  }

  private handleData(
    request: NetworkRequest<unknown>,
    data: Uint8Array | undefined,
  ): void {
    if (this.debug.writeResponse) {
      writeResponseToDisk(data, requestLabel(request), this.debug.responseDir)
        .then((path) => this.log(`Wrote ${requestLabel(request)} to ${path}`))
        .catch((error: unknown) => {
          this.log(`Failed to write response: ${String(error)}`, true);
        });
    }
    if (this.debug.logResponse) {
      this.log(asJSONString(data) || "No data");
    }
  }

  /**
   * A throwing listener is logged; it never costs a caller its response
   */
  private emitSafely(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.log(`Listener for ${event} threw: ${String(error)}`, true);
    }
  }

  private log(message: string, isError: boolean = false): void {
    (this.logger ?? consoleLogger).log(message, isError);
  }
}
