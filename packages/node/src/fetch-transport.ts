import {
  consoleLogger,
  type Cancellable,
  type LoggingDelegate,
  type ResponseInfo,
  type Transport,
  type TransportCompletion,
  type TransportRequest,
} from "@netkit/core";

export interface FetchTransportConfig {
  /** Per-exchange timeout in milliseconds (default: 30000) */
  timeout: number;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
  logger?: LoggingDelegate;
}

export const DEFAULT_FETCH_TRANSPORT_CONFIG: FetchTransportConfig = {
  timeout: 30000,
};

interface Outcome {
  data?: Uint8Array;
  response?: ResponseInfo;
  error?: Error;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Transport over the fetch API. Each exchange is aborted on cancel or once
 * its timeout elapses.
 */
export class FetchTransport implements Transport {
  private config: FetchTransportConfig;
  private fetchFn: typeof fetch;

  constructor(config: Partial<FetchTransportConfig> = {}) {
    this.config = { ...DEFAULT_FETCH_TRANSPORT_CONFIG, ...config };
    if (!Number.isFinite(this.config.timeout) || this.config.timeout <= 0) {
      throw new RangeError(
        `timeout must be a positive number, got ${this.config.timeout}`,
      );
    }
    this.fetchFn = this.config.fetch ?? fetch;
  }

  perform(
    request: TransportRequest,
    onComplete: TransportCompletion,
  ): Cancellable {
    // Setup timeout with AbortController
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout);

    this.exchange(request, controller.signal)
      .then(({ data, response, error }) => {
        clearTimeout(timeoutId);
        onComplete(data, response, timedOut ? this.timeoutError() : error);
      })
      .catch((error: unknown) => {
        this.log(`Transport completion threw: ${String(error)}`);
      });

    return { cancel: () => controller.abort() };
  }

  /**
   * Never rejects; failures are reported in the outcome
   */
  private async exchange(
    request: TransportRequest,
    signal: AbortSignal,
  ): Promise<Outcome> {
    try {
      const response = await this.fetchFn(request.url, {
        method: request.method ?? "GET",
        headers: request.headers,
        body: request.body,
        signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      const data = new Uint8Array(await response.arrayBuffer());
      return {
        data,
        response: { statusCode: response.status, headers, url: response.url },
      };
    } catch (error) {
      return { error: toError(error) };
    }
  }

  private timeoutError(): Error {
    const error = new Error(
      `Request timed out after ${this.config.timeout} ms`,
    );
    error.name = "TimeoutError";
    return error;
  }

  private log(message: string): void {
    (this.config.logger ?? consoleLogger).log(message, true);
  }
}
