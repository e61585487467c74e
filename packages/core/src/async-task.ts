import { CancelledError } from "./errors";
import type {
  Cancellable,
  ResponseInfo,
  Transport,
  TransportCompletion,
  TransportRequest,
} from "./types";

/**
 * Lifecycle of an async task
 */
export enum TaskState {
  NOT_STARTED = "not_started",
  EXECUTING = "executing",
  FINISHED = "finished",
}

type FinishListener = () => void;

/**
 * Wraps one transport invocation as a cancellable unit of work.
 *
 * The task reaches FINISHED exactly once whatever the timing of cancellation,
 * and its completion fires at most once. Cancellation before or during
 * execution is reported to the completion as a CancelledError.
 */
export class AsyncTask implements Cancellable {
  private state: TaskState = TaskState.NOT_STARTED;
  private cancelled = false;
  private handle: Cancellable | null = null;
  private finishListeners: FinishListener[] = [];

  constructor(
    private readonly transport: Transport,
    private readonly request: TransportRequest,
    private readonly completion: TransportCompletion,
  ) {}

  getState(): TaskState {
    return this.state;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  isFinished(): boolean {
    return this.state === TaskState.FINISHED;
  }

  /**
   * Register a listener fired once the task finishes
   */
  onFinish(listener: FinishListener): void {
    if (this.isFinished()) {
      listener();
      return;
    }
    this.finishListeners.push(listener);
  }

  /**
   * Begin the transport call. Only the first call has an effect.
   */
  start(): void {
    if (this.state !== TaskState.NOT_STARTED) {
      return;
    }
    this.state = TaskState.EXECUTING;

    if (this.cancelled) {
      this.finishCancelled();
      return;
    }

    let handle: Cancellable;
    try {
      handle = this.transport.perform(this.request, (data, response, error) =>
        this.handleTransportCompletion(data, response, error),
      );
    } catch (error) {
      this.complete(
        undefined,
        undefined,
        error instanceof Error ? error : new Error(String(error)),
      );
      return;
    }

    // The transport may have completed synchronously
    if (this.isFinished()) {
      return;
    }
    this.handle = handle;

    // cancel() may have run while perform() was still setting up
    if (this.cancelled) {
      handle.cancel();
    }
  }

  /**
   * Safe to call in any state, any number of times
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;

    if (this.state === TaskState.EXECUTING) {
      this.handle?.cancel();
    }
  }

  private handleTransportCompletion(
    data: Uint8Array | undefined,
    response: ResponseInfo | undefined,
    error: Error | undefined,
  ): void {
    if (this.isFinished()) {
      return;
    }
    if (this.cancelled) {
      this.finishCancelled();
      return;
    }
    this.complete(data, response, error);
  }

  private finishCancelled(): void {
    this.complete(undefined, undefined, new CancelledError());
  }

  private complete(
    data: Uint8Array | undefined,
    response: ResponseInfo | undefined,
    error: Error | undefined,
  ): void {
    try {
      this.completion(data, response, error);
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    if (this.isFinished()) {
      return;
    }
    this.state = TaskState.FINISHED;
    this.handle = null;

    const listeners = this.finishListeners;
    this.finishListeners = [];
    listeners.forEach((listener) => listener());
  }
}
