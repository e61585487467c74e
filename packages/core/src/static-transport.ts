import { CancelledError } from "./errors";
import type { Cancellable, Transport, TransportCompletion, TransportRequest } from "./types";

/**
 * Transport answering every exchange with fixed bytes and no response
 * metadata. Serves requests carrying mock data.
 */
export class StaticTransport implements Transport {
  constructor(private readonly data: Uint8Array) {}

  perform(_request: TransportRequest, onComplete: TransportCompletion): Cancellable {
    let settled = false;
    const settle = (error?: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      if (error) {
        onComplete(undefined, undefined, error);
      } else {
        onComplete(this.data, undefined, undefined);
      }
    };

    queueMicrotask(() => settle());
    return { cancel: () => settle(new CancelledError()) };
  }
}
