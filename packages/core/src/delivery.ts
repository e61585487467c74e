import type { DeliveryContext } from "./types";

/** Runs the callback on the microtask queue (default) */
export const microtaskContext: DeliveryContext = (callback) => {
  queueMicrotask(callback);
};

/** Runs the callback on a later turn of the event loop */
export const macrotaskContext: DeliveryContext = (callback) => {
  setTimeout(callback, 0);
};

/** Runs the callback immediately, on the coordinator's own stack */
export const inlineContext: DeliveryContext = (callback) => {
  callback();
};
