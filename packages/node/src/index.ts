/**
 * NetKit for Node.js
 *
 * Fetch transport, debug output and the NetworkClient facade over the core
 * coordinator.
 */

export { NetworkClient } from "./client";
export type { NetworkClientConfig, RetryEvent } from "./client";
export {
  FetchTransport,
  DEFAULT_FETCH_TRANSPORT_CONFIG,
} from "./fetch-transport";
export type { FetchTransportConfig } from "./fetch-transport";
export {
  readDebugFlags,
  asCurl,
  asJSONString,
  writeResponseToDisk,
  DEFAULT_DEBUG_FLAGS,
} from "./debug";
export type { DebugFlags } from "./debug";

// Re-export from core
export * from "@netkit/core";
