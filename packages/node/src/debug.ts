/**
 * Debug output switched on from process arguments or environment
 */

import { writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { TransportRequest } from "@netkit/core";

export interface DebugFlags {
  /** Log every response body as pretty-printed JSON */
  logResponse: boolean;
  /** Log every outgoing exchange as a curl command */
  logCurl: boolean;
  /** Write every response body to `responseDir` */
  writeResponse: boolean;
  responseDir: string;
}

export const DEFAULT_DEBUG_FLAGS: DebugFlags = {
  logResponse: false,
  logCurl: false,
  writeResponse: false,
  responseDir: tmpdir(),
};

function isEnabled(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

/**
 * Read the flags from `-LOG_RESPONSE`, `-LOG_CURL` and `-WRITE_RESPONSE`
 * arguments, or the matching `NETKIT_*` environment variables
 */
export function readDebugFlags(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): DebugFlags {
  return {
    logResponse:
      argv.includes("-LOG_RESPONSE") || isEnabled(env.NETKIT_LOG_RESPONSE),
    logCurl: argv.includes("-LOG_CURL") || isEnabled(env.NETKIT_LOG_CURL),
    writeResponse:
      argv.includes("-WRITE_RESPONSE") || isEnabled(env.NETKIT_WRITE_RESPONSE),
    responseDir: env.NETKIT_RESPONSE_DIR || DEFAULT_DEBUG_FLAGS.responseDir,
  };
}

/**
 * Render an exchange as a curl command. The body is included for POST only.
 */
export function asCurl(request: TransportRequest): string {
  let curl = "curl -k -i ";
  const method = request.method ?? "GET";
  if (method !== "GET") {
    curl += `-X ${method} `;
  }
  if (method === "POST" && request.body !== undefined) {
    const body =
      typeof request.body === "string"
        ? request.body
        : new TextDecoder().decode(request.body);
    curl += `-d "${body}" `;
  }
  for (const [key, value] of Object.entries(request.headers ?? {})) {
    curl += `-H "${key}: ${value}" `;
  }
  return `${curl}"${request.url}"`;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * Pretty-printed JSON with sorted keys, or "" when the bytes are not JSON
 */
export function asJSONString(data: Uint8Array | undefined): string {
  if (data === undefined) {
    return "";
  }
  try {
    const json: unknown = JSON.parse(new TextDecoder().decode(data));
    return JSON.stringify(sortKeys(json), null, 2);
  } catch {
    return "";
  }
}

/**
 * Write the body as `<name>.json` inside `dir` and return the file path
 */
export async function writeResponseToDisk(
  data: Uint8Array | undefined,
  name: string,
  dir: string,
): Promise<string> {
  const path = join(dir, `${name.replace(/[\\/]/g, "_")}.json`);
  await writeFile(path, asJSONString(data), "utf8");
  return path;
}
