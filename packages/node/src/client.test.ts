import { describe, it, expect, vi } from "vitest";
import {
  CancelledError,
  InvalidStatusError,
  failureOf,
  successValue,
  type NetworkRequest,
} from "@netkit/core";
import { NetworkClient, type NetworkClientConfig, type RetryEvent } from "./client";

interface Logo {
  name: string;
}

const noDebug = { logResponse: false, logCurl: false, writeResponse: false };

function createClient(config: NetworkClientConfig = {}) {
  const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();
  const logger = { log: vi.fn() };
  const client = new NetworkClient({
    fetch: fetchMock,
    logger,
    debug: noDebug,
    ...config,
  });
  return { client, fetchMock, logger };
}

/**
 * Fetch that only settles by rejecting once its signal aborts
 */
function abortableFetch(_input: Parameters<typeof fetch>[0], init?: RequestInit) {
  return new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
  });
}

function logoRequest(client: NetworkClient, retryLimit = 0) {
  return client.createRequest<Logo>(
    "logo",
    { url: "https://example.test/logo" },
    { retryLimit, displayLabel: "logo" },
  );
}

describe("NetworkClient", () => {
  describe("fetch", () => {
    it("should decode JSON bodies by default", async () => {
      const { client, fetchMock } = createClient();
      fetchMock.mockResolvedValue(new Response('{"name":"nyt"}'));

      const response = await client.fetch(logoRequest(client));

      expect(successValue(response)).toEqual({ name: "nyt" });
      expect(response.response?.statusCode).toBe(200);
    });

    it("should use a custom parser", async () => {
      const { client, fetchMock } = createClient();
      fetchMock.mockResolvedValue(new Response("plain"));
      const request = client.createRequest<string>(
        "text",
        { url: "https://example.test/text" },
        { parser: (data) => new TextDecoder().decode(data) },
      );

      const response = await client.fetch(request);

      expect(successValue(response)).toBe("plain");
    });

    it("should share one exchange between concurrent callers", async () => {
      const { client, fetchMock } = createClient();
      fetchMock.mockResolvedValue(new Response('{"name":"nyt"}'));

      const responses = await Promise.all([
        client.fetch(logoRequest(client)),
        client.fetch(logoRequest(client)),
      ]);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(responses.map(successValue)).toEqual([
        { name: "nyt" },
        { name: "nyt" },
      ]);
    });

    it("should answer mock data without fetching", async () => {
      const { client, fetchMock } = createClient();
      const request = client.createRequest<Logo>(
        "logo",
        { url: "https://example.test/logo" },
        { mockData: new TextEncoder().encode('{"name":"mock"}') },
      );

      const response = await client.fetch(request);

      expect(fetchMock).not.toHaveBeenCalled();
      expect(successValue(response)).toEqual({ name: "mock" });
    });

    it("should report rejected status codes", async () => {
      const { client, fetchMock } = createClient();
      fetchMock.mockResolvedValue(new Response("missing", { status: 404 }));

      const response = await client.fetch(logoRequest(client));

      expect(failureOf(response)).toBeInstanceOf(InvalidStatusError);
      expect(response.response?.statusCode).toBe(404);
    });

    it("should retry failed exchanges", async () => {
      const { client, fetchMock } = createClient({ retry: { retryDelayMs: 1 } });
      fetchMock
        .mockResolvedValueOnce(new Response("down", { status: 500 }))
        .mockResolvedValueOnce(new Response('{"name":"nyt"}'));
      const retries: RetryEvent[] = [];
      client.on("retry", (event: RetryEvent) => retries.push(event));

      const response = await client.fetch(logoRequest(client, 1));

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(successValue(response)).toEqual({ name: "nyt" });
      expect(retries).toHaveLength(1);
      expect(retries[0].attempt).toBe(1);
      expect(retries[0].error).toBeInstanceOf(InvalidStatusError);
    });
  });

  describe("execute", () => {
    it("should emit transfer-start and response events", async () => {
      const { client, fetchMock } = createClient();
      fetchMock.mockResolvedValue(new Response('{"name":"nyt"}'));
      const started: Array<NetworkRequest<unknown>> = [];
      const delivered = vi.fn();
      client.on("transfer-start", (request: NetworkRequest<unknown>) =>
        started.push(request),
      );
      client.on("response", delivered);
      const request = logoRequest(client);

      const response = await new Promise((resolve) => {
        client.execute(request, resolve);
      });

      expect(started.map((entry) => entry.callId)).toEqual([request.callId]);
      expect(delivered).toHaveBeenCalledWith(request, response);
    });
  });

  describe("cancel", () => {
    it("should resolve the caller with a cancellation and abort the fetch", async () => {
      const { client, fetchMock } = createClient();
      fetchMock.mockImplementation(abortableFetch);
      const request = logoRequest(client);

      const pending = client.fetch(request);
      expect(client.isInflight("logo")).toBe(true);
      client.cancel(request);
      const response = await pending;

      expect(failureOf(response)).toBeInstanceOf(CancelledError);
      expect(client.isInflight("logo")).toBe(false);
      expect(client.hasWaiters("logo")).toBe(false);
      expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
    });

    it("should drop every caller on cancelAll", () => {
      const { client, fetchMock } = createClient();
      fetchMock.mockImplementation(abortableFetch);
      const callback = vi.fn();

      client.execute(logoRequest(client), callback);
      client.cancelAll();

      expect(client.hasWaiters("logo")).toBe(false);
      expect(client.isInflight("logo")).toBe(false);
      expect(callback).not.toHaveBeenCalled();
      expect(fetchMock.mock.calls[0][1]?.signal?.aborted).toBe(true);
    });
  });

  describe("throwing listeners", () => {
    it("should resolve the caller when a response listener throws", async () => {
      const { client, fetchMock, logger } = createClient();
      fetchMock.mockImplementation(async () => new Response('{"name":"nyt"}'));
      client.on("response", () => {
        throw new Error("listener");
      });

      const response = await client.fetch(logoRequest(client));

      expect(successValue(response)).toEqual({ name: "nyt" });
      expect(logger.log).toHaveBeenCalledWith(
        "Listener for response threw: Error: listener",
        true,
      );

      await client.fetch(logoRequest(client));
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("should resolve the caller when a transfer-start listener throws", async () => {
      const { client, fetchMock, logger } = createClient();
      fetchMock.mockImplementation(async () => new Response('{"name":"nyt"}'));
      client.on("transfer-start", () => {
        throw new Error("listener");
      });

      const response = await client.fetch(logoRequest(client));

      expect(successValue(response)).toEqual({ name: "nyt" });
      expect(logger.log).toHaveBeenCalledWith(
        "Listener for transfer-start threw: Error: listener",
        true,
      );
      expect(client.isInflight("logo")).toBe(false);
    });

    it("should keep retrying when a retry listener throws", async () => {
      const { client, fetchMock } = createClient({ retry: { retryDelayMs: 1 } });
      fetchMock
        .mockResolvedValueOnce(new Response("down", { status: 500 }))
        .mockResolvedValueOnce(new Response('{"name":"nyt"}'));
      client.on("retry", () => {
        throw new Error("listener");
      });

      const response = await client.fetch(logoRequest(client, 1));

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(successValue(response)).toEqual({ name: "nyt" });
    });
  });

  describe("debug output", () => {
    it("should log the curl command and the formatted response", async () => {
      const { client, fetchMock, logger } = createClient({
        debug: { ...noDebug, logCurl: true, logResponse: true },
      });
      fetchMock.mockResolvedValue(new Response('{"name":"nyt"}'));

      await client.fetch(logoRequest(client));

      expect(logger.log).toHaveBeenCalledWith(
        'curl -k -i "https://example.test/logo"',
        false,
      );
      expect(logger.log).toHaveBeenCalledWith('{\n  "name": "nyt"\n}', false);
    });

    it("should log a placeholder for bodies that are not JSON", async () => {
      const { client, fetchMock, logger } = createClient({
        debug: { ...noDebug, logResponse: true },
      });
      fetchMock.mockResolvedValue(new Response("plain"));
      const request = client.createRequest<string>(
        "text",
        { url: "https://example.test/text" },
        { parser: (data) => new TextDecoder().decode(data) },
      );

      await client.fetch(request);

      expect(logger.log).toHaveBeenCalledWith("No data", false);
    });
  });
});
