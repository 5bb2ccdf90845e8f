import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ProviderCircuitOpenError } from "./baseProvider";
import { FPLProvider } from "./fplProvider";
import { HttpProviderAdapter, HttpStatusError, type FetchLike } from "./httpProvider";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("HttpProviderAdapter", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches JSON relative to the base URL", async () => {
    const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => jsonResponse({ ok: true }));
    const adapter = new HttpProviderAdapter("test-api", {
      baseUrl: "https://api.example.test/v1/",
      defaultHeaders: { Accept: "application/json" },
      fetch,
    });

    await expect(adapter.getJson("/status")).resolves.toEqual({ ok: true });
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://api.example.test/v1/status");
    expect(init).toMatchObject({ method: "GET", headers: { Accept: "application/json" } });
    expect(adapter.getMetadata()).toMatchObject({ provider: "test-api", status: "online", totalRequests: 1 });
  });

  it("retries transient failures", async () => {
    const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const adapter = new HttpProviderAdapter("test-api", { baseUrl: "https://api.example.test", retries: 2, retryDelayMs: 0, fetch });

    await expect(adapter.getJson("status")).resolves.toEqual({ ok: true });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("raises the HTTP status once retries are spent", async () => {
    const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => jsonResponse({ error: "boom" }, 500));
    const adapter = new HttpProviderAdapter("test-api", { baseUrl: "https://api.example.test", retries: 1, retryDelayMs: 0, fetch });

    await expect(adapter.getJson("/status")).rejects.toBeInstanceOf(HttpStatusError);
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(adapter.getMetadata()).toMatchObject({ status: "degraded", consecutiveFailures: 1, lastError: "HTTP 500" });
  });

  it("opens the circuit after repeated failures and retries after the cooldown", async () => {
    let clock = 1_000;
    const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => {
      throw new TypeError("fetch failed");
    });
    const adapter = new HttpProviderAdapter("test-api", {
      baseUrl: "https://api.example.test",
      retries: 0,
      failureThreshold: 2,
      cooldownMs: 30_000,
      now: () => clock,
      fetch,
    });

    await expect(adapter.getJson("/a")).rejects.toThrow("fetch failed");
    await expect(adapter.getJson("/a")).rejects.toThrow("fetch failed");
    expect(adapter.getMetadata().status).toBe("offline");

    await expect(adapter.getJson("/a")).rejects.toBeInstanceOf(ProviderCircuitOpenError);
    expect(fetch).toHaveBeenCalledTimes(2);

    clock += 30_000;
    fetch.mockResolvedValueOnce(jsonResponse({ ok: true }));
    await expect(adapter.getJson("/a")).resolves.toEqual({ ok: true });
    expect(adapter.getMetadata()).toMatchObject({ status: "online", consecutiveFailures: 0 });
  });

  it("can be reset by hand", async () => {
    const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => {
      throw new TypeError("fetch failed");
    });
    const adapter = new HttpProviderAdapter("test-api", { baseUrl: "https://api.example.test", retries: 0, failureThreshold: 1, fetch });

    await expect(adapter.getJson("/a")).rejects.toThrow("fetch failed");
    adapter.resetCircuit();
    expect(adapter.getMetadata()).toMatchObject({ status: "online", consecutiveFailures: 0 });
  });
});

describe("FPLProvider", () => {
  it("requests the bootstrap and fixtures endpoints", async () => {
    const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(async () => jsonResponse([]));
    const provider = new FPLProvider({ baseUrl: "https://fpl.example.test/api", fetch });

    await provider.getBootstrapStatic();
    await provider.getFixtures();

    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      "https://fpl.example.test/api/bootstrap-static/",
      "https://fpl.example.test/api/fixtures/",
    ]);
    expect(fetch.mock.calls[0]?.[1]).toMatchObject({
      headers: { "User-Agent": "fpl-chat-assistant/1.0", Accept: "application/json" },
    });
  });
});
