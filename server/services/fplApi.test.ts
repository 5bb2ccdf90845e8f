import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FPLApiService } from "./fplApi";
import type { FPLProvider } from "./providers/fplProvider";
import { loadSampleBootstrap, loadSampleFixtures } from "./__fixtures__/sampleSnapshot";

type ProviderStub = Pick<FPLProvider, "getBootstrapStatic" | "getFixtures" | "getMetadata">;

function createProviderStub() {
  return {
    getBootstrapStatic: vi.fn(async (): Promise<unknown> => loadSampleBootstrap()),
    getFixtures: vi.fn(async (): Promise<unknown> => loadSampleFixtures()),
    getMetadata: vi.fn(() => ({
      provider: "fpl-api",
      status: "online" as const,
      totalRequests: 1,
      consecutiveFailures: 0,
    })),
  } satisfies ProviderStub;
}

describe("FPLApiService", () => {
  let clock = 0;

  beforeEach(() => {
    clock = 1_000;
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createService(provider = createProviderStub()) {
    const service = FPLApiService.create({
      provider: provider as unknown as FPLProvider,
      cacheTtlMs: 60_000,
      proxyUrl: "",
      now: () => clock,
    });
    return { service, provider };
  }

  it("validates and caches the bootstrap payload", async () => {
    const { service, provider } = createService();

    const first = await service.getBootstrapData();
    const second = await service.getBootstrapData();

    expect(first.elements).toHaveLength(19);
    expect(second).toEqual(first);
    expect(provider.getBootstrapStatic).toHaveBeenCalledTimes(1);
  });

  it("refetches when forced or expired", async () => {
    const { service, provider } = createService();

    await service.getFixtures();
    await service.getFixtures({ force: true });
    clock += 60_000;
    await service.getFixtures();

    expect(provider.getFixtures).toHaveBeenCalledTimes(3);
  });

  it("serves the last good payload when a refetch fails", async () => {
    const { service, provider } = createService();
    await service.getFixtures();
    provider.getFixtures.mockRejectedValueOnce(new Error("HTTP 503"));

    const fixtures = await service.getFixtures({ force: true });
    expect(fixtures).toHaveLength(8);
  });

  it("fails when there is nothing cached to fall back on", async () => {
    const { service, provider } = createService();
    provider.getBootstrapStatic.mockRejectedValueOnce(new Error("HTTP 503"));

    await expect(service.getBootstrapData()).rejects.toThrow("Failed to fetch data from FPL API: HTTP 503");
  });

  it("rejects payloads that do not match the schema", async () => {
    const { service, provider } = createService();
    provider.getFixtures.mockResolvedValueOnce([{ id: "not-a-number" }]);

    await expect(service.getFixtures()).rejects.toThrow("Failed to fetch data from FPL API");
  });

  it("reads the current gameweek from the events list", async () => {
    const { service } = createService();
    await expect(service.getCurrentGameweek()).resolves.toBe(10);
  });

  it("clears its cache on request", async () => {
    const { service, provider } = createService();
    await service.getBootstrapData();
    service.clearCache();
    await service.getBootstrapData();

    expect(provider.getBootstrapStatic).toHaveBeenCalledTimes(2);
    expect(service.getProviderMetadata()).toMatchObject({ provider: "fpl-api", status: "online" });
  });
});
