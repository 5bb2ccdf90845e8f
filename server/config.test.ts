import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.fpl).toEqual({
      baseUrl: "https://fantasy.premierleague.com/api",
      timeoutMs: 15000,
      retries: 2,
      cacheTtlMs: 300000,
      proxyUrl: undefined,
    });
    expect(config.pipeline).toEqual({ bootstrap: true, schedule: "*/30 * * * *", timezone: "UTC" });
    expect(config.engine).toEqual({
      fuzzyThreshold: 0.8,
      historyDepth: 3,
      defaultTopN: 5,
      maxTopN: 10,
      maxFixtures: 15,
    });
    expect(config.history).toEqual({ store: "memory", retention: 10, sessionIdleMs: 7200000, maxSessions: 10000 });
    expect(config.openRouter).toEqual({ apiKey: undefined, model: "mistralai/mistral-7b-instruct:free" });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      FUZZY_THRESHOLD: "0.75",
      DATA_PIPELINE_BOOTSTRAP: "false",
      HTTP_PROXY: "http://proxy.example.test:3128",
      OPENROUTER_API_KEY: "test-secret",
    });

    expect(config.port).toBe(8080);
    expect(config.engine.fuzzyThreshold).toBe(0.75);
    expect(config.pipeline.bootstrap).toBe(false);
    expect(config.fpl.proxyUrl).toBe("http://proxy.example.test:3128");
    expect(config.openRouter.apiKey).toBe("test-secret");
  });

  it("keeps at least as many turns as the resolver reads", () => {
    const config = loadConfig({ HISTORY_DEPTH: "6", HISTORY_RETENTION: "2" });
    expect(config.history.retention).toBe(6);
  });

  it("caps the default result count at the maximum", () => {
    const config = loadConfig({ DEFAULT_TOP_N: "12", MAX_TOP_N: "8" });
    expect(config.engine).toMatchObject({ defaultTopN: 8, maxTopN: 8 });
  });

  it("stores history in the database when one is configured", () => {
    expect(loadConfig({ DATABASE_URL: "postgres://localhost/fpl" }).history.store).toBe("database");
    expect(loadConfig({ DATABASE_URL: "postgres://localhost/fpl", CONVERSATION_STORE: "memory" }).history.store).toBe("memory");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ FUZZY_THRESHOLD: "1.5" })).toThrow(/^Invalid environment configuration: FUZZY_THRESHOLD/);
  });
});
