import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_ENGINE_CONFIG } from "../config";
import { ChatService } from "./chatService";
import { InMemoryConversationStore } from "./conversationHistory";
import { SnapshotUnavailableError } from "./errors";
import { QueryEngine } from "./queryEngine";
import { FallbackGenerator, type GenerationRequest, type ResponseGenerator } from "./responseGenerator";
import { SnapshotStore } from "./snapshotStore";
import { buildSampleSnapshot } from "./__fixtures__/sampleSnapshot";

function createService(options: { loaded?: boolean; generator?: ResponseGenerator } = {}) {
  const store = SnapshotStore.create();
  if (options.loaded ?? true) {
    store.swap(buildSampleSnapshot(store.nextGenerationId()));
  }
  const history = new InMemoryConversationStore(20, () => new Date("2025-11-01T10:00:00Z"));
  const service = ChatService.create({
    engine: new QueryEngine(DEFAULT_ENGINE_CONFIG),
    store,
    history,
    generator: options.generator ?? new FallbackGenerator(),
    historyDepth: DEFAULT_ENGINE_CONFIG.historyDepth,
  });
  return { service, history, store };
}

describe("ChatService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers a question and records the turn", async () => {
    const { service, history } = createService();

    const response = await service.processChatMessage("Tell me about Haaland", "session-a");

    expect(response).toMatchObject({
      sessionId: "session-a",
      intent: "player_detail",
      confidence: 0.9,
      resolvedQuery: "Tell me about Haaland",
      answer: "**Haaland** (Man City, Forward, £15.0m) has 150 points, 20 goals and 4 assists this season. Form 8, owned by 60.3%.",
    });
    expect(response.context.generationId).toBe(1);

    const turns = await history.getHistory("session-a");
    expect(turns).toHaveLength(1);
    expect(turns[0]).toMatchObject({
      turnIndex: 0,
      rawQuery: "Tell me about Haaland",
      intent: "player_detail",
      mentionedEntityIds: [5],
      generationId: 1,
      answer: response.answer,
    });
  });

  it("resolves follow-up pronouns against the stored conversation", async () => {
    const { service } = createService();
    await service.processChatMessage("Tell me about Haaland", "session-a");

    const followUp = await service.processChatMessage("how much does he cost", "session-a");

    expect(followUp.resolvedQuery).toBe("how much does Haaland cost");
    expect(followUp.context.contextResolved).toBe(true);
    expect(followUp.context.entities.map(entity => entity.name)).toEqual(["Haaland"]);
  });

  it("keeps sessions apart", async () => {
    const { service } = createService();
    await service.processChatMessage("Tell me about Haaland", "session-a");

    const other = await service.processChatMessage("how much does he cost", "session-b");
    expect(other.resolvedQuery).toBe("how much does he cost");
    expect(other.context.contextResolved).toBe(false);
  });

  it("starts a new session when none is given", async () => {
    const { service } = createService();
    const response = await service.processChatMessage("hello");
    expect(response.sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(response.intent).toBe("conversational");
  });

  it("passes recent history to the generator, most recent first", async () => {
    const generate = vi.fn(async (_request: GenerationRequest) => "stub answer");
    const { service } = createService({ generator: { generate } });

    await service.processChatMessage("Tell me about Saka", "session-a");
    await service.processChatMessage("Tell me about Salah", "session-a");
    await service.processChatMessage("compare them", "session-a");

    const lastCall = generate.mock.calls[2]?.[0];
    expect(lastCall?.history.map(turn => turn.rawQuery)).toEqual(["Tell me about Salah", "Tell me about Saka"]);
  });

  it("fails before touching history when no snapshot is loaded", async () => {
    const { service, history } = createService({ loaded: false });

    await expect(service.processChatMessage("Tell me about Haaland", "session-a")).rejects.toThrow(SnapshotUnavailableError);
    expect(await history.getHistory("session-a")).toEqual([]);
  });

  it("analyses without generating or storing anything", async () => {
    const generate = vi.fn(async (_request: GenerationRequest) => "stub answer");
    const { service, history } = createService({ generator: { generate } });

    const { sessionId, outcome } = await service.analyzeQuery("Arsenal's next 3 fixtures", "session-a");

    expect(sessionId).toBe("session-a");
    expect(outcome.classification.intent).toBe("fixture_lookup");
    expect(outcome.context.fixtures).toHaveLength(3);
    expect(generate).not.toHaveBeenCalled();
    expect(await history.getHistory("session-a")).toEqual([]);
  });

  it("clears a session", async () => {
    const { service } = createService();
    await service.processChatMessage("hello", "session-a");
    await service.processChatMessage("thanks", "session-a");

    expect(await service.clearSession("session-a")).toBe(2);
    expect(await service.getHistory("session-a")).toEqual([]);
  });
});
