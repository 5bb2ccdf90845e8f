import { describe, expect, it, vi } from "vitest";
import type { ConversationTurn, NewConversationTurn } from "@shared/schema";
import {
  DatabaseConversationStore,
  InMemoryConversationStore,
  SessionWriteQueue,
} from "./conversationHistory";
import type { DataRepository } from "./repositories/dataRepository";

const fixedNow = () => new Date("2025-11-01T10:00:00Z");

function newTurn(rawQuery: string, mentionedEntityIds: number[] = []): NewConversationTurn {
  return {
    rawQuery,
    resolvedQuery: rawQuery,
    answer: `answer to ${rawQuery}`,
    intent: "player_detail",
    mentionedEntityIds,
    generationId: 1,
  };
}

type RepositoryStub = Pick<
  DataRepository,
  | "getLatestTurnIndex"
  | "insertConversationTurn"
  | "pruneConversationTurns"
  | "getRecentTurns"
  | "getSessionTurns"
  | "deleteConversation"
>;

function createRepositoryStub() {
  const rows: ConversationTurn[] = [];
  const stub = {
    getLatestTurnIndex: vi.fn(async (sessionId: string) => {
      const indexes = rows.filter(row => row.sessionId === sessionId).map(row => row.turnIndex);
      return indexes.length > 0 ? Math.max(...indexes) : null;
    }),
    insertConversationTurn: vi.fn(async (turn: ConversationTurn) => {
      rows.push(turn);
    }),
    pruneConversationTurns: vi.fn(async (sessionId: string, keepFromIndex: number) => {
      for (let i = rows.length - 1; i >= 0; i--) {
        const row = rows[i];
        if (row && row.sessionId === sessionId && row.turnIndex < keepFromIndex) rows.splice(i, 1);
      }
    }),
    getRecentTurns: vi.fn(async (sessionId: string, limit: number) =>
      rows.filter(row => row.sessionId === sessionId).sort((a, b) => b.turnIndex - a.turnIndex).slice(0, limit)),
    getSessionTurns: vi.fn(async (sessionId: string) =>
      rows.filter(row => row.sessionId === sessionId).sort((a, b) => a.turnIndex - b.turnIndex)),
    deleteConversation: vi.fn(async (sessionId: string) => {
      const before = rows.length;
      for (let i = rows.length - 1; i >= 0; i--) {
        if (rows[i]?.sessionId === sessionId) rows.splice(i, 1);
      }
      return before - rows.length;
    }),
  } satisfies RepositoryStub;

  return { stub, rows, repository: stub as unknown as DataRepository };
}

describe("SessionWriteQueue", () => {
  it("runs tasks for one key in order", async () => {
    const queue = new SessionWriteQueue();
    const order: string[] = [];

    const slow = queue.run("a", async () => {
      await new Promise(resolve => setTimeout(resolve, 10));
      order.push("first");
    });
    const fast = queue.run("a", async () => {
      order.push("second");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["first", "second"]);
  });

  it("keeps going after a failed task", async () => {
    const queue = new SessionWriteQueue();
    const failed = queue.run("a", async () => {
      throw new Error("write failed");
    });
    const next = queue.run("a", async () => "ok");

    await expect(failed).rejects.toThrow("write failed");
    await expect(next).resolves.toBe("ok");
  });
});

describe("InMemoryConversationStore", () => {
  it("assigns increasing turn indexes per session", async () => {
    const store = new InMemoryConversationStore(20, fixedNow);

    const [first, second, other] = await Promise.all([
      store.appendTurn("session-a", newTurn("Tell me about Saka", [3])),
      store.appendTurn("session-a", newTurn("is he fit")),
      store.appendTurn("session-b", newTurn("hello")),
    ]);

    expect(first).toMatchObject({ sessionId: "session-a", turnIndex: 0, timestamp: "2025-11-01T10:00:00.000Z" });
    expect(second?.turnIndex).toBe(1);
    expect(other?.turnIndex).toBe(0);
    expect(store.sessionCount()).toBe(2);
  });

  it("returns recent turns most recent first", async () => {
    const store = new InMemoryConversationStore(20, fixedNow);
    for (const query of ["one", "two", "three", "four"]) {
      await store.appendTurn("session-a", newTurn(query));
    }

    const recent = await store.getRecentTurns("session-a", 3);
    expect(recent.map(turn => turn.rawQuery)).toEqual(["four", "three", "two"]);
    expect(await store.getRecentTurns("session-a", 0)).toEqual([]);
    expect(await store.getRecentTurns("missing", 3)).toEqual([]);
  });

  it("keeps only the retained window but never reuses indexes", async () => {
    const store = new InMemoryConversationStore(2, fixedNow);
    for (const query of ["one", "two", "three"]) {
      await store.appendTurn("session-a", newTurn(query));
    }

    const history = await store.getHistory("session-a");
    expect(history.map(turn => [turn.turnIndex, turn.rawQuery])).toEqual([
      [1, "two"],
      [2, "three"],
    ]);
  });

  it("copies mentioned ids so callers cannot mutate stored turns", async () => {
    const store = new InMemoryConversationStore(20, fixedNow);
    const ids = [5];
    await store.appendTurn("session-a", newTurn("Haaland", ids));
    ids.push(7);

    const [turn] = await store.getHistory("session-a");
    expect(turn?.mentionedEntityIds).toEqual([5]);
  });

  it("clears a session and starts its indexes again", async () => {
    const store = new InMemoryConversationStore(20, fixedNow);
    await store.appendTurn("session-a", newTurn("one"));
    await store.appendTurn("session-a", newTurn("two"));

    expect(await store.clearSession("session-a")).toBe(2);
    expect(await store.getHistory("session-a")).toEqual([]);
    expect((await store.appendTurn("session-a", newTurn("three"))).turnIndex).toBe(0);
  });
});

describe("InMemoryConversationStore session limits", () => {
  it("drops sessions that have been idle too long", async () => {
    let clock = new Date("2025-11-01T10:00:00Z").getTime();
    const store = new InMemoryConversationStore(20, () => new Date(clock), { idleMs: 60_000, maxSessions: 100 });

    await store.appendTurn("session-a", newTurn("one"));
    clock += 30_000;
    await store.appendTurn("session-b", newTurn("two"));
    clock += 40_000;
    await store.appendTurn("session-c", newTurn("three"));

    expect(store.sessionCount()).toBe(2);
    expect(await store.getHistory("session-a")).toEqual([]);
    expect((await store.getRecentTurns("session-b", 3)).map(turn => turn.rawQuery)).toEqual(["two"]);

    clock += 61_000;
    expect(await store.getRecentTurns("session-b", 3)).toEqual([]);
    expect((await store.appendTurn("session-b", newTurn("again"))).turnIndex).toBe(0);
  });

  it("evicts the least recently active session past the cap", async () => {
    let clock = new Date("2025-11-01T10:00:00Z").getTime();
    const store = new InMemoryConversationStore(20, () => new Date(clock), { idleMs: 3_600_000, maxSessions: 2 });

    await store.appendTurn("session-a", newTurn("one"));
    clock += 1_000;
    await store.appendTurn("session-b", newTurn("two"));
    clock += 1_000;
    await store.appendTurn("session-a", newTurn("three"));
    clock += 1_000;
    await store.appendTurn("session-c", newTurn("four"));

    expect(store.sessionCount()).toBe(2);
    expect(await store.getHistory("session-b")).toEqual([]);
    expect((await store.getHistory("session-a")).map(turn => turn.turnIndex)).toEqual([0, 1]);
    expect((await store.getHistory("session-c")).map(turn => turn.rawQuery)).toEqual(["four"]);
  });
});

describe("DatabaseConversationStore", () => {
  it("continues from the latest stored index", async () => {
    const { repository, stub } = createRepositoryStub();
    const store = new DatabaseConversationStore(repository, 20, fixedNow);

    await store.appendTurn("session-a", newTurn("one"));
    const second = await store.appendTurn("session-a", newTurn("two"));

    expect(second.turnIndex).toBe(1);
    expect(stub.insertConversationTurn).toHaveBeenCalledTimes(2);
    expect(stub.pruneConversationTurns).not.toHaveBeenCalled();
  });

  it("serializes concurrent appends to one session", async () => {
    const { repository } = createRepositoryStub();
    const store = new DatabaseConversationStore(repository, 20, fixedNow);

    const turns = await Promise.all(["one", "two", "three"].map(query => store.appendTurn("session-a", newTurn(query))));
    expect(turns.map(turn => turn.turnIndex)).toEqual([0, 1, 2]);
  });

  it("prunes turns outside the retention window", async () => {
    const { repository, stub, rows } = createRepositoryStub();
    const store = new DatabaseConversationStore(repository, 2, fixedNow);

    for (const query of ["one", "two", "three"]) {
      await store.appendTurn("session-a", newTurn(query));
    }

    expect(stub.pruneConversationTurns).toHaveBeenCalledWith("session-a", 1);
    expect(rows.map(row => row.rawQuery)).toEqual(["two", "three"]);
  });

  it("delegates reads and deletes to the repository", async () => {
    const { repository, stub } = createRepositoryStub();
    const store = new DatabaseConversationStore(repository, 20, fixedNow);
    await store.appendTurn("session-a", newTurn("one"));
    await store.appendTurn("session-a", newTurn("two"));

    expect((await store.getRecentTurns("session-a", 1)).map(turn => turn.rawQuery)).toEqual(["two"]);
    expect(stub.getRecentTurns).toHaveBeenCalledWith("session-a", 1);
    expect(await store.clearSession("session-a")).toBe(2);
    expect(await store.getHistory("session-a")).toEqual([]);
  });
});
