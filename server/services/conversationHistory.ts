import type { ConversationTurn, NewConversationTurn } from '@shared/schema';
import { getConfig } from '../config';
import { DataRepository } from './repositories/dataRepository';

export interface ConversationStore {
  /** Assigns the next turnIndex for the session and stores the turn. */
  appendTurn(sessionId: string, turn: NewConversationTurn): Promise<ConversationTurn>;
  /** Up to `k` turns of one session, most recent first. */
  getRecentTurns(sessionId: string, k: number): Promise<ConversationTurn[]>;
  /** Every retained turn of one session, oldest first. */
  getHistory(sessionId: string): Promise<ConversationTurn[]>;
  clearSession(sessionId: string): Promise<number>;
}

/**
 * Serializes async work per key. Appends to one session run one after
 * another; different sessions never wait on each other.
 */
export class SessionWriteQueue {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(() => task());
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return next;
  }

  pending(): number {
    return this.tails.size;
  }
}

export interface SessionLimits {
  /** Sessions with no append for this long are dropped. */
  idleMs: number;
  maxSessions: number;
}

export const DEFAULT_SESSION_LIMITS: SessionLimits = {
  idleMs: 2 * 60 * 60 * 1000,
  maxSessions: 10_000,
};

interface SessionState {
  turns: ConversationTurn[];
  nextIndex: number;
  lastActive: number;
}

export class InMemoryConversationStore implements ConversationStore {
  // Insertion order is least recently appended first
  private readonly sessions = new Map<string, SessionState>();
  private readonly queue = new SessionWriteQueue();

  constructor(
    private readonly retention: number = getConfig().history.retention,
    private readonly now: () => Date = () => new Date(),
    private readonly limits: SessionLimits = DEFAULT_SESSION_LIMITS,
  ) {}

  appendTurn(sessionId: string, turn: NewConversationTurn): Promise<ConversationTurn> {
    return this.queue.run(sessionId, async () => {
      const at = this.now();
      const state = this.live(sessionId, at.getTime()) ?? { turns: [], nextIndex: 0, lastActive: 0 };
      const stored: ConversationTurn = {
        ...turn,
        mentionedEntityIds: [...turn.mentionedEntityIds],
        sessionId,
        turnIndex: state.nextIndex,
        timestamp: at.toISOString(),
      };

      state.turns.push(stored);
      if (state.turns.length > this.retention) {
        state.turns.splice(0, state.turns.length - this.retention);
      }
      state.nextIndex += 1;
      state.lastActive = at.getTime();

      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, state);
      this.evict(at.getTime());
      return stored;
    });
  }

  async getRecentTurns(sessionId: string, k: number): Promise<ConversationTurn[]> {
    if (k <= 0) return [];
    const turns = this.live(sessionId, this.now().getTime())?.turns ?? [];
    return turns.slice(-k).reverse();
  }

  async getHistory(sessionId: string): Promise<ConversationTurn[]> {
    return [...(this.live(sessionId, this.now().getTime())?.turns ?? [])];
  }

  clearSession(sessionId: string): Promise<number> {
    return this.queue.run(sessionId, async () => {
      const removed = this.live(sessionId, this.now().getTime())?.turns.length ?? 0;
      this.sessions.delete(sessionId);
      return removed;
    });
  }

  sessionCount(): number {
    return this.sessions.size;
  }

  private isIdle(state: SessionState, at: number): boolean {
    return at - state.lastActive > this.limits.idleMs;
  }

  private live(sessionId: string, at: number): SessionState | undefined {
    const state = this.sessions.get(sessionId);
    if (state && this.isIdle(state, at)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return state;
  }

  private evict(at: number): void {
    for (const [sessionId, state] of this.sessions) {
      if (this.sessions.size <= this.limits.maxSessions && !this.isIdle(state, at)) break;
      this.sessions.delete(sessionId);
    }
  }
}

export class DatabaseConversationStore implements ConversationStore {
  private readonly queue = new SessionWriteQueue();

  constructor(
    private readonly repository: DataRepository = DataRepository.getInstance(),
    private readonly retention: number = getConfig().history.retention,
    private readonly now: () => Date = () => new Date(),
  ) {}

  appendTurn(sessionId: string, turn: NewConversationTurn): Promise<ConversationTurn> {
    return this.queue.run(sessionId, async () => {
      const latest = await this.repository.getLatestTurnIndex(sessionId);
      const turnIndex = latest === null ? 0 : latest + 1;
      const stored: ConversationTurn = {
        ...turn,
        mentionedEntityIds: [...turn.mentionedEntityIds],
        sessionId,
        turnIndex,
        timestamp: this.now().toISOString(),
      };

      await this.repository.insertConversationTurn(stored);
      if (turnIndex + 1 > this.retention) {
        await this.repository.pruneConversationTurns(sessionId, turnIndex + 1 - this.retention);
      }
      return stored;
    });
  }

  getRecentTurns(sessionId: string, k: number): Promise<ConversationTurn[]> {
    return this.repository.getRecentTurns(sessionId, k);
  }

  getHistory(sessionId: string): Promise<ConversationTurn[]> {
    return this.repository.getSessionTurns(sessionId);
  }

  clearSession(sessionId: string): Promise<number> {
    return this.queue.run(sessionId, () => this.repository.deleteConversation(sessionId));
  }
}

let defaultStore: ConversationStore | null = null;

export function getConversationStore(): ConversationStore {
  if (!defaultStore) {
    const config = getConfig();
    defaultStore = config.history.store === 'database'
      ? new DatabaseConversationStore(DataRepository.getInstance(), config.history.retention)
      : new InMemoryConversationStore(config.history.retention, undefined, {
        idleMs: config.history.sessionIdleMs,
        maxSessions: config.history.maxSessions,
      });
    console.log(`[chat] Conversation history stored in ${config.history.store}`);
  }
  return defaultStore;
}
