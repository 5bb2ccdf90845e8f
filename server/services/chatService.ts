import { randomUUID } from 'crypto';
import type { ChatResponse, ConversationTurn } from '@shared/schema';
import { getConfig } from '../config';
import { getConversationStore, type ConversationStore } from './conversationHistory';
import { QueryEngine, type QueryOutcome } from './queryEngine';
import { getResponseGenerator, type ResponseGenerator } from './responseGenerator';
import { SnapshotStore } from './snapshotStore';

export interface ChatServiceDependencies {
  engine: QueryEngine;
  store: SnapshotStore;
  history: ConversationStore;
  generator: ResponseGenerator;
  historyDepth: number;
}

export interface AnalysisResult {
  sessionId: string;
  outcome: QueryOutcome;
}

export class ChatService {
  private static instance: ChatService;

  private constructor(private readonly deps: ChatServiceDependencies) {}

  static getInstance(): ChatService {
    if (!ChatService.instance) {
      const { engine } = getConfig();
      ChatService.instance = new ChatService({
        engine: new QueryEngine(engine),
        store: SnapshotStore.getInstance(),
        history: getConversationStore(),
        generator: getResponseGenerator(),
        historyDepth: engine.historyDepth,
      });
    }
    return ChatService.instance;
  }

  static create(deps: ChatServiceDependencies): ChatService {
    return new ChatService(deps);
  }

  /** Runs the engine only; nothing is generated or stored. */
  async analyzeQuery(message: string, sessionId?: string): Promise<AnalysisResult> {
    const session = sessionId ?? randomUUID();
    const snapshot = this.deps.store.current();
    const history = await this.deps.history.getRecentTurns(session, this.deps.historyDepth);
    return { sessionId: session, outcome: this.deps.engine.process(message, session, history, snapshot) };
  }

  async processChatMessage(message: string, sessionId?: string): Promise<ChatResponse> {
    const startedAt = Date.now();
    const session = sessionId ?? randomUUID();

    // One snapshot per request, captured before anything else reads data
    const snapshot = this.deps.store.current();
    const history = await this.deps.history.getRecentTurns(session, this.deps.historyDepth);
    const outcome = this.deps.engine.process(message, session, history, snapshot);
    const { classification, context } = outcome;

    console.log(`[chat] session=${session} intent=${classification.intent} rule=${classification.ruleId} resolved=${classification.contextResolved} generation=${snapshot.generationId}`);

    const answer = await this.deps.generator.generate({ query: classification.query, context, history });

    await this.deps.history.appendTurn(session, {
      rawQuery: message,
      resolvedQuery: classification.query,
      answer,
      intent: classification.intent,
      mentionedEntityIds: outcome.mentionedEntityIds,
      generationId: snapshot.generationId,
    });

    return {
      answer,
      sessionId: session,
      intent: classification.intent,
      confidence: classification.confidence,
      resolvedQuery: classification.query,
      context,
      responseTimeMs: Date.now() - startedAt,
    };
  }

  getHistory(sessionId: string): Promise<ConversationTurn[]> {
    return this.deps.history.getHistory(sessionId);
  }

  clearSession(sessionId: string): Promise<number> {
    return this.deps.history.clearSession(sessionId);
  }
}
