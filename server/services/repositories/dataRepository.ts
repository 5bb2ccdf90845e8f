import { and, asc, desc, eq, lt, max, sql } from "drizzle-orm";
import type {
  ConversationTurn,
  FPLFixture,
  FPLPlayer,
  FPLTeam
} from "@shared/schema";
import {
  conversationTurns,
  rawFplFixtures,
  rawFplPlayers,
  rawFplTeams,
  type ConversationTurnRow
} from "../../db/schema";
import { createDatabase, type AppDatabase } from "../../db/client";

export interface RawDataset {
  players: FPLPlayer[];
  teams: FPLTeam[];
  fixtures: FPLFixture[];
  fetchedAt: Date | null;
}

function toTurn(row: ConversationTurnRow): ConversationTurn {
  return {
    sessionId: row.sessionId,
    turnIndex: row.turnIndex,
    rawQuery: row.rawQuery,
    resolvedQuery: row.resolvedQuery,
    answer: row.answer,
    intent: row.intent,
    mentionedEntityIds: row.mentionedEntityIds,
    generationId: row.generationId,
    timestamp: row.createdAt.toISOString(),
  };
}

export class DataRepository {
  private static instance: DataRepository;

  private constructor(private readonly db: AppDatabase) {}

  static getInstance(db?: AppDatabase): DataRepository {
    if (!DataRepository.instance) {
      DataRepository.instance = new DataRepository(db ?? createDatabase());
    }
    return DataRepository.instance;
  }

  static create(db: AppDatabase): DataRepository {
    return new DataRepository(db);
  }

  async upsertFplPlayers(players: FPLPlayer[], fetchedAt: Date = new Date()): Promise<void> {
    if (players.length === 0) return;

    await this.db.insert(rawFplPlayers)
      .values(players.map(player => ({
        playerId: player.id,
        payload: player,
        fetchedAt,
      })))
      .onConflictDoUpdate({
        target: rawFplPlayers.playerId,
        set: {
          payload: sql`excluded.payload`,
          fetchedAt: sql`excluded.fetched_at`,
        },
      });
  }

  async upsertFplTeams(teams: FPLTeam[], fetchedAt: Date = new Date()): Promise<void> {
    if (teams.length === 0) return;

    await this.db.insert(rawFplTeams)
      .values(teams.map(team => ({
        teamId: team.id,
        payload: team,
        fetchedAt,
      })))
      .onConflictDoUpdate({
        target: rawFplTeams.teamId,
        set: {
          payload: sql`excluded.payload`,
          fetchedAt: sql`excluded.fetched_at`,
        },
      });
  }

  async upsertFplFixtures(fixtures: FPLFixture[], fetchedAt: Date = new Date()): Promise<void> {
    if (fixtures.length === 0) return;

    await this.db.insert(rawFplFixtures)
      .values(fixtures.map(fixture => ({
        fixtureId: fixture.id,
        event: fixture.event,
        payload: fixture,
        fetchedAt,
      })))
      .onConflictDoUpdate({
        target: rawFplFixtures.fixtureId,
        set: {
          payload: sql`excluded.payload`,
          event: sql`excluded.event`,
          fetchedAt: sql`excluded.fetched_at`,
        },
      });
  }

  async getFplPlayers(): Promise<FPLPlayer[]> {
    const rows = await this.db.select().from(rawFplPlayers);
    return rows.map(row => row.payload);
  }

  async getFplTeams(): Promise<FPLTeam[]> {
    const rows = await this.db.select().from(rawFplTeams);
    return rows.map(row => row.payload);
  }

  async getFplFixtures(): Promise<FPLFixture[]> {
    const rows = await this.db.select().from(rawFplFixtures);
    return rows.map(row => row.payload);
  }

  /** The last persisted upstream payloads, used when the API is unreachable. */
  async loadRawDataset(): Promise<RawDataset> {
    const [players, teams, fixtures, timestamps] = await Promise.all([
      this.getFplPlayers(),
      this.getFplTeams(),
      this.getFplFixtures(),
      this.getLatestFetchTimestamps(),
    ]);

    return { players, teams, fixtures, fetchedAt: timestamps.players };
  }

  async getLatestFetchTimestamps(): Promise<Record<"players" | "teams" | "fixtures", Date | null>> {
    const [players, teams, fixtures] = await Promise.all([
      this.db.select({ ts: max(rawFplPlayers.fetchedAt) }).from(rawFplPlayers),
      this.db.select({ ts: max(rawFplTeams.fetchedAt) }).from(rawFplTeams),
      this.db.select({ ts: max(rawFplFixtures.fetchedAt) }).from(rawFplFixtures),
    ]);

    return {
      players: players[0]?.ts ?? null,
      teams: teams[0]?.ts ?? null,
      fixtures: fixtures[0]?.ts ?? null,
    };
  }

  async insertConversationTurn(turn: ConversationTurn): Promise<void> {
    await this.db.insert(conversationTurns).values({
      sessionId: turn.sessionId,
      turnIndex: turn.turnIndex,
      rawQuery: turn.rawQuery,
      resolvedQuery: turn.resolvedQuery,
      answer: turn.answer,
      intent: turn.intent,
      mentionedEntityIds: turn.mentionedEntityIds,
      generationId: turn.generationId,
      createdAt: new Date(turn.timestamp),
    });
  }

  async getLatestTurnIndex(sessionId: string): Promise<number | null> {
    const rows = await this.db
      .select({ latest: max(conversationTurns.turnIndex) })
      .from(conversationTurns)
      .where(eq(conversationTurns.sessionId, sessionId));
    return rows[0]?.latest ?? null;
  }

  /** Most recent first. */
  async getRecentTurns(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];

    const rows = await this.db
      .select()
      .from(conversationTurns)
      .where(eq(conversationTurns.sessionId, sessionId))
      .orderBy(desc(conversationTurns.turnIndex))
      .limit(limit);
    return rows.map(toTurn);
  }

  async getSessionTurns(sessionId: string): Promise<ConversationTurn[]> {
    const rows = await this.db
      .select()
      .from(conversationTurns)
      .where(eq(conversationTurns.sessionId, sessionId))
      .orderBy(asc(conversationTurns.turnIndex));
    return rows.map(toTurn);
  }

  async pruneConversationTurns(sessionId: string, keepFromIndex: number): Promise<void> {
    await this.db
      .delete(conversationTurns)
      .where(and(
        eq(conversationTurns.sessionId, sessionId),
        lt(conversationTurns.turnIndex, keepFromIndex),
      ));
  }

  async deleteConversation(sessionId: string): Promise<number> {
    const deleted = await this.db
      .delete(conversationTurns)
      .where(eq(conversationTurns.sessionId, sessionId))
      .returning({ turnIndex: conversationTurns.turnIndex });
    return deleted.length;
  }
}
