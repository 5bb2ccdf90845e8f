import { jsonb, integer, pgTable, text, timestamp, primaryKey } from "drizzle-orm/pg-core";
import type {
  FPLFixture,
  FPLPlayer,
  FPLTeam,
  QueryIntent
} from "@shared/schema";

export const rawFplPlayers = pgTable("raw_fpl_players", {
  playerId: integer("player_id").primaryKey(),
  payload: jsonb("payload").$type<FPLPlayer>().notNull(),
  fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull().defaultNow(),
});

export const rawFplTeams = pgTable("raw_fpl_teams", {
  teamId: integer("team_id").primaryKey(),
  payload: jsonb("payload").$type<FPLTeam>().notNull(),
  fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull().defaultNow(),
});

export const rawFplFixtures = pgTable("raw_fpl_fixtures", {
  fixtureId: integer("fixture_id").primaryKey(),
  event: integer("event"),
  payload: jsonb("payload").$type<FPLFixture>().notNull(),
  fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull().defaultNow(),
});

export const conversationTurns = pgTable("conversation_turns", {
  sessionId: text("session_id").notNull(),
  turnIndex: integer("turn_index").notNull(),
  rawQuery: text("raw_query").notNull(),
  resolvedQuery: text("resolved_query").notNull(),
  answer: text("answer").notNull(),
  intent: text("intent").$type<QueryIntent>().notNull(),
  mentionedEntityIds: jsonb("mentioned_entity_ids").$type<number[]>().notNull(),
  generationId: integer("generation_id").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  pk: primaryKey({ columns: [table.sessionId, table.turnIndex] }),
}));

export type RawFplPlayer = typeof rawFplPlayers.$inferSelect;
export type RawFplTeam = typeof rawFplTeams.$inferSelect;
export type RawFplFixture = typeof rawFplFixtures.$inferSelect;
export type ConversationTurnRow = typeof conversationTurns.$inferSelect;
export type NewConversationTurnRow = typeof conversationTurns.$inferInsert;
