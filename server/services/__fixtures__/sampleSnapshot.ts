import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import {
  fplBootstrapSchema,
  fplFixturesSchema,
  type ConversationTurn,
  type FPLBootstrap,
  type FPLFixture,
  type FPLPlayer,
} from "@shared/schema";
import { buildSnapshot, type DatasetSnapshot } from "../entityDictionary";

const fixturesDir = dirname(fileURLToPath(import.meta.url));

export const SAMPLE_FETCHED_AT = new Date("2025-10-30T12:00:00Z");

export function loadSampleBootstrap(): FPLBootstrap {
  return fplBootstrapSchema.parse(JSON.parse(readFileSync(join(fixturesDir, "bootstrap.json"), "utf-8")));
}

export function loadSampleFixtures(): FPLFixture[] {
  return fplFixturesSchema.parse(JSON.parse(readFileSync(join(fixturesDir, "fixtures.json"), "utf-8")));
}

/** An active Chelsea defender with no points; override the names and id. */
export function samplePlayer(overrides: Partial<FPLPlayer> & Pick<FPLPlayer, "id" | "web_name" | "first_name" | "second_name">): FPLPlayer {
  return {
    team: 4,
    element_type: 2,
    now_cost: 50,
    total_points: 0,
    goals_scored: 0,
    assists: 0,
    minutes: 0,
    form: 0,
    selected_by_percent: 0.5,
    expected_goals: 0,
    status: "a",
    news: "",
    ...overrides,
  };
}

export function buildSampleSnapshot(generationId = 1, extraPlayers: FPLPlayer[] = []): DatasetSnapshot {
  const bootstrap = loadSampleBootstrap();
  return buildSnapshot({
    bootstrap: { ...bootstrap, elements: [...bootstrap.elements, ...extraPlayers] },
    fixtures: loadSampleFixtures(),
    generationId,
    fetchedAt: SAMPLE_FETCHED_AT,
  });
}

export function makeTurn(overrides: Partial<ConversationTurn> & Pick<ConversationTurn, "rawQuery">): ConversationTurn {
  return {
    sessionId: "session-a",
    turnIndex: 0,
    resolvedQuery: overrides.rawQuery,
    answer: "",
    intent: "player_detail",
    mentionedEntityIds: [],
    generationId: 1,
    timestamp: "2025-10-30T12:00:00.000Z",
    ...overrides,
  };
}
