import { z } from "zod";

// FPL API payloads. Only the fields the assistant reads are validated.
const numericField = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a numeric value, received "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

export const fplPlayerSchema = z.object({
  id: z.number().int(),
  web_name: z.string(),
  first_name: z.string(),
  second_name: z.string(),
  team: z.number().int(),
  element_type: z.number().int(), // 1=GK, 2=DEF, 3=MID, 4=FWD
  now_cost: z.number().int(), // Price in tenths of millions
  total_points: z.number().int(),
  goals_scored: z.number().int().default(0),
  assists: z.number().int().default(0),
  minutes: z.number().int().default(0),
  form: numericField.default("0"),
  selected_by_percent: numericField.default("0"),
  expected_goals: numericField.default("0"),
  status: z.string().default("a"),
  news: z.string().nullable().default(""),
});

export const fplTeamSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  short_name: z.string(),
});

export const fplEventSchema = z.object({
  id: z.number().int(),
  is_current: z.boolean().default(false),
  is_next: z.boolean().default(false),
  finished: z.boolean().default(false),
});

export const fplBootstrapSchema = z.object({
  elements: z.array(fplPlayerSchema),
  teams: z.array(fplTeamSchema),
  events: z.array(fplEventSchema).default([]),
});

export const fplFixtureSchema = z.object({
  id: z.number().int(),
  event: z.number().int().nullable(), // gameweek, null while unscheduled
  team_h: z.number().int(),
  team_a: z.number().int(),
  team_h_difficulty: z.number().int().default(3),
  team_a_difficulty: z.number().int().default(3),
  finished: z.boolean().default(false),
  kickoff_time: z.string().nullable().default(null),
});

export const fplFixturesSchema = z.array(fplFixtureSchema);

export type FPLPlayer = z.infer<typeof fplPlayerSchema>;
export type FPLTeam = z.infer<typeof fplTeamSchema>;
export type FPLEvent = z.infer<typeof fplEventSchema>;
export type FPLBootstrap = z.infer<typeof fplBootstrapSchema>;
export type FPLFixture = z.infer<typeof fplFixtureSchema>;

// Domain entities
export type Position = 'Keeper' | 'Defender' | 'Midfielder' | 'Forward';

export type AvailabilityStatus = 'Active' | 'Injured' | 'Unavailable' | 'OnLoan';

export interface PersonStats {
  points: number;
  goals: number;
  assists: number;
  minutes: number;
  form: number;
  ownershipPercent: number;
  expectedGoals: number;
}

export interface PersonEntity {
  id: number;
  displayName: string;
  fullName: string;
  firstName: string;
  secondName: string;
  teamId: number;
  position: Position;
  price: number; // tenths of a million
  stats: PersonStats;
  status: AvailabilityStatus;
  statusNote: string;
}

export interface GroupEntity {
  id: number;
  canonicalName: string;
  shortName: string;
  aliases: readonly string[]; // normalized, canonical name first
}

export interface Fixture {
  id: number;
  gameweek: number | null;
  homeTeamId: number;
  awayTeamId: number;
  kickoffTime: string | null;
  finished: boolean;
  homeDifficulty: number;
  awayDifficulty: number;
}

// Conversation history
export type QueryIntent =
  | 'conversational'
  | 'fixture_lookup'
  | 'filtered_statistic'
  | 'statistical_leader'
  | 'rules_knowledge'
  | 'strategy_advice'
  | 'team_position_filter'
  | 'player_detail'
  | 'general';

export interface ConversationTurn {
  sessionId: string;
  turnIndex: number;
  rawQuery: string;
  resolvedQuery: string;
  answer: string;
  intent: QueryIntent;
  mentionedEntityIds: number[];
  generationId: number;
  timestamp: string;
}

export type NewConversationTurn = Omit<ConversationTurn, 'sessionId' | 'turnIndex' | 'timestamp'>;

// Name matching
export type MatchTier = 'exact_name' | 'name_part' | 'all_words' | 'word_boundary';

export type MatchResult =
  | { kind: 'exact'; entity: PersonEntity; tier: MatchTier }
  | { kind: 'ambiguous'; candidates: PersonEntity[]; tier: MatchTier }
  | { kind: 'unavailable'; entity: PersonEntity; reason: string }
  | { kind: 'not_found'; suggestions: PersonEntity[] };

export interface PersonMention {
  span: string;
  start: number;
  result: MatchResult;
}

// Extraction & classification
export type StatKey = 'points' | 'goals' | 'assists' | 'expected_goals' | 'ownership' | 'form' | 'value' | 'price';

export type PriceConstraint =
  | { kind: 'under'; max: number }
  | { kind: 'over'; min: number }
  | { kind: 'between'; min: number; max: number };

export interface ExtractionResult {
  persons: PersonMention[];
  teamId?: number;
  position?: Position;
  price?: PriceConstraint;
  gameweek?: number;
  statKey?: StatKey;
  limit?: number;
  fixtureCount?: number;
  includeUnavailable: boolean;
}

export interface QueryClassification {
  intent: QueryIntent;
  confidence: number;
  ruleId: string;
  query: string;
  originalQuery: string;
  contextResolved: boolean;
  generationId: number;
  extracted: ExtractionResult;
}

// Retrieval
export interface RankedResult {
  rank: number;
  entity: PersonEntity;
  value: number | null;
}

export interface FixtureView {
  id: number;
  gameweek: number | null;
  kickoffTime: string | null;
  homeTeam: string;
  awayTeam: string;
  homeDifficulty: number;
  awayDifficulty: number;
  opponent?: string;
  venue?: 'home' | 'away';
  difficulty?: number;
}

export interface KnowledgeEntry {
  id: string;
  topic: string;
  keywords: string[];
  text: string;
}

export type StrategyLens = 'captaincy' | 'differential' | 'template' | 'value' | 'form';

export interface UnavailableOutcome {
  span: string;
  entity: PersonEntity;
  reason: string;
}

export interface AmbiguousOutcome {
  span: string;
  tier: MatchTier;
  candidates: PersonEntity[];
}

export interface NotFoundOutcome {
  span: string;
  /** Close spellings; never treated as a match. */
  suggestions: PersonEntity[];
}

export interface RetrievalResult {
  intent: QueryIntent;
  generationId: number;
  sortKey: StatKey | null;
  lens: StrategyLens | null;
  ranked: RankedResult[];
  totalMatched: number;
  unavailable: UnavailableOutcome[];
  ambiguous: AmbiguousOutcome[];
  notFound: NotFoundOutcome[];
  fixtures: FixtureView[];
  knowledge: KnowledgeEntry[];
}

// Structured context handed to the generator
export interface CandidateSummary {
  id: number;
  name: string;
  fullName: string;
  team: string;
  position: Position;
  price: number; // £m
}

export interface ContextEntityRecord {
  rank: number;
  id: number;
  name: string;
  fullName: string;
  team: string;
  position: Position;
  price: number; // £m
  status: AvailabilityStatus;
  points: number;
  goals: number;
  assists: number;
  minutes: number;
  form: number;
  ownershipPercent: number;
  expectedGoals: number;
  pointsPerMillion: number;
  sortValue: number | null;
}

export interface ContextFilters {
  team?: string;
  position?: Position;
  price?: string;
  gameweek?: number;
  sortKey?: StatKey;
  lens?: StrategyLens;
  includeUnavailable: boolean;
}

export interface StructuredContext {
  intent: QueryIntent;
  confidence: number;
  query: string;
  originalQuery: string;
  contextResolved: boolean;
  generationId: number;
  fetchedAt: string;
  filters: ContextFilters;
  entities: ContextEntityRecord[];
  unavailable: Array<{ query: string; name: string; team: string; status: AvailabilityStatus; reason: string; note?: string }>;
  ambiguous: Array<{ query: string; candidates: CandidateSummary[] }>;
  notFound: Array<{ query: string; suggestions: CandidateSummary[] }>;
  fixtures: FixtureView[];
  knowledge: Array<{ topic: string; text: string }>;
  totalMatched: number;
}

// HTTP request / response
export const chatRequestSchema = z.object({
  message: z.string().trim().min(1).max(1000),
  sessionId: z.string().min(1).max(128).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export const sessionParamsSchema = z.object({
  sessionId: z.string().min(1).max(128),
});

export interface ChatResponse {
  answer: string;
  sessionId: string;
  intent: QueryIntent;
  confidence: number;
  resolvedQuery: string;
  context: StructuredContext;
  responseTimeMs: number;
}
