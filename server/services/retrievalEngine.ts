import type {
  AmbiguousOutcome,
  ExtractionResult,
  Fixture,
  FixtureView,
  KnowledgeEntry,
  NotFoundOutcome,
  PersonEntity,
  QueryClassification,
  RankedResult,
  RetrievalResult,
  StatKey,
  StrategyLens,
  UnavailableOutcome,
} from '@shared/schema';
import { DEFAULT_ENGINE_CONFIG } from '../config';
import { teamName, type DatasetSnapshot } from './entityDictionary';
import { StaleSnapshotError } from './errors';
import { foldText } from './intentClassifier';
import { normalizeName } from './nameMatcher';
import { getKnowledgeBase, getQueryVocabulary } from './referenceData';

export interface RetrievalOptions {
  maxFixtures: number;
  defaultFixtureCount: number;
  differentialOwnershipCeiling: number;
}

const DEFAULT_OPTIONS: RetrievalOptions = {
  maxFixtures: DEFAULT_ENGINE_CONFIG.maxFixtures,
  defaultFixtureCount: 5,
  differentialOwnershipCeiling: 10,
};

export function statValue(person: PersonEntity, key: StatKey): number {
  switch (key) {
    case 'points':
      return person.stats.points;
    case 'goals':
      return person.stats.goals;
    case 'assists':
      return person.stats.assists;
    case 'expected_goals':
      return person.stats.expectedGoals;
    case 'ownership':
      return person.stats.ownershipPercent;
    case 'form':
      return person.stats.form;
    case 'value':
      return pointsPerMillion(person);
    case 'price':
      return person.price / 10;
  }
}

export type SortOrder = 'asc' | 'desc';

/** Price ranks cheapest first; every other statistic highest first. */
export function sortOrderFor(key: StatKey): SortOrder {
  return key === 'price' ? 'asc' : 'desc';
}

export function pointsPerMillion(person: PersonEntity): number {
  return person.price > 0 ? Math.round((person.stats.points * 1000) / person.price) / 100 : 0;
}

/** Team, position, price and availability as one set intersection. */
export function applyStructuralFilters(persons: readonly PersonEntity[], extraction: ExtractionResult): PersonEntity[] {
  const { teamId, position, price, includeUnavailable } = extraction;
  return persons.filter(person => {
    if (!includeUnavailable && person.status !== 'Active') return false;
    if (teamId !== undefined && person.teamId !== teamId) return false;
    if (position !== undefined && person.position !== position) return false;
    if (price) {
      if (price.kind === 'under' && !(person.price < price.max)) return false;
      if (price.kind === 'over' && !(person.price > price.min)) return false;
      if (price.kind === 'between' && (person.price < price.min || person.price > price.max)) return false;
    }
    return true;
  });
}

interface Scored {
  entity: PersonEntity;
  value: number;
}

function tieBreak(a: Scored, b: Scored): number {
  return a.entity.displayName.localeCompare(b.entity.displayName) || a.entity.id - b.entity.id;
}

/** Sorted by value (descending unless `order` is asc), ties broken by display name then id; truncated to topN. */
export function rankBy(
  persons: readonly PersonEntity[],
  valueOf: (person: PersonEntity) => number,
  topN: number,
  order: SortOrder = 'desc',
): RankedResult[] {
  const direction = order === 'asc' ? 1 : -1;
  return persons
    .map(entity => ({ entity, value: valueOf(entity) }))
    .sort((a, b) => direction * (a.value - b.value) || tieBreak(a, b))
    .slice(0, topN)
    .map((entry, index) => ({ rank: index + 1, entity: entry.entity, value: entry.value }));
}

function countTokens(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

export function lexicalTokens(text: string, stopWords: ReadonlySet<string>): string[] {
  return normalizeName(foldText(text))
    .split(' ')
    .filter(token => token.length > 2 && !stopWords.has(token));
}

/** Sum over shared tokens of query frequency times document frequency. */
export function overlapScore(queryTokens: string[], documentTokens: string[]): number {
  const query = countTokens(queryTokens);
  const document = countTokens(documentTokens);
  let score = 0;
  for (const [token, count] of query) {
    score += count * (document.get(token) ?? 0);
  }
  return score;
}

function containsPhrase(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?:^|[^a-z0-9])${escaped}(?:$|[^a-z0-9])`).test(text);
}

export function detectStrategyLens(query: string): StrategyLens {
  const text = foldText(query);
  if (/\bcaptain(?:cy|s)?\b|\barmband\b/.test(text)) return 'captaincy';
  if (/\b(?:differentials?|low(?:ly)? owned|low ownership|punts?|under the radar)\b/.test(text)) return 'differential';
  if (/\b(?:template|essentials?|must[- ]haves?|high(?:ly)? owned)\b/.test(text)) return 'template';
  if (/\b(?:value|ppm|points per million|budget|cheap|enablers?|bargains?)\b/.test(text)) return 'value';
  return 'form';
}

const LENS_SORT: Record<StrategyLens, StatKey> = {
  captaincy: 'form',
  differential: 'form',
  template: 'ownership',
  value: 'value',
  form: 'form',
};

function compareKickoff(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

export class RetrievalEngine {
  private readonly options: RetrievalOptions;
  private readonly knowledgeBase: KnowledgeEntry[];

  constructor(options: Partial<RetrievalOptions> = {}, knowledgeBase?: KnowledgeEntry[]) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.knowledgeBase = knowledgeBase ?? getKnowledgeBase();
  }

  retrieve(classification: QueryClassification, snapshot: DatasetSnapshot, topN: number): RetrievalResult {
    if (classification.generationId !== snapshot.generationId) {
      throw new StaleSnapshotError(classification.generationId, snapshot.generationId);
    }

    const limit = Math.max(1, Math.floor(topN));
    const extraction = classification.extracted;
    const result: RetrievalResult = {
      intent: classification.intent,
      generationId: snapshot.generationId,
      sortKey: null,
      lens: null,
      ranked: [],
      totalMatched: 0,
      ...this.collectOutcomes(extraction),
      fixtures: [],
      knowledge: [],
    };

    switch (classification.intent) {
      case 'conversational':
        return { ...result, unavailable: [], ambiguous: [], notFound: [] };

      case 'player_detail': {
        const found = this.resolvedPersons(extraction);
        return {
          ...result,
          ranked: found.map((entity, index) => ({ rank: index + 1, entity, value: null })),
          totalMatched: found.length,
        };
      }

      case 'filtered_statistic':
      case 'statistical_leader':
      case 'team_position_filter': {
        const sortKey = extraction.statKey ?? 'points';
        const filtered = applyStructuralFilters(snapshot.persons, extraction);
        return {
          ...result,
          sortKey,
          ranked: rankBy(filtered, person => statValue(person, sortKey), limit, sortOrderFor(sortKey)),
          totalMatched: filtered.length,
        };
      }

      case 'strategy_advice':
        return this.retrieveStrategy(result, classification, snapshot, limit);

      case 'rules_knowledge': {
        const knowledge = this.rankKnowledge(classification.query, limit);
        return { ...result, knowledge, totalMatched: knowledge.length };
      }

      case 'fixture_lookup': {
        const fixtures = this.retrieveFixtures(extraction, snapshot);
        return { ...result, fixtures, totalMatched: fixtures.length };
      }

      case 'general':
        return this.retrieveGeneral(result, classification, snapshot, limit);
    }
  }

  rankKnowledge(query: string, topN: number): KnowledgeEntry[] {
    const text = normalizeName(foldText(query));
    const stopWords = getQueryVocabulary().stopWords;
    const queryTokens = lexicalTokens(query, stopWords);

    return this.knowledgeBase
      .map(entry => {
        const hits = entry.keywords.filter(keyword => containsPhrase(text, normalizeName(keyword))).length;
        const overlap = overlapScore(queryTokens, lexicalTokens(`${entry.topic} ${entry.text}`, stopWords));
        return { entry, hits, score: hits * 10 + overlap };
      })
      .filter(candidate => candidate.hits > 0)
      .sort((a, b) => b.score - a.score || a.entry.id.localeCompare(b.entry.id))
      .slice(0, topN)
      .map(candidate => candidate.entry);
  }

  private collectOutcomes(extraction: ExtractionResult): Pick<RetrievalResult, 'unavailable' | 'ambiguous' | 'notFound'> {
    const unavailable: UnavailableOutcome[] = [];
    const ambiguous: AmbiguousOutcome[] = [];
    const notFound: NotFoundOutcome[] = [];

    for (const mention of extraction.persons) {
      const { result } = mention;
      if (result.kind === 'unavailable') {
        unavailable.push({ span: mention.span, entity: result.entity, reason: result.reason });
      } else if (result.kind === 'ambiguous') {
        ambiguous.push({ span: mention.span, tier: result.tier, candidates: result.candidates });
      } else if (result.kind === 'not_found') {
        notFound.push({ span: mention.span, suggestions: result.suggestions });
      }
    }

    return { unavailable, ambiguous, notFound };
  }

  private resolvedPersons(extraction: ExtractionResult): PersonEntity[] {
    const found: PersonEntity[] = [];
    for (const mention of extraction.persons) {
      if (mention.result.kind === 'exact') {
        found.push(mention.result.entity);
      }
    }
    return found;
  }

  private retrieveStrategy(
    base: RetrievalResult,
    classification: QueryClassification,
    snapshot: DatasetSnapshot,
    limit: number,
  ): RetrievalResult {
    const extraction = classification.extracted;
    const lens = detectStrategyLens(classification.query);
    const sortKey = LENS_SORT[lens];
    const knowledge = this.rankKnowledge(classification.query, 2);
    const mentioned = this.resolvedPersons(extraction);

    if (mentioned.length > 0) {
      return {
        ...base,
        lens,
        sortKey,
        knowledge,
        ranked: mentioned.map((entity, index) => ({ rank: index + 1, entity, value: statValue(entity, sortKey) })),
        totalMatched: mentioned.length,
      };
    }

    let pool = applyStructuralFilters(snapshot.persons, extraction);
    if (lens === 'differential') {
      pool = pool.filter(person => person.stats.ownershipPercent < this.options.differentialOwnershipCeiling);
    } else if (lens === 'captaincy' && extraction.position === undefined) {
      pool = pool.filter(person => person.position === 'Midfielder' || person.position === 'Forward');
    }

    return {
      ...base,
      lens,
      sortKey,
      knowledge,
      ranked: rankBy(pool, person => statValue(person, sortKey), limit),
      totalMatched: pool.length,
    };
  }

  private retrieveGeneral(
    base: RetrievalResult,
    classification: QueryClassification,
    snapshot: DatasetSnapshot,
    limit: number,
  ): RetrievalResult {
    const stopWords = getQueryVocabulary().stopWords;
    const queryTokens = lexicalTokens(classification.query, stopWords);
    if (queryTokens.length === 0) {
      return base;
    }

    const scored = applyStructuralFilters(snapshot.persons, classification.extracted)
      .map(person => {
        const group = snapshot.dictionary.groupsById.get(person.teamId);
        const document = [person.displayName, person.fullName, group?.aliases.join(' ') ?? '', person.position].join(' ');
        return { person, score: overlapScore(queryTokens, lexicalTokens(document, new Set<string>())) };
      })
      .filter(candidate => candidate.score > 0);

    const scores = new Map(scored.map(candidate => [candidate.person.id, candidate.score]));
    return {
      ...base,
      ranked: rankBy(scored.map(candidate => candidate.person), person => scores.get(person.id) ?? 0, limit),
      totalMatched: scored.length,
    };
  }

  private retrieveFixtures(extraction: ExtractionResult, snapshot: DatasetSnapshot): FixtureView[] {
    const teamId = extraction.teamId ?? this.resolvedPersons(extraction)[0]?.teamId;
    const { gameweek } = extraction;

    let pool: Fixture[] = snapshot.fixtures.filter(fixture =>
      teamId === undefined || fixture.homeTeamId === teamId || fixture.awayTeamId === teamId);
    pool = gameweek !== undefined
      ? pool.filter(fixture => fixture.gameweek === gameweek)
      : pool.filter(fixture => !fixture.finished);

    pool.sort((a, b) =>
      (a.gameweek ?? Number.MAX_SAFE_INTEGER) - (b.gameweek ?? Number.MAX_SAFE_INTEGER)
      || compareKickoff(a.kickoffTime, b.kickoffTime)
      || a.id - b.id);

    let count = this.options.maxFixtures;
    if (teamId !== undefined && gameweek === undefined) {
      count = Math.min(extraction.fixtureCount ?? this.options.defaultFixtureCount, this.options.maxFixtures);
    } else if (teamId === undefined && gameweek === undefined) {
      const nextGameweek = pool[0]?.gameweek;
      pool = pool.filter(fixture => fixture.gameweek === nextGameweek);
    }

    return pool.slice(0, count).map(fixture => this.toFixtureView(fixture, snapshot, teamId));
  }

  private toFixtureView(fixture: Fixture, snapshot: DatasetSnapshot, teamId: number | undefined): FixtureView {
    const view: FixtureView = {
      id: fixture.id,
      gameweek: fixture.gameweek,
      kickoffTime: fixture.kickoffTime,
      homeTeam: teamName(snapshot, fixture.homeTeamId),
      awayTeam: teamName(snapshot, fixture.awayTeamId),
      homeDifficulty: fixture.homeDifficulty,
      awayDifficulty: fixture.awayDifficulty,
    };
    if (teamId !== undefined) {
      const home = fixture.homeTeamId === teamId;
      view.venue = home ? 'home' : 'away';
      view.opponent = teamName(snapshot, home ? fixture.awayTeamId : fixture.homeTeamId);
      view.difficulty = home ? fixture.homeDifficulty : fixture.awayDifficulty;
    }
    return view;
  }
}
