import type {
  ExtractionResult,
  MatchResult,
  PersonMention,
  Position,
  PriceConstraint,
  StatKey,
} from '@shared/schema';
import type { DatasetSnapshot } from './entityDictionary';
import { NameMatcher, normalizeName } from './nameMatcher';
import { getQueryVocabulary, type QueryVocabulary } from './referenceData';

export interface QueryToken {
  index: number;
  text: string; // possessive stripped
  norm: string;
  start: number;
  end: number;
  capitalized: boolean;
}

const TOKEN_PATTERN = /[\p{L}\p{N}](?:[\p{L}\p{N}'’.\-]*[\p{L}\p{N}])?/gu;
const POSSESSIVE_PATTERN = /['’]s$/i;

export function tokenizeQuery(query: string): QueryToken[] {
  const tokens: QueryToken[] = [];
  for (const match of query.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    const raw = match[0];
    const text = raw.replace(POSSESSIVE_PATTERN, '');
    tokens.push({
      index: tokens.length,
      text,
      norm: normalizeName(text),
      start,
      end: start + raw.length,
      capitalized: /^\p{Lu}/u.test(text),
    });
  }
  return tokens;
}

/** Finds `phrase` (already tokenized) as a run of unclaimed tokens. */
function findPhrase(tokens: QueryToken[], phrase: string[], claimed: Set<number>): number {
  if (phrase.length === 0) return -1;
  for (let i = 0; i + phrase.length <= tokens.length; i++) {
    let hit = true;
    for (let j = 0; j < phrase.length; j++) {
      const token = tokens[i + j];
      if (!token || claimed.has(i + j) || token.norm !== phrase[j]) {
        hit = false;
        break;
      }
    }
    if (hit) return i;
  }
  return -1;
}

function phraseTokens(phrase: string): string[] {
  return tokenizeQuery(phrase).map(token => token.norm);
}

// Price amounts need a currency marker (£9m, £9, 9m, 9.5) so "over 10 goals" is not a price
const AMOUNT = String.raw`(?:[£$]\s*(\d+(?:\.\d+)?)(?:\s*(?:m|mil|million)\b)?|(\d+(?:\.\d+)?)\s*(?:m|mil|million)\b|(\d+\.\d+))`;
const BETWEEN_PRICE = new RegExp(String.raw`\bbetween\s*${AMOUNT}\s*(?:and|to|-)\s*${AMOUNT}`, 'i');
const UNDER_PRICE = new RegExp(String.raw`\b(?:under|below|less than|cheaper than|lower than)\s*${AMOUNT}`, 'i');
const OVER_PRICE = new RegExp(String.raw`\b(?:over|above|more than|greater than|higher than)\s*${AMOUNT}`, 'i');

function amountFrom(groups: Array<string | undefined>): number | undefined {
  const value = groups.find(group => group !== undefined);
  if (value === undefined) return undefined;
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? Math.round(parsed * 10) : undefined;
}

/** Price bounds in tenths of a million. Under/over are strict, between is inclusive. */
export function parsePriceConstraint(query: string): PriceConstraint | undefined {
  const between = BETWEEN_PRICE.exec(query);
  if (between) {
    const low = amountFrom([between[1], between[2], between[3]]);
    const high = amountFrom([between[4], between[5], between[6]]);
    if (low !== undefined && high !== undefined) {
      return { kind: 'between', min: Math.min(low, high), max: Math.max(low, high) };
    }
  }

  const under = UNDER_PRICE.exec(query);
  if (under) {
    const max = amountFrom([under[1], under[2], under[3]]);
    if (max !== undefined) return { kind: 'under', max };
  }

  const over = OVER_PRICE.exec(query);
  if (over) {
    const min = amountFrom([over[1], over[2], over[3]]);
    if (min !== undefined) return { kind: 'over', min };
  }

  return undefined;
}

export function parseGameweek(query: string): number | undefined {
  const match = /\b(?:gw|gameweek|game week)\s*(\d{1,2})\b/i.exec(query);
  if (!match?.[1]) return undefined;
  const gameweek = Number.parseInt(match[1], 10);
  return gameweek >= 1 && gameweek <= 38 ? gameweek : undefined;
}

export function parseFixtureCount(query: string): number | undefined {
  const match = /\bnext\s+(\d{1,2})\s+(?:games?|fixtures?|matches|match|gameweeks?|gws?)\b/i.exec(query);
  if (!match?.[1]) return undefined;
  const count = Number.parseInt(match[1], 10);
  return count > 0 ? count : undefined;
}

export function parseLimit(query: string): number | undefined {
  const match = /\b(?:top|best|first)\s+(\d{1,2})\b/i.exec(query) ?? /\b(\d{1,2})\s+(?:best|top|cheapest)\b/i.exec(query);
  if (!match?.[1]) return undefined;
  const limit = Number.parseInt(match[1], 10);
  return limit > 0 ? limit : undefined;
}

const STAT_PATTERNS: Array<{ key: StatKey; pattern: RegExp }> = [
  { key: 'price', pattern: /\b(?:cheapest|least expensive|lowest[- ]priced?)\b/i },
  { key: 'value', pattern: /\b(?:value|ppm|points per (?:million|mil|m|£m)|bang for (?:your |the )?buck)\b/i },
  { key: 'expected_goals', pattern: /\b(?:xg|expected goals?)\b/i },
  { key: 'assists', pattern: /\bassists?\b/i },
  { key: 'goals', pattern: /\b(?:goals?|scorers?|scored)\b/i },
  { key: 'ownership', pattern: /\b(?:owned|ownership|selected by|selection|popular)\b/i },
  { key: 'form', pattern: /\b(?:form|in-form)\b/i },
  { key: 'points', pattern: /\b(?:points?|pts|scoring)\b/i },
];

export function detectStatKey(query: string): StatKey | undefined {
  return STAT_PATTERNS.find(({ pattern }) => pattern.test(query))?.key;
}

const INCLUDE_UNAVAILABLE_PATTERN = /\b(?:including|include|incl|even)\s+(?:the\s+)?(?:injured|unavailable|suspended)\b|\b(?:injured|unavailable|suspended|doubtful)\s+players\b|\ball players\b/i;

const COMPARISON_PATTERN = /\b(?:or|vs|versus|compare|comparing|between|instead of)\b|,|\b(?:sell|selling|swap|swapping|replace|replacing)\b[^?]*\bfor\b/i;

const CONNECTORS = new Set(['or', 'vs', 'versus', 'and', 'compare', 'comparing', 'between', 'for', 'with', 'instead', 'sell', 'selling', 'swap', 'replace', 'get', 'buy', 'pick', 'transfer']);

interface Segment {
  tokens: QueryToken[];
  connected: boolean;
}

function isAccepted(result: MatchResult): boolean {
  return result.kind !== 'not_found';
}

function spanOf(tokens: QueryToken[]): string {
  return tokens.map(token => token.text).join(' ');
}

export class EntityExtractor {
  private readonly matcher: NameMatcher;
  private readonly vocabulary: QueryVocabulary;

  constructor(matcher?: NameMatcher, vocabulary?: QueryVocabulary) {
    this.matcher = matcher ?? new NameMatcher();
    this.vocabulary = vocabulary ?? getQueryVocabulary();
  }

  extract(query: string, snapshot: DatasetSnapshot): ExtractionResult {
    const tokens = tokenizeQuery(query);
    const claimed = new Set<number>();

    const teamId = this.detectTeam(tokens, claimed, snapshot);
    const position = this.detectPosition(tokens, claimed);
    const includeUnavailable = INCLUDE_UNAVAILABLE_PATTERN.test(query);
    const fixtureCount = parseFixtureCount(query);

    const result: ExtractionResult = {
      persons: this.extractPersons(query, tokens, claimed, snapshot, includeUnavailable),
      includeUnavailable,
    };

    if (teamId !== undefined) result.teamId = teamId;
    if (position) result.position = position;
    const price = parsePriceConstraint(query);
    if (price) result.price = price;
    const gameweek = parseGameweek(query);
    if (gameweek !== undefined) result.gameweek = gameweek;
    const statKey = detectStatKey(query);
    if (statKey) result.statKey = statKey;
    if (fixtureCount !== undefined) {
      result.fixtureCount = fixtureCount;
    } else {
      const limit = parseLimit(query);
      if (limit !== undefined) result.limit = limit;
    }

    return result;
  }

  private detectTeam(tokens: QueryToken[], claimed: Set<number>, snapshot: DatasetSnapshot): number | undefined {
    let earliest: { start: number; groupId: number } | undefined;
    for (const { alias, groupId } of snapshot.dictionary.teamAliases) {
      const phrase = phraseTokens(alias);
      let index = findPhrase(tokens, phrase, claimed);
      while (index !== -1) {
        for (let j = 0; j < phrase.length; j++) claimed.add(index + j);
        const start = tokens[index]?.start ?? 0;
        if (!earliest || start < earliest.start) {
          earliest = { start, groupId };
        }
        index = findPhrase(tokens, phrase, claimed);
      }
    }
    return earliest?.groupId;
  }

  private detectPosition(tokens: QueryToken[], claimed: Set<number>): Position | undefined {
    let earliest: { start: number; position: Position } | undefined;
    for (const [synonym, position] of this.vocabulary.positionSynonyms) {
      const phrase = phraseTokens(synonym);
      const index = findPhrase(tokens, phrase, claimed);
      if (index === -1) continue;
      for (let j = 0; j < phrase.length; j++) claimed.add(index + j);
      const start = tokens[index]?.start ?? 0;
      if (!earliest || start < earliest.start) {
        earliest = { start, position };
      }
    }
    return earliest?.position;
  }

  private isNameLike(token: QueryToken, claimed: Set<number>): boolean {
    return token.norm.length >= 2
      && !/\d/.test(token.norm)
      && !claimed.has(token.index)
      && !this.vocabulary.stopWords.has(token.norm);
  }

  private buildSegments(query: string, tokens: QueryToken[], claimed: Set<number>): Segment[] {
    const segments: Segment[] = [];
    let current: QueryToken[] = [];
    let connectedBefore = false;

    const close = (connectedAfter: boolean) => {
      if (current.length > 0) {
        segments.push({ tokens: current, connected: connectedBefore || connectedAfter });
      }
      current = [];
    };

    tokens.forEach((token, i) => {
      const previous = tokens[i - 1];
      const gap = previous ? query.slice(previous.end, token.start) : '';
      const punctuated = /[^\s'’]/.test(gap);

      if (!this.isNameLike(token, claimed)) {
        const connector = CONNECTORS.has(token.norm);
        close(connector || punctuated);
        connectedBefore = connector;
        return;
      }

      if (punctuated && current.length > 0) {
        close(true);
        connectedBefore = true;
      } else if (punctuated) {
        connectedBefore = true;
      }
      current.push(token);
    });
    close(false);

    return segments;
  }

  private extractPersons(
    query: string,
    tokens: QueryToken[],
    claimed: Set<number>,
    snapshot: DatasetSnapshot,
    includeUnavailable: boolean,
  ): PersonMention[] {
    const segments = this.buildSegments(query, tokens, claimed);
    const comparison = COMPARISON_PATTERN.test(query);
    const wholeQuery = tokens.length > 0 && tokens.length <= 2 && tokens.every(token => this.isNameLike(token, claimed));

    const surfaced: QueryToken[][] = [];
    const deferred: QueryToken[][] = [];

    for (const segment of segments) {
      if (wholeQuery || (comparison && segment.connected)) {
        surfaced.push(segment.tokens);
        continue;
      }
      // Capitalized runs are surfaced; the lowercase remainder is a fallback only
      let run: QueryToken[] = [];
      let lower: QueryToken[] = [];
      for (const token of segment.tokens) {
        if (token.capitalized) {
          if (lower.length > 0) deferred.push(lower);
          lower = [];
          run.push(token);
        } else {
          if (run.length > 0) surfaced.push(run);
          run = [];
          lower.push(token);
        }
      }
      if (run.length > 0) surfaced.push(run);
      if (lower.length > 0) deferred.push(lower);
    }

    const mentions = surfaced.flatMap(run => this.resolveRun(run, snapshot, includeUnavailable, true));
    if (!mentions.some(mention => isAccepted(mention.result))) {
      mentions.push(...deferred.flatMap(run => this.resolveRun(run, snapshot, includeUnavailable, false)));
    }

    return dedupeMentions(mentions);
  }

  /**
   * Resolves a run of name-like tokens: the whole run first (up to 4 tokens),
   * then 2-grams, then single tokens. A resolved n-gram consumes its tokens.
   */
  private resolveRun(
    run: QueryToken[],
    snapshot: DatasetSnapshot,
    includeUnavailable: boolean,
    surfaceMisses: boolean,
  ): PersonMention[] {
    const mention = (slice: QueryToken[], result: MatchResult): PersonMention => ({
      span: spanOf(slice),
      start: slice[0]?.start ?? 0,
      result,
    });
    const match = (slice: QueryToken[]) => this.matcher.match(spanOf(slice), snapshot, includeUnavailable);

    if (!surfaceMisses && run.every(token => token.norm.length < 3)) {
      return [];
    }

    const whole = match(run);
    if (run.length >= 2 && run.length <= 4 && isAccepted(whole)) {
      return [mention(run, whole)];
    }

    const consumed = new Array<boolean>(run.length).fill(false);
    const found: PersonMention[] = [];

    if (run.length > 2) {
      for (let i = 0; i + 1 < run.length; i++) {
        if (consumed[i] || consumed[i + 1]) continue;
        const pair = run.slice(i, i + 2);
        const result = match(pair);
        if (isAccepted(result)) {
          found.push(mention(pair, result));
          consumed[i] = true;
          consumed[i + 1] = true;
        }
      }
    }

    const missed: PersonMention[] = [];
    run.forEach((token, i) => {
      if (consumed[i]) return;
      if (!surfaceMisses && token.norm.length < 3) return;
      const result = run.length === 1 ? whole : match([token]);
      if (isAccepted(result)) {
        found.push(mention([token], result));
      } else {
        missed.push(mention([token], result));
      }
    });

    if (!surfaceMisses) {
      return found;
    }

    if (found.length === 0) {
      return [mention(run, whole.kind === 'not_found' ? whole : { kind: 'not_found', suggestions: [] })];
    }

    return [...found, ...missed];
  }
}

function resolvedId(result: MatchResult): number | undefined {
  return result.kind === 'exact' || result.kind === 'unavailable' ? result.entity.id : undefined;
}

/**
 * One mention per resolved entity (longest span wins), ambiguous mentions only
 * while some candidate is still unresolved, not-found spans once each.
 */
export function dedupeMentions(mentions: PersonMention[]): PersonMention[] {
  const byEntity = new Map<number, PersonMention>();
  for (const mention of mentions) {
    const id = resolvedId(mention.result);
    if (id === undefined) continue;
    const existing = byEntity.get(id);
    if (!existing || mention.span.length > existing.span.length) {
      byEntity.set(id, mention);
    }
  }

  const resolvedSpans = [...byEntity.values()].map(mention => normalizeName(mention.span));
  const kept: PersonMention[] = [...byEntity.values()];
  const seen = new Set<string>();

  for (const mention of mentions) {
    const { result } = mention;
    const key = `${result.kind}:${normalizeName(mention.span)}`;
    if (result.kind === 'exact' || result.kind === 'unavailable' || seen.has(key)) continue;

    if (result.kind === 'ambiguous') {
      const overlaps = result.candidates.filter(candidate => byEntity.has(candidate.id));
      if (overlaps.length === result.candidates.length) continue;
    } else if (resolvedSpans.some(span => span.includes(normalizeName(mention.span)))) {
      continue;
    }

    seen.add(key);
    kept.push(mention);
  }

  return kept.sort((a, b) => a.start - b.start);
}
