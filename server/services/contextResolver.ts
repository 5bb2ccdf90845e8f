import type { ConversationTurn, PersonEntity } from '@shared/schema';
import { DEFAULT_ENGINE_CONFIG } from '../config';
import type { DatasetSnapshot } from './entityDictionary';
import { NameMatcher } from './nameMatcher';

const PRONOUN_PATTERN = /\b(?:he|she|they|him|her|them|his|their|hers|theirs)\b/i;
const REFERENT_PATTERN = /\b(?:the\s+same|this|that|the)\s+(?:player|guy|lad)\b/i;

const NAME = String.raw`([A-Z][\p{L}'’.\-]+(?:\s+[A-Z][\p{L}'’.\-]+){0,2})`;

// Prior answers: bold names and sentence subjects
const ANSWER_PATTERNS: RegExp[] = [
  /\*\*([^*\n]{2,40})\*\*/gu,
  new RegExp(String.raw`(?:^|[.!?]\s+|\n\s*)${NAME}\s+(?:is|was|has|costs|plays|scored|remains|currently|averages)\b`, 'gu'),
];

// The user's own phrasing
const QUERY_PATTERNS: RegExp[] = [
  new RegExp(String.raw`\b(?:about|is|does|did|has|rate|on|get|buy|sell)\s+${NAME}`, 'gu'),
  new RegExp(String.raw`^${NAME}(?:['’]s)?\s+(?:price|cost|team|position|form|stats|fixtures|injury|news)\b`, 'gu'),
  new RegExp(String.raw`\bwhich team does\s+${NAME}\s+play for\b`, 'gu'),
];

const NON_NOUN_FOLLOWERS = new Set([
  'a', 'an', 'the', 'to', 'for', 'in', 'on', 'at', 'now', 'again', 'this', 'that', 'or', 'and', 'but', 'if',
  'is', 'was', 'be', 'over', 'instead', 'yet', 'still', 'too', 'then', 'than', 'as', 'with',
]);

export interface ResolutionResult {
  query: string;
  resolved: boolean;
  entityId?: number;
}

export function hasReferent(query: string): boolean {
  return PRONOUN_PATTERN.test(query) || REFERENT_PATTERN.test(query);
}

function collectNames(text: string, patterns: RegExp[]): Array<{ name: string; index: number }> {
  const names: Array<{ name: string; index: number }> = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const name = match[1]?.replace(/['’]s$/i, '').trim();
      if (name) {
        names.push({ name, index: (match.index ?? 0) + match[0].indexOf(match[1] ?? '') });
      }
    }
  }
  return names;
}

/** Rewrites pronouns and generic referents to `name`, keeping possessives. */
export function substituteReferents(query: string, name: string): string {
  const possessive = `${name}'s`;
  return query
    .replace(/\b(?:the\s+same|this|that|the)\s+(?:player|guy|lad)(['’]s)?\b/gi, (_match, owner: string | undefined) => owner ? possessive : name)
    .replace(/\b(?:his|their|theirs|hers)\b/gi, possessive)
    .replace(/\bher\b/gi, (_match, offset: number, whole: string) => {
      const next = /^\s+([A-Za-z]+)/.exec(whole.slice(offset + 3))?.[1]?.toLowerCase();
      return next && !NON_NOUN_FOLLOWERS.has(next) ? possessive : name;
    })
    .replace(/\b(?:he|she|they|him|them)\b/gi, name);
}

export class ContextResolver {
  private readonly matcher: NameMatcher;
  private readonly historyDepth: number;

  constructor(matcher?: NameMatcher, historyDepth: number = DEFAULT_ENGINE_CONFIG.historyDepth) {
    this.matcher = matcher ?? new NameMatcher();
    this.historyDepth = historyDepth;
  }

  /**
   * Replaces pronouns with the most recently mentioned person in the session's
   * last K turns. Returns the query unchanged when nothing in the window
   * resolves against the snapshot.
   */
  resolve(
    query: string,
    sessionId: string,
    history: readonly ConversationTurn[],
    snapshot: DatasetSnapshot,
  ): ResolutionResult {
    if (!hasReferent(query)) {
      return { query, resolved: false };
    }

    const entity = this.findMostRecentPerson(sessionId, history, snapshot);
    if (!entity) {
      return { query, resolved: false };
    }

    return {
      query: substituteReferents(query, entity.displayName),
      resolved: true,
      entityId: entity.id,
    };
  }

  findMostRecentPerson(
    sessionId: string,
    history: readonly ConversationTurn[],
    snapshot: DatasetSnapshot,
  ): PersonEntity | undefined {
    const window = history
      .filter(turn => turn.sessionId === sessionId)
      .sort((a, b) => b.turnIndex - a.turnIndex)
      .slice(0, this.historyDepth);

    for (const turn of window) {
      // The answer came last; its leading subject is the freshest mention
      for (const { name } of collectNames(turn.answer, ANSWER_PATTERNS).sort((a, b) => a.index - b.index)) {
        const entity = this.validate(name, snapshot);
        if (entity) return entity;
      }

      for (const id of [...turn.mentionedEntityIds].reverse()) {
        const entity = snapshot.dictionary.personsById.get(id);
        if (entity) return entity;
      }

      for (const { name } of collectNames(turn.resolvedQuery, QUERY_PATTERNS).sort((a, b) => b.index - a.index)) {
        const entity = this.validate(name, snapshot);
        if (entity) return entity;
      }
    }

    return undefined;
  }

  private validate(name: string, snapshot: DatasetSnapshot): PersonEntity | undefined {
    const result = this.matcher.match(name, snapshot, true);
    return result.kind === 'exact' ? result.entity : undefined;
  }
}
