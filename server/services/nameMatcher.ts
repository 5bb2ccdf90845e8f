import type { AvailabilityStatus, MatchResult, MatchTier, PersonEntity } from '@shared/schema';
import { DEFAULT_ENGINE_CONFIG } from '../config';
import type { DatasetSnapshot, PersonNameForms } from './entityDictionary';

/**
 * Lowercase, decompose (NFD), drop combining marks and collapse whitespace.
 * Lowercasing runs first so characters such as "İ" cannot leave a mark behind,
 * which keeps the function idempotent.
 */
export function normalizeName(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenizeName(value: string): string[] {
  return value.split(/[\s.\-']+/).filter(Boolean);
}

/** Share of equal characters at equal positions, over the longer length. */
export function positionalSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 0;
  const shortest = Math.min(a.length, b.length);
  let same = 0;
  for (let i = 0; i < shortest; i++) {
    if (a[i] === b[i]) same += 1;
  }
  return same / longest;
}

/**
 * Near spelling of similar length, or (with `trigrams`) a shared 3-character
 * chunk when both strings have at least 4 characters.
 */
export function isFuzzyMatch(candidate: string, target: string, threshold: number, trigrams = true): boolean {
  if (!candidate || !target) return false;

  if (Math.abs(candidate.length - target.length) <= 2 && positionalSimilarity(candidate, target) >= threshold) {
    return true;
  }

  if (trigrams && candidate.length >= 4 && target.length >= 4) {
    for (let i = 0; i + 3 <= candidate.length; i++) {
      const gram = candidate.slice(i, i + 3);
      if (!gram.includes(' ') && target.includes(gram)) {
        return true;
      }
    }
  }

  return false;
}

function occursAtWordStart(haystack: string, needle: string): boolean {
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    if (index === 0 || !/[a-z0-9]/.test(haystack[index - 1] ?? '')) {
      return true;
    }
    index = haystack.indexOf(needle, index + 1);
  }
  return false;
}

interface TierRule {
  tier: MatchTier;
  test: (query: string, queryTokens: string[], forms: PersonNameForms) => boolean;
}

const TIERS: TierRule[] = [
  {
    tier: 'exact_name',
    test: (query, _tokens, forms) => query === forms.display || query === forms.full,
  },
  {
    tier: 'name_part',
    test: (query, _tokens, forms) => query === forms.second || query === forms.first,
  },
  {
    tier: 'all_words',
    test: (_query, tokens, forms) =>
      tokens.length >= 2 && tokens.every(token => forms.fullTokens.some(word => word.includes(token))),
  },
  {
    tier: 'word_boundary',
    test: (query, _tokens, forms) =>
      query.length >= 3 && (occursAtWordStart(forms.display, query) || occursAtWordStart(forms.full, query)),
  },
];

const UNAVAILABLE_REASONS: Record<Exclude<AvailabilityStatus, 'Active'>, string> = {
  Injured: 'injured and unavailable for selection',
  Unavailable: 'unavailable for selection',
  OnLoan: 'out on loan and unavailable for selection',
};

export function unavailableReason(status: AvailabilityStatus): string {
  return status === 'Active' ? 'available for selection' : UNAVAILABLE_REASONS[status];
}

function byDisplayName(a: PersonEntity, b: PersonEntity): number {
  return a.displayName.localeCompare(b.displayName) || a.id - b.id;
}

export interface NameMatcherOptions {
  fuzzyThreshold: number;
  maxSuggestions?: number;
}

export class NameMatcher {
  private readonly fuzzyThreshold: number;
  private readonly maxSuggestions: number;

  constructor(options: NameMatcherOptions = { fuzzyThreshold: DEFAULT_ENGINE_CONFIG.fuzzyThreshold }) {
    this.fuzzyThreshold = options.fuzzyThreshold;
    this.maxSuggestions = options.maxSuggestions ?? 5;
  }

  match(candidate: string, snapshot: DatasetSnapshot, includeUnavailable = false): MatchResult {
    const query = normalizeName(candidate);
    if (query.length < 2) {
      return { kind: 'not_found', suggestions: [] };
    }

    const queryTokens = tokenizeName(query);
    const primary = includeUnavailable
      ? snapshot.persons
      : snapshot.persons.filter(person => person.status === 'Active');

    const primaryHit = this.matchTiers(query, queryTokens, primary, snapshot);
    if (primaryHit) {
      const [first] = primaryHit.entities;
      return primaryHit.entities.length === 1 && first
        ? { kind: 'exact', entity: first, tier: primaryHit.tier }
        : { kind: 'ambiguous', candidates: primaryHit.entities, tier: primaryHit.tier };
    }

    if (!includeUnavailable) {
      const inactive = snapshot.persons.filter(person => person.status !== 'Active');
      const inactiveHit = this.matchTiers(query, queryTokens, inactive, snapshot);
      if (inactiveHit) {
        const [first] = inactiveHit.entities;
        return inactiveHit.entities.length === 1 && first
          ? { kind: 'unavailable', entity: first, reason: unavailableReason(first.status) }
          : { kind: 'ambiguous', candidates: inactiveHit.entities, tier: inactiveHit.tier };
      }
    }

    return { kind: 'not_found', suggestions: this.suggest(query, primary, snapshot) };
  }

  /**
   * Close spellings for a name nothing matched. Chunk overlap is only tried
   * against display names and surnames; given names are compared by spelling.
   */
  private suggest(query: string, population: readonly PersonEntity[], snapshot: DatasetSnapshot): PersonEntity[] {
    return population
      .filter(person => {
        const forms = snapshot.dictionary.nameForms.get(person.id);
        return forms !== undefined && (
          isFuzzyMatch(query, forms.display, this.fuzzyThreshold)
          || isFuzzyMatch(query, forms.second, this.fuzzyThreshold)
          || isFuzzyMatch(query, forms.first, this.fuzzyThreshold, false)
        );
      })
      .sort(byDisplayName)
      .slice(0, this.maxSuggestions);
  }

  private matchTiers(
    query: string,
    queryTokens: string[],
    population: readonly PersonEntity[],
    snapshot: DatasetSnapshot,
  ): { tier: TierRule['tier']; entities: PersonEntity[] } | null {
    for (const rule of TIERS) {
      const entities = population.filter(person => {
        const forms = snapshot.dictionary.nameForms.get(person.id);
        return forms !== undefined && rule.test(query, queryTokens, forms);
      });
      if (entities.length > 0) {
        return { tier: rule.tier, entities: entities.sort(byDisplayName) };
      }
    }
    return null;
  }
}
