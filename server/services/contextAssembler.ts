import type {
  CandidateSummary,
  ContextEntityRecord,
  ContextFilters,
  PersonEntity,
  PriceConstraint,
  QueryClassification,
  RankedResult,
  RetrievalResult,
  StructuredContext,
} from '@shared/schema';
import { teamName, type DatasetSnapshot } from './entityDictionary';
import { pointsPerMillion } from './retrievalEngine';

export function toMillions(price: number): number {
  return Math.round(price) / 10;
}

export function formatMillions(price: number): string {
  return `£${toMillions(price).toFixed(1)}m`;
}

export function describePrice(price: PriceConstraint): string {
  switch (price.kind) {
    case 'under':
      return `under ${formatMillions(price.max)}`;
    case 'over':
      return `over ${formatMillions(price.min)}`;
    case 'between':
      return `between ${formatMillions(price.min)} and ${formatMillions(price.max)}`;
  }
}

function toRecord(ranked: RankedResult, snapshot: DatasetSnapshot): ContextEntityRecord {
  const { entity } = ranked;
  return {
    rank: ranked.rank,
    id: entity.id,
    name: entity.displayName,
    fullName: entity.fullName,
    team: teamName(snapshot, entity.teamId),
    position: entity.position,
    price: toMillions(entity.price),
    status: entity.status,
    points: entity.stats.points,
    goals: entity.stats.goals,
    assists: entity.stats.assists,
    minutes: entity.stats.minutes,
    form: entity.stats.form,
    ownershipPercent: entity.stats.ownershipPercent,
    expectedGoals: entity.stats.expectedGoals,
    pointsPerMillion: pointsPerMillion(entity),
    sortValue: ranked.value,
  };
}

function candidateSummary(entity: PersonEntity, snapshot: DatasetSnapshot): CandidateSummary {
  return {
    id: entity.id,
    name: entity.displayName,
    fullName: entity.fullName,
    team: teamName(snapshot, entity.teamId),
    position: entity.position,
    price: toMillions(entity.price),
  };
}

function buildFilters(classification: QueryClassification, retrieval: RetrievalResult, snapshot: DatasetSnapshot): ContextFilters {
  const { teamId, position, price, gameweek, includeUnavailable } = classification.extracted;
  const filters: ContextFilters = { includeUnavailable };
  if (teamId !== undefined) filters.team = teamName(snapshot, teamId);
  if (position !== undefined) filters.position = position;
  if (price) filters.price = describePrice(price);
  if (gameweek !== undefined) filters.gameweek = gameweek;
  if (retrieval.sortKey) filters.sortKey = retrieval.sortKey;
  if (retrieval.lens) filters.lens = retrieval.lens;
  return filters;
}

/**
 * Flattens a retrieval result into the JSON-ready block the generator sees.
 * Pure: no prose, prices in £m, and every unresolved mention carried through.
 */
export function assembleContext(
  classification: QueryClassification,
  retrieval: RetrievalResult,
  snapshot: DatasetSnapshot,
): StructuredContext {
  return {
    intent: classification.intent,
    confidence: classification.confidence,
    query: classification.query,
    originalQuery: classification.originalQuery,
    contextResolved: classification.contextResolved,
    generationId: snapshot.generationId,
    fetchedAt: snapshot.fetchedAt.toISOString(),
    filters: buildFilters(classification, retrieval, snapshot),
    entities: retrieval.ranked.map(ranked => toRecord(ranked, snapshot)),
    unavailable: retrieval.unavailable.map(outcome => {
      const entry: StructuredContext['unavailable'][number] = {
        query: outcome.span,
        name: outcome.entity.displayName,
        team: teamName(snapshot, outcome.entity.teamId),
        status: outcome.entity.status,
        reason: outcome.reason,
      };
      if (outcome.entity.statusNote) entry.note = outcome.entity.statusNote;
      return entry;
    }),
    ambiguous: retrieval.ambiguous.map(outcome => ({
      query: outcome.span,
      candidates: outcome.candidates.map(candidate => candidateSummary(candidate, snapshot)),
    })),
    notFound: retrieval.notFound.map(outcome => ({
      query: outcome.span,
      suggestions: outcome.suggestions.map(suggestion => candidateSummary(suggestion, snapshot)),
    })),
    fixtures: retrieval.fixtures.map(fixture => ({ ...fixture })),
    knowledge: retrieval.knowledge.map(entry => ({ topic: entry.topic, text: entry.text })),
    totalMatched: retrieval.totalMatched,
  };
}
