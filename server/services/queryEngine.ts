import type {
  ConversationTurn,
  ExtractionResult,
  QueryClassification,
  RetrievalResult,
  StructuredContext,
} from '@shared/schema';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config';
import { assembleContext } from './contextAssembler';
import { ContextResolver, type ResolutionResult } from './contextResolver';
import type { DatasetSnapshot } from './entityDictionary';
import { EntityExtractor } from './entityExtractor';
import { SnapshotIntegrityError, StaleSnapshotError } from './errors';
import { IntentClassifier, emptyExtraction } from './intentClassifier';
import { NameMatcher } from './nameMatcher';
import { RetrievalEngine } from './retrievalEngine';

export interface QueryEngineDependencies {
  resolver: ContextResolver;
  extractor: EntityExtractor;
  classifier: IntentClassifier;
  retrieval: RetrievalEngine;
}

export interface QueryOutcome {
  resolution: ResolutionResult;
  classification: QueryClassification;
  retrieval: RetrievalResult;
  context: StructuredContext;
  topN: number;
  /** Persons this turn talked about, in mention order; stored with the turn. */
  mentionedEntityIds: number[];
  degraded: boolean;
}

interface Understanding {
  resolution: ResolutionResult;
  classification: QueryClassification;
}

function mentionedIds(extraction: ExtractionResult, retrieval: RetrievalResult): number[] {
  const ids: number[] = [];
  for (const mention of extraction.persons) {
    const { result } = mention;
    if ((result.kind === 'exact' || result.kind === 'unavailable') && !ids.includes(result.entity.id)) {
      ids.push(result.entity.id);
    }
  }
  const leader = retrieval.ranked[0];
  if (ids.length === 0 && leader) {
    ids.push(leader.entity.id);
  }
  return ids;
}

export class QueryEngine {
  private readonly config: EngineConfig;
  private readonly deps: QueryEngineDependencies;

  constructor(config: EngineConfig = DEFAULT_ENGINE_CONFIG, deps?: Partial<QueryEngineDependencies>) {
    this.config = config;
    const matcher = new NameMatcher({ fuzzyThreshold: config.fuzzyThreshold });
    this.deps = {
      resolver: deps?.resolver ?? new ContextResolver(matcher, config.historyDepth),
      extractor: deps?.extractor ?? new EntityExtractor(matcher),
      classifier: deps?.classifier ?? new IntentClassifier(),
      retrieval: deps?.retrieval ?? new RetrievalEngine({ maxFixtures: config.maxFixtures }),
    };
  }

  effectiveTopN(limit: number | undefined): number {
    return Math.max(1, Math.min(limit ?? this.config.defaultTopN, this.config.maxTopN));
  }

  /**
   * Runs one query against a single captured snapshot. Every stage reads the
   * same generation; the snapshot is never re-read mid-request.
   */
  process(
    query: string,
    sessionId: string,
    history: readonly ConversationTurn[],
    snapshot: DatasetSnapshot,
  ): QueryOutcome {
    let degraded = false;
    let understanding: Understanding;

    try {
      understanding = this.understand(query, sessionId, history, snapshot);
    } catch (error) {
      if (error instanceof SnapshotIntegrityError || error instanceof StaleSnapshotError) {
        throw error;
      }
      console.error('[engine] Query understanding failed, falling back to general:', error);
      degraded = true;
      understanding = {
        resolution: { query, resolved: false },
        classification: {
          intent: 'general',
          confidence: 0.5,
          ruleId: 'general',
          query,
          originalQuery: query,
          contextResolved: false,
          generationId: snapshot.generationId,
          extracted: emptyExtraction(),
        },
      };
    }

    const { resolution, classification } = understanding;
    const topN = this.effectiveTopN(classification.extracted.limit);
    const retrieval = this.deps.retrieval.retrieve(classification, snapshot, topN);
    const context = assembleContext(classification, retrieval, snapshot);

    return {
      resolution,
      classification,
      retrieval,
      context,
      topN,
      mentionedEntityIds: mentionedIds(classification.extracted, retrieval),
      degraded,
    };
  }

  private understand(
    query: string,
    sessionId: string,
    history: readonly ConversationTurn[],
    snapshot: DatasetSnapshot,
  ): Understanding {
    const { resolver, extractor, classifier } = this.deps;

    // Small talk is answered before any history lookup
    if (classifier.isConversational(query)) {
      const resolution: ResolutionResult = { query, resolved: false };
      return {
        resolution,
        classification: classifier.classify(query, emptyExtraction(), {
          originalQuery: query,
          contextResolved: false,
          generationId: snapshot.generationId,
        }),
      };
    }

    const resolution = resolver.resolve(query, sessionId, history, snapshot);
    const extraction = extractor.extract(resolution.query, snapshot);
    const classification = classifier.classify(resolution.query, extraction, {
      originalQuery: query,
      contextResolved: resolution.resolved,
      generationId: snapshot.generationId,
    });

    return { resolution, classification };
  }
}
