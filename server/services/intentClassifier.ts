import type { ExtractionResult, QueryClassification, QueryIntent } from '@shared/schema';

export interface ClassificationSignals {
  query: string;
  /** Lowercased, punctuation folded to spaces. */
  text: string;
  extraction: ExtractionResult;
}

export interface IntentRule {
  id: string;
  intent: QueryIntent;
  confidence: number;
  matches: (signals: ClassificationSignals) => boolean;
}

export interface ClassificationContext {
  originalQuery: string;
  contextResolved: boolean;
  generationId: number;
}

export function foldText(query: string): string {
  return query
    .toLowerCase()
    .replace(/[’`]/g, "'")
    .replace(/[^\p{L}\p{N}'£$.\s]/gu, ' ')
    .replace(/\.(?!\d)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function anyMatch(patterns: RegExp[], text: string): boolean {
  return patterns.some(pattern => pattern.test(text));
}

const CONVERSATIONAL_PATTERNS: RegExp[] = [
  /^(?:hi|hello|hey|hiya|howdy|greetings|yo)(?: (?:there|mate|all|everyone|bot))?$/,
  /^good (?:morning|afternoon|evening|day)(?: (?:there|mate))?$/,
  /^(?:(?:hi|hello|hey) )?how(?: are you| are u| r u| is it going|'s it going)(?: (?:doing|today))?$/,
  /^(?:thanks|thank you|thx|ty|cheers|much appreciated)(?: (?:so much|a lot|mate|again))*$/,
  /^(?:bye|goodbye|good bye|see (?:ya|you)(?: later)?|later|cya)$/,
  /^(?:yes|no|ok|okay|cool|great|nice|sure|alright|got it)$/,
  /^(?:what'?s up|sup|wassup)$/,
  /^nice to meet you$/,
];

const FIXTURE_PATTERNS: RegExp[] = [
  /\b(?:fixtures?|schedule|opponents?|fdr)\b/,
  /\bnext (?:\d+ )?(?:games?|matches|match|opponents?)\b/,
  /\bupcoming (?:games?|matches|run)\b/,
  /\bwho (?:do|does|are|is) .+ (?:play|playing|face|facing)\b/,
  /\bwhen (?:do|does|are|is) .+ (?:play|playing)\b/,
  /\bplay(?:ing)? (?:in )?(?:gw|gameweek) ?\d+/,
  /\b(?:home|away) (?:games?|matches)\b/,
];

const SUPERLATIVE_PATTERN = /\b(?:most|highest|top|best|leading|leaders?|biggest|greatest|cheapest)\b/;
const LEADER_SUBJECT_PATTERN = /\b(?:players?|performers?|scorers?|assisters?|creators?|owned)\b/;

const STRONG_RULES_PATTERNS: RegExp[] = [
  /\bhow many points\b/,
  /\bpoints (?:for|do you get for) (?:a |an )?(?:goal|assist|clean sheet|save|penalty|yellow|red|own goal|bonus)/,
  /\bclean sheet points\b/,
  /\bfree transfers?\b/,
  /\btransfer (?:rules|cost)\b/,
  /\b(?:wildcard|free hit|bench boost|triple captain|chip) rules\b/,
  /\bsquad (?:size|rules)\b/,
  /\bstarting budget\b/,
  /\bhow (?:does|do) (?:the )?(?:scoring|bonus|captain|captaincy|auto ?subs?|transfers?|chips?|wildcard|free hit|bench boost|triple captain|price changes?|deadlines?|defensive contributions?)\b/,
  /\bwhat (?:is|are) (?:the )?(?:rules|scoring system|bonus points|bps)\b/,
  /\bhow many (?:players|transfers)\b/,
  /\bdefensive contributions?\b/,
  /\bdeadline\b/,
];

const MEDIUM_RULES_PATTERNS: RegExp[] = [
  /\bscoring system\b/,
  /\bpenalt(?:y|ies)\b/,
  /\bcaptain (?:points|rules)\b/,
  /\bvice[- ]captain\b/,
  /\bwildcard\b/,
  /\bfree hit\b/,
  /\bbench boost\b/,
  /\btriple captain\b/,
  /\bbudget\b/,
  /\bhits?\b/,
  /\bauto ?subs?\b/,
  /\bbonus points?\b/,
  /\bprice changes?\b/,
  /\bselling price\b/,
];

const STRATEGY_INDICATORS = /\b(?:differentials?|template|value|should i|when should|when to|timing|advice|strategy|use my|play my|activate|worth it|best time|plan)\b/;
const PLAYER_INDICATORS = /\b(?:who|which players?|best|top|under|recommend)\b/;

const STRATEGY_PATTERNS: RegExp[] = [
  /\b(?:differentials?|template|punts?|enablers?)\b/,
  /\b(?:value picks?|budget (?:options?|picks?)|low(?:ly)? owned|low ownership|points per million|ppm)\b/,
  /\bcaptain(?:cy)?\b/,
  /\bwho should i (?:captain|pick|buy|get|sell|transfer)\b/,
  /\bshould i (?:sell|buy|get|transfer|keep|bench|start|pick)\b/,
  /\b(?:wildcard|free hit|bench boost|triple captain|chips?)\b/,
  /\b(?:double|blank) gameweek\b|\b(?:dgw|bgw)\b/,
  /\b(?:transfer (?:strategy|plan|advice|targets?)|strategy|advice)\b/,
  /\b(?:in form|hot streak|on fire)\b/,
];

function hasResolvedPerson(extraction: ExtractionResult): boolean {
  return extraction.persons.some(mention => mention.result.kind === 'exact' || mention.result.kind === 'unavailable');
}

/**
 * Ordered rules; the first match wins. Referent resolution sits between the
 * conversational and fixture rules and is performed by the query engine before
 * the remaining rules run.
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    id: 'conversational',
    intent: 'conversational',
    confidence: 0.98,
    matches: ({ text }) => anyMatch(CONVERSATIONAL_PATTERNS, text),
  },
  {
    id: 'fixture',
    intent: 'fixture_lookup',
    confidence: 0.95,
    matches: ({ text }) => anyMatch(FIXTURE_PATTERNS, text),
  },
  {
    id: 'filtered-statistic',
    intent: 'filtered_statistic',
    confidence: 0.92,
    matches: ({ text, extraction }) =>
      (extraction.position !== undefined || extraction.price !== undefined) && SUPERLATIVE_PATTERN.test(text),
  },
  {
    id: 'statistical-leader',
    intent: 'statistical_leader',
    confidence: 0.9,
    matches: ({ text, extraction }) =>
      SUPERLATIVE_PATTERN.test(text) && (extraction.statKey !== undefined || LEADER_SUBJECT_PATTERN.test(text)),
  },
  {
    id: 'rules-knowledge',
    intent: 'rules_knowledge',
    confidence: 0.85,
    matches: ({ text, extraction }) =>
      (anyMatch(STRONG_RULES_PATTERNS, text) || anyMatch(MEDIUM_RULES_PATTERNS, text))
      && !STRATEGY_INDICATORS.test(text)
      && !PLAYER_INDICATORS.test(text)
      && !hasResolvedPerson(extraction),
  },
  {
    id: 'strategy',
    intent: 'strategy_advice',
    confidence: 0.8,
    matches: ({ text }) => anyMatch(STRATEGY_PATTERNS, text),
  },
  {
    id: 'team-position-filter',
    intent: 'team_position_filter',
    confidence: 0.85,
    matches: ({ extraction }) => extraction.teamId !== undefined || extraction.position !== undefined,
  },
  {
    id: 'player-detail',
    intent: 'player_detail',
    confidence: 0.9,
    matches: ({ extraction }) => extraction.persons.length > 0,
  },
  {
    id: 'general',
    intent: 'general',
    confidence: 0.5,
    matches: () => true,
  },
];

export function emptyExtraction(): ExtractionResult {
  return { persons: [], includeUnavailable: false };
}

const FALLBACK_RULE: IntentRule = { id: 'general', intent: 'general', confidence: 0.5, matches: () => true };

export class IntentClassifier {
  constructor(private readonly rules: readonly IntentRule[] = INTENT_RULES) {}

  isConversational(query: string): boolean {
    const rule = this.rules.find(candidate => candidate.intent === 'conversational');
    return rule?.matches({ query, text: foldText(query), extraction: emptyExtraction() }) ?? false;
  }

  classify(query: string, extraction: ExtractionResult, context: ClassificationContext): QueryClassification {
    const signals: ClassificationSignals = { query, text: foldText(query), extraction };
    const rule = this.rules.find(candidate => candidate.matches(signals)) ?? FALLBACK_RULE;

    return {
      intent: rule.intent,
      confidence: rule.confidence,
      ruleId: rule.id,
      query,
      originalQuery: context.originalQuery,
      contextResolved: context.contextResolved,
      generationId: context.generationId,
      extracted: extraction,
    };
  }
}
