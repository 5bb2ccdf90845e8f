/**
 * Turns a structured context block into the reply text. OpenRouter is used
 * when a key is configured; otherwise, or when the call fails, the context is
 * rendered deterministically.
 */
import { z } from 'zod';
import type {
  ContextEntityRecord,
  ConversationTurn,
  FixtureView,
  StatKey,
  StructuredContext
} from '@shared/schema';
import { getConfig } from '../config';
import type { FetchLike } from './providers/httpProvider';

export interface GenerationRequest {
  query: string;
  context: StructuredContext;
  /** Most recent first, as the store returns them. */
  history: readonly ConversationTurn[];
}

export interface ResponseGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

const openRouterResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
  })).min(1),
});

const STAT_LABELS: Record<StatKey, string> = {
  points: 'points',
  goals: 'goals',
  assists: 'assists',
  expected_goals: 'xG',
  ownership: '% ownership',
  form: 'form',
  value: 'points per £1m',
  price: 'lowest price',
};

const POSITION_PLURALS: Record<ContextEntityRecord['position'], string> = {
  Keeper: 'goalkeepers',
  Defender: 'defenders',
  Midfielder: 'midfielders',
  Forward: 'forwards',
};

const SYSTEM_PROMPT = [
  'You are a Fantasy Premier League assistant.',
  'Answer using only the JSON context supplied with each question; do not invent players, prices or statistics.',
  'Prices are in millions of pounds. Keep answers short and put player names in **bold**.',
  'If the context lists unavailable players, say they are unavailable and why.',
  'If it lists ambiguous names, ask which player was meant and list the candidates.',
  'If it lists names that were not found, say you could not find them and offer any suggestions given; never treat a suggestion as the player asked about.',
].join(' ');

function formatPrice(price: number): string {
  return `£${price.toFixed(1)}m`;
}

function formatStat(record: ContextEntityRecord, key: StatKey | undefined): string {
  const value = record.sortValue ?? record.points;
  switch (key ?? 'points') {
    case 'ownership':
      return `${value}% owned`;
    case 'value':
      return `${value} points per £1m`;
    case 'expected_goals':
      return `${value} xG`;
    case 'form':
      return `form ${value}`;
    case 'price':
      return formatPrice(value);
    default:
      return `${value} ${STAT_LABELS[key ?? 'points']}`;
  }
}

function describeEntity(record: ContextEntityRecord): string {
  return `**${record.name}** (${record.team}, ${record.position}, ${formatPrice(record.price)}) has ${record.points} points, `
    + `${record.goals} goals and ${record.assists} assists this season. Form ${record.form}, owned by ${record.ownershipPercent}%.`;
}

function describeFixture(fixture: FixtureView): string {
  const when = fixture.gameweek === null ? 'Unscheduled' : `GW${fixture.gameweek}`;
  if (fixture.venue && fixture.opponent) {
    return `${when}: ${fixture.opponent} (${fixture.venue === 'home' ? 'H' : 'A'}), difficulty ${fixture.difficulty ?? '?'}`;
  }
  return `${when}: ${fixture.homeTeam} v ${fixture.awayTeam}`;
}

function conversationalReply(query: string): string {
  const text = query.toLowerCase();
  if (/\b(?:thanks|thank you|thx|ty|cheers|appreciated)\b/.test(text)) {
    return "You're welcome! Ask me anything else about players, fixtures or FPL rules.";
  }
  if (/\b(?:bye|goodbye|see (?:ya|you)|later|cya)\b/.test(text)) {
    return 'See you next gameweek. Good luck with your team!';
  }
  if (/\bhow\b/.test(text)) {
    return "I'm doing well, thanks. What would you like to know about FPL?";
  }
  return 'Hi! Ask me about players, prices, fixtures, FPL rules or strategy.';
}

function rankingHeading(context: StructuredContext): string {
  const { filters } = context;
  const subject = filters.position ? POSITION_PLURALS[filters.position] : 'players';
  const parts = [`Top ${context.entities.length} ${subject}`];
  if (filters.team) parts.push(`at ${filters.team}`);
  if (filters.price) parts.push(filters.price);
  if (filters.lens) {
    parts.push(`(${filters.lens})`);
  } else if (filters.sortKey) {
    parts.push(`by ${STAT_LABELS[filters.sortKey]}`);
  }
  return `${parts.join(' ')}:`;
}

/** Deterministic rendering of a context block. No network. */
export function renderContextFallback(context: StructuredContext): string {
  if (context.intent === 'conversational') {
    return conversationalReply(context.originalQuery);
  }

  const lines: string[] = [];

  switch (context.intent) {
    case 'player_detail':
      lines.push(...context.entities.map(describeEntity));
      break;
    case 'fixture_lookup':
      if (context.fixtures.length > 0) {
        lines.push(...context.fixtures.map(describeFixture));
      }
      break;
    case 'rules_knowledge':
      lines.push(...context.knowledge.map(entry => `${entry.topic}: ${entry.text}`));
      break;
    default:
      if (context.entities.length > 0) {
        lines.push(rankingHeading(context));
        lines.push(...context.entities.map(record =>
          `${record.rank}. **${record.name}** (${record.team}, ${formatPrice(record.price)}): ${formatStat(record, context.filters.sortKey)}`));
      }
      if (context.intent === 'strategy_advice') {
        lines.push(...context.knowledge.map(entry => `${entry.topic}: ${entry.text}`));
      }
  }

  for (const entry of context.unavailable) {
    lines.push(`**${entry.name}** (${entry.team}) is ${entry.reason}${entry.note ? ` (${entry.note})` : ''}.`);
  }
  for (const entry of context.ambiguous) {
    const options = entry.candidates
      .map(candidate => `${candidate.name} (${candidate.team}, ${candidate.position}, ${formatPrice(candidate.price)})`)
      .join('; ');
    lines.push(`"${entry.query}" could be more than one player: ${options}. Which did you mean?`);
  }
  for (const entry of context.notFound) {
    const hint = entry.suggestions.length > 0
      ? ` Did you mean ${entry.suggestions.map(suggestion => `${suggestion.name} (${suggestion.team})`).join(' or ')}?`
      : '';
    lines.push(`I couldn't find a player called "${entry.query}" in the current FPL data.${hint}`);
  }

  if (lines.length === 0) {
    return "I couldn't find anything matching that. Try asking about a player, a team's fixtures, or an FPL rule.";
  }
  return lines.join('\n');
}

export class FallbackGenerator implements ResponseGenerator {
  async generate(request: GenerationRequest): Promise<string> {
    return renderContextFallback(request.context);
  }
}

export interface OpenRouterOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
  fetch?: FetchLike;
}

export class OpenRouterGenerator implements ResponseGenerator {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: OpenRouterOptions) {
    this.baseUrl = options.baseUrl ?? 'https://openrouter.ai/api/v1';
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  buildMessages(request: GenerationRequest): LLMMessage[] {
    const messages: LLMMessage[] = [{ role: 'system', content: SYSTEM_PROMPT }];
    for (const turn of [...request.history].reverse()) {
      messages.push({ role: 'user', content: turn.rawQuery });
      if (turn.answer) {
        messages.push({ role: 'assistant', content: turn.answer });
      }
    }
    messages.push({
      role: 'user',
      content: `Question: ${request.query}\n\nContext (JSON):\n${JSON.stringify(request.context)}`,
    });
    return messages;
  }

  async generate(request: GenerationRequest): Promise<string> {
    if (request.context.intent === 'conversational') {
      return renderContextFallback(request.context);
    }

    try {
      return await this.complete(this.buildMessages(request));
    } catch (error) {
      console.error('[OpenRouterGenerator] Completion failed, rendering context instead:', error);
      return renderContextFallback(request.context);
    }
  }

  private async complete(messages: LLMMessage[]): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 20000);
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
          'X-Title': 'FPL Chat Assistant',
        },
        body: JSON.stringify({
          model: this.options.model,
          messages,
          max_tokens: this.options.maxTokens ?? 600,
          temperature: this.options.temperature ?? 0.3,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorData = await response.text();
        throw new Error(`OpenRouter API error: ${response.status} - ${errorData}`);
      }

      const body: unknown = await response.json();
      const content = openRouterResponseSchema.parse(body).choices[0]?.message.content?.trim() ?? '';
      if (!content) {
        throw new Error('OpenRouter returned empty content');
      }
      return content;
    } finally {
      clearTimeout(timer);
    }
  }
}

let defaultGenerator: ResponseGenerator | null = null;

export function getResponseGenerator(): ResponseGenerator {
  if (!defaultGenerator) {
    const { openRouter } = getConfig();
    if (openRouter.apiKey) {
      defaultGenerator = new OpenRouterGenerator({ apiKey: openRouter.apiKey, model: openRouter.model });
      console.log(`[chat] Using OpenRouter model ${openRouter.model}`);
    } else {
      defaultGenerator = new FallbackGenerator();
      console.warn('[chat] OPENROUTER_API_KEY not set; answers are rendered from context only');
    }
  }
  return defaultGenerator;
}
