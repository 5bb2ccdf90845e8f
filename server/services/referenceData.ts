import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { KnowledgeEntry, Position } from "@shared/schema";

const currentDir = dirname(fileURLToPath(import.meta.url));
const dataDir = join(currentDir, "..", "data");

const teamAliasesSchema = z.record(z.string(), z.array(z.string().min(1)));

const vocabularySchema = z.object({
  positions: z.object({
    Keeper: z.array(z.string()),
    Defender: z.array(z.string()),
    Midfielder: z.array(z.string()),
    Forward: z.array(z.string()),
  }),
  stopWords: z.array(z.string()),
});

const knowledgeSchema = z.array(z.object({
  id: z.string(),
  topic: z.string(),
  keywords: z.array(z.string()),
  text: z.string(),
}));

export interface QueryVocabulary {
  positionSynonyms: ReadonlyArray<readonly [string, Position]>;
  stopWords: ReadonlySet<string>;
}

function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw: unknown = JSON.parse(readFileSync(join(dataDir, file), "utf-8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid reference data in ${file}: ${parsed.error.message}`);
  }
  return parsed.data;
}

let teamAliases: Record<string, string[]> | null = null;
let vocabulary: QueryVocabulary | null = null;
let knowledge: KnowledgeEntry[] | null = null;

/** Static alias table keyed by FPL short name (e.g. "MCI"). */
export function getTeamAliasTable(): Record<string, string[]> {
  if (!teamAliases) {
    teamAliases = readJson("team-aliases.json", teamAliasesSchema);
  }
  return teamAliases;
}

export function getQueryVocabulary(): QueryVocabulary {
  if (!vocabulary) {
    const data = readJson("query-vocabulary.json", vocabularySchema);
    const positions: Position[] = ["Keeper", "Defender", "Midfielder", "Forward"];
    // Longest synonym first so "centre backs" wins over "backs"
    const synonyms = positions
      .flatMap(position => data.positions[position].map(word => [word.toLowerCase(), position] as const))
      .sort((a, b) => b[0].length - a[0].length);
    vocabulary = {
      positionSynonyms: synonyms,
      stopWords: new Set(data.stopWords.map(word => word.toLowerCase())),
    };
  }
  return vocabulary;
}

export function getKnowledgeBase(): KnowledgeEntry[] {
  if (!knowledge) {
    knowledge = readJson("fpl-rules.json", knowledgeSchema);
  }
  return knowledge;
}
