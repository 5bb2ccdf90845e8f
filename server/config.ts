import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).transform(value => value === "true");

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  FPL_API_BASE_URL: z.string().url().default("https://fantasy.premierleague.com/api"),
  FPL_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  FPL_FETCH_RETRIES: z.coerce.number().int().min(0).default(2),
  FPL_CACHE_TTL_MS: z.coerce.number().int().min(0).default(5 * 60 * 1000),
  HTTPS_PROXY: z.string().optional(),
  HTTP_PROXY: z.string().optional(),

  DATA_PIPELINE_BOOTSTRAP: booleanFlag.default("true"),
  DATA_PIPELINE_SCHEDULE: z.string().default("*/30 * * * *"),
  DATA_PIPELINE_TZ: z.string().default("UTC"),

  HISTORY_DEPTH: z.coerce.number().int().min(0).default(3),
  HISTORY_RETENTION: z.coerce.number().int().min(1).default(10),
  HISTORY_SESSION_IDLE_MS: z.coerce.number().int().positive().default(2 * 60 * 60 * 1000),
  HISTORY_MAX_SESSIONS: z.coerce.number().int().min(1).default(10000),
  FUZZY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  DEFAULT_TOP_N: z.coerce.number().int().min(1).default(5),
  MAX_TOP_N: z.coerce.number().int().min(1).default(10),
  MAX_FIXTURES: z.coerce.number().int().min(1).default(15),

  DATABASE_URL: z.string().optional(),
  CONVERSATION_STORE: z.enum(["memory", "database"]).optional(),

  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_MODEL: z.string().default("mistralai/mistral-7b-instruct:free"),
});

export interface EngineConfig {
  fuzzyThreshold: number;
  historyDepth: number;
  defaultTopN: number;
  maxTopN: number;
  maxFixtures: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  fuzzyThreshold: 0.8,
  historyDepth: 3,
  defaultTopN: 5,
  maxTopN: 10,
  maxFixtures: 15,
};

export interface AppConfig {
  env: string;
  port: number;
  fpl: {
    baseUrl: string;
    timeoutMs: number;
    retries: number;
    cacheTtlMs: number;
    proxyUrl?: string;
  };
  pipeline: {
    bootstrap: boolean;
    schedule: string;
    timezone: string;
  };
  engine: EngineConfig;
  history: {
    store: "memory" | "database";
    retention: number;
    sessionIdleMs: number;
    maxSessions: number;
  };
  databaseUrl?: string;
  openRouter: {
    apiKey?: string;
    model: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;
  const maxTopN = Math.max(values.MAX_TOP_N, 1);

  return {
    env: values.NODE_ENV,
    port: values.PORT,
    fpl: {
      baseUrl: values.FPL_API_BASE_URL,
      timeoutMs: values.FPL_FETCH_TIMEOUT_MS,
      retries: values.FPL_FETCH_RETRIES,
      cacheTtlMs: values.FPL_CACHE_TTL_MS,
      proxyUrl: values.HTTPS_PROXY || values.HTTP_PROXY || undefined,
    },
    pipeline: {
      bootstrap: values.DATA_PIPELINE_BOOTSTRAP,
      schedule: values.DATA_PIPELINE_SCHEDULE,
      timezone: values.DATA_PIPELINE_TZ,
    },
    engine: {
      fuzzyThreshold: values.FUZZY_THRESHOLD,
      historyDepth: values.HISTORY_DEPTH,
      defaultTopN: Math.min(values.DEFAULT_TOP_N, maxTopN),
      maxTopN,
      maxFixtures: values.MAX_FIXTURES,
    },
    history: {
      store: values.CONVERSATION_STORE ?? (values.DATABASE_URL ? "database" : "memory"),
      retention: Math.max(values.HISTORY_RETENTION, values.HISTORY_DEPTH),
      sessionIdleMs: values.HISTORY_SESSION_IDLE_MS,
      maxSessions: values.HISTORY_MAX_SESSIONS,
    },
    databaseUrl: values.DATABASE_URL || undefined,
    openRouter: {
      apiKey: values.OPENROUTER_API_KEY || undefined,
      model: values.OPENROUTER_MODEL,
    },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
