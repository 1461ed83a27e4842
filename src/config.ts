import { z } from 'zod';
import { ConfigurationError } from './utils/errors';

/**
 * A credential is unusable when absent or still holding the `.env.example` placeholder
 */
export function isPlaceholderCredential(value: string | undefined): boolean {
  return !value || value.trim() === '' || value.toLowerCase().includes('your');
}

const credential = (name: string) =>
  z.string({ required_error: `${name} is required` })
    .refine(value => !isPlaceholderCredential(value), {
      message: `${name} is missing or still a placeholder`,
    });

const intWithDefault = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z.object({
  NEWS_API_KEY: credential('NEWS_API_KEY'),
  OPENROUTER_API_KEY: credential('OPENROUTER_API_KEY'),

  NEWS_API_URL: z.string().url().default('https://newsapi.org/v2/top-headlines'),
  NEWS_CATEGORIES: z.string().default('technology,business'),
  NEWS_LANGUAGE: z.string().min(2).default('en'),
  NEWS_PAGE_SIZE: intWithDefault(20, 1, 100),
  POLL_INTERVAL_SECONDS: intWithDefault(60, 1),
  NEWS_FETCH_TIMEOUT_MS: intWithDefault(10000, 100),

  LLM_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  LLM_MODEL: z.string().min(1).default('google/gemini-2.5-flash'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  EMBEDDING_MODEL: z.string().min(1).default('qwen/qwen3-embedding-8b'),
  APP_URL: z.string().default('http://localhost:8000'),

  RETRIEVAL_TOP_K: intWithDefault(5, 1, 50),
  CHUNK_MAX_TOKENS: intWithDefault(400, 16),
  REQUEST_TIMEOUT_MS: intWithDefault(30000, 100),
  INDEX_RETENTION_HOURS: z.coerce.number().min(0).default(0),
  CHAT_RATE_LIMIT_PER_MINUTE: intWithDefault(30, 1),

  PORT: intWithDefault(8000, 0, 65535),
  HOST: z.string().default('0.0.0.0'),
  FRONTEND_URL: z.string().optional(),
  NODE_ENV: z.string().default('development'),
});

export interface AppConfig {
  news: {
    apiKey: string;
    url: string;
    categories: string[];
    language: string;
    pageSize: number;
    pollIntervalMs: number;
    fetchTimeoutMs: number;
  };
  llm: {
    apiKey: string;
    baseURL: string;
    model: string;
    temperature: number;
    embeddingModel: string;
    appUrl: string;
  };
  retrieval: {
    topK: number;
    chunkMaxTokens: number;
    retentionHours: number;
  };
  server: {
    port: number;
    host: string;
    requestTimeoutMs: number;
    chatRateLimitPerMinute: number;
    frontendUrl?: string;
    isProduction: boolean;
    isDevelopment: boolean;
  };
}

export function parseCategories(raw: string): string[] {
  const categories = raw
    .split(',')
    .map(c => c.trim().toLowerCase())
    .filter(c => c.length > 0);
  return Array.from(new Set(categories));
}

/**
 * Validate the environment and shape it into the application config.
 * Throws ConfigurationError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const variable = issue.path.join('.');
      return issue.message.includes(variable) ? issue.message : `${variable}: ${issue.message}`;
    });
    throw new ConfigurationError(issues);
  }

  const e = parsed.data;
  const categories = parseCategories(e.NEWS_CATEGORIES);
  if (categories.length === 0) {
    throw new ConfigurationError(['NEWS_CATEGORIES must name at least one category']);
  }

  return {
    news: {
      apiKey: e.NEWS_API_KEY,
      url: e.NEWS_API_URL,
      categories,
      language: e.NEWS_LANGUAGE,
      pageSize: e.NEWS_PAGE_SIZE,
      pollIntervalMs: e.POLL_INTERVAL_SECONDS * 1000,
      fetchTimeoutMs: e.NEWS_FETCH_TIMEOUT_MS,
    },
    llm: {
      apiKey: e.OPENROUTER_API_KEY,
      baseURL: e.LLM_BASE_URL,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      embeddingModel: e.EMBEDDING_MODEL,
      appUrl: e.APP_URL,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      chunkMaxTokens: e.CHUNK_MAX_TOKENS,
      retentionHours: e.INDEX_RETENTION_HOURS,
    },
    server: {
      port: e.PORT,
      host: e.HOST,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
      chatRateLimitPerMinute: e.CHAT_RATE_LIMIT_PER_MINUTE,
      frontendUrl: e.FRONTEND_URL,
      isProduction: e.NODE_ENV === 'production',
      isDevelopment: e.NODE_ENV === 'development',
    },
  };
}
