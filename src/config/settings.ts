import Joi from 'joi';
import path from 'path';

export type OverflowStrategy = 'skip' | 'truncate';
export type LlmBackendName = 'openai' | 'gemini';

export interface Settings {
  server: {
    port: number;
    frontendUrl?: string;
  };
  database: {
    path: string;
  };
  orchestrator: {
    sourceTimeoutMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    retryBackoff: number;
    queryDeadlineMs: number;
    maxResultsPerSource: number;
  };
  pipeline: {
    scoringThreshold: number;
    minRelevanceScore: number;
    titlePermissive: boolean;
    overflowStrategy: OverflowStrategy;
    summarize: boolean;
    scoringBatchSize: number;
  };
  llm: {
    primary: LlmBackendName;
    openaiApiKey?: string;
    openaiModel: string;
    openaiBaseUrl?: string;
    geminiApiKey?: string;
    geminiModel: string;
    maxAttempts: number;
    retryDelayMs: number;
  };
  sources: {
    githubToken?: string;
    redditUserAgent: string;
    sourcesFile: string;
  };
  email: {
    service: 'gmail' | 'smtp';
    user?: string;
    password?: string;
    smtpHost?: string;
    smtpPort: number;
    from?: string;
    senderName: string;
  };
  scheduler: {
    enabled: boolean;
    cron: string;
    timezone?: string;
  };
}

interface ParsedEnv {
  PORT: number;
  FRONTEND_URL?: string;
  DATABASE_PATH: string;
  SOURCE_TIMEOUT_MS: number;
  SOURCE_MAX_ATTEMPTS: number;
  SOURCE_RETRY_BASE_DELAY_MS: number;
  SOURCE_RETRY_BACKOFF: number;
  QUERY_DEADLINE_MS: number;
  MAX_RESULTS_PER_SOURCE: number;
  FILTER_SCORING_THRESHOLD: number;
  FILTER_MIN_RELEVANCE_SCORE: number;
  FILTER_TITLE_PERMISSIVE: boolean;
  FILTER_OVERFLOW_STRATEGY: OverflowStrategy;
  FILTER_SUMMARIZE: boolean;
  FILTER_SCORING_BATCH_SIZE: number;
  LLM_PRIMARY: LlmBackendName;
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
  OPENAI_BASE_URL?: string;
  GEMINI_API_KEY?: string;
  GEMINI_MODEL: string;
  LLM_MAX_ATTEMPTS: number;
  LLM_RETRY_DELAY_MS: number;
  GITHUB_TOKEN?: string;
  REDDIT_USER_AGENT: string;
  SOURCES_FILE: string;
  EMAIL_SERVICE: 'gmail' | 'smtp';
  EMAIL_USER?: string;
  EMAIL_PASSWORD?: string;
  SMTP_HOST?: string;
  SMTP_PORT: number;
  EMAIL_FROM?: string;
  SENDER_NAME: string;
  SCHEDULER_ENABLED: boolean;
  SCHEDULER_CRON: string;
  SCHEDULER_TIMEZONE?: string;
}

const envSchema = Joi.object<ParsedEnv>({
  PORT: Joi.number().integer().min(1).max(65535).default(3000),
  FRONTEND_URL: Joi.string().uri().optional(),
  DATABASE_PATH: Joi.string().default(path.join(process.cwd(), 'data', 'issue-radar.db')),

  SOURCE_TIMEOUT_MS: Joi.number().integer().positive().default(30_000),
  SOURCE_MAX_ATTEMPTS: Joi.number().integer().min(1).max(10).default(3),
  SOURCE_RETRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(500),
  SOURCE_RETRY_BACKOFF: Joi.number().min(1).default(2),
  QUERY_DEADLINE_MS: Joi.number().integer().positive().default(90_000),
  MAX_RESULTS_PER_SOURCE: Joi.number().integer().positive().default(100),

  FILTER_SCORING_THRESHOLD: Joi.number().integer().min(0).default(5),
  FILTER_MIN_RELEVANCE_SCORE: Joi.number().integer().min(0).max(10).default(5),
  FILTER_TITLE_PERMISSIVE: Joi.boolean().default(true),
  FILTER_OVERFLOW_STRATEGY: Joi.string().valid('skip', 'truncate').default('skip'),
  FILTER_SUMMARIZE: Joi.boolean().default(true),
  FILTER_SCORING_BATCH_SIZE: Joi.number().integer().min(1).default(5),

  LLM_PRIMARY: Joi.string().valid('openai', 'gemini').default('gemini'),
  OPENAI_API_KEY: Joi.string().allow('').optional(),
  OPENAI_MODEL: Joi.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: Joi.string().uri().optional(),
  GEMINI_API_KEY: Joi.string().allow('').optional(),
  GEMINI_MODEL: Joi.string().default('gemini-2.0-flash-lite'),
  LLM_MAX_ATTEMPTS: Joi.number().integer().min(1).max(10).default(2),
  LLM_RETRY_DELAY_MS: Joi.number().integer().min(0).default(1000),

  GITHUB_TOKEN: Joi.string().allow('').optional(),
  REDDIT_USER_AGENT: Joi.string().default('issue-radar/1.0'),
  SOURCES_FILE: Joi.string().default(path.join(process.cwd(), 'config', 'sources.json')),

  EMAIL_SERVICE: Joi.string().valid('gmail', 'smtp').default('gmail'),
  EMAIL_USER: Joi.string().allow('').optional(),
  EMAIL_PASSWORD: Joi.string().allow('').optional(),
  SMTP_HOST: Joi.string().allow('').optional(),
  SMTP_PORT: Joi.number().integer().positive().default(587),
  EMAIL_FROM: Joi.string().allow('').optional(),
  SENDER_NAME: Joi.string().default('Issue Radar'),

  SCHEDULER_ENABLED: Joi.boolean().default(true),
  SCHEDULER_CRON: Joi.string().default('* * * * *'),
  SCHEDULER_TIMEZONE: Joi.string().optional()
}).unknown(true);

// Empty strings count as "not set"
const optional = (value: string | undefined): string | undefined => (value ? value : undefined);

/**
 * Read and validate settings from the environment
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });
  if (error) {
    throw new Error(`Invalid configuration: ${error.details.map(d => d.message).join('; ')}`);
  }
  const e = value;

  return {
    server: {
      port: e.PORT,
      frontendUrl: e.FRONTEND_URL
    },
    database: {
      path: e.DATABASE_PATH
    },
    orchestrator: {
      sourceTimeoutMs: e.SOURCE_TIMEOUT_MS,
      maxAttempts: e.SOURCE_MAX_ATTEMPTS,
      retryBaseDelayMs: e.SOURCE_RETRY_BASE_DELAY_MS,
      retryBackoff: e.SOURCE_RETRY_BACKOFF,
      queryDeadlineMs: e.QUERY_DEADLINE_MS,
      maxResultsPerSource: e.MAX_RESULTS_PER_SOURCE
    },
    pipeline: {
      scoringThreshold: e.FILTER_SCORING_THRESHOLD,
      minRelevanceScore: e.FILTER_MIN_RELEVANCE_SCORE,
      titlePermissive: e.FILTER_TITLE_PERMISSIVE,
      overflowStrategy: e.FILTER_OVERFLOW_STRATEGY,
      summarize: e.FILTER_SUMMARIZE,
      scoringBatchSize: e.FILTER_SCORING_BATCH_SIZE
    },
    llm: {
      primary: e.LLM_PRIMARY,
      openaiApiKey: optional(e.OPENAI_API_KEY),
      openaiModel: e.OPENAI_MODEL,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      geminiApiKey: optional(e.GEMINI_API_KEY),
      geminiModel: e.GEMINI_MODEL,
      maxAttempts: e.LLM_MAX_ATTEMPTS,
      retryDelayMs: e.LLM_RETRY_DELAY_MS
    },
    sources: {
      githubToken: optional(e.GITHUB_TOKEN),
      redditUserAgent: e.REDDIT_USER_AGENT,
      sourcesFile: e.SOURCES_FILE
    },
    email: {
      service: e.EMAIL_SERVICE,
      user: optional(e.EMAIL_USER),
      password: optional(e.EMAIL_PASSWORD),
      smtpHost: optional(e.SMTP_HOST),
      smtpPort: e.SMTP_PORT,
      from: optional(e.EMAIL_FROM),
      senderName: e.SENDER_NAME
    },
    scheduler: {
      enabled: e.SCHEDULER_ENABLED,
      cron: e.SCHEDULER_CRON,
      timezone: e.SCHEDULER_TIMEZONE
    }
  };
}
