import path from 'node:path';
import { Criticality, isCriticality } from '../types/radar.types';

export const SERVICE_NAME = 'stack-radar';
export const SERVICE_VERSION = '1.0.0';

export const RADAR_SETTINGS = Symbol('RADAR_SETTINGS');
export const CLOCK = Symbol('CLOCK');

export type Clock = () => Date;

export type ModelProvider = 'gemini' | 'openai' | 'ollama';
export type ReportFormat = 'json' | 'csv';

export const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

export const KNOWLEDGE_SCHEMA_VERSION = 1;

const DEFAULT_COMPLETION_MODELS: Record<ModelProvider, string> = {
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
  ollama: 'llama3.1',
};

const DEFAULT_EMBEDDING_MODELS: Record<ModelProvider, string> = {
  gemini: 'gemini-embedding-001',
  openai: 'text-embedding-3-small',
  ollama: 'nomic-embed-text',
};

export interface RetrySettings {
  maxAttempts: number;
  backoffMs: number;
}

export interface RadarSettings {
  configPath: string;
  dataDir: string;
  reportDir: string;
  reportFormat: ReportFormat;
  reportMinCriticality: Criticality;
  /** Overrides the config file's threshold when set. */
  similarityThreshold: number | null;
  pipelineConcurrency: number;
  requestTimeoutMs: number;
  completion: {
    provider: ModelProvider;
    model: string;
    temperature: number;
    inputMaxChars: number;
    retry: RetrySettings;
  };
  embedding: {
    provider: ModelProvider;
    model: string;
    maxChars: number;
    cacheSize: number;
    retry: RetrySettings;
  };
  articleContent: {
    enabled: boolean;
    maxChars: number;
  };
  inquisitor: {
    topK: number;
    temperature: number;
    excerptChars: number;
  };
  credentials: {
    geminiApiKey: string;
    openaiApiKey: string;
    githubToken: string;
  };
  endpoints: {
    gemini: string;
    openai: string;
    ollama: string;
    github: string;
  };
  userAgent: string;
}

function readString(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: string,
): string {
  const raw = (env[name] ?? '').trim();
  return raw || fallback;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  bounds: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const raw = (env[name] ?? '').trim();
  const parsed = raw ? Number(raw) : fallback;
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  let value = bounds.integer ? Math.floor(parsed) : parsed;
  if (bounds.min != null) {
    value = Math.max(bounds.min, value);
  }
  if (bounds.max != null) {
    value = Math.min(bounds.max, value);
  }
  return value;
}

function readProvider(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: ModelProvider,
): ModelProvider {
  const raw = (env[name] ?? '').trim().toLowerCase();
  if (raw === 'gemini' || raw === 'openai' || raw === 'ollama') {
    return raw;
  }
  return fallback;
}

function readThreshold(env: NodeJS.ProcessEnv): number | null {
  const raw = (env.VIGIL_SIMILARITY_THRESHOLD ?? '').trim();
  if (!raw) {
    return null;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

export function resolveRadarSettings(
  env: NodeJS.ProcessEnv = process.env,
): RadarSettings {
  const dataDir = readString(
    env,
    'DATA_DIR',
    path.join(process.cwd(), 'data'),
  );
  const completionProvider = readProvider(env, 'AI_PROVIDER', 'gemini');
  const embeddingProvider = readProvider(
    env,
    'EMBEDDING_PROVIDER',
    completionProvider,
  );
  const reportCutoff = readString(
    env,
    'REPORT_MIN_CRITICALITY',
    'LOW',
  ).toUpperCase();

  return {
    configPath: readString(
      env,
      'RADAR_CONFIG_PATH',
      path.join(process.cwd(), 'config', 'radar.config.json'),
    ),
    dataDir,
    reportDir: readString(env, 'REPORT_DIR', path.join(dataDir, 'reports')),
    reportFormat:
      readString(env, 'REPORT_FORMAT', 'json').toLowerCase() === 'csv'
        ? 'csv'
        : 'json',
    reportMinCriticality: isCriticality(reportCutoff) ? reportCutoff : 'LOW',
    similarityThreshold: readThreshold(env),
    pipelineConcurrency: readNumber(env, 'PIPELINE_CONCURRENCY', 4, {
      min: 1,
      max: 32,
      integer: true,
    }),
    requestTimeoutMs:
      readNumber(env, 'AI_TIMEOUT_SEC', 60, { min: 1 }) * 1000,
    completion: {
      provider: completionProvider,
      model: readString(
        env,
        'AI_MODEL',
        DEFAULT_COMPLETION_MODELS[completionProvider],
      ),
      temperature: readNumber(env, 'AI_TEMPERATURE', 0.2, { min: 0, max: 2 }),
      inputMaxChars: readNumber(env, 'AI_INPUT_MAX_CHARS', 4000, {
        min: 200,
        integer: true,
      }),
      retry: {
        maxAttempts: readNumber(env, 'ANALYZER_MAX_ATTEMPTS', 3, {
          min: 1,
          max: 10,
          integer: true,
        }),
        backoffMs: readNumber(env, 'ANALYZER_BACKOFF_MS', 1500, { min: 0 }),
      },
    },
    embedding: {
      provider: embeddingProvider,
      model: readString(
        env,
        'EMBEDDING_MODEL',
        DEFAULT_EMBEDDING_MODELS[embeddingProvider],
      ),
      maxChars: readNumber(env, 'EMBEDDING_MAX_CHARS', 2000, {
        min: 100,
        integer: true,
      }),
      cacheSize: readNumber(env, 'EMBEDDING_CACHE_SIZE', 500, {
        min: 0,
        integer: true,
      }),
      retry: {
        maxAttempts: readNumber(env, 'EMBEDDING_MAX_ATTEMPTS', 3, {
          min: 1,
          max: 10,
          integer: true,
        }),
        backoffMs: readNumber(env, 'EMBEDDING_BACKOFF_MS', 1000, { min: 0 }),
      },
    },
    articleContent: {
      enabled: readString(env, 'FETCH_ARTICLE_CONTENT', 'true').toLowerCase() !== 'false',
      maxChars: readNumber(env, 'ARTICLE_CONTENT_MAX_CHARS', 20000, {
        min: 500,
        integer: true,
      }),
    },
    inquisitor: {
      topK: readNumber(env, 'INQUISITOR_TOP_K', 5, {
        min: 1,
        max: 50,
        integer: true,
      }),
      temperature: readNumber(env, 'INQUISITOR_TEMPERATURE', 0, {
        min: 0,
        max: 2,
      }),
      excerptChars: readNumber(env, 'INQUISITOR_EXCERPT_CHARS', 600, {
        min: 100,
        integer: true,
      }),
    },
    credentials: {
      geminiApiKey: readString(env, 'GEMINI_API_KEY', ''),
      openaiApiKey: readString(env, 'OPENAI_API_KEY', ''),
      githubToken: readString(env, 'GITHUB_TOKEN', ''),
    },
    endpoints: {
      gemini: readString(
        env,
        'GEMINI_API_BASE',
        'https://generativelanguage.googleapis.com/v1beta',
      ),
      openai: readString(env, 'OPENAI_API_BASE', 'https://api.openai.com/v1'),
      ollama: readString(env, 'OLLAMA_BASE_URL', 'http://localhost:11434'),
      github: readString(env, 'GITHUB_API_BASE', 'https://api.github.com'),
    },
    userAgent: readString(env, 'RADAR_USER_AGENT', `${SERVICE_NAME}/1.0`),
  };
}
