import {
  EmbeddingBackendKind,
  JobTransportDriver,
  StorageDriver,
  VectorIndexDriver,
  validateEnvironment,
} from './env.validation';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

const LOCAL_EMBEDDING_DIMENSION = 384;
const OPENAI_EMBEDDING_DIMENSION = 1536;

export interface PipelineConfig {
  storage: {
    driver: StorageDriver;
    redisUrl: string;
    keyPrefix: string;
  };
  vectorIndex: {
    driver: VectorIndexDriver;
    databaseUrl?: string;
    table: string;
  };
  queue: {
    transport: JobTransportDriver;
    ingestionConcurrency: number;
    answerConcurrency: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  embedding: {
    backend: EmbeddingBackendKind;
    model: string;
    dimension: number;
    baseUrl?: string;
    apiKey?: string;
    timeoutMs: number;
    maxRetries: number;
    batchSize: number;
  };
  llm: {
    model: string;
    baseUrl?: string;
    apiKey?: string;
    timeoutMs: number;
    maxRetries: number;
    temperature: number;
  };
  rateLimit: {
    capacity: number;
    refillPerSecond: number;
    acquireTimeoutMs: number;
  };
  chunking: {
    chunkSize: number;
    overlap: number;
  };
  answer: {
    topK: number;
    minSimilarity: number;
    deadlineMs: number;
    cacheTtlSeconds: number;
  };
}

export function loadPipelineConfig(
  env: Record<string, string | undefined> = process.env,
): PipelineConfig {
  const vars = validateEnvironment(env);

  if (vars.CHUNK_OVERLAP >= vars.CHUNK_SIZE) {
    throw new Error(
      `Invalid pipeline configuration: CHUNK_OVERLAP (${vars.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${vars.CHUNK_SIZE})`,
    );
  }
  if (vars.JOB_BACKOFF_MAX_MS < vars.JOB_BACKOFF_BASE_MS) {
    throw new Error(
      'Invalid pipeline configuration: JOB_BACKOFF_MAX_MS must not be smaller than JOB_BACKOFF_BASE_MS',
    );
  }

  const defaultDimension =
    vars.EMBEDDING_BACKEND === EmbeddingBackendKind.OpenAI
      ? OPENAI_EMBEDDING_DIMENSION
      : LOCAL_EMBEDDING_DIMENSION;

  return {
    storage: {
      driver: vars.STORAGE_DRIVER,
      redisUrl: vars.REDIS_URL,
      keyPrefix: vars.KEY_PREFIX,
    },
    vectorIndex: {
      driver: vars.VECTOR_INDEX_DRIVER,
      databaseUrl: vars.DATABASE_URL,
      table: vars.VECTOR_TABLE,
    },
    queue: {
      transport: vars.JOB_TRANSPORT,
      ingestionConcurrency: vars.INGESTION_CONCURRENCY,
      answerConcurrency: vars.ANSWER_CONCURRENCY,
      maxAttempts: vars.JOB_MAX_ATTEMPTS,
      backoffBaseMs: vars.JOB_BACKOFF_BASE_MS,
      backoffMaxMs: vars.JOB_BACKOFF_MAX_MS,
    },
    embedding: {
      backend: vars.EMBEDDING_BACKEND,
      model: vars.EMBEDDING_MODEL,
      dimension: vars.EMBEDDING_DIMENSION ?? defaultDimension,
      baseUrl: vars.EMBEDDING_BASE_URL,
      apiKey: vars.EMBEDDING_API_KEY ?? vars.OPENAI_API_KEY,
      timeoutMs: vars.EMBEDDING_TIMEOUT_MS,
      maxRetries: vars.EMBEDDING_MAX_RETRIES,
      batchSize: vars.EMBEDDING_BATCH_SIZE,
    },
    llm: {
      model: vars.LLM_MODEL,
      baseUrl: vars.LLM_BASE_URL,
      apiKey: vars.LLM_API_KEY ?? vars.OPENAI_API_KEY,
      timeoutMs: vars.LLM_TIMEOUT_MS,
      maxRetries: vars.LLM_MAX_RETRIES,
      temperature: vars.LLM_TEMPERATURE,
    },
    rateLimit: {
      capacity: vars.RATE_LIMIT_CAPACITY,
      refillPerSecond: vars.RATE_LIMIT_PER_SECOND,
      acquireTimeoutMs: vars.RATE_LIMIT_TIMEOUT_MS,
    },
    chunking: {
      chunkSize: vars.CHUNK_SIZE,
      overlap: vars.CHUNK_OVERLAP,
    },
    answer: {
      topK: vars.ANSWER_TOP_K,
      minSimilarity: vars.ANSWER_MIN_SIMILARITY,
      deadlineMs: vars.ANSWER_DEADLINE_MS,
      cacheTtlSeconds: vars.CACHE_TTL_SECONDS,
    },
  };
}
