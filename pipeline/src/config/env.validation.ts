import { plainToInstance, Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';

export enum StorageDriver {
  Memory = 'memory',
  Redis = 'redis',
}

export enum VectorIndexDriver {
  Memory = 'memory',
  PgVector = 'pgvector',
}

export enum JobTransportDriver {
  Memory = 'memory',
  Bullmq = 'bullmq',
}

export enum EmbeddingBackendKind {
  Local = 'local',
  OpenAI = 'openai',
}

/**
 * Shape of the environment the pipeline reads. Field initializers are the
 * defaults used when a variable is absent.
 */
export class EnvironmentVariables {
  @IsEnum(StorageDriver)
  STORAGE_DRIVER: StorageDriver = StorageDriver.Memory;

  @IsString()
  @IsNotEmpty()
  REDIS_URL: string = 'redis://127.0.0.1:6379';

  @IsEnum(VectorIndexDriver)
  VECTOR_INDEX_DRIVER: VectorIndexDriver = VectorIndexDriver.Memory;

  @ValidateIf((env: EnvironmentVariables) => env.VECTOR_INDEX_DRIVER === VectorIndexDriver.PgVector)
  @IsString()
  @IsNotEmpty()
  DATABASE_URL?: string;

  @Matches(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'VECTOR_TABLE must be a plain SQL identifier' })
  VECTOR_TABLE: string = 'chunk_embeddings';

  @IsEnum(JobTransportDriver)
  JOB_TRANSPORT: JobTransportDriver = JobTransportDriver.Memory;

  @Matches(/^[A-Za-z0-9_-]+$/, { message: 'KEY_PREFIX may only contain letters, digits, _ and -' })
  KEY_PREFIX: string = 'docqa';

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsEnum(EmbeddingBackendKind)
  EMBEDDING_BACKEND: EmbeddingBackendKind = EmbeddingBackendKind.Local;

  @IsString()
  EMBEDDING_MODEL: string = 'text-embedding-3-small';

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(4096)
  EMBEDDING_DIMENSION?: number;

  @IsOptional()
  @IsString()
  EMBEDDING_BASE_URL?: string;

  @IsOptional()
  @IsString()
  EMBEDDING_API_KEY?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  EMBEDDING_TIMEOUT_MS: number = 30_000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  EMBEDDING_MAX_RETRIES: number = 0;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(2048)
  EMBEDDING_BATCH_SIZE: number = 16;

  @IsString()
  LLM_MODEL: string = 'gpt-4o-mini';

  @IsOptional()
  @IsString()
  LLM_BASE_URL?: string;

  @IsOptional()
  @IsString()
  LLM_API_KEY?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  LLM_TIMEOUT_MS: number = 60_000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  LLM_MAX_RETRIES: number = 0;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(2)
  LLM_TEMPERATURE: number = 0.2;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  RATE_LIMIT_CAPACITY: number = 1;

  @Type(() => Number)
  @IsNumber()
  @Min(0.001)
  RATE_LIMIT_PER_SECOND: number = 1;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  RATE_LIMIT_TIMEOUT_MS: number = 10_000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  INGESTION_CONCURRENCY: number = 2;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  ANSWER_CONCURRENCY: number = 4;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  JOB_MAX_ATTEMPTS: number = 3;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  JOB_BACKOFF_BASE_MS: number = 2_000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  JOB_BACKOFF_MAX_MS: number = 60_000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  CHUNK_SIZE: number = 800;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  CHUNK_OVERLAP: number = 200;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  ANSWER_TOP_K: number = 10;

  @Type(() => Number)
  @IsNumber()
  @Min(-1)
  @Max(1)
  ANSWER_MIN_SIMILARITY: number = 0.6;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  ANSWER_DEADLINE_MS: number = 30_000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  CACHE_TTL_SECONDS: number = 12 * 60 * 60;
}

/**
 * Validates a raw environment map, returning a typed instance or throwing
 * with every violation listed.
 */
export function validateEnvironment(env: Record<string, string | undefined>): EnvironmentVariables {
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    // empty strings behave as unset so `.env` placeholders fall back to defaults
    if (value !== undefined && value !== '') {
      defined[key] = value;
    }
  }

  const validated = plainToInstance(EnvironmentVariables, defined);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${details}`);
  }

  return validated;
}
