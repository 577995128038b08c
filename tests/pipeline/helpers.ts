import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from '../../pipeline/src/app.module';
import { loadPipelineConfig, PIPELINE_CONFIG, PipelineConfig } from '../../pipeline/src/config/app.config';
import { RESPONSE_CACHE, ResponseCache } from '../../pipeline/src/modules/cache/response-cache.interface';
import { EMBEDDING_BACKEND, EmbeddingBackend } from '../../pipeline/src/modules/embeddings/embedding-backend.interface';
import { LocalHashEmbeddingBackend } from '../../pipeline/src/modules/embeddings/services/local-hash-embedding.backend';
import { LANGUAGE_MODEL, LanguageModel } from '../../pipeline/src/modules/llm/language-model.interface';

export const CAPITALS_TEXT = [
  'Paris is the capital of France.',
  'Berlin is the capital of Germany.',
  'Rome is the capital of Italy.',
].join('\n\n');

/** Pipeline configuration for tests: small chunks, fast retries, in-memory drivers. */
export function testConfig(env: Record<string, string> = {}): PipelineConfig {
  return loadPipelineConfig({
    CHUNK_SIZE: '40',
    CHUNK_OVERLAP: '0',
    ANSWER_TOP_K: '2',
    ANSWER_MIN_SIMILARITY: '-1',
    RATE_LIMIT_CAPACITY: '5',
    RATE_LIMIT_TIMEOUT_MS: '1000',
    JOB_BACKOFF_BASE_MS: '0',
    JOB_BACKOFF_MAX_MS: '0',
    EMBEDDING_DIMENSION: '384',
    ...env,
  });
}

export class FakeLanguageModel implements LanguageModel {
  readonly name = 'fake';
  readonly calls: { question: string; evidence: string[] }[] = [];

  async complete(question: string, evidence: string[]): Promise<string> {
    this.calls.push({ question, evidence });
    return `Answer from ${evidence.length} facts`;
  }
}

/** Resolves each completion only when the test releases it. */
export class GatedLanguageModel implements LanguageModel {
  readonly name = 'gated';
  calls = 0;
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async complete(_question: string, evidence: string[]): Promise<string> {
    this.calls += 1;
    await this.gate;
    return `Late answer from ${evidence.length} facts`;
  }

  open(): void {
    this.release();
  }
}

/** Wraps another backend and fails its first `failures` calls. */
export class FlakyEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'flaky';
  calls = 0;

  constructor(
    private readonly inner: EmbeddingBackend,
    private failures: number,
  ) {}

  dimension(): number {
    return this.inner.dimension();
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('upstream down');
    }
    return this.inner.embed(texts);
  }
}

/** Local hash embeddings that hold every call until the test opens the gate. */
export class GatedEmbeddingBackend implements EmbeddingBackend {
  readonly name = 'gated';
  calls = 0;
  /** Resolves when the first call arrives. */
  readonly started: Promise<void>;
  private readonly inner = new LocalHashEmbeddingBackend(384);
  private markStarted: () => void = () => undefined;
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  constructor() {
    this.started = new Promise<void>((resolve) => {
      this.markStarted = resolve;
    });
  }

  dimension(): number {
    return this.inner.dimension();
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    this.markStarted();
    await this.gate;
    return this.inner.embed(texts);
  }

  open(): void {
    this.release();
  }
}

export interface PipelineFixture {
  config?: PipelineConfig;
  languageModel?: LanguageModel;
  embeddingBackend?: EmbeddingBackend;
  responseCache?: ResponseCache;
}

/** Compiles and initializes the whole application on in-memory drivers. */
export async function createPipeline(fixture: PipelineFixture = {}): Promise<TestingModule> {
  let builder = Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(PIPELINE_CONFIG)
    .useValue(fixture.config ?? testConfig())
    .overrideProvider(LANGUAGE_MODEL)
    .useValue(fixture.languageModel ?? new FakeLanguageModel());

  if (fixture.embeddingBackend) {
    builder = builder.overrideProvider(EMBEDDING_BACKEND).useValue(fixture.embeddingBackend);
  }
  if (fixture.responseCache) {
    builder = builder.overrideProvider(RESPONSE_CACHE).useValue(fixture.responseCache);
  }

  const moduleRef = await builder.compile();
  await moduleRef.init();
  return moduleRef;
}
