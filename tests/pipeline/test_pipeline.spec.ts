import { BadRequestException } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import {
  AnswerFailedError,
  AnswerTimeoutError,
  LanguageModelError,
  NotFoundError,
} from '../../pipeline/src/common/errors/pipeline.errors';
import { fingerprint } from '../../pipeline/src/modules/cache/fingerprint';
import { CacheEntry, ResponseCache } from '../../pipeline/src/modules/cache/response-cache.interface';
import { DocumentState } from '../../pipeline/src/modules/documents/document.types';
import { LocalHashEmbeddingBackend } from '../../pipeline/src/modules/embeddings/services/local-hash-embedding.backend';
import { LanguageModel } from '../../pipeline/src/modules/llm/language-model.interface';
import { answerJobId, ingestJobId } from '../../pipeline/src/modules/pipeline/pipeline.types';
import { OrchestratorService } from '../../pipeline/src/modules/pipeline/services/orchestrator.service';
import { JobState } from '../../pipeline/src/modules/queue/job.types';
import { TaskQueueService } from '../../pipeline/src/modules/queue/services/task-queue.service';
import { RATE_LIMITER, TokenBucketRateLimiter } from '../../pipeline/src/modules/rate-limit/token-bucket.rate-limiter';
import { VECTOR_INDEX, VectorIndex } from '../../pipeline/src/modules/vector-index/vector-index.interface';
import {
  CAPITALS_TEXT,
  createPipeline,
  FakeLanguageModel,
  FlakyEmbeddingBackend,
  GatedEmbeddingBackend,
  GatedLanguageModel,
  PipelineFixture,
  testConfig,
} from './helpers';

const QUESTION = 'What is the capital of France?';
const NO_FACTS = 'There are no facts available related to: What is the capital of France?';

/** A cache whose lookups never return. */
class StalledResponseCache implements ResponseCache {
  get(): Promise<CacheEntry | null> {
    return new Promise(() => undefined);
  }

  async put(): Promise<void> {}

  async delete(): Promise<void> {}
}

describe('Pipeline (e2e)', () => {
  let moduleRef: TestingModule;
  let orchestrator: OrchestratorService;
  let queue: TaskQueueService;
  let index: VectorIndex;
  let limiter: TokenBucketRateLimiter;

  async function start(fixture: PipelineFixture = {}): Promise<void> {
    moduleRef = await createPipeline(fixture);
    orchestrator = moduleRef.get(OrchestratorService);
    queue = moduleRef.get(TaskQueueService);
    index = moduleRef.get<VectorIndex>(VECTOR_INDEX);
    limiter = moduleRef.get<TokenBucketRateLimiter>(RATE_LIMITER);
  }

  async function ingestAndWait(text: string, contentType = 'text/plain'): Promise<string> {
    const documentId = await orchestrator.ingest(Buffer.from(text), { contentType, fileName: 'capitals.txt' });
    await queue.waitFor(ingestJobId(documentId));
    return documentId;
  }

  afterEach(async () => {
    await moduleRef.close();
  });

  it('ingests a document, answers from it, then serves the repeat from cache', async () => {
    const languageModel = new FakeLanguageModel();
    await start({ languageModel });
    const acquire = jest.spyOn(limiter, 'acquire');

    const documentId = await ingestAndWait(CAPITALS_TEXT);

    expect(await orchestrator.getDocument(documentId)).toMatchObject({
      state: DocumentState.Ready,
      chunkCount: 3,
      attempts: 1,
      fileName: 'capitals.txt',
    });
    expect(await index.size()).toBe(3);

    const first = await orchestrator.answer(QUESTION);
    expect(first).toMatchObject({
      question: QUESTION,
      answer: 'Answer from 2 facts',
      evidence: [`${documentId}:0`, `${documentId}:1`],
      cached: false,
    });
    expect(languageModel.calls).toEqual([
      { question: QUESTION, evidence: ['Paris is the capital of France.', 'Berlin is the capital of Germany.'] },
    ]);
    expect(acquire).toHaveBeenCalledTimes(1);

    const second = await orchestrator.answer(QUESTION);
    expect(second).toMatchObject({
      answer: 'Answer from 2 facts',
      evidence: [`${documentId}:0`, `${documentId}:1`],
      cached: true,
    });
    expect(second.requestId).not.toBe(first.requestId);
    expect(acquire).toHaveBeenCalledTimes(1);
    expect(languageModel.calls).toHaveLength(1);
  });

  it('makes one model call for concurrent variants of the same question', async () => {
    const languageModel = new FakeLanguageModel();
    await start({ languageModel });
    await ingestAndWait(CAPITALS_TEXT);

    const [a, b] = await Promise.all([
      orchestrator.answer(QUESTION),
      orchestrator.answer('  what IS the capital of   FRANCE? '),
    ]);

    expect(languageModel.calls).toHaveLength(1);
    expect(b.answer).toBe(a.answer);
    expect(b.evidence).toEqual(a.evidence);
    expect(b.question).toBe('  what IS the capital of   FRANCE? ');
  });

  it('does not process the same bytes twice', async () => {
    await start();
    const documentId = await ingestAndWait(CAPITALS_TEXT);

    expect(await orchestrator.ingest(Buffer.from(CAPITALS_TEXT), { contentType: 'text/plain' })).toBe(documentId);
    expect(orchestrator.getJob(ingestJobId(documentId)).attempts).toBe(1);
    expect((await orchestrator.getDocument(documentId)).attempts).toBe(1);
  });

  it('recovers from transient embedding failures', async () => {
    const embeddingBackend = new FlakyEmbeddingBackend(new LocalHashEmbeddingBackend(384), 2);
    await start({ embeddingBackend });

    const documentId = await ingestAndWait(CAPITALS_TEXT);

    expect(await orchestrator.getDocument(documentId)).toMatchObject({
      state: DocumentState.Ready,
      attempts: 3,
      chunkCount: 3,
    });
    expect(orchestrator.getJob(ingestJobId(documentId))).toMatchObject({ state: JobState.Succeeded, attempts: 3 });
    expect(await index.size()).toBe(3);
  });

  it('marks the document failed once every attempt is used', async () => {
    const embeddingBackend = new FlakyEmbeddingBackend(new LocalHashEmbeddingBackend(384), 10);
    await start({ embeddingBackend });

    const documentId = await ingestAndWait(CAPITALS_TEXT);

    const document = await orchestrator.getDocument(documentId);
    expect(document).toMatchObject({
      state: DocumentState.Failed,
      attempts: 3,
      error: 'Embedding backend flaky failed: upstream down',
    });
    expect(orchestrator.getJob(ingestJobId(documentId))).toMatchObject({
      state: JobState.Failed,
      attempts: 3,
      error: 'Embedding backend flaky failed: upstream down',
    });
    expect(embeddingBackend.calls).toBe(3);
    expect(await index.size()).toBe(0);
  });

  it('records a cancellation made while the ingestion was queued on the document', async () => {
    const embeddingBackend = new GatedEmbeddingBackend();
    await start({ embeddingBackend, config: testConfig({ INGESTION_CONCURRENCY: '1' }) });

    const first = await orchestrator.ingest(Buffer.from(CAPITALS_TEXT), { contentType: 'text/plain' });
    await embeddingBackend.started;
    const second = await orchestrator.ingest(Buffer.from('Tokyo is the capital of Japan.'), {
      contentType: 'text/plain',
    });
    expect(orchestrator.cancelIngestion(second)).toMatchObject({ state: JobState.Queued, cancelled: true });

    embeddingBackend.open();
    const job = await queue.waitFor(ingestJobId(second));
    await queue.waitFor(ingestJobId(first));

    const message = `Job ingest-${second} was cancelled`;
    expect(job).toMatchObject({ state: JobState.Failed, attempts: 1, error: message });
    expect(await orchestrator.getDocument(second)).toMatchObject({
      state: DocumentState.Failed,
      attempts: 1,
      chunkCount: 0,
      error: message,
    });
    expect(await orchestrator.getDocument(first)).toMatchObject({ state: DocumentState.Ready, chunkCount: 3 });
    expect(await index.size()).toBe(3);
  });

  it('stops an ingestion cancelled mid-run and removes the vectors it wrote', async () => {
    const embeddingBackend = new GatedEmbeddingBackend();
    await start({ embeddingBackend, config: testConfig({ EMBEDDING_BATCH_SIZE: '1' }) });

    const documentId = await orchestrator.ingest(Buffer.from(CAPITALS_TEXT), { contentType: 'text/plain' });
    await embeddingBackend.started;
    expect(orchestrator.cancelIngestion(documentId)).toMatchObject({ state: JobState.Running, cancelled: true });

    embeddingBackend.open();
    const job = await queue.waitFor(ingestJobId(documentId));

    const message = `Job ingest-${documentId} was cancelled`;
    expect(job).toMatchObject({ state: JobState.Failed, attempts: 1, error: message });
    expect(await orchestrator.getDocument(documentId)).toMatchObject({
      state: DocumentState.Failed,
      attempts: 1,
      error: message,
    });
    expect(embeddingBackend.calls).toBe(1);
    expect(await index.size()).toBe(0);
  });

  it('fails unsupported uploads without retrying', async () => {
    await start();

    const documentId = await ingestAndWait('\x89PNG', 'image/png');

    expect(await orchestrator.getDocument(documentId)).toMatchObject({
      state: DocumentState.Failed,
      attempts: 1,
      error: 'Unsupported content type "image/png"',
    });
  });

  it('answers without the model when nothing relevant is indexed', async () => {
    const languageModel = new FakeLanguageModel();
    await start({ languageModel });

    const first = await orchestrator.answer(QUESTION);
    const second = await orchestrator.answer(QUESTION);

    expect(first).toMatchObject({
      answer: NO_FACTS,
      evidence: [],
      cached: false,
    });
    expect(second.cached).toBe(false);
    expect(languageModel.calls).toHaveLength(0);
  });

  it('times out the caller but still caches the late answer', async () => {
    const languageModel = new GatedLanguageModel();
    await start({ languageModel, config: testConfig({ ANSWER_DEADLINE_MS: '50' }) });
    await ingestAndWait(CAPITALS_TEXT);

    await expect(orchestrator.answer(QUESTION)).rejects.toBeInstanceOf(AnswerTimeoutError);

    languageModel.open();
    const job = await queue.waitFor(answerJobId(fingerprint(QUESTION)));
    expect(job.state).toBe(JobState.Succeeded);

    const cached = await orchestrator.answer(QUESTION);
    expect(cached).toMatchObject({ answer: 'Late answer from 2 facts', cached: true });
    expect(languageModel.calls).toBe(1);
  });

  it('bounds the cache lookup by the answer deadline', async () => {
    await start({ responseCache: new StalledResponseCache(), config: testConfig({ ANSWER_DEADLINE_MS: '50' }) });

    await expect(orchestrator.answer(QUESTION)).rejects.toBeInstanceOf(AnswerTimeoutError);
    expect(queue.getJob(answerJobId(fingerprint(QUESTION)))).toBeNull();
  });

  it('applies per-request retrieval settings', async () => {
    const languageModel = new FakeLanguageModel();
    await start({ languageModel });
    const documentId = await ingestAndWait(CAPITALS_TEXT);

    const byDefault = await orchestrator.answer(QUESTION);
    expect(byDefault.evidence).toEqual([`${documentId}:0`, `${documentId}:1`]);

    const narrowed = await orchestrator.answer(QUESTION, { maxResponses: 1 });
    expect(narrowed).toMatchObject({ answer: 'Answer from 1 facts', evidence: [`${documentId}:0`], cached: false });

    const strict = await orchestrator.answer(QUESTION, { similarityLimit: 0.9 });
    expect(strict).toMatchObject({ answer: NO_FACTS, evidence: [], cached: false });

    expect(languageModel.calls).toHaveLength(2);
    await expect(orchestrator.answer(QUESTION, { maxResponses: 0 })).rejects.toThrow(
      'maxResponses must not be less than 1',
    );
    await expect(orchestrator.answer(QUESTION, { similarityLimit: 2 })).rejects.toThrow(
      'similarityLimit must not be greater than 1',
    );
  });

  it('hides the cause of a failed answer job from the caller', async () => {
    const languageModel: LanguageModel = {
      name: 'broken',
      complete: async () => {
        throw new LanguageModelError('Language model request failed: Invalid model', false, 400);
      },
    };
    await start({ languageModel });
    await ingestAndWait(CAPITALS_TEXT);

    const error = await orchestrator.answer(QUESTION).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AnswerFailedError);
    expect(error).toMatchObject({
      message: 'The question could not be answered right now, please try again later',
    });
    expect(queue.getJob(answerJobId(fingerprint(QUESTION)))).toMatchObject({
      state: JobState.Failed,
      attempts: 1,
      error: 'Language model request failed: Invalid model',
    });
  });

  it('deletes a document and stops citing it', async () => {
    const languageModel = new FakeLanguageModel();
    await start({ languageModel });
    const documentId = await ingestAndWait(CAPITALS_TEXT);
    await orchestrator.answer(QUESTION);

    const removed = await orchestrator.deleteDocument(documentId);

    expect(removed.sort()).toEqual([`${documentId}:0`, `${documentId}:1`, `${documentId}:2`]);
    expect(await index.size()).toBe(0);
    await expect(orchestrator.getDocument(documentId)).rejects.toBeInstanceOf(NotFoundError);

    const after = await orchestrator.answer(QUESTION);
    expect(after).toMatchObject({
      answer: NO_FACTS,
      cached: false,
    });
    expect(languageModel.calls).toHaveLength(1);
  });

  it('validates questions and uploads', async () => {
    await start();

    const blank = orchestrator.answer('   ');
    await expect(blank).rejects.toBeInstanceOf(BadRequestException);
    await expect(blank).rejects.toThrow('question must not be empty');
    await expect(orchestrator.answer('x'.repeat(5001))).rejects.toThrow(
      'question must be shorter than or equal to 5000 characters',
    );
    await expect(orchestrator.ingest(Buffer.alloc(0), { contentType: 'text/plain' })).rejects.toThrow(
      'Document payload is empty',
    );
  });

  it('reports unknown documents and jobs', async () => {
    await start();

    await expect(orchestrator.getDocument('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(orchestrator.deleteDocument('missing')).rejects.toBeInstanceOf(NotFoundError);
    expect(() => orchestrator.getJob('missing')).toThrow('Job missing not found');
    expect(() => orchestrator.cancelIngestion('missing')).toThrow('Job ingest-missing not found');
  });
});
