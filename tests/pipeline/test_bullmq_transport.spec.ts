import { Queue, QueueEvents, Worker } from 'bullmq';
import { JobRecord, JobState } from '../../pipeline/src/modules/queue/job.types';
import { BullmqJobTransport } from '../../pipeline/src/modules/queue/transports/bullmq-job.transport';

type CapturedProcessor = (job: { id?: string; data: unknown }) => Promise<unknown>;
type CompletedHandler = (event: { jobId: string; returnvalue: unknown }) => void;
const mockProcessors: CapturedProcessor[] = [];
const mockCompleted: { name: string; handler: CompletedHandler }[] = [];

jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation(() => ({
    add: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined),
  })),
  Worker: jest.fn().mockImplementation((_name: string, processor: CapturedProcessor) => {
    mockProcessors.push(processor);
    return {
      on: jest.fn(),
      close: jest.fn().mockResolvedValue(undefined),
    };
  }),
  QueueEvents: jest.fn().mockImplementation((name: string) => ({
    on: jest.fn((event: string, handler: CompletedHandler) => {
      if (event === 'completed') {
        mockCompleted.push({ name, handler });
      }
    }),
    close: jest.fn().mockResolvedValue(undefined),
  })),
}));

const QueueMock = jest.mocked(Queue);
const WorkerMock = jest.mocked(Worker);
const QueueEventsMock = jest.mocked(QueueEvents);

const connection = { host: '127.0.0.1', port: 6379, maxRetriesPerRequest: null };

function record(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    id: 'ingest-abc',
    jobClass: 'ingestion',
    payload: { kind: 'ingest-document', documentId: 'abc' },
    state: JobState.Queued,
    attempts: 0,
    maxAttempts: 3,
    lockKey: 'document:abc',
    cancelled: false,
    createdAt: '2024-03-01T10:00:00.000Z',
    updatedAt: '2024-03-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('BullmqJobTransport', () => {
  let transport: BullmqJobTransport;

  beforeEach(() => {
    QueueMock.mockClear();
    WorkerMock.mockClear();
    QueueEventsMock.mockClear();
    mockProcessors.length = 0;
    mockCompleted.length = 0;
    transport = new BullmqJobTransport(connection, 'docqa');
  });

  it('adds one BullMQ job per attempt without BullMQ-side retries', async () => {
    await transport.dispatch(record(), 0);
    await transport.dispatch(record({ attempts: 1 }), 2500);

    expect(QueueMock).toHaveBeenCalledTimes(1);
    expect(QueueMock).toHaveBeenCalledWith('ingestion-jobs', {
      connection,
      prefix: 'docqa',
      defaultJobOptions: { attempts: 1, removeOnComplete: true, removeOnFail: false },
    });

    const queue = QueueMock.mock.results[0].value;
    expect(queue.add).toHaveBeenNthCalledWith(1, 'ingest-document', record(), {
      jobId: 'ingest-abc-0',
      delay: undefined,
    });
    expect(queue.add).toHaveBeenNthCalledWith(2, 'ingest-document', record({ attempts: 1 }), {
      jobId: 'ingest-abc-1',
      delay: 2500,
    });
  });

  it('uses a separate queue per job class', async () => {
    await transport.dispatch(record(), 0);
    await transport.dispatch(
      record({
        id: 'answer-fp',
        jobClass: 'answer',
        payload: { kind: 'answer-question', question: 'q', requestId: 'r', fingerprint: 'fp' },
      }),
      0,
    );

    expect(QueueMock.mock.calls.map(([name]) => name)).toEqual(['ingestion-jobs', 'answer-jobs']);
  });

  it('delivers well-formed job data to the consumer', async () => {
    const deliver = jest.fn().mockResolvedValue(null);
    await transport.consume('answer', 4, deliver);

    expect(WorkerMock).toHaveBeenCalledWith('answer-jobs', expect.any(Function), {
      connection,
      prefix: 'docqa',
      concurrency: 4,
    });
    const [processor] = mockProcessors;
    await processor({ id: 'answer-fp-0', data: record() });
    await processor({ id: 'junk', data: { hello: 'world' } });

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(deliver).toHaveBeenCalledWith(record());
  });

  it('returns the delivered record as the BullMQ job result', async () => {
    const settled = record({ state: JobState.Succeeded, attempts: 1, result: 'indexed' });
    await transport.consume('ingestion', 1, jest.fn().mockResolvedValue(settled));

    const [processor] = mockProcessors;

    await expect(processor({ id: 'ingest-abc-0', data: record() })).resolves.toEqual(settled);
    await expect(processor({ id: 'junk', data: 42 })).resolves.toBeNull();
  });

  it('listens for completions on every job class queue once', async () => {
    await transport.onSettled(jest.fn());
    await transport.onSettled(jest.fn());

    expect(QueueEventsMock.mock.calls).toEqual([
      ['ingestion-jobs', { connection, prefix: 'docqa' }],
      ['answer-jobs', { connection, prefix: 'docqa' }],
    ]);
  });

  it('reports settled records from completion events to every listener', async () => {
    const first = jest.fn();
    const second = jest.fn();
    await transport.onSettled(first);
    await transport.onSettled(second);
    const [ingestion] = mockCompleted.filter(({ name }) => name === 'ingestion-jobs');

    const settled = record({ state: JobState.Failed, attempts: 3, error: 'embeddings offline' });
    ingestion.handler({ jobId: 'ingest-abc-2', returnvalue: JSON.stringify(settled) });
    ingestion.handler({ jobId: 'ingest-abc-0', returnvalue: record({ state: JobState.Queued, attempts: 1 }) });
    ingestion.handler({ jobId: 'junk', returnvalue: null });
    ingestion.handler({ jobId: 'junk', returnvalue: 'not json' });

    expect(first).toHaveBeenCalledTimes(1);
    expect(first).toHaveBeenCalledWith(settled);
    expect(second).toHaveBeenCalledWith(settled);
  });

  it('closes workers, event listeners and queues', async () => {
    await transport.consume('ingestion', 2, jest.fn());
    await transport.onSettled(jest.fn());
    await transport.dispatch(record(), 0);

    await transport.close();

    expect(WorkerMock.mock.results[0].value.close).toHaveBeenCalledTimes(1);
    expect(QueueEventsMock.mock.results[0].value.close).toHaveBeenCalledTimes(1);
    expect(QueueEventsMock.mock.results[1].value.close).toHaveBeenCalledTimes(1);
    expect(QueueMock.mock.results[0].value.close).toHaveBeenCalledTimes(1);
  });
});
