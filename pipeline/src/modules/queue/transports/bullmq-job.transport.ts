import { Logger } from '@nestjs/common';
import { ConnectionOptions, Job, Queue, QueueEvents, Worker } from 'bullmq';
import { describeError } from '../../../common/errors/pipeline.errors';
import { isJobRecord, isTerminal, JOB_CLASSES, JobClass, JobRecord } from '../job.types';
import { DeliverFn, JobTransport, SettledFn } from './job-transport.interface';

export function queueNameFor(jobClass: JobClass): string {
  return `${jobClass}-jobs`;
}

/**
 * BullMQ-backed transport: one queue and one worker per job class, keys
 * namespaced under the configured prefix. BullMQ never retries on its own
 * (`attempts: 1`); a retry is a fresh delayed job whose id carries the
 * attempt number, so a redelivered attempt is deduplicated by BullMQ.
 *
 * Each delivery returns the job record as its BullMQ return value, so the
 * `completed` events of the queues tell every process when a job settles,
 * whichever process ran it.
 */
export class BullmqJobTransport implements JobTransport {
  readonly name = 'bullmq';
  private readonly logger = new Logger(BullmqJobTransport.name);
  private readonly queues = new Map<JobClass, Queue<JobRecord>>();
  private readonly workers: Worker<unknown, JobRecord | null>[] = [];
  private readonly events: QueueEvents[] = [];
  private readonly settledListeners: SettledFn[] = [];

  constructor(
    private readonly connection: ConnectionOptions,
    private readonly prefix: string,
  ) {}

  async consume(jobClass: JobClass, concurrency: number, deliver: DeliverFn): Promise<void> {
    const name = queueNameFor(jobClass);
    const worker = new Worker<unknown, JobRecord | null>(
      name,
      async (job: Job<unknown, JobRecord | null>) => {
        if (!isJobRecord(job.data)) {
          this.logger.error(`Discarding malformed job ${job.id ?? '?'} from ${name}`);
          return null;
        }
        return deliver(job.data);
      },
      {
        connection: this.connection,
        prefix: this.prefix,
        concurrency: Math.max(1, concurrency),
      },
    );

    worker.on('ready', () => this.logger.log(`${name} worker ready (concurrency ${concurrency})`));
    worker.on('error', (err) => this.logger.error(`${name} worker error: ${err.message}`, err.stack));
    worker.on('failed', (job, err) =>
      this.logger.error(`${name} delivery ${job?.id ?? '?'} failed: ${err.message}`),
    );
    this.workers.push(worker);
  }

  async dispatch(record: JobRecord, delayMs: number): Promise<void> {
    await this.queueFor(record.jobClass).add(record.payload.kind, record, {
      jobId: `${record.id}-${record.attempts}`,
      delay: delayMs > 0 ? delayMs : undefined,
    });
  }

  async onSettled(listener: SettledFn): Promise<void> {
    this.settledListeners.push(listener);
    if (this.events.length > 0) {
      return;
    }

    for (const jobClass of JOB_CLASSES) {
      const name = queueNameFor(jobClass);
      const events = new QueueEvents(name, { connection: this.connection, prefix: this.prefix });
      events.on('completed', ({ jobId, returnvalue }) => this.announce(name, jobId, returnvalue));
      events.on('error', (err) => this.logger.error(`${name} events error: ${err.message}`));
      this.events.push(events);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.workers.map((worker) => worker.close()));
    await Promise.all(this.events.map((events) => events.close()));
    await Promise.all([...this.queues.values()].map((queue) => queue.close()));
    this.workers.length = 0;
    this.events.length = 0;
    this.queues.clear();
  }

  private announce(name: string, jobId: string, returnvalue: unknown): void {
    let value = returnvalue;
    if (typeof value === 'string') {
      try {
        value = JSON.parse(value);
      } catch (error) {
        this.logger.warn(`Unreadable return value of ${name} job ${jobId}: ${describeError(error)}`);
        return;
      }
    }
    if (!isJobRecord(value) || !isTerminal(value.state)) {
      return;
    }
    for (const listener of this.settledListeners) {
      listener(value);
    }
  }

  private queueFor(jobClass: JobClass): Queue<JobRecord> {
    let queue = this.queues.get(jobClass);
    if (!queue) {
      queue = new Queue<JobRecord>(queueNameFor(jobClass), {
        connection: this.connection,
        prefix: this.prefix,
        defaultJobOptions: {
          attempts: 1,
          removeOnComplete: true,
          removeOnFail: false,
        },
      });
      this.queues.set(jobClass, queue);
    }
    return queue;
  }
}
