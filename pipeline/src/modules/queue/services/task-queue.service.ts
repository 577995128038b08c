import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import {
  describeError,
  isRetryable,
  JobCancelledError,
  NotFoundError,
} from '../../../common/errors/pipeline.errors';
import { PIPELINE_CONFIG, PipelineConfig } from '../../../config/app.config';
import { computeBackoff } from '../backoff';
import {
  isPayloadOf,
  isTerminal,
  JOB_CLASS_OF,
  JobContext,
  JobHandler,
  JobKind,
  JobPayload,
  JobRecord,
  JobState,
  lockKeyFor,
  PayloadOf,
} from '../job.types';
import { KeyedMutex } from '../keyed-mutex';
import { JOB_TRANSPORT, JobTransport } from '../transports/job-transport.interface';

const MAX_RETAINED_TERMINAL_JOBS = 1000;

export interface EnqueueOptions {
  /** A queued or running job with this id is returned instead of enqueuing a duplicate. */
  jobId?: string;
}

/**
 * Task Queue / Worker Pool.
 *
 * Owns the job state machine. Transports hand back delivered records; a
 * delivery runs only if it matches the local record's pending attempt, so
 * stale or duplicate deliveries are dropped. Retryable failures go back to
 * the transport with exponential backoff until `maxAttempts` is reached.
 * Jobs that settle in another process are picked up from the transport's
 * settled reports, so `waitFor` resolves wherever the job was enqueued.
 */
@Injectable()
export class TaskQueueService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(TaskQueueService.name);
  private readonly jobs = new Map<string, JobRecord>();
  private readonly handlers = new Map<JobKind, JobHandler>();
  private readonly settled = new EventEmitter();
  private readonly locks = new KeyedMutex();
  private readonly retained: string[] = [];

  constructor(
    @Inject(JOB_TRANSPORT) private readonly transport: JobTransport,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {
    this.settled.setMaxListeners(0);
  }

  async onApplicationBootstrap(): Promise<void> {
    const { ingestionConcurrency, answerConcurrency } = this.config.queue;
    await this.transport.onSettled((record) => this.observeSettled(record));
    await this.transport.consume('ingestion', ingestionConcurrency, (record) => this.deliver(record));
    await this.transport.consume('answer', answerConcurrency, (record) => this.deliver(record));
    this.logger.log(
      `Worker pools started on ${this.transport.name} transport (ingestion=${ingestionConcurrency}, answer=${answerConcurrency})`,
    );
  }

  async onModuleDestroy(): Promise<void> {
    await this.transport.close();
  }

  registerHandler<K extends JobKind>(kind: K, handler: JobHandler<PayloadOf<K>>): void {
    if (this.handlers.has(kind)) {
      throw new Error(`A handler for ${kind} jobs is already registered`);
    }
    this.handlers.set(kind, (payload, context) => {
      if (!isPayloadOf(kind, payload)) {
        throw new Error(`Handler for ${kind} received a ${payload.kind} payload`);
      }
      return handler(payload, context);
    });
  }

  async enqueue(payload: JobPayload, options: EnqueueOptions = {}): Promise<JobRecord> {
    const id = options.jobId ?? randomUUID();
    const existing = this.jobs.get(id);
    if (existing && !isTerminal(existing.state)) {
      this.logger.debug(`Job ${id} is already ${existing.state}`);
      return this.snapshot(existing);
    }

    const now = new Date().toISOString();
    const job: JobRecord = {
      id,
      jobClass: JOB_CLASS_OF[payload.kind],
      payload: { ...payload },
      state: JobState.Queued,
      attempts: 0,
      maxAttempts: this.config.queue.maxAttempts,
      lockKey: lockKeyFor(payload),
      cancelled: false,
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(id, job);
    const snapshot = this.snapshot(job);

    try {
      await this.transport.dispatch(snapshot, 0);
    } catch (error) {
      this.jobs.delete(id);
      throw error;
    }
    this.logger.debug(`Enqueued ${payload.kind} job ${id}`);
    return snapshot;
  }

  getJob(id: string): JobRecord | null {
    const job = this.jobs.get(id);
    return job ? this.snapshot(job) : null;
  }

  /** Resolves with the job once it reaches succeeded or failed. */
  waitFor(id: string): Promise<JobRecord> {
    const job = this.jobs.get(id);
    if (!job) {
      return Promise.reject(new NotFoundError('Job', id));
    }
    if (isTerminal(job.state)) {
      return Promise.resolve(this.snapshot(job));
    }
    return new Promise((resolve) => {
      this.settled.once(id, resolve);
    });
  }

  /**
   * Flags the job as cancelled. A queued job is still delivered, so its
   * handler can record the cancellation before its first cancellation
   * check fails it; a running job fails at its next check. Finished jobs
   * are left untouched.
   */
  cancel(id: string): JobRecord {
    const job = this.jobs.get(id);
    if (!job) {
      throw new NotFoundError('Job', id);
    }
    if (isTerminal(job.state)) {
      return this.snapshot(job);
    }

    job.cancelled = true;
    job.updatedAt = new Date().toISOString();
    this.logger.log(`Cancellation requested for job ${id}`);
    return this.snapshot(job);
  }

  /** Runs `fn` under the same lock jobs with `lockKey` take. */
  runExclusive<T>(lockKey: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(lockKey, fn);
  }

  private async deliver(delivered: JobRecord): Promise<JobRecord | null> {
    let job = this.jobs.get(delivered.id);
    if (!job) {
      // dispatched by another process, or before a restart
      job = { ...delivered, payload: { ...delivered.payload } };
      this.jobs.set(job.id, job);
      this.logger.log(`Adopted ${job.payload.kind} job ${job.id} at attempt ${job.attempts}`);
    } else if (job.state === JobState.Queued && delivered.attempts > job.attempts) {
      // earlier attempts ran in another process
      job.attempts = delivered.attempts;
      job.error = delivered.error;
      job.cancelled = job.cancelled || delivered.cancelled;
      job.updatedAt = new Date().toISOString();
    }

    const lockKey = job.lockKey ?? lockKeyFor(job.payload);
    return this.locks.runExclusive(lockKey, () => this.execute(delivered.id, delivered.attempts));
  }

  /** Resolves with the job after this attempt, or null for a stale delivery. */
  private async execute(id: string, expectedAttempts: number): Promise<JobRecord | null> {
    const job = this.jobs.get(id);
    if (!job || job.state !== JobState.Queued || job.attempts !== expectedAttempts) {
      this.logger.debug(`Skipping stale delivery of job ${id}`);
      return null;
    }

    job.state = JobState.Running;
    job.attempts += 1;
    job.updatedAt = new Date().toISOString();
    const attempt = job.attempts;
    const context: JobContext = {
      jobId: id,
      attempt,
      isCancelled: () => job.cancelled,
      throwIfCancelled: () => {
        if (job.cancelled) {
          throw new JobCancelledError(id);
        }
      },
    };

    const handler = this.handlers.get(job.payload.kind);
    if (!handler) {
      this.finish(job, JobState.Failed, { error: `No handler registered for ${job.payload.kind} jobs` });
      return this.snapshot(job);
    }

    try {
      const result = await handler(job.payload, context);
      this.finish(job, JobState.Succeeded, { result });
    } catch (error) {
      await this.handleFailure(job, error);
    }
    return this.snapshot(job);
  }

  private observeSettled(settled: JobRecord): void {
    const job = this.jobs.get(settled.id);
    // unknown here, already settled here, or running here
    if (!job || job.state !== JobState.Queued) {
      return;
    }
    job.attempts = Math.max(job.attempts, settled.attempts);
    this.logger.debug(`Job ${job.id} ${settled.state} in another process`);
    this.finish(job, settled.state, { error: settled.error, result: settled.result });
  }

  private async handleFailure(job: JobRecord, error: unknown): Promise<void> {
    const message = describeError(error);
    if (job.cancelled || !isRetryable(error) || job.attempts >= job.maxAttempts) {
      this.logger.error(
        `Job ${job.id} failed after ${job.attempts}/${job.maxAttempts} attempts: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.finish(job, JobState.Failed, { error: message });
      return;
    }

    const delayMs = computeBackoff(job.attempts, {
      baseDelayMs: this.config.queue.backoffBaseMs,
      maxDelayMs: this.config.queue.backoffMaxMs,
    });
    job.state = JobState.Queued;
    job.error = message;
    job.updatedAt = new Date().toISOString();
    this.logger.warn(
      `Job ${job.id} attempt ${job.attempts}/${job.maxAttempts} failed (${message}); retrying in ${delayMs}ms`,
    );

    try {
      await this.transport.dispatch(this.snapshot(job), delayMs);
    } catch (dispatchError) {
      this.finish(job, JobState.Failed, {
        error: `${message}; retry could not be scheduled: ${describeError(dispatchError)}`,
      });
    }
  }

  private finish(job: JobRecord, state: JobState, outcome: { error?: string; result?: unknown }): void {
    job.state = state;
    job.error = outcome.error;
    job.result = outcome.result;
    job.updatedAt = new Date().toISOString();
    if (state === JobState.Succeeded) {
      this.logger.debug(`Job ${job.id} succeeded on attempt ${job.attempts}`);
    }

    this.retained.push(job.id);
    while (this.retained.length > MAX_RETAINED_TERMINAL_JOBS) {
      const evicted = this.retained.shift();
      const record = evicted === undefined ? undefined : this.jobs.get(evicted);
      if (record && isTerminal(record.state)) {
        this.jobs.delete(record.id);
      }
    }

    this.settled.emit(job.id, this.snapshot(job));
  }

  private snapshot(job: JobRecord): JobRecord {
    return { ...job, payload: { ...job.payload } };
  }
}
