import { JobClass, JobRecord } from '../job.types';

export const JOB_TRANSPORT = Symbol('JOB_TRANSPORT');

/** Resolves with the record as it stands after the delivery, or null when the delivery was dropped. */
export type DeliverFn = (record: JobRecord) => Promise<JobRecord | null>;

export type SettledFn = (record: JobRecord) => void;

/**
 * Moves job records to the worker pools. A transport only delivers; the
 * job state machine, retries and locking live in TaskQueueService.
 */
export interface JobTransport {
  readonly name: string;
  /** Starts delivering `jobClass` records, at most `concurrency` at a time. */
  consume(jobClass: JobClass, concurrency: number, deliver: DeliverFn): Promise<void>;
  /** Schedules delivery of a snapshot of `record` after `delayMs`. */
  dispatch(record: JobRecord, delayMs: number): Promise<void>;
  /**
   * Reports every job that reaches succeeded or failed in any process
   * consuming from this transport, including this one.
   */
  onSettled(listener: SettledFn): Promise<void>;
  close(): Promise<void>;
}
