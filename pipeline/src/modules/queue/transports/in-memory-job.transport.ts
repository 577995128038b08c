import { Logger } from '@nestjs/common';
import { describeError } from '../../../common/errors/pipeline.errors';
import { isTerminal, JobClass, JobRecord } from '../job.types';
import { DeliverFn, JobTransport, SettledFn } from './job-transport.interface';

interface Lane {
  pending: JobRecord[];
  active: number;
  concurrency: number;
  deliver?: DeliverFn;
}

/**
 * Single-process transport: one FIFO lane per job class with a fixed
 * number of concurrent deliveries, and timers for delayed dispatch.
 * Records dispatched before a consumer registers wait in the lane.
 */
export class InMemoryJobTransport implements JobTransport {
  readonly name = 'memory';
  private readonly logger = new Logger(InMemoryJobTransport.name);
  private readonly lanes = new Map<JobClass, Lane>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly settledListeners: SettledFn[] = [];
  private closed = false;

  async consume(jobClass: JobClass, concurrency: number, deliver: DeliverFn): Promise<void> {
    const lane = this.lane(jobClass);
    lane.deliver = deliver;
    lane.concurrency = Math.max(1, concurrency);
    this.logger.log(`Consuming ${jobClass} jobs with concurrency ${lane.concurrency}`);
    this.pump(lane);
  }

  async dispatch(record: JobRecord, delayMs: number): Promise<void> {
    if (this.closed) {
      throw new Error(`Cannot dispatch job ${record.id}: transport is closed`);
    }
    const snapshot: JobRecord = { ...record, payload: { ...record.payload } };
    if (delayMs <= 0) {
      this.push(snapshot);
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.push(snapshot);
    }, delayMs);
    this.timers.add(timer);
  }

  async onSettled(listener: SettledFn): Promise<void> {
    this.settledListeners.push(listener);
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    await Promise.all([...this.inFlight]);
  }

  private lane(jobClass: JobClass): Lane {
    let lane = this.lanes.get(jobClass);
    if (!lane) {
      lane = { pending: [], active: 0, concurrency: 1 };
      this.lanes.set(jobClass, lane);
    }
    return lane;
  }

  private push(record: JobRecord): void {
    const lane = this.lane(record.jobClass);
    lane.pending.push(record);
    this.pump(lane);
  }

  private pump(lane: Lane): void {
    const deliver = lane.deliver;
    if (!deliver) return;

    while (!this.closed && lane.active < lane.concurrency && lane.pending.length > 0) {
      const record = lane.pending.shift();
      if (!record) break;
      lane.active += 1;
      const delivery: Promise<void> = deliver(record)
        .then((settled) => {
          if (settled && isTerminal(settled.state)) {
            this.settledListeners.forEach((listener) => listener(settled));
          }
        })
        .catch((error: unknown) => {
          this.logger.error(`Delivery of job ${record.id} failed: ${describeError(error)}`);
        })
        .finally(() => {
          lane.active -= 1;
          this.inFlight.delete(delivery);
          this.pump(lane);
        });
      this.inFlight.add(delivery);
    }
  }
}
