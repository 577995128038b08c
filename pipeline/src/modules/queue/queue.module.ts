import { Module } from '@nestjs/common';
import { getRedis } from '../../common/lib/redis';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/app.config';
import { JobTransportDriver } from '../../config/env.validation';
import { TaskQueueService } from './services/task-queue.service';
import { BullmqJobTransport } from './transports/bullmq-job.transport';
import { InMemoryJobTransport } from './transports/in-memory-job.transport';
import { JOB_TRANSPORT, JobTransport } from './transports/job-transport.interface';

@Module({
  providers: [
    {
      provide: JOB_TRANSPORT,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig): JobTransport =>
        config.queue.transport === JobTransportDriver.Bullmq
          ? new BullmqJobTransport(getRedis(config.storage.redisUrl), config.storage.keyPrefix)
          : new InMemoryJobTransport(),
    },
    TaskQueueService,
  ],
  exports: [TaskQueueService],
})
export class QueueModule {}
