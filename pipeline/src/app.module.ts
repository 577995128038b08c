import { Module, OnApplicationShutdown } from '@nestjs/common';
import { closeRedis } from './common/lib/redis';
import { ConfigModule } from './config/config.module';
import { PipelineModule } from './modules/pipeline/pipeline.module';

@Module({
  imports: [ConfigModule, PipelineModule],
})
export class AppModule implements OnApplicationShutdown {
  // runs after every module's onModuleDestroy, once workers and queues are closed
  async onApplicationShutdown(): Promise<void> {
    await closeRedis();
  }
}
