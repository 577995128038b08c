import { Module } from '@nestjs/common';
import { getRedis } from '../../common/lib/redis';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/app.config';
import { StorageDriver } from '../../config/env.validation';
import { RESPONSE_CACHE, ResponseCache } from './response-cache.interface';
import { InMemoryResponseCache } from './services/in-memory-response.cache';
import { RedisResponseCache } from './services/redis-response.cache';

@Module({
  providers: [
    {
      provide: RESPONSE_CACHE,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig): ResponseCache =>
        config.storage.driver === StorageDriver.Redis
          ? new RedisResponseCache(getRedis(config.storage.redisUrl), config.storage.keyPrefix)
          : new InMemoryResponseCache(),
    },
  ],
  exports: [RESPONSE_CACHE],
})
export class CacheModule {}
