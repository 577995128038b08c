import { Module } from '@nestjs/common';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/app.config';
import { RATE_LIMITER, TokenBucketRateLimiter } from './token-bucket.rate-limiter';

@Module({
  providers: [
    {
      provide: RATE_LIMITER,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) =>
        new TokenBucketRateLimiter({
          capacity: config.rateLimit.capacity,
          refillPerSecond: config.rateLimit.refillPerSecond,
        }),
    },
  ],
  exports: [RATE_LIMITER],
})
export class RateLimitModule {}
