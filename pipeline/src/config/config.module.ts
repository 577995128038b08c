import { Global, Module } from '@nestjs/common';
import { loadPipelineConfig, PIPELINE_CONFIG } from './app.config';

@Global()
@Module({
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: () => loadPipelineConfig(process.env),
    },
  ],
  exports: [PIPELINE_CONFIG],
})
export class ConfigModule {}
