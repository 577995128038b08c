import { Module } from '@nestjs/common';
import { Pool } from 'pg';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/app.config';
import { VectorIndexDriver } from '../../config/env.validation';
import { InMemoryVectorIndex } from './services/in-memory-vector.index';
import { PgVectorIndex } from './services/pgvector.index';
import { VECTOR_INDEX, VectorIndex } from './vector-index.interface';

@Module({
  providers: [
    {
      provide: VECTOR_INDEX,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig): VectorIndex => {
        if (config.vectorIndex.driver === VectorIndexDriver.PgVector) {
          const pool = new Pool({ connectionString: config.vectorIndex.databaseUrl });
          return new PgVectorIndex(pool, config.vectorIndex.table, config.embedding.dimension);
        }
        return new InMemoryVectorIndex(config.embedding.dimension);
      },
    },
  ],
  exports: [VECTOR_INDEX],
})
export class VectorIndexModule {}
