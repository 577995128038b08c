import { Module } from '@nestjs/common';
import { CacheModule } from '../cache/cache.module';
import { DocumentsModule } from '../documents/documents.module';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { LlmModule } from '../llm/llm.module';
import { QueueModule } from '../queue/queue.module';
import { RateLimitModule } from '../rate-limit/rate-limit.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { AnswerProcessor } from './processors/answer.processor';
import { IngestionProcessor } from './processors/ingestion.processor';
import { AnswerCacheService } from './services/answer-cache.service';
import { OrchestratorService } from './services/orchestrator.service';

@Module({
  imports: [
    DocumentsModule,
    EmbeddingsModule,
    VectorIndexModule,
    CacheModule,
    RateLimitModule,
    LlmModule,
    QueueModule,
  ],
  providers: [AnswerCacheService, IngestionProcessor, AnswerProcessor, OrchestratorService],
  exports: [OrchestratorService],
})
export class PipelineModule {}
