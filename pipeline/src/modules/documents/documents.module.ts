import { Module } from '@nestjs/common';
import { getRedis } from '../../common/lib/redis';
import { PIPELINE_CONFIG, PipelineConfig } from '../../config/app.config';
import { StorageDriver } from '../../config/env.validation';
import { DOCUMENT_STORE, DocumentStore } from './document-store.interface';
import { ChunkingService } from './services/chunking.service';
import { InMemoryDocumentStore } from './services/in-memory-document.store';
import { RedisDocumentStore } from './services/redis-document.store';
import { TextExtractionService } from './services/text-extraction.service';

@Module({
  providers: [
    {
      provide: DOCUMENT_STORE,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig): DocumentStore =>
        config.storage.driver === StorageDriver.Redis
          ? new RedisDocumentStore(getRedis(config.storage.redisUrl), config.storage.keyPrefix)
          : new InMemoryDocumentStore(),
    },
    TextExtractionService,
    ChunkingService,
  ],
  exports: [DOCUMENT_STORE, TextExtractionService, ChunkingService],
})
export class DocumentsModule {}
