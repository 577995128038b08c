import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PIPELINE_CONFIG, PipelineConfig } from './config/app.config';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  // no HTTP adapter: the web layer embeds OrchestratorService
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  const config = app.get<PipelineConfig>(PIPELINE_CONFIG);
  logger.log(
    `Pipeline running (storage=${config.storage.driver}, index=${config.vectorIndex.driver}, ` +
      `transport=${config.queue.transport}, embeddings=${config.embedding.backend})`,
  );
}

bootstrap().catch((error: unknown) => {
  logger.error('Pipeline failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
