import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createJsonLogLine } from '@thumbnail-pipeline/shared';
import { AppModule } from './app.module';
import { ThumbnailServiceConfigService } from './infrastructure/config/thumbnail-service-config.service';
import { HttpExceptionFilter } from './presentation/http/common/http-exception.filter';

const logger = new Logger('Bootstrap');

async function start(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  const config = app.get(ThumbnailServiceConfigService);
  await app.listen(config.port);

  logger.log(createJsonLogLine({
    level: 'info',
    service: 'thumbnail-service',
    message: 'Thumbnail service started.',
    correlationId: 'system',
    queue: config.queue,
    metadata: {
      port: config.port,
      sourceBucket: config.sourceBucket,
      destBucket: config.destinationBucket,
      metadataTable: config.metadataTable,
    },
  }));
}

start().catch((error: unknown) => {
  logger.error(createJsonLogLine({
    level: 'error',
    service: 'thumbnail-service',
    message: 'Thumbnail service failed to start.',
    correlationId: 'system',
    error,
  }));
  process.exitCode = 1;
});
