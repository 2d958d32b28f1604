import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ProcessBucketNotificationUseCase } from './application/thumbnail/process-bucket-notification.use-case';
import { IMAGE_METADATA_REPOSITORY_PORT } from './application/thumbnail/ports/image-metadata-repository.port';
import { THUMBNAIL_IMAGE_PROCESSOR_PORT } from './application/thumbnail/ports/thumbnail-image-processor.port';
import { THUMBNAIL_OBJECT_STORAGE_PORT } from './application/thumbnail/ports/thumbnail-object-storage.port';
import { ServiceInfoQuery } from './application/system/service-info.query';
import {
  THUMBNAIL_SERVICE_ENV_FILE_PATHS,
  ThumbnailServiceConfigService,
  validateThumbnailServiceEnvironment,
} from './infrastructure/config/thumbnail-service-config.service';
import { SharpThumbnailImageProcessorAdapter } from './infrastructure/imaging/sharp-thumbnail-image-processor.adapter';
import { PostgresImageMetadataRepository } from './infrastructure/persistence/postgres-image-metadata.repository';
import { MinioThumbnailObjectStorageAdapter } from './infrastructure/storage/minio-thumbnail-object-storage.adapter';
import { NotificationsController } from './presentation/http/notifications/notifications.controller';
import { AppController } from './presentation/http/system/app.controller';
import { RabbitMqBucketNotificationConsumerService } from './presentation/messaging/rabbitmq-bucket-notification-consumer.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: THUMBNAIL_SERVICE_ENV_FILE_PATHS,
      validate: validateThumbnailServiceEnvironment,
    }),
  ],
  controllers: [AppController, NotificationsController],
  providers: [
    ThumbnailServiceConfigService,
    ServiceInfoQuery,
    MinioThumbnailObjectStorageAdapter,
    {
      provide: THUMBNAIL_OBJECT_STORAGE_PORT,
      useExisting: MinioThumbnailObjectStorageAdapter,
    },
    SharpThumbnailImageProcessorAdapter,
    {
      provide: THUMBNAIL_IMAGE_PROCESSOR_PORT,
      useExisting: SharpThumbnailImageProcessorAdapter,
    },
    PostgresImageMetadataRepository,
    {
      provide: IMAGE_METADATA_REPOSITORY_PORT,
      useExisting: PostgresImageMetadataRepository,
    },
    ProcessBucketNotificationUseCase,
    RabbitMqBucketNotificationConsumerService,
  ],
})
export class AppModule {}
