import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  createJsonLogLine,
  ensureCorrelationId,
  generateId,
  type ChangeRecord,
  type NotificationBatch,
} from '@thumbnail-pipeline/shared';
import {
  THUMBNAIL_BATCH_SUCCESS,
  THUMBNAIL_MAX_DIMENSION,
  buildResizedObjectKey,
  createImageMetadataRecord,
  type ThumbnailBatchResult,
} from '../../domain/thumbnail/thumbnail-generation';
import {
  DecodeError,
  MetadataWriteError,
  SourceNotFoundError,
  WriteError,
  runPipelineStage,
} from '../../domain/thumbnail/thumbnail-pipeline-errors';
import {
  IMAGE_METADATA_REPOSITORY_PORT,
  type ImageMetadataRepositoryPort,
} from './ports/image-metadata-repository.port';
import {
  THUMBNAIL_IMAGE_PROCESSOR_PORT,
  type ThumbnailImageProcessorPort,
} from './ports/thumbnail-image-processor.port';
import {
  THUMBNAIL_OBJECT_STORAGE_PORT,
  type ThumbnailObjectStoragePort,
} from './ports/thumbnail-object-storage.port';
import { ThumbnailServiceConfigService } from '../../infrastructure/config/thumbnail-service-config.service';

/**
 * Turns every record of a bucket notification into a JPEG thumbnail plus one
 * metadata row, strictly in order. The first failing record aborts the batch:
 * later records are not attempted and an already uploaded thumbnail of the
 * failing record is left in place.
 */
@Injectable()
export class ProcessBucketNotificationUseCase {
  private readonly logger = new Logger(ProcessBucketNotificationUseCase.name);

  constructor(
    @Inject(THUMBNAIL_OBJECT_STORAGE_PORT)
    private readonly objectStorage: ThumbnailObjectStoragePort,
    @Inject(THUMBNAIL_IMAGE_PROCESSOR_PORT)
    private readonly imageProcessor: ThumbnailImageProcessorPort,
    @Inject(IMAGE_METADATA_REPOSITORY_PORT)
    private readonly metadataRepository: ImageMetadataRepositoryPort,
    @Inject(ThumbnailServiceConfigService)
    private readonly config: ThumbnailServiceConfigService,
  ) {}

  async execute(batch: NotificationBatch): Promise<ThumbnailBatchResult> {
    const correlationId = ensureCorrelationId(batch.correlationId);

    for (const record of batch.records) {
      await this.processRecord(record, correlationId);
    }

    this.logger.log(createJsonLogLine({
      level: 'info',
      service: 'thumbnail-service',
      message: 'Notification batch processed.',
      correlationId,
      metadata: { recordCount: batch.records.length },
    }));
    return { ...THUMBNAIL_BATCH_SUCCESS };
  }

  private async processRecord(record: ChangeRecord, correlationId: string): Promise<void> {
    const sourceBucket = this.config.sourceBucket;
    const destBucket = this.config.destinationBucket;
    const metadataTable = this.config.metadataTable;
    const imageId = generateId();

    const source = await runPipelineStage(
      () => this.objectStorage.readObject(sourceBucket, record.key),
      (cause) => new SourceNotFoundError({ objectKey: record.key, target: sourceBucket, cause }),
    );

    const rendered = await runPipelineStage(
      () => this.imageProcessor.generateThumbnail({
        source,
        maxWidth: THUMBNAIL_MAX_DIMENSION,
        maxHeight: THUMBNAIL_MAX_DIMENSION,
      }),
      (cause) => new DecodeError({ objectKey: record.key, target: sourceBucket, cause }),
    );

    const resizedKey = buildResizedObjectKey(record.key);
    await runPipelineStage(
      () => this.objectStorage.writeObject({
        bucket: destBucket,
        objectKey: resizedKey,
        body: rendered.buffer,
        contentType: rendered.contentType,
      }),
      (cause) => new WriteError({ objectKey: resizedKey, target: destBucket, cause }),
    );

    const metadata = createImageMetadataRecord({
      imageId,
      originalKey: record.key,
      resizedKey,
      sourceBucket,
      destBucket,
    });
    await runPipelineStage(
      () => this.metadataRepository.putItem(metadataTable, metadata),
      (cause) => new MetadataWriteError({ objectKey: record.key, target: metadataTable, cause }),
    );

    this.logger.log(createJsonLogLine({
      level: 'info',
      service: 'thumbnail-service',
      message: 'Thumbnail stored and metadata recorded.',
      correlationId,
      imageId,
      objectKey: record.key,
      bucket: sourceBucket,
      metadata: {
        resizedKey,
        destBucket,
        width: rendered.width,
        height: rendered.height,
        eventName: record.eventName,
      },
    }));
  }
}
