import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { createJsonLogLine } from '@thumbnail-pipeline/shared';
import { Pool } from 'pg';
import type { ImageMetadataRepositoryPort } from '../../application/thumbnail/ports/image-metadata-repository.port';
import type { ImageMetadataRecord } from '../../domain/thumbnail/thumbnail-generation';
import { ThumbnailServiceConfigService } from '../config/thumbnail-service-config.service';

@Injectable()
export class PostgresImageMetadataRepository implements ImageMetadataRepositoryPort, OnModuleDestroy {
  private readonly logger = new Logger(PostgresImageMetadataRepository.name);
  private readonly pool: Pool;

  constructor(@Inject(ThumbnailServiceConfigService) config: ThumbnailServiceConfigService) {
    this.pool = new Pool({
      connectionString: config.databaseUrl,
      max: 5,
      idleTimeoutMillis: 10_000,
    });

    this.pool.on('error', (error: unknown) => {
      this.logger.error(createJsonLogLine({
        level: 'error',
        service: 'thumbnail-service',
        message: 'Postgres pool error in image metadata repository.',
        correlationId: 'system',
        error,
      }));
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  async putItem(tableId: string, record: ImageMetadataRecord): Promise<void> {
    await this.pool.query(buildInsertImageMetadataSql(tableId), [
      record.imageId,
      record.originalKey,
      record.resizedKey,
      record.uploadTime,
      record.sourceBucket,
      record.destBucket,
    ]);
  }
}

export function buildInsertImageMetadataSql(tableId: string): string {
  return `
    insert into ${quoteQualifiedIdentifier(tableId)} (
      image_id,
      original_key,
      resized_key,
      upload_time,
      source_bucket,
      dest_bucket
    )
    values ($1::uuid, $2, $3, $4::timestamptz, $5, $6)
  `;
}

export function quoteQualifiedIdentifier(identifier: string): string {
  const parts = identifier.split('.');
  if (parts.length > 2 || parts.some((part) => !/^[A-Za-z_][A-Za-z0-9_]*$/.test(part))) {
    throw new Error(`Invalid table identifier: "${identifier}"`);
  }

  return parts.map((part) => `"${part}"`).join('.');
}
