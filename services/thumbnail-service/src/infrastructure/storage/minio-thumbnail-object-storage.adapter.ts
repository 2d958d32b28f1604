import { Inject, Injectable } from '@nestjs/common';
import { Client } from 'minio';
import type {
  DerivedObjectWrite,
  ThumbnailObjectStoragePort,
} from '../../application/thumbnail/ports/thumbnail-object-storage.port';
import { ThumbnailServiceConfigService } from '../config/thumbnail-service-config.service';

@Injectable()
export class MinioThumbnailObjectStorageAdapter implements ThumbnailObjectStoragePort {
  private readonly client: Client;

  constructor(@Inject(ThumbnailServiceConfigService) config: ThumbnailServiceConfigService) {
    this.client = new Client({
      endPoint: config.minioEndpoint,
      port: config.minioApiPort,
      useSSL: config.minioUseSsl,
      accessKey: config.minioRootUser,
      secretKey: config.minioRootPassword,
      region: config.s3Region,
    });
  }

  async readObject(bucket: string, objectKey: string): Promise<Buffer> {
    const stream = await this.client.getObject(bucket, objectKey);
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  }

  async writeObject(input: DerivedObjectWrite): Promise<void> {
    await this.client.putObject(input.bucket, input.objectKey, input.body, input.body.length, {
      'Content-Type': input.contentType,
    });
  }
}
