import type { ImageMetadataRecord } from '../../../domain/thumbnail/thumbnail-generation';

export const IMAGE_METADATA_REPOSITORY_PORT = Symbol('IMAGE_METADATA_REPOSITORY_PORT');

export interface ImageMetadataRepositoryPort {
  putItem(tableId: string, record: ImageMetadataRecord): Promise<void>;
}
