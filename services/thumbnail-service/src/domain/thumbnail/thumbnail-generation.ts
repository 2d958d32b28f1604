export const THUMBNAIL_MAX_DIMENSION = 300;
export const RESIZED_KEY_PREFIX = 'resized';
export const THUMBNAIL_CONTENT_TYPE = 'image/jpeg';

export interface ThumbnailBatchResult {
  statusCode: number;
  body: string;
}

export const THUMBNAIL_BATCH_SUCCESS: Readonly<ThumbnailBatchResult> = Object.freeze({
  statusCode: 200,
  body: 'Image resized and metadata stored successfully.',
});

export interface ImageMetadataRecord {
  imageId: string;
  originalKey: string;
  resizedKey: string;
  uploadTime: string;
  sourceBucket: string;
  destBucket: string;
}

export function objectKeyBasename(objectKey: string): string {
  const lastSeparator = objectKey.lastIndexOf('/');
  return lastSeparator === -1 ? objectKey : objectKey.slice(lastSeparator + 1);
}

/**
 * Derived objects are flattened under `resized/`, so two sources that share a
 * basename (`a/cat.png`, `b/cat.png`) map to the same key and the later upload wins.
 */
export function buildResizedObjectKey(sourceKey: string): string {
  return `${RESIZED_KEY_PREFIX}/${objectKeyBasename(sourceKey)}`;
}

export function createImageMetadataRecord(input: {
  imageId: string;
  originalKey: string;
  resizedKey: string;
  sourceBucket: string;
  destBucket: string;
  processedAt?: Date;
}): ImageMetadataRecord {
  return {
    imageId: input.imageId,
    originalKey: input.originalKey,
    resizedKey: input.resizedKey,
    uploadTime: (input.processedAt ?? new Date()).toISOString(),
    sourceBucket: input.sourceBucket,
    destBucket: input.destBucket,
  };
}
