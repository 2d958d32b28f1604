export const THUMBNAIL_OBJECT_STORAGE_PORT = Symbol('THUMBNAIL_OBJECT_STORAGE_PORT');

export interface DerivedObjectWrite {
  bucket: string;
  objectKey: string;
  body: Buffer;
  contentType: string;
}

export interface ThumbnailObjectStoragePort {
  /** Rejects when the object is missing or cannot be read. */
  readObject(bucket: string, objectKey: string): Promise<Buffer>;
  /** Replaces any object already stored under the key. */
  writeObject(input: DerivedObjectWrite): Promise<void>;
}
