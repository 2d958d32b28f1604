export const THUMBNAIL_IMAGE_PROCESSOR_PORT = Symbol('THUMBNAIL_IMAGE_PROCESSOR_PORT');

export interface GenerateThumbnailInput {
  source: Buffer;
  maxWidth: number;
  maxHeight: number;
}

export interface GenerateThumbnailResult {
  buffer: Buffer;
  contentType: string;
  width: number;
  height: number;
}

export interface ThumbnailImageProcessorPort {
  /** Fits the image inside maxWidth x maxHeight without enlarging it and encodes it as JPEG. */
  generateThumbnail(input: GenerateThumbnailInput): Promise<GenerateThumbnailResult>;
}
