import { Injectable } from '@nestjs/common';
import sharp from 'sharp';
import type {
  GenerateThumbnailInput,
  GenerateThumbnailResult,
  ThumbnailImageProcessorPort,
} from '../../application/thumbnail/ports/thumbnail-image-processor.port';
import { THUMBNAIL_CONTENT_TYPE } from '../../domain/thumbnail/thumbnail-generation';

@Injectable()
export class SharpThumbnailImageProcessorAdapter implements ThumbnailImageProcessorPort {
  // No EXIF auto-rotation: the thumbnail keeps the stored raster's orientation.
  async generateThumbnail(input: GenerateThumbnailInput): Promise<GenerateThumbnailResult> {
    const { data, info } = await sharp(input.source)
      .resize({
        width: input.maxWidth,
        height: input.maxHeight,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .jpeg()
      .toBuffer({ resolveWithObject: true });

    return {
      buffer: data,
      contentType: THUMBNAIL_CONTENT_TYPE,
      width: info.width,
      height: info.height,
    };
  }
}
