import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
} from '@nestjs/common';
import { isBucketNotificationEvent, toNotificationBatch } from '@thumbnail-pipeline/shared';
import { ProcessBucketNotificationUseCase } from '../../../application/thumbnail/process-bucket-notification.use-case';
import type { ThumbnailBatchResult } from '../../../domain/thumbnail/thumbnail-generation';

/** Webhook target for bucket notifications (MinIO `notify_webhook`). */
@Controller('notifications')
export class NotificationsController {
  constructor(
    @Inject(ProcessBucketNotificationUseCase)
    private readonly processBucketNotificationUseCase: ProcessBucketNotificationUseCase,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async receive(
    @Body() body: unknown,
    @Headers('x-correlation-id') correlationId?: string,
  ): Promise<ThumbnailBatchResult> {
    if (!isBucketNotificationEvent(body)) {
      throw new BadRequestException({
        code: 'INVALID_NOTIFICATION',
        message: 'Body must be a bucket notification with a non-empty object key on every record.',
      });
    }

    return this.processBucketNotificationUseCase.execute(toNotificationBatch(body, correlationId));
  }
}
