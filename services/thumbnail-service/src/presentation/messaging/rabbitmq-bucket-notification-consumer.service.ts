import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as amqp from 'amqplib';
import {
  createJsonLogLine,
  ensureCorrelationId,
  isBucketNotificationEvent,
  toNotificationBatch,
  type BucketNotificationEvent,
  type LogLevel,
} from '@thumbnail-pipeline/shared';
import { ProcessBucketNotificationUseCase } from '../../application/thumbnail/process-bucket-notification.use-case';
import { ThumbnailServiceConfigService } from '../../infrastructure/config/thumbnail-service-config.service';

/** The parts of an AMQP delivery the consumer reads. */
export interface BucketNotificationDelivery {
  content: Buffer;
  fields: {
    redelivered: boolean;
    routingKey?: string;
  };
  properties: {
    correlationId?: unknown;
    messageId?: unknown;
  };
}

export interface BucketNotificationDeliveryChannel {
  ack(message: BucketNotificationDelivery): void;
  nack(message: BucketNotificationDelivery, allUpTo?: boolean, requeue?: boolean): void;
}

export type DeliveryOutcome = 'acked' | 'requeued' | 'rejected';

/**
 * Feeds MinIO AMQP bucket notifications into the pipeline. Redelivery and
 * dead-lettering belong to the broker: a failed batch is requeued once, and
 * rejected without requeue when it fails again or cannot be parsed.
 */
@Injectable()
export class RabbitMqBucketNotificationConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RabbitMqBucketNotificationConsumerService.name);
  private connection?: amqp.ChannelModel;

  constructor(
    @Inject(ProcessBucketNotificationUseCase)
    private readonly processBucketNotificationUseCase: ProcessBucketNotificationUseCase,
    @Inject(ThumbnailServiceConfigService)
    private readonly config: ThumbnailServiceConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    const { queue, prefetch } = this.config;
    const connection = await amqp.connect(this.config.rabbitmqUrl);
    this.connection = connection;
    connection.on('error', (error: unknown) => this.logLifecycle('error', 'AMQP connection error.', error));

    const channel = await connection.createChannel();
    channel.on('error', (error: unknown) => this.logLifecycle('error', 'AMQP channel error.', error));
    channel.on('close', () => this.logLifecycle('warn', 'AMQP channel closed; no further notifications will be consumed.'));

    await channel.checkQueue(queue);
    await channel.prefetch(prefetch);
    await channel.consume(queue, (message) => {
      if (message === null) {
        this.logLifecycle('warn', 'Consumer cancelled by the broker.');
        return;
      }
      this.handleDelivery(channel, message).catch((error: unknown) => {
        this.logLifecycle('error', 'Bucket notification delivery could not be settled.', error);
      });
    });

    this.logLifecycle('info', `Consuming bucket notifications from "${queue}" (prefetch ${prefetch}).`);
  }

  async onModuleDestroy(): Promise<void> {
    const connection = this.connection;
    this.connection = undefined;
    if (!connection) {
      return;
    }

    try {
      await connection.close();
    } catch (error) {
      this.logLifecycle('warn', 'AMQP connection did not close cleanly.', error);
    }
  }

  async handleDelivery(
    channel: BucketNotificationDeliveryChannel,
    message: BucketNotificationDelivery,
  ): Promise<DeliveryOutcome> {
    const correlationId = ensureCorrelationId(message.properties.correlationId);
    const notification = readNotification(message.content);

    if (!notification) {
      channel.nack(message, false, false);
      this.logDelivery('warn', 'Rejected a delivery that is not a bucket notification.', message, correlationId, {
        outcome: 'rejected',
      });
      return 'rejected';
    }

    try {
      const result = await this.processBucketNotificationUseCase.execute(
        toNotificationBatch(notification, correlationId),
      );
      channel.ack(message);
      this.logDelivery('info', result.body, message, correlationId, {
        outcome: 'acked',
        recordCount: notification.Records.length,
      }, notification);
      return 'acked';
    } catch (error) {
      const requeue = !message.fields.redelivered;
      channel.nack(message, false, requeue);
      const outcome: DeliveryOutcome = requeue ? 'requeued' : 'rejected';
      this.logDelivery('error', 'Bucket notification failed.', message, correlationId, { outcome }, notification, error);
      return outcome;
    }
  }

  private logDelivery(
    level: LogLevel,
    text: string,
    message: BucketNotificationDelivery,
    correlationId: string,
    metadata: Record<string, unknown>,
    notification?: BucketNotificationEvent,
    error?: unknown,
  ): void {
    const firstRecord = notification?.Records[0];
    const line = createJsonLogLine({
      level,
      service: 'thumbnail-service',
      message: text,
      correlationId,
      messageId: typeof message.properties.messageId === 'string' ? message.properties.messageId : undefined,
      routingKey: message.fields.routingKey,
      queue: this.config.queue,
      objectKey: firstRecord?.s3.object.key,
      bucket: firstRecord?.s3.bucket.name,
      metadata: { ...metadata, redelivered: message.fields.redelivered },
      error,
    });
    this.write(level, line);
  }

  private logLifecycle(level: LogLevel, text: string, error?: unknown): void {
    this.write(level, createJsonLogLine({
      level,
      service: 'thumbnail-service',
      message: text,
      correlationId: 'system',
      queue: this.config.queue,
      error,
    }));
  }

  private write(level: LogLevel, line: string): void {
    if (level === 'error') {
      this.logger.error(line);
    } else if (level === 'warn') {
      this.logger.warn(line);
    } else {
      this.logger.log(line);
    }
  }
}

function readNotification(content: Buffer): BucketNotificationEvent | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(content.toString('utf-8'));
  } catch {
    return undefined;
  }
  return isBucketNotificationEvent(payload) ? payload : undefined;
}
