/**
 * S3-style bucket notification as emitted by MinIO (AMQP and webhook targets)
 * and by S3 event notifications. Only the fields the pipeline reads are typed;
 * everything else in the document is ignored.
 */
export interface BucketNotificationRecord {
  eventName?: string;
  eventTime?: string;
  s3: {
    bucket: {
      name: string;
    };
    object: {
      /** URL-encoded, with `+` standing for a space. */
      key: string;
      size?: number;
      eTag?: string;
      contentType?: string;
    };
  };
}

export interface BucketNotificationEvent {
  EventName?: string;
  Key?: string;
  Records: BucketNotificationRecord[];
}

export interface ChangeRecord {
  key: string;
  bucket?: string;
  eventName?: string;
}

export interface NotificationBatch {
  records: ChangeRecord[];
  correlationId?: string;
}

export function isBucketNotificationEvent(value: unknown): value is BucketNotificationEvent {
  if (!isRecord(value) || !Array.isArray(value.Records)) {
    return false;
  }

  return value.Records.every(isBucketNotificationRecord);
}

function isBucketNotificationRecord(value: unknown): value is BucketNotificationRecord {
  if (!isRecord(value) || !isRecord(value.s3)) {
    return false;
  }

  const { bucket, object } = value.s3;
  return (
    isRecord(bucket) &&
    typeof bucket.name === 'string' &&
    isRecord(object) &&
    typeof object.key === 'string' &&
    object.key.trim().length > 0
  );
}

export function decodeObjectKey(raw: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    return raw;
  }
}

export function toNotificationBatch(
  event: BucketNotificationEvent,
  correlationId?: string,
): NotificationBatch {
  return {
    correlationId,
    records: event.Records.map((record) => ({
      key: decodeObjectKey(record.s3.object.key),
      bucket: record.s3.bucket.name,
      eventName: record.eventName,
    })),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
