import test from 'node:test';
import assert from 'node:assert/strict';
import {
  decodeObjectKey,
  isBucketNotificationEvent,
  toNotificationBatch,
  type BucketNotificationEvent,
} from '../../../packages/shared/src/messaging/bucket-notification';

function createMinioNotification(keys: string[]): BucketNotificationEvent {
  return {
    EventName: 's3:ObjectCreated:Put',
    Key: `uploads/${keys[0] ?? ''}`,
    Records: keys.map((key) => ({
      eventName: 's3:ObjectCreated:Put',
      eventTime: '2026-03-01T10:00:00.000Z',
      s3: {
        bucket: { name: 'uploads' },
        object: { key, size: 68, contentType: 'image/png' },
      },
    })),
  };
}

test('decodeObjectKey turns form-encoded keys back into object keys', () => {
  assert.equal(decodeObjectKey('photos%2Fmy+cat.png'), 'photos/my cat.png');
  assert.equal(decodeObjectKey('photos/caf%C3%A9.jpg'), 'photos/café.jpg');
  assert.equal(decodeObjectKey('photos/plain.png'), 'photos/plain.png');
});

test('decodeObjectKey keeps the raw key when the escape sequence is malformed', () => {
  assert.equal(decodeObjectKey('photos/100%.png'), 'photos/100%.png');
});

test('isBucketNotificationEvent accepts MinIO notifications, including an empty record list', () => {
  assert.equal(isBucketNotificationEvent(createMinioNotification(['photos/cat.png'])), true);
  assert.equal(isBucketNotificationEvent({ Records: [] }), true);
});

test('isBucketNotificationEvent rejects payloads without usable object keys', () => {
  assert.equal(isBucketNotificationEvent(null), false);
  assert.equal(isBucketNotificationEvent({}), false);
  assert.equal(isBucketNotificationEvent({ Records: {} }), false);
  assert.equal(isBucketNotificationEvent({ Records: [{ s3: { bucket: { name: 'uploads' } } }] }), false);
  assert.equal(isBucketNotificationEvent(createMinioNotification(['  '])), false);
  assert.equal(
    isBucketNotificationEvent({ Records: [{ s3: { bucket: { name: 'uploads' }, object: { key: 42 } } }] }),
    false,
  );
});

test('toNotificationBatch keeps record order and decodes every key', () => {
  const batch = toNotificationBatch(
    createMinioNotification(['photos%2Fcat.png', 'photos/dog+1.jpg']),
    'corr-1',
  );

  assert.deepEqual(batch, {
    correlationId: 'corr-1',
    records: [
      { key: 'photos/cat.png', bucket: 'uploads', eventName: 's3:ObjectCreated:Put' },
      { key: 'photos/dog 1.jpg', bucket: 'uploads', eventName: 's3:ObjectCreated:Put' },
    ],
  });
});
