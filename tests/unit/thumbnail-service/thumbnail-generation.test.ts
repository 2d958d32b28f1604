import test from 'node:test';
import assert from 'node:assert/strict';
import {
  THUMBNAIL_BATCH_SUCCESS,
  buildResizedObjectKey,
  createImageMetadataRecord,
  objectKeyBasename,
} from '../../../services/thumbnail-service/src/domain/thumbnail/thumbnail-generation';

test('buildResizedObjectKey flattens any path depth to resized/<basename>', () => {
  assert.equal(buildResizedObjectKey('cat.png'), 'resized/cat.png');
  assert.equal(buildResizedObjectKey('photos/cat.png'), 'resized/cat.png');
  assert.equal(buildResizedObjectKey('a/b/c/d/dog.jpg'), 'resized/dog.jpg');
});

test('buildResizedObjectKey maps same-named objects from different folders to one key', () => {
  assert.equal(buildResizedObjectKey('2025/cat.png'), buildResizedObjectKey('2026/cat.png'));
});

test('objectKeyBasename returns an empty name for keys ending in a slash', () => {
  assert.equal(objectKeyBasename('photos/'), '');
  assert.equal(buildResizedObjectKey('photos/'), 'resized/');
});

test('createImageMetadataRecord stamps the processing time in UTC ISO-8601', () => {
  const record = createImageMetadataRecord({
    imageId: 'img-1',
    originalKey: 'photos/cat.png',
    resizedKey: 'resized/cat.png',
    sourceBucket: 'uploads',
    destBucket: 'thumbnails',
    processedAt: new Date(Date.UTC(2026, 2, 1, 10, 0, 0, 250)),
  });

  assert.deepEqual(record, {
    imageId: 'img-1',
    originalKey: 'photos/cat.png',
    resizedKey: 'resized/cat.png',
    uploadTime: '2026-03-01T10:00:00.250Z',
    sourceBucket: 'uploads',
    destBucket: 'thumbnails',
  });
});

test('THUMBNAIL_BATCH_SUCCESS is the fixed success payload', () => {
  assert.deepEqual(THUMBNAIL_BATCH_SUCCESS, {
    statusCode: 200,
    body: 'Image resized and metadata stored successfully.',
  });
  assert.ok(Object.isFrozen(THUMBNAIL_BATCH_SUCCESS));
});
