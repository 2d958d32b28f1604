import test from 'node:test';
import assert from 'node:assert/strict';
import sharp from 'sharp';
import { SharpThumbnailImageProcessorAdapter } from '../../../services/thumbnail-service/src/infrastructure/imaging/sharp-thumbnail-image-processor.adapter';
import { createSolidImage } from './test-doubles';

const cases: Array<{ source: [number, number]; expected: [number, number] }> = [
  { source: [1000, 500], expected: [300, 150] },
  { source: [500, 1000], expected: [150, 300] },
  { source: [640, 480], expected: [300, 225] },
  { source: [200, 120], expected: [200, 120] },
  { source: [300, 300], expected: [300, 300] },
  { source: [301, 300], expected: [300, 299] },
  { source: [1000, 1], expected: [300, 1] },
];

for (const { source, expected } of cases) {
  test(`SharpThumbnailImageProcessorAdapter fits ${source[0]}x${source[1]} into ${expected[0]}x${expected[1]}`, async () => {
    const adapter = new SharpThumbnailImageProcessorAdapter();

    const result = await adapter.generateThumbnail({
      source: await createSolidImage(source[0], source[1]),
      maxWidth: 300,
      maxHeight: 300,
    });

    assert.equal(result.contentType, 'image/jpeg');
    assert.equal(result.width, expected[0]);
    assert.equal(result.height, expected[1]);

    const metadata = await sharp(result.buffer).metadata();
    assert.equal(metadata.format, 'jpeg');
    assert.equal(metadata.width, expected[0]);
    assert.equal(metadata.height, expected[1]);
  });
}

test('SharpThumbnailImageProcessorAdapter encodes images with an alpha channel as JPEG', async () => {
  const adapter = new SharpThumbnailImageProcessorAdapter();
  const transparent = await sharp({
    create: { width: 400, height: 400, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } },
  })
    .png()
    .toBuffer();

  const result = await adapter.generateThumbnail({ source: transparent, maxWidth: 300, maxHeight: 300 });

  const metadata = await sharp(result.buffer).metadata();
  assert.equal(metadata.format, 'jpeg');
  assert.equal(metadata.width, 300);
  assert.equal(metadata.height, 300);
});

test('SharpThumbnailImageProcessorAdapter rejects bytes that are not an image', async () => {
  const adapter = new SharpThumbnailImageProcessorAdapter();

  await assert.rejects(
    adapter.generateThumbnail({ source: Buffer.from('not an image'), maxWidth: 300, maxHeight: 300 }),
    Error,
  );
});
