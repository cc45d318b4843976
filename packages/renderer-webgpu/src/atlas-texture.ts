import type { AtlasImage, TexturedDrawClass } from '@lumen2d/renderer-contract';

import { GPU_TEXTURE_USAGE, toArrayBuffer } from './gpu-constants.js';

const BYTES_PER_PIXEL = 4;

export function validateAtlasImage(image: AtlasImage): void {
  const { width, height, pixels } = image;
  if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
    throw new RangeError(`Atlas dimensions must be positive integers (got ${width}x${height}).`);
  }

  const expected = width * height * BYTES_PER_PIXEL;
  if (pixels.byteLength !== expected) {
    throw new RangeError(
      `Atlas pixels for ${width}x${height} RGBA8 must be ${expected} bytes (got ${pixels.byteLength}).`,
    );
  }
}

export function createAtlasTexture(
  device: GPUDevice,
  drawClass: TexturedDrawClass,
  image: AtlasImage,
): GPUTexture {
  validateAtlasImage(image);

  const size = { width: image.width, height: image.height, depthOrArrayLayers: 1 };
  const texture = device.createTexture({
    label: `atlas:${drawClass}`,
    size,
    format: 'rgba8unorm',
    usage: GPU_TEXTURE_USAGE.TEXTURE_BINDING | GPU_TEXTURE_USAGE.COPY_DST,
  });

  device.queue.writeTexture(
    { texture },
    toArrayBuffer(image.pixels),
    { offset: 0, bytesPerRow: image.width * BYTES_PER_PIXEL, rowsPerImage: image.height },
    size,
  );

  return texture;
}
