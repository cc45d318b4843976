import { CAMERA_UNIFORM_BYTES, packCameraUniform } from '@lumen2d/renderer-contract';
import type { CameraState } from '@lumen2d/renderer-contract';

import { GPU_BUFFER_USAGE, toArrayBuffer } from './gpu-constants.js';

/**
 * A layer's camera buffer, bound at group 0 by every pipeline drawing that
 * layer.
 */
export class CameraUniform {
  readonly buffer: GPUBuffer;

  readonly #device: GPUDevice;

  constructor(device: GPUDevice, label = 'camera') {
    this.#device = device;
    this.buffer = device.createBuffer({
      label,
      size: CAMERA_UNIFORM_BYTES,
      usage: GPU_BUFFER_USAGE.UNIFORM | GPU_BUFFER_USAGE.COPY_DST,
    });
  }

  write(camera: CameraState, pointSizePx: number): void {
    this.#device.queue.writeBuffer(
      this.buffer,
      0,
      toArrayBuffer(packCameraUniform(camera, pointSizePx)),
    );
  }

  destroy(): void {
    this.buffer.destroy();
  }
}
