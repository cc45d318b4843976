import {
  INDIRECT_ARGS_BYTES,
  QUAD_VERTEX_COUNT,
  createIndirectDrawArgs,
} from '@lumen2d/renderer-contract';

import { GPU_BUFFER_USAGE, toArrayBuffer } from './gpu-constants.js';
import type { BatchSlot } from './instance-batch.js';

/**
 * Owns one `drawIndirect` argument block per batch slot. With GPU culling the
 * instance count is produced on the device and never read back.
 */
export class IndirectDrawAssembler {
  readonly #device: GPUDevice;
  readonly #buffers = new Map<BatchSlot, GPUBuffer>();

  constructor(device: GPUDevice) {
    this.#device = device;
  }

  getArgsBuffer(slot: BatchSlot): GPUBuffer {
    let buffer = this.#buffers.get(slot);
    if (!buffer) {
      buffer = this.#device.createBuffer({
        label: `indirect:${slot}`,
        size: INDIRECT_ARGS_BYTES,
        usage: GPU_BUFFER_USAGE.STORAGE | GPU_BUFFER_USAGE.INDIRECT | GPU_BUFFER_USAGE.COPY_DST,
      });
      this.#buffers.set(slot, buffer);
    }
    return buffer;
  }

  /**
   * Zeroes the instance count ahead of a culling dispatch.
   */
  reset(slot: BatchSlot): GPUBuffer {
    return this.writeHostCount(slot, 0);
  }

  /**
   * Stores a count the host already knows, for CPU or disabled culling.
   */
  writeHostCount(slot: BatchSlot, instanceCount: number): GPUBuffer {
    const buffer = this.getArgsBuffer(slot);
    this.#device.queue.writeBuffer(
      buffer,
      0,
      toArrayBuffer(createIndirectDrawArgs(QUAD_VERTEX_COUNT, instanceCount)),
    );
    return buffer;
  }

  encodeDraw(pass: GPURenderPassEncoder, slot: BatchSlot): void {
    const buffer = this.#buffers.get(slot);
    if (!buffer) {
      throw new Error(`No indirect args were prepared for ${slot}.`);
    }
    pass.drawIndirect(buffer, 0);
  }

  destroy(): void {
    for (const buffer of this.#buffers.values()) {
      buffer.destroy();
    }
    this.#buffers.clear();
  }
}
