import {
  BufferOverflowError,
  DEFAULT_RENDERER_CONFIG,
  encodeInstanceInto,
  getInstanceLayout,
  telemetry,
} from '@lumen2d/renderer-contract';
import type {
  Color,
  DrawClass,
  InstanceLayout,
  InstanceTransform,
  RenderLayer,
  UvRegion,
} from '@lumen2d/renderer-contract';

import { GPU_BUFFER_USAGE, growCapacity } from './gpu-constants.js';

/**
 * Key of the device resources that follow one batch. World batches keep the
 * bare class name.
 */
export type BatchSlot = DrawClass | `${Exclude<RenderLayer, 'world'>}:${DrawClass}`;

export function batchSlot(layer: RenderLayer, drawClass: DrawClass): BatchSlot {
  return layer === 'world' ? drawClass : `${layer}:${drawClass}`;
}

export interface InstanceBatchBufferOptions {
  readonly device: GPUDevice;
  readonly drawClass: DrawClass;
  /**
   * Defaults to `world`.
   */
  readonly layer?: RenderLayer;
  /**
   * Records reserved up front, on the host and on the device.
   */
  readonly initialCapacity?: number;
  /**
   * Hard cap on records per frame. Pushing past it throws
   * `BufferOverflowError`.
   */
  readonly maxInstances?: number;
}

/**
 * Per-class, per-frame list of encoded records with a grow-only device
 * mirror. Records keep insertion order until the culling pass compacts them.
 */
export class InstanceBatchBuffer {
  readonly drawClass: DrawClass;
  readonly layer: RenderLayer;
  readonly slot: BatchSlot;
  readonly layout: InstanceLayout;

  readonly #device: GPUDevice;
  readonly #initialCapacity: number;
  readonly #maxInstances: number;

  #storage: ArrayBuffer;
  #words: Float32Array;
  #capacity: number;
  #length = 0;

  #gpuBuffer: GPUBuffer | undefined;
  #gpuCapacity = 0;
  #destroyed = false;

  constructor(options: InstanceBatchBufferOptions) {
    this.drawClass = options.drawClass;
    this.layer = options.layer ?? 'world';
    this.slot = batchSlot(this.layer, options.drawClass);
    this.layout = getInstanceLayout(options.drawClass);
    this.#device = options.device;
    this.#maxInstances =
      options.maxInstances ?? DEFAULT_RENDERER_CONFIG.limits.maxInstancesPerClass;
    this.#initialCapacity = Math.max(
      1,
      Math.min(
        options.initialCapacity ?? DEFAULT_RENDERER_CONFIG.limits.initialInstanceCapacity,
        this.#maxInstances,
      ),
    );

    this.#capacity = this.#initialCapacity;
    this.#storage = new ArrayBuffer(this.#capacity * this.layout.strideBytes);
    this.#words = new Float32Array(this.#storage);
  }

  get length(): number {
    return this.#length;
  }

  /**
   * Host-side capacity in records.
   */
  get capacity(): number {
    return this.#capacity;
  }

  get byteLength(): number {
    return this.#length * this.layout.strideBytes;
  }

  get gpuBuffer(): GPUBuffer | undefined {
    return this.#gpuBuffer;
  }

  /**
   * Device-side capacity in records. Never shrinks.
   */
  get gpuCapacity(): number {
    return this.#gpuCapacity;
  }

  /**
   * The current records as raw words, valid until the next push or clear.
   */
  words(): Uint32Array {
    return new Uint32Array(this.#storage, 0, this.#length * this.layout.strideWords);
  }

  push(record: Float32Array): void {
    if (record.length !== this.layout.strideWords) {
      throw new RangeError(
        `A ${this.drawClass} record has ${this.layout.strideWords} words (got ${record.length}).`,
      );
    }

    const offset = this.#reserveSlot();
    this.#words.set(record, offset);
    this.#length += 1;
  }

  /**
   * Encodes straight into the batch storage. A rejected object leaves the
   * batch unchanged.
   */
  pushEncoded(
    transform: InstanceTransform,
    color: Color,
    uvRegion?: UvRegion,
  ): void {
    const offset = this.#reserveSlot();
    encodeInstanceInto(this.#words, offset, this.drawClass, transform, color, uvRegion);
    this.#length += 1;
  }

  clear(): void {
    this.#length = 0;
  }

  /**
   * Copies the current records to the device buffer, growing it first when
   * needed. Returns `false` without touching the device when empty.
   */
  upload(): boolean {
    this.#assertUsable();
    if (this.#length === 0) {
      return false;
    }

    const buffer = this.#ensureGpuCapacity(this.#length);
    this.#device.queue.writeBuffer(buffer, 0, this.#storage, 0, this.byteLength);
    return true;
  }

  destroy(): void {
    this.#gpuBuffer?.destroy();
    this.#gpuBuffer = undefined;
    this.#gpuCapacity = 0;
    this.#length = 0;
    this.#destroyed = true;
  }

  #assertUsable(): void {
    if (this.#destroyed) {
      throw new Error(`Instance batch for ${this.drawClass} has been destroyed.`);
    }
  }

  #reserveSlot(): number {
    this.#assertUsable();
    if (this.#length >= this.#maxInstances) {
      throw new BufferOverflowError(this.drawClass, this.#maxInstances);
    }

    if (this.#length === this.#capacity) {
      const capacity = Math.min(this.#capacity * 2, this.#maxInstances);
      const storage = new ArrayBuffer(capacity * this.layout.strideBytes);
      new Uint8Array(storage).set(new Uint8Array(this.#storage));
      this.#storage = storage;
      this.#words = new Float32Array(storage);
      this.#capacity = capacity;
    }

    return this.#length * this.layout.strideWords;
  }

  #ensureGpuCapacity(requiredRecords: number): GPUBuffer {
    if (this.#gpuBuffer && this.#gpuCapacity >= requiredRecords) {
      return this.#gpuBuffer;
    }

    const capacity = Math.min(
      growCapacity(this.#gpuCapacity, requiredRecords, this.#initialCapacity),
      this.#maxInstances,
    );
    this.#gpuBuffer?.destroy();
    this.#gpuBuffer = this.#device.createBuffer({
      label: `instances:${this.slot}`,
      size: capacity * this.layout.strideBytes,
      usage: GPU_BUFFER_USAGE.STORAGE | GPU_BUFFER_USAGE.VERTEX | GPU_BUFFER_USAGE.COPY_DST,
    });
    this.#gpuCapacity = capacity;

    telemetry.emit('InstanceBufferGrown', {
      layer: this.layer,
      drawClass: this.drawClass,
      capacity,
      bytes: capacity * this.layout.strideBytes,
    });
    return this.#gpuBuffer;
  }
}
