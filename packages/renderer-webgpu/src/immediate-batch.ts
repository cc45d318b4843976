import { DEFAULT_RENDERER_CONFIG } from '@lumen2d/renderer-contract';
import type { BoundsRect, Color, RenderLayer, Vec2 } from '@lumen2d/renderer-contract';

import { GPU_BUFFER_USAGE, growCapacity } from './gpu-constants.js';
import { IMMEDIATE_VERTEX_FLOATS, IMMEDIATE_VERTEX_STRIDE_BYTES } from './pipeline-set.js';
import type { ImmediateTopology, PipelineSet } from './pipeline-set.js';

class ImmediateVertexList {
  readonly topology: ImmediateTopology;
  readonly #label: string;

  #storage: ArrayBuffer;
  #floats: Float32Array;
  #capacity: number;
  #count = 0;
  #gpuBuffer: GPUBuffer | undefined;
  #gpuCapacity = 0;

  constructor(topology: ImmediateTopology, initialCapacity: number, label: string) {
    this.topology = topology;
    this.#label = label;
    this.#capacity = initialCapacity;
    this.#storage = new ArrayBuffer(initialCapacity * IMMEDIATE_VERTEX_STRIDE_BYTES);
    this.#floats = new Float32Array(this.#storage);
  }

  get count(): number {
    return this.#count;
  }

  get gpuBuffer(): GPUBuffer | undefined {
    return this.#gpuBuffer;
  }

  push(point: Vec2, color: Color): void {
    if (this.#count === this.#capacity) {
      const capacity = this.#capacity * 2;
      const storage = new ArrayBuffer(capacity * IMMEDIATE_VERTEX_STRIDE_BYTES);
      new Uint8Array(storage).set(new Uint8Array(this.#storage));
      this.#storage = storage;
      this.#floats = new Float32Array(storage);
      this.#capacity = capacity;
    }

    this.#floats.set(
      [point.x, point.y, color.r, color.g, color.b, color.a],
      this.#count * IMMEDIATE_VERTEX_FLOATS,
    );
    this.#count += 1;
  }

  clear(): void {
    this.#count = 0;
  }

  upload(device: GPUDevice, floor: number): boolean {
    if (this.#count === 0) {
      return false;
    }

    if (!this.#gpuBuffer || this.#gpuCapacity < this.#count) {
      const capacity = growCapacity(this.#gpuCapacity, this.#count, floor);
      this.#gpuBuffer?.destroy();
      this.#gpuBuffer = device.createBuffer({
        label: this.#label,
        size: capacity * IMMEDIATE_VERTEX_STRIDE_BYTES,
        usage: GPU_BUFFER_USAGE.VERTEX | GPU_BUFFER_USAGE.COPY_DST,
      });
      this.#gpuCapacity = capacity;
    }

    device.queue.writeBuffer(
      this.#gpuBuffer,
      0,
      this.#storage,
      0,
      this.#count * IMMEDIATE_VERTEX_STRIDE_BYTES,
    );
    return true;
  }

  destroy(): void {
    this.#gpuBuffer?.destroy();
    this.#gpuBuffer = undefined;
    this.#gpuCapacity = 0;
  }
}

/**
 * Unculled, uninstanced debug geometry drawn after every instanced class of
 * its layer.
 */
export class ImmediateBatch {
  readonly #device: GPUDevice;
  readonly #initialCapacity: number;
  readonly #triangles: ImmediateVertexList;
  readonly #lines: ImmediateVertexList;

  constructor(
    device: GPUDevice,
    initialCapacity: number = DEFAULT_RENDERER_CONFIG.limits.initialImmediateVertexCapacity,
    layer: RenderLayer = 'world',
  ) {
    this.#device = device;
    this.#initialCapacity = Math.max(1, initialCapacity);
    const prefix = layer === 'world' ? 'immediate' : `immediate:${layer}`;
    this.#triangles = new ImmediateVertexList(
      'triangle-list',
      this.#initialCapacity,
      `${prefix}:triangle-list`,
    );
    this.#lines = new ImmediateVertexList('line-list', this.#initialCapacity, `${prefix}:line-list`);
  }

  get vertexCount(): number {
    return this.#triangles.count + this.#lines.count;
  }

  pushTriangle(a: Vec2, b: Vec2, c: Vec2, color: Color): void {
    this.#triangles.push(a, color);
    this.#triangles.push(b, color);
    this.#triangles.push(c, color);
  }

  pushLine(from: Vec2, to: Vec2, color: Color): void {
    this.#lines.push(from, color);
    this.#lines.push(to, color);
  }

  /**
   * Two triangles covering `rect`, wound the same way as `pushTriangle`.
   */
  fillRect(rect: BoundsRect, color: Color): void {
    const topLeft = { x: rect.x, y: rect.y };
    const topRight = { x: rect.x + rect.width, y: rect.y };
    const bottomRight = { x: rect.x + rect.width, y: rect.y + rect.height };
    const bottomLeft = { x: rect.x, y: rect.y + rect.height };
    this.pushTriangle(topLeft, topRight, bottomRight, color);
    this.pushTriangle(topLeft, bottomRight, bottomLeft, color);
  }

  /**
   * The four edges of `rect` as lines, clockwise from the top-left corner.
   */
  strokeRect(rect: BoundsRect, color: Color): void {
    const topLeft = { x: rect.x, y: rect.y };
    const topRight = { x: rect.x + rect.width, y: rect.y };
    const bottomRight = { x: rect.x + rect.width, y: rect.y + rect.height };
    const bottomLeft = { x: rect.x, y: rect.y + rect.height };
    this.pushLine(topLeft, topRight, color);
    this.pushLine(topRight, bottomRight, color);
    this.pushLine(bottomRight, bottomLeft, color);
    this.pushLine(bottomLeft, topLeft, color);
  }

  upload(): boolean {
    const triangles = this.#triangles.upload(this.#device, this.#initialCapacity);
    const lines = this.#lines.upload(this.#device, this.#initialCapacity);
    return triangles || lines;
  }

  /**
   * Returns the number of draw calls encoded. The camera bind group must
   * already be set on the pass.
   */
  encode(pass: GPURenderPassEncoder, pipelines: PipelineSet): number {
    let draws = 0;
    for (const list of [this.#triangles, this.#lines]) {
      const buffer = list.gpuBuffer;
      if (list.count === 0 || !buffer) {
        continue;
      }
      pass.setPipeline(pipelines.getImmediatePipeline(list.topology));
      pass.setVertexBuffer(0, buffer);
      pass.draw(list.count);
      draws += 1;
    }
    return draws;
  }

  clear(): void {
    this.#triangles.clear();
    this.#lines.clear();
  }

  destroy(): void {
    this.#triangles.destroy();
    this.#lines.destroy();
  }
}
