import {
  CULL_UNIFORM_BYTES,
  getCullWorkgroupCount,
  packCullingUniforms,
} from '@lumen2d/renderer-contract';
import type { CullingBounds, DrawClass } from '@lumen2d/renderer-contract';

import { GPU_BUFFER_USAGE, GPU_SHADER_STAGE, toArrayBuffer } from './gpu-constants.js';
import type { BatchSlot, InstanceBatchBuffer } from './instance-batch.js';
import { CULL_SHADER } from './shaders.js';

export interface CullDispatch {
  readonly drawClass: DrawClass;
  readonly bindGroup: GPUBindGroup;
  readonly workgroupCount: number;
}

export interface CullPrepareOptions {
  readonly batch: InstanceBatchBuffer;
  /**
   * Indirect args whose instance count has already been reset.
   */
  readonly argsBuffer: GPUBuffer;
  readonly bounds: CullingBounds;
  readonly maxAreaExtent: number;
}

interface ClassResources {
  readonly uniformBuffer: GPUBuffer;
  outputBuffer: GPUBuffer | undefined;
  outputCapacity: number;
  bindGroup: GPUBindGroup | undefined;
  boundSource: GPUBuffer | undefined;
  boundArgs: GPUBuffer | undefined;
}

/**
 * Compute stage that tests every batched record against the culling planes
 * and compacts the visible ones into a per-slot output buffer.
 */
export class VisibilityCullingStage {
  readonly #device: GPUDevice;
  readonly #bindGroupLayout: GPUBindGroupLayout;
  readonly #pipeline: GPUComputePipeline;
  readonly #resources = new Map<BatchSlot, ClassResources>();

  constructor(device: GPUDevice) {
    this.#device = device;

    this.#bindGroupLayout = device.createBindGroupLayout({
      label: 'cull',
      entries: [
        { binding: 0, visibility: GPU_SHADER_STAGE.COMPUTE, buffer: { type: 'uniform' } },
        { binding: 1, visibility: GPU_SHADER_STAGE.COMPUTE, buffer: { type: 'read-only-storage' } },
        { binding: 2, visibility: GPU_SHADER_STAGE.COMPUTE, buffer: { type: 'storage' } },
        { binding: 3, visibility: GPU_SHADER_STAGE.COMPUTE, buffer: { type: 'storage' } },
      ],
    });

    this.#pipeline = device.createComputePipeline({
      label: 'cull',
      layout: device.createPipelineLayout({ bindGroupLayouts: [this.#bindGroupLayout] }),
      compute: {
        module: device.createShaderModule({ label: 'cull', code: CULL_SHADER }),
        entryPoint: 'cs_main',
      },
    });
  }

  /**
   * The compacted records of a batch slot, sized to its batch's device
   * capacity.
   */
  getOutputBuffer(slot: BatchSlot): GPUBuffer | undefined {
    return this.#resources.get(slot)?.outputBuffer;
  }

  /**
   * Writes this frame's uniforms for one class and returns its dispatch. The
   * batch must already be uploaded.
   */
  prepare(options: CullPrepareOptions): CullDispatch {
    const { batch, argsBuffer } = options;
    const source = batch.gpuBuffer;
    if (!source) {
      throw new Error(`Instance batch for ${batch.drawClass} has not been uploaded.`);
    }

    const resources = this.#ensureOutput(batch.slot, batch.gpuCapacity, batch.layout.strideBytes);
    const uniforms = packCullingUniforms({
      bounds: options.bounds,
      instanceCount: batch.length,
      recordWords: batch.layout.strideWords,
      maxAreaExtent: options.maxAreaExtent,
    });
    this.#device.queue.writeBuffer(resources.uniformBuffer, 0, uniforms);

    if (
      !resources.bindGroup ||
      resources.boundSource !== source ||
      resources.boundArgs !== argsBuffer
    ) {
      resources.bindGroup = this.#createBindGroup(batch.slot, resources, source, argsBuffer);
      resources.boundSource = source;
      resources.boundArgs = argsBuffer;
    }

    return {
      drawClass: batch.drawClass,
      bindGroup: resources.bindGroup,
      workgroupCount: getCullWorkgroupCount(batch.length),
    };
  }

  encode(pass: GPUComputePassEncoder, dispatches: readonly CullDispatch[]): number {
    let dispatched = 0;
    for (const dispatch of dispatches) {
      if (dispatch.workgroupCount === 0) {
        continue;
      }
      if (dispatched === 0) {
        pass.setPipeline(this.#pipeline);
      }
      pass.setBindGroup(0, dispatch.bindGroup);
      pass.dispatchWorkgroups(dispatch.workgroupCount);
      dispatched += 1;
    }
    return dispatched;
  }

  /**
   * Stores records compacted on the host, for when culling runs on the CPU.
   */
  writeCompacted(
    slot: BatchSlot,
    capacity: number,
    strideBytes: number,
    records: Uint32Array,
  ): GPUBuffer {
    const resources = this.#ensureOutput(slot, capacity, strideBytes);
    const output = resources.outputBuffer;
    if (!output) {
      throw new Error(`Culling output for ${slot} is missing.`);
    }
    if (records.byteLength > 0) {
      this.#device.queue.writeBuffer(output, 0, toArrayBuffer(records));
    }
    return output;
  }

  destroy(): void {
    for (const resources of this.#resources.values()) {
      resources.uniformBuffer.destroy();
      resources.outputBuffer?.destroy();
    }
    this.#resources.clear();
  }

  #ensureOutput(slot: BatchSlot, capacity: number, strideBytes: number): ClassResources {
    let resources = this.#resources.get(slot);
    if (!resources) {
      resources = {
        uniformBuffer: this.#device.createBuffer({
          label: `cull-uniforms:${slot}`,
          size: CULL_UNIFORM_BYTES,
          usage: GPU_BUFFER_USAGE.UNIFORM | GPU_BUFFER_USAGE.COPY_DST,
        }),
        outputBuffer: undefined,
        outputCapacity: 0,
        bindGroup: undefined,
        boundSource: undefined,
        boundArgs: undefined,
      };
      this.#resources.set(slot, resources);
    }

    if (!resources.outputBuffer || resources.outputCapacity < capacity) {
      resources.outputBuffer?.destroy();
      resources.outputBuffer = this.#device.createBuffer({
        label: `culled:${slot}`,
        size: Math.max(1, capacity) * strideBytes,
        usage: GPU_BUFFER_USAGE.STORAGE | GPU_BUFFER_USAGE.VERTEX | GPU_BUFFER_USAGE.COPY_DST,
      });
      resources.outputCapacity = Math.max(1, capacity);
      resources.bindGroup = undefined;
    }

    return resources;
  }

  #createBindGroup(
    slot: BatchSlot,
    resources: ClassResources,
    source: GPUBuffer,
    argsBuffer: GPUBuffer,
  ): GPUBindGroup {
    const output = resources.outputBuffer;
    if (!output) {
      throw new Error(`Culling output for ${slot} is missing.`);
    }

    return this.#device.createBindGroup({
      label: `cull:${slot}`,
      layout: this.#bindGroupLayout,
      entries: [
        { binding: 0, resource: { buffer: resources.uniformBuffer } },
        { binding: 1, resource: { buffer: source } },
        { binding: 2, resource: { buffer: output } },
        { binding: 3, resource: { buffer: argsBuffer } },
      ],
    });
  }
}
