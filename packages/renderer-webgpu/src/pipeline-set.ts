import { BYTES_PER_WORD, getInstanceLayout } from '@lumen2d/renderer-contract';
import type { DrawClass, InstanceLayout } from '@lumen2d/renderer-contract';

import { GPU_BUFFER_USAGE, GPU_SHADER_STAGE, toArrayBuffer } from './gpu-constants.js';
import { GLYPH_SHADER, IMMEDIATE_SHADER, QUAD_SHADER, SPRITE_SHADER } from './shaders.js';

export type ImmediateTopology = Extract<GPUPrimitiveTopology, 'triangle-list' | 'line-list'>;

export const IMMEDIATE_VERTEX_FLOATS = 6;
export const IMMEDIATE_VERTEX_STRIDE_BYTES = IMMEDIATE_VERTEX_FLOATS * BYTES_PER_WORD;

const COLORED_VERTEX_STRIDE_BYTES = 24;
const TEXTURED_VERTEX_STRIDE_BYTES = 16;
const FIRST_INSTANCE_LOCATION = 2;

// prettier-ignore
const COLORED_QUAD_VERTICES = new Float32Array([
  0, 0, 1, 1, 1, 1,
  1, 0, 1, 1, 1, 1,
  0, 1, 1, 1, 1, 1,
  0, 1, 1, 1, 1, 1,
  1, 0, 1, 1, 1, 1,
  1, 1, 1, 1, 1, 1,
]);

// prettier-ignore
const TEXTURED_QUAD_VERTICES = new Float32Array([
  0, 0, 0, 0,
  1, 0, 1, 0,
  0, 1, 0, 1,
  0, 1, 0, 1,
  1, 0, 1, 0,
  1, 1, 1, 1,
]);

/**
 * Instance attributes each program reads, in shader location order starting
 * at location 2. Primitives go through the quad program.
 */
const INSTANCE_INPUTS: Readonly<Record<Exclude<DrawClass, 'primitive'>, readonly string[]>> = {
  quad: ['translation', 'scale', 'color'],
  sprite: ['position', 'color', 'uvOffset', 'uvScale', 'size', 'rotation'],
  glyph: ['pivot', 'color', 'uvOffset', 'uvScale', 'pivotOffset', 'size', 'scale', 'rotation'],
};

const VERTEX_FORMATS: Readonly<Record<1 | 2 | 4, GPUVertexFormat>> = {
  1: 'float32',
  2: 'float32x2',
  4: 'float32x4',
};

const ALPHA_BLEND: GPUBlendState = {
  color: {
    srcFactor: 'src-alpha',
    dstFactor: 'one-minus-src-alpha',
    operation: 'add',
  },
  alpha: {
    srcFactor: 'one',
    dstFactor: 'one-minus-src-alpha',
    operation: 'add',
  },
};

export function createInstanceBufferLayout(
  layout: InstanceLayout,
  inputs: readonly string[],
): GPUVertexBufferLayout {
  return {
    arrayStride: layout.strideBytes,
    stepMode: 'instance',
    attributes: inputs.map((name, index) => {
      const attribute = layout.attributes.find((candidate) => candidate.name === name);
      if (!attribute) {
        throw new Error(`Instance layout ${layout.drawClass} has no ${name} attribute.`);
      }
      return {
        shaderLocation: FIRST_INSTANCE_LOCATION + index,
        offset: attribute.word * BYTES_PER_WORD,
        format: VERTEX_FORMATS[attribute.components],
      };
    }),
  };
}

export interface InstancedPipeline {
  readonly pipeline: GPURenderPipeline;
  readonly vertexBuffer: GPUBuffer;
  readonly textured: boolean;
}

/**
 * Every render program, created once per device. Primitives and quads share
 * one program; textured classes bind their atlas at group 1.
 */
export class PipelineSet {
  readonly cameraBindGroupLayout: GPUBindGroupLayout;
  readonly atlasBindGroupLayout: GPUBindGroupLayout;

  readonly #device: GPUDevice;
  readonly #sampler: GPUSampler;
  readonly #coloredVertices: GPUBuffer;
  readonly #texturedVertices: GPUBuffer;
  readonly #instanced: ReadonlyMap<DrawClass, InstancedPipeline>;
  readonly #immediate: ReadonlyMap<ImmediateTopology, GPURenderPipeline>;

  constructor(device: GPUDevice, format: GPUTextureFormat) {
    this.#device = device;

    this.cameraBindGroupLayout = device.createBindGroupLayout({
      label: 'camera',
      entries: [
        {
          binding: 0,
          visibility: GPU_SHADER_STAGE.VERTEX,
          buffer: { type: 'uniform' },
        },
      ],
    });

    this.atlasBindGroupLayout = device.createBindGroupLayout({
      label: 'atlas',
      entries: [
        {
          binding: 0,
          visibility: GPU_SHADER_STAGE.FRAGMENT,
          sampler: { type: 'filtering' },
        },
        {
          binding: 1,
          visibility: GPU_SHADER_STAGE.FRAGMENT,
          texture: { sampleType: 'float' },
        },
      ],
    });

    this.#sampler = device.createSampler({
      magFilter: 'nearest',
      minFilter: 'nearest',
      addressModeU: 'clamp-to-edge',
      addressModeV: 'clamp-to-edge',
    });

    this.#coloredVertices = this.#createVertexBuffer('quad-vertices', COLORED_QUAD_VERTICES);
    this.#texturedVertices = this.#createVertexBuffer('textured-quad-vertices', TEXTURED_QUAD_VERTICES);

    const flatLayout = device.createPipelineLayout({
      bindGroupLayouts: [this.cameraBindGroupLayout],
    });
    const texturedLayout = device.createPipelineLayout({
      bindGroupLayouts: [this.cameraBindGroupLayout, this.atlasBindGroupLayout],
    });

    const coloredVertexLayout: GPUVertexBufferLayout = {
      arrayStride: COLORED_VERTEX_STRIDE_BYTES,
      stepMode: 'vertex',
      attributes: [
        { shaderLocation: 0, offset: 0, format: 'float32x2' },
        { shaderLocation: 1, offset: 8, format: 'float32x4' },
      ],
    };
    const texturedVertexLayout: GPUVertexBufferLayout = {
      arrayStride: TEXTURED_VERTEX_STRIDE_BYTES,
      stepMode: 'vertex',
      attributes: [
        { shaderLocation: 0, offset: 0, format: 'float32x2' },
        { shaderLocation: 1, offset: 8, format: 'float32x2' },
      ],
    };

    const createPipeline = (
      label: string,
      code: string,
      layout: GPUPipelineLayout,
      buffers: GPUVertexBufferLayout[],
      topology: GPUPrimitiveTopology,
    ): GPURenderPipeline => {
      const module = device.createShaderModule({ label, code });
      return device.createRenderPipeline({
        label,
        layout,
        vertex: { module, entryPoint: 'vs_main', buffers },
        fragment: {
          module,
          entryPoint: 'fs_main',
          targets: [{ format, blend: ALPHA_BLEND }],
        },
        primitive: { topology, cullMode: 'none' },
      });
    };

    const quad: InstancedPipeline = {
      pipeline: createPipeline(
        'quad',
        QUAD_SHADER,
        flatLayout,
        [coloredVertexLayout, createInstanceBufferLayout(getInstanceLayout('quad'), INSTANCE_INPUTS.quad)],
        'triangle-list',
      ),
      vertexBuffer: this.#coloredVertices,
      textured: false,
    };
    const sprite: InstancedPipeline = {
      pipeline: createPipeline(
        'sprite',
        SPRITE_SHADER,
        texturedLayout,
        [texturedVertexLayout, createInstanceBufferLayout(getInstanceLayout('sprite'), INSTANCE_INPUTS.sprite)],
        'triangle-list',
      ),
      vertexBuffer: this.#texturedVertices,
      textured: true,
    };
    const glyph: InstancedPipeline = {
      pipeline: createPipeline(
        'glyph',
        GLYPH_SHADER,
        texturedLayout,
        [texturedVertexLayout, createInstanceBufferLayout(getInstanceLayout('glyph'), INSTANCE_INPUTS.glyph)],
        'triangle-list',
      ),
      vertexBuffer: this.#texturedVertices,
      textured: true,
    };

    this.#instanced = new Map<DrawClass, InstancedPipeline>([
      ['primitive', quad],
      ['quad', quad],
      ['sprite', sprite],
      ['glyph', glyph],
    ]);

    const immediateBuffers: GPUVertexBufferLayout[] = [
      {
        arrayStride: IMMEDIATE_VERTEX_STRIDE_BYTES,
        stepMode: 'vertex',
        attributes: [
          { shaderLocation: 0, offset: 0, format: 'float32x2' },
          { shaderLocation: 1, offset: 8, format: 'float32x4' },
        ],
      },
    ];
    this.#immediate = new Map<ImmediateTopology, GPURenderPipeline>([
      ['triangle-list', createPipeline('immediate-triangles', IMMEDIATE_SHADER, flatLayout, immediateBuffers, 'triangle-list')],
      ['line-list', createPipeline('immediate-lines', IMMEDIATE_SHADER, flatLayout, immediateBuffers, 'line-list')],
    ]);
  }

  getInstancedPipeline(drawClass: DrawClass): InstancedPipeline {
    const entry = this.#instanced.get(drawClass);
    if (!entry) {
      throw new Error(`No pipeline for draw class ${drawClass}.`);
    }
    return entry;
  }

  getImmediatePipeline(topology: ImmediateTopology): GPURenderPipeline {
    const pipeline = this.#immediate.get(topology);
    if (!pipeline) {
      throw new Error(`No immediate pipeline for ${topology}.`);
    }
    return pipeline;
  }

  createCameraBindGroup(cameraBuffer: GPUBuffer, label = 'camera'): GPUBindGroup {
    return this.#device.createBindGroup({
      label,
      layout: this.cameraBindGroupLayout,
      entries: [{ binding: 0, resource: { buffer: cameraBuffer } }],
    });
  }

  createAtlasBindGroup(texture: GPUTexture): GPUBindGroup {
    return this.#device.createBindGroup({
      label: 'atlas',
      layout: this.atlasBindGroupLayout,
      entries: [
        { binding: 0, resource: this.#sampler },
        { binding: 1, resource: texture.createView() },
      ],
    });
  }

  destroy(): void {
    this.#coloredVertices.destroy();
    this.#texturedVertices.destroy();
  }

  #createVertexBuffer(label: string, data: Float32Array): GPUBuffer {
    const buffer = this.#device.createBuffer({
      label,
      size: data.byteLength,
      usage: GPU_BUFFER_USAGE.VERTEX | GPU_BUFFER_USAGE.COPY_DST,
    });
    this.#device.queue.writeBuffer(buffer, 0, toArrayBuffer(data));
    return buffer;
  }
}
