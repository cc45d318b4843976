import { vi } from 'vitest';

export interface StubBuffer {
  readonly label: string | undefined;
  readonly size: number;
  readonly usage: number;
  readonly destroy: ReturnType<typeof vi.fn>;
}

export interface StubTexture {
  readonly label: string | undefined;
  readonly createView: ReturnType<typeof vi.fn>;
  readonly destroy: ReturnType<typeof vi.fn>;
}

export interface StubBindGroup {
  readonly label: string | undefined;
  readonly entries: readonly GPUBindGroupEntry[];
}

export interface StubGpuEnvironment {
  readonly device: GPUDevice;
  readonly buffers: StubBuffer[];
  readonly textures: StubTexture[];
  readonly bindGroups: StubBindGroup[];
  readonly createBuffer: ReturnType<typeof vi.fn>;
  readonly createBindGroup: ReturnType<typeof vi.fn>;
  readonly createTexture: ReturnType<typeof vi.fn>;
  readonly createRenderPipeline: ReturnType<typeof vi.fn>;
  readonly createComputePipeline: ReturnType<typeof vi.fn>;
  readonly createCommandEncoder: ReturnType<typeof vi.fn>;
  readonly writeBuffer: ReturnType<typeof vi.fn>;
  readonly writeTexture: ReturnType<typeof vi.fn>;
  readonly submit: ReturnType<typeof vi.fn>;
  readonly beginComputePass: ReturnType<typeof vi.fn>;
  readonly beginRenderPass: ReturnType<typeof vi.fn>;
  readonly computePass: {
    readonly setPipeline: ReturnType<typeof vi.fn>;
    readonly setBindGroup: ReturnType<typeof vi.fn>;
    readonly dispatchWorkgroups: ReturnType<typeof vi.fn>;
    readonly end: ReturnType<typeof vi.fn>;
  };
  readonly renderPass: {
    readonly setPipeline: ReturnType<typeof vi.fn>;
    readonly setBindGroup: ReturnType<typeof vi.fn>;
    readonly setVertexBuffer: ReturnType<typeof vi.fn>;
    readonly draw: ReturnType<typeof vi.fn>;
    readonly drawIndirect: ReturnType<typeof vi.fn>;
    readonly end: ReturnType<typeof vi.fn>;
  };
  readonly resolveDeviceLost: (info: GPUDeviceLostInfo) => void;
  findBuffer(label: string): StubBuffer | undefined;
  /**
   * Payloads written to the buffer with `label`, oldest first, trimmed to the
   * written range.
   */
  writesTo(label: string): ArrayBuffer[];
}

function sliceWrite(call: readonly unknown[]): ArrayBuffer | undefined {
  const data = call[2];
  if (!(data instanceof ArrayBuffer)) {
    return undefined;
  }
  const dataOffset = typeof call[3] === 'number' ? call[3] : 0;
  const size = typeof call[4] === 'number' ? call[4] : data.byteLength - dataOffset;
  return data.slice(dataOffset, dataOffset + size);
}

export function createStubGpuEnvironment(): StubGpuEnvironment {
  const buffers: StubBuffer[] = [];
  const textures: StubTexture[] = [];
  const bindGroups: StubBindGroup[] = [];

  const createBuffer = vi.fn((descriptor: GPUBufferDescriptor) => {
    const buffer: StubBuffer = {
      label: descriptor.label,
      size: descriptor.size,
      usage: descriptor.usage,
      destroy: vi.fn(),
    };
    buffers.push(buffer);
    return buffer;
  });

  const createTexture = vi.fn((descriptor: GPUTextureDescriptor) => {
    const texture: StubTexture = {
      label: descriptor.label,
      createView: vi.fn(() => ({ label: `${descriptor.label ?? 'texture'}:view` })),
      destroy: vi.fn(),
    };
    textures.push(texture);
    return texture;
  });

  const createBindGroup = vi.fn((descriptor: GPUBindGroupDescriptor) => {
    const bindGroup: StubBindGroup = {
      label: descriptor.label,
      entries: Array.from(descriptor.entries),
    };
    bindGroups.push(bindGroup);
    return bindGroup;
  });

  const computePass = {
    setPipeline: vi.fn(),
    setBindGroup: vi.fn(),
    dispatchWorkgroups: vi.fn(),
    end: vi.fn(),
  };
  const renderPass = {
    setPipeline: vi.fn(),
    setBindGroup: vi.fn(),
    setVertexBuffer: vi.fn(),
    draw: vi.fn(),
    drawIndirect: vi.fn(),
    end: vi.fn(),
  };
  const beginComputePass = vi.fn(() => computePass);
  const beginRenderPass = vi.fn(() => renderPass);
  const commandBuffer = { label: 'frame' };
  const createCommandEncoder = vi.fn(() => ({
    beginComputePass,
    beginRenderPass,
    finish: vi.fn(() => commandBuffer),
  }));

  const writeBuffer = vi.fn();
  const writeTexture = vi.fn();
  const submit = vi.fn();

  let resolveDeviceLost: (info: GPUDeviceLostInfo) => void = () => undefined;
  const lost = new Promise<GPUDeviceLostInfo>((resolve) => {
    resolveDeviceLost = resolve;
  });

  const createRenderPipeline = vi.fn((descriptor: GPURenderPipelineDescriptor) => ({
    label: descriptor.label,
  }));
  const createComputePipeline = vi.fn((descriptor: GPUComputePipelineDescriptor) => ({
    label: descriptor.label,
  }));

  const device = {
    lost,
    queue: { writeBuffer, writeTexture, submit },
    createBuffer,
    createTexture,
    createBindGroup,
    createBindGroupLayout: vi.fn((descriptor: GPUBindGroupLayoutDescriptor) => ({
      label: descriptor.label,
    })),
    createPipelineLayout: vi.fn(() => ({})),
    createShaderModule: vi.fn((descriptor: GPUShaderModuleDescriptor) => ({
      label: descriptor.label,
    })),
    createRenderPipeline,
    createComputePipeline,
    createSampler: vi.fn(() => ({ label: 'sampler' })),
    createCommandEncoder,
  } as unknown as GPUDevice;

  const findBuffer = (label: string): StubBuffer | undefined =>
    buffers.filter((buffer) => buffer.label === label).at(-1);

  const writesTo = (label: string): ArrayBuffer[] =>
    writeBuffer.mock.calls.flatMap((call: unknown[]) => {
      const target = buffers.find((buffer) => buffer === call[0]);
      if (target?.label !== label) {
        return [];
      }
      const payload = sliceWrite(call);
      return payload ? [payload] : [];
    });

  return {
    device,
    buffers,
    textures,
    bindGroups,
    createBuffer,
    createBindGroup,
    createTexture,
    createRenderPipeline,
    createComputePipeline,
    createCommandEncoder,
    writeBuffer,
    writeTexture,
    submit,
    beginComputePass,
    beginRenderPass,
    computePass,
    renderPass,
    resolveDeviceLost,
    findBuffer,
    writesTo,
  };
}

export function asGpuBuffer(buffer: StubBuffer | undefined): GPUBuffer {
  return buffer as unknown as GPUBuffer;
}

export const STUB_TARGET = { label: 'target' } as unknown as GPUTextureView;
