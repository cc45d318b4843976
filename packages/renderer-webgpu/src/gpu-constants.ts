export const GPU_SHADER_STAGE: {
  readonly VERTEX: number;
  readonly FRAGMENT: number;
  readonly COMPUTE: number;
} =
  (globalThis as unknown as { GPUShaderStage?: { VERTEX: number; FRAGMENT: number; COMPUTE: number } })
    .GPUShaderStage ?? { VERTEX: 1, FRAGMENT: 2, COMPUTE: 4 };

export const GPU_BUFFER_USAGE: {
  readonly COPY_SRC: number;
  readonly COPY_DST: number;
  readonly INDEX: number;
  readonly VERTEX: number;
  readonly UNIFORM: number;
  readonly STORAGE: number;
  readonly INDIRECT: number;
} =
  (
    globalThis as unknown as {
      GPUBufferUsage?: {
        COPY_SRC: number;
        COPY_DST: number;
        INDEX: number;
        VERTEX: number;
        UNIFORM: number;
        STORAGE: number;
        INDIRECT: number;
      };
    }
  ).GPUBufferUsage ?? {
    COPY_SRC: 4,
    COPY_DST: 8,
    INDEX: 16,
    VERTEX: 32,
    UNIFORM: 64,
    STORAGE: 128,
    INDIRECT: 256,
  };

export const GPU_TEXTURE_USAGE: { readonly COPY_DST: number; readonly TEXTURE_BINDING: number } =
  (globalThis as unknown as { GPUTextureUsage?: { COPY_DST: number; TEXTURE_BINDING: number } })
    .GPUTextureUsage ?? { COPY_DST: 2, TEXTURE_BINDING: 4 };

export function toArrayBuffer(view: ArrayBufferView): ArrayBuffer {
  const { buffer, byteOffset, byteLength } = view;

  if (buffer instanceof ArrayBuffer) {
    if (byteOffset === 0 && byteLength === buffer.byteLength) {
      return buffer;
    }
    return buffer.slice(byteOffset, byteOffset + byteLength);
  }

  const copy = new ArrayBuffer(byteLength);
  new Uint8Array(copy).set(new Uint8Array(buffer, byteOffset, byteLength));
  return copy;
}

/**
 * Doubles until the request fits. Never returns less than `floor`.
 */
export function growCapacity(current: number, required: number, floor: number): number {
  return Math.max(floor, current * 2, required);
}
