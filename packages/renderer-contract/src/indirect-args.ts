/**
 * `drawIndirect` argument block: vertexCount, instanceCount, firstVertex,
 * firstInstance. All u32.
 */
export const INDIRECT_ARGS_WORDS = 4;
export const INDIRECT_ARGS_BYTES = INDIRECT_ARGS_WORDS * 4;
export const INDIRECT_INSTANCE_COUNT_WORD = 1;

/**
 * Two triangles per instance.
 */
export const QUAD_VERTEX_COUNT = 6;

export interface IndirectDrawArgs {
  readonly vertexCount: number;
  readonly instanceCount: number;
  readonly firstVertex: number;
  readonly firstInstance: number;
}

/**
 * The state the args buffer is reset to before each culling dispatch.
 */
export function createIndirectDrawArgs(
  vertexCount: number = QUAD_VERTEX_COUNT,
  instanceCount = 0,
): Uint32Array {
  if (!Number.isInteger(vertexCount) || vertexCount < 0) {
    throw new RangeError(`vertexCount must be a non-negative integer (got ${vertexCount}).`);
  }
  if (!Number.isInteger(instanceCount) || instanceCount < 0) {
    throw new RangeError(`instanceCount must be a non-negative integer (got ${instanceCount}).`);
  }
  return Uint32Array.of(vertexCount, instanceCount, 0, 0);
}

export function readIndirectDrawArgs(words: Uint32Array): IndirectDrawArgs {
  return {
    vertexCount: words[0],
    instanceCount: words[INDIRECT_INSTANCE_COUNT_WORD],
    firstVertex: words[2],
    firstInstance: words[3],
  };
}
