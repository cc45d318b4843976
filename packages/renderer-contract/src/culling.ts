import { HEADER_EXTENT_WORD, HEADER_POSITION_WORD, RECORD_BLOCK_WORDS } from './layouts.js';
import { INDIRECT_INSTANCE_COUNT_WORD } from './indirect-args.js';
import type { BoundsRect } from './types.js';

export const CULL_WORKGROUP_SIZE = 64;
export const CULL_PLANE_COUNT = 6;
export const DEFAULT_MAX_AREA_EXTENT = 10_000;

/**
 * `planes` plus instanceCount, recordWords, maxAreaExtent and one pad word.
 */
export const CULL_UNIFORM_BYTES = CULL_PLANE_COUNT * 16 + 16;

/**
 * Six `(a, b, c, d)` planes packed back to back. A point is inside a plane when
 * `a * x + b * y + c * z + d >= 0`.
 */
export interface CullingBounds {
  readonly planes: Float32Array;
}

export type RecordShape = 'area' | 'point';

export interface CullingUniforms {
  readonly bounds: CullingBounds;
  readonly instanceCount: number;
  readonly recordWords: number;
  readonly maxAreaExtent: number;
}

const ALWAYS_INSIDE_PLANE = [0, 0, 0, 1] as const;

export function createViewportBounds(rect: BoundsRect): CullingBounds {
  const planes = new Float32Array(CULL_PLANE_COUNT * 4);
  planes.set([1, 0, 0, -rect.x], 0);
  planes.set([-1, 0, 0, rect.x + rect.width], 4);
  planes.set([0, 1, 0, -rect.y], 8);
  planes.set([0, -1, 0, rect.y + rect.height], 12);
  planes.set(ALWAYS_INSIDE_PLANE, 16);
  planes.set(ALWAYS_INSIDE_PLANE, 20);
  return { planes };
}

/**
 * Extracts the six clip planes of a column-major view-projection matrix whose
 * clip-space depth range is [0, 1].
 */
export function createFrustumBounds(viewProjection: Float32Array): CullingBounds {
  if (viewProjection.length < 16) {
    throw new RangeError(`View-projection matrix needs 16 elements (got ${viewProjection.length}).`);
  }

  const m = viewProjection;
  const row = (index: number): readonly [number, number, number, number] => [
    m[index],
    m[index + 4],
    m[index + 8],
    m[index + 12],
  ];
  const r0 = row(0);
  const r1 = row(1);
  const r2 = row(2);
  const r3 = row(3);

  const planes = new Float32Array(CULL_PLANE_COUNT * 4);
  const add = (a: readonly number[], b: readonly number[], sign: 1 | -1): number[] =>
    a.map((value, index) => value + sign * b[index]);

  planes.set(add(r3, r0, 1), 0);
  planes.set(add(r3, r0, -1), 4);
  planes.set(add(r3, r1, -1), 8);
  planes.set(add(r3, r1, 1), 12);
  planes.set(r2, 16);
  planes.set(add(r3, r2, -1), 20);
  return { planes };
}

/**
 * Packs the uniform block read by the culling compute shader.
 */
export function packCullingUniforms(uniforms: CullingUniforms): ArrayBuffer {
  if (uniforms.bounds.planes.length !== CULL_PLANE_COUNT * 4) {
    throw new RangeError(
      `Culling bounds need ${CULL_PLANE_COUNT * 4} plane components (got ${uniforms.bounds.planes.length}).`,
    );
  }

  const data = new ArrayBuffer(CULL_UNIFORM_BYTES);
  const floats = new Float32Array(data);
  const words = new Uint32Array(data);
  floats.set(uniforms.bounds.planes, 0);
  words[CULL_PLANE_COUNT * 4] = uniforms.instanceCount;
  words[CULL_PLANE_COUNT * 4 + 1] = uniforms.recordWords;
  floats[CULL_PLANE_COUNT * 4 + 2] = uniforms.maxAreaExtent;
  return data;
}

export function classifyRecordShape(
  width: number,
  height: number,
  maxAreaExtent: number = DEFAULT_MAX_AREA_EXTENT,
): RecordShape {
  const isArea =
    width > 0 && width < maxAreaExtent && height > 0 && height < maxAreaExtent;
  return isArea ? 'area' : 'point';
}

/**
 * Inclusive test: an object touching a plane counts as inside.
 */
export function isVisible(
  bounds: CullingBounds,
  x: number,
  y: number,
  width: number,
  height: number,
  maxAreaExtent: number = DEFAULT_MAX_AREA_EXTENT,
): boolean {
  const area = classifyRecordShape(width, height, maxAreaExtent) === 'area';
  const halfWidth = area ? width * 0.5 : 0;
  const halfHeight = area ? height * 0.5 : 0;
  const { planes } = bounds;

  for (let plane = 0; plane < CULL_PLANE_COUNT; plane += 1) {
    const a = planes[plane * 4];
    const b = planes[plane * 4 + 1];
    const d = planes[plane * 4 + 3];
    const distance = a * x + b * y + d;
    const reach = Math.abs(a) * halfWidth + Math.abs(b) * halfHeight;
    if (distance + reach < 0) {
      return false;
    }
  }
  return true;
}

export interface SoftwareCullingOptions {
  /**
   * Source records as raw words, `recordWords` per instance.
   */
  readonly source: Uint32Array;
  readonly recordWords: number;
  readonly instanceCount: number;
  readonly bounds: CullingBounds;
  /**
   * Receives compacted records. Must hold `instanceCount * recordWords` words.
   */
  readonly output: Uint32Array;
  /**
   * Indirect args `{ vertexCount, instanceCount, firstVertex, firstInstance }`;
   * the instance count must already be reset to zero.
   */
  readonly drawArgs: Uint32Array;
  readonly maxAreaExtent?: number;
  /**
   * Order in which invocations reach the atomic. Defaults to index order.
   */
  readonly invocationOrder?: (invocationCount: number) => Iterable<number>;
}

export interface SoftwareCullingResult {
  readonly workgroupCount: number;
  readonly invocationCount: number;
  readonly visibleCount: number;
}

export function getCullWorkgroupCount(instanceCount: number): number {
  return Math.ceil(instanceCount / CULL_WORKGROUP_SIZE);
}

function* sequentialOrder(count: number): Iterable<number> {
  for (let index = 0; index < count; index += 1) {
    yield index;
  }
}

/**
 * Host-side execution of the culling compute pass. Each invocation runs the
 * same steps as the shader, and `Atomics.add` stands in for the device
 * fetch-add that hands out compacted slots.
 */
export function runSoftwareCulling(options: SoftwareCullingOptions): SoftwareCullingResult {
  const { source, recordWords, instanceCount, bounds, output, drawArgs } = options;
  const maxAreaExtent = options.maxAreaExtent ?? DEFAULT_MAX_AREA_EXTENT;

  if (!Number.isInteger(recordWords) || recordWords <= 0 || recordWords % RECORD_BLOCK_WORDS !== 0) {
    throw new RangeError(`recordWords must be a positive multiple of ${RECORD_BLOCK_WORDS} (got ${recordWords}).`);
  }
  if (source.length < instanceCount * recordWords) {
    throw new RangeError('Culling source is shorter than instanceCount records.');
  }
  if (output.length < instanceCount * recordWords) {
    throw new RangeError('Culling output cannot hold instanceCount records.');
  }

  const workgroupCount = getCullWorkgroupCount(instanceCount);
  const invocationCount = workgroupCount * CULL_WORKGROUP_SIZE;
  const floats = new Float32Array(source.buffer, source.byteOffset, source.length);
  const order = options.invocationOrder ?? sequentialOrder;

  for (const index of order(invocationCount)) {
    if (index >= instanceCount) {
      continue;
    }

    const base = index * recordWords;
    const visible = isVisible(
      bounds,
      floats[base + HEADER_POSITION_WORD],
      floats[base + HEADER_POSITION_WORD + 1],
      floats[base + HEADER_EXTENT_WORD],
      floats[base + HEADER_EXTENT_WORD + 1],
      maxAreaExtent,
    );
    if (!visible) {
      continue;
    }

    const slot = Atomics.add(drawArgs, INDIRECT_INSTANCE_COUNT_WORD, 1);
    output.set(source.subarray(base, base + recordWords), slot * recordWords);
  }

  return {
    workgroupCount,
    invocationCount,
    visibleCount: drawArgs[INDIRECT_INSTANCE_COUNT_WORD],
  };
}
