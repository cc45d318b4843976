import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { createViewportBounds, runSoftwareCulling } from './culling.js';
import { createIndirectDrawArgs } from './indirect-args.js';
import { encodeInstanceInto } from './instance-encoder.js';
import { INSTANCE_LAYOUTS } from './layouts.js';
import type { DrawClass, Vec2 } from './types.js';

const PROPERTY_SEED = 31_337;
const PROPERTY_RUNS = 200;
const VIEW_WIDTH = 800;
const VIEW_HEIGHT = 600;
const MAX_INSTANCES = 300;

const propertyConfig = (offset: number): fc.Parameters<unknown> => ({
  seed: PROPERTY_SEED + offset,
  numRuns: PROPERTY_RUNS,
  endOnFailure: true,
});

const bounds = createViewportBounds({ x: 0, y: 0, width: VIEW_WIDTH, height: VIEW_HEIGHT });

interface Placement {
  readonly position: Vec2;
  readonly size: Vec2;
}

const f32 = (min: number, max: number): fc.Arbitrary<number> =>
  fc.float({ min, max, noNaN: true, noDefaultInfinity: true });

const insidePlacement: fc.Arbitrary<Placement> = fc.record({
  position: fc.record({ x: f32(0, VIEW_WIDTH), y: f32(0, VIEW_HEIGHT) }),
  size: fc.record({ x: f32(0, 64), y: f32(0, 64) }),
});

// Far enough right that no area object can reach back into view.
const outsidePlacement: fc.Arbitrary<Placement> = fc.record({
  position: fc.record({ x: f32(900, 5000), y: f32(-5000, 5000) }),
  size: fc.record({ x: f32(0, 64), y: f32(0, 64) }),
});

const anyPlacement: fc.Arbitrary<Placement> = fc.record({
  position: fc.record({ x: f32(-400, 1200), y: f32(-400, 1000) }),
  size: fc.record({ x: f32(0, 128), y: f32(0, 128) }),
});

function encodeBatch(drawClass: DrawClass, placements: readonly Placement[]): Uint32Array {
  const stride = INSTANCE_LAYOUTS[drawClass].strideWords;
  const words = new Float32Array(placements.length * stride);
  placements.forEach((placement, index) => {
    encodeInstanceInto(
      words,
      index * stride,
      drawClass,
      { position: placement.position, scale: placement.size, rotation: 0 },
      { r: 1, g: 1, b: 1, a: 1 },
    );
  });
  return new Uint32Array(words.buffer);
}

function cullBatch(
  source: Uint32Array,
  instanceCount: number,
  invocationOrder?: (count: number) => Iterable<number>,
): { count: number; records: string[] } {
  const recordWords = 8;
  const output = new Uint32Array(source.length);
  const drawArgs = createIndirectDrawArgs();
  const result = runSoftwareCulling({
    source,
    recordWords,
    instanceCount,
    bounds,
    output,
    drawArgs,
    invocationOrder,
  });

  const records: string[] = [];
  for (let slot = 0; slot < result.visibleCount; slot += 1) {
    records.push(Array.from(output.subarray(slot * recordWords, (slot + 1) * recordWords)).join(','));
  }
  return { count: drawArgs[1], records };
}

describe('software culling properties', () => {
  it('keeps every fully contained instance', () => {
    fc.assert(
      fc.property(fc.array(insidePlacement, { maxLength: MAX_INSTANCES }), (placements) => {
        const source = encodeBatch('quad', placements);

        expect(cullBatch(source, placements.length).count).toBe(placements.length);
      }),
      propertyConfig(0),
    );
  });

  it('drops every fully outside instance', () => {
    fc.assert(
      fc.property(fc.array(outsidePlacement, { maxLength: MAX_INSTANCES }), (placements) => {
        const source = encodeBatch('quad', placements);
        const { count, records } = cullBatch(source, placements.length);

        expect(count).toBe(0);
        expect(records).toEqual([]);
      }),
      propertyConfig(1),
    );
  });

  it('produces the same set and count regardless of invocation order', () => {
    fc.assert(
      fc.property(
        fc.array(anyPlacement, { maxLength: MAX_INSTANCES }),
        fc.nat(),
        (placements, rotation) => {
          const source = encodeBatch('primitive', placements);
          const rotated = (count: number): number[] =>
            Array.from({ length: count }, (_, index) => (index + rotation) % count);

          const first = cullBatch(source, placements.length);
          const second = cullBatch(source, placements.length, rotated);

          expect(second.count).toBe(first.count);
          expect([...second.records].sort()).toEqual([...first.records].sort());
          expect(first.count).toBeLessThanOrEqual(placements.length);
        },
      ),
      propertyConfig(2),
    );
  });
});
