import { describe, expect, it } from 'vitest';

import {
  classifyRecordShape,
  createFrustumBounds,
  createViewportBounds,
  getCullWorkgroupCount,
  isVisible,
  packCullingUniforms,
  runSoftwareCulling,
} from './culling.js';
import { createOrthographicCamera } from './camera.js';
import { createIndirectDrawArgs } from './indirect-args.js';
import { encodeInstanceInto } from './instance-encoder.js';
import { INSTANCE_LAYOUTS } from './layouts.js';
import { layoutTextRun } from './text-run.js';
import type { DrawClass, InstanceTransform, UvRegion, Vec2 } from './types.js';

const WHITE = { r: 1, g: 1, b: 1, a: 1 };
const UV: UvRegion = { offset: { u: 0, v: 0 }, scale: { u: 1, v: 1 } };
const viewport = createViewportBounds({ x: 0, y: 0, width: 800, height: 600 });

function buildBatch(
  drawClass: DrawClass,
  items: readonly { position: Vec2; scale?: Vec2 }[],
): Float32Array {
  const stride = INSTANCE_LAYOUTS[drawClass].strideWords;
  const words = new Float32Array(items.length * stride);
  items.forEach((item, index) => {
    const transform: InstanceTransform = {
      position: item.position,
      scale: item.scale ?? { x: 0, y: 0 },
      rotation: 0,
    };
    encodeInstanceInto(words, index * stride, drawClass, transform, WHITE, UV);
  });
  return words;
}

function cull(drawClass: DrawClass, batch: Float32Array, instanceCount: number) {
  const recordWords = INSTANCE_LAYOUTS[drawClass].strideWords;
  const source = new Uint32Array(batch.buffer);
  const output = new Uint32Array(source.length);
  const drawArgs = createIndirectDrawArgs();
  const result = runSoftwareCulling({
    source,
    recordWords,
    instanceCount,
    bounds: viewport,
    output,
    drawArgs,
  });
  return { result, output, drawArgs };
}

describe('classifyRecordShape', () => {
  it('treats extents strictly inside (0, maxAreaExtent) as areas', () => {
    expect(classifyRecordShape(20, 20)).toBe('area');
    expect(classifyRecordShape(9_999, 1)).toBe('area');
  });

  it('treats zero, negative and oversized extents as points', () => {
    expect(classifyRecordShape(0, 0)).toBe('point');
    expect(classifyRecordShape(20, 0)).toBe('point');
    expect(classifyRecordShape(-5, 5)).toBe('point');
    expect(classifyRecordShape(10_000, 10)).toBe('point');
  });

  it('honours a custom threshold', () => {
    expect(classifyRecordShape(200, 200, 100)).toBe('point');
  });
});

describe('isVisible', () => {
  it('keeps points on the viewport edges', () => {
    expect(isVisible(viewport, 0, 300, 0, 0)).toBe(true);
    expect(isVisible(viewport, 800, 300, 0, 0)).toBe(true);
    expect(isVisible(viewport, 400, 0, 0, 0)).toBe(true);
    expect(isVisible(viewport, 400, 600, 0, 0)).toBe(true);
  });

  it('drops points just past an edge', () => {
    expect(isVisible(viewport, -0.5, 300, 0, 0)).toBe(false);
    expect(isVisible(viewport, 800.5, 300, 0, 0)).toBe(false);
  });

  it('keeps area objects that straddle an edge', () => {
    expect(isVisible(viewport, -5, 300, 20, 20)).toBe(true);
    expect(isVisible(viewport, -10, 300, 20, 20)).toBe(true);
    expect(isVisible(viewport, -10.5, 300, 20, 20)).toBe(false);
  });

  it('tests oversized records as points', () => {
    expect(isVisible(viewport, -5, 300, 20_000, 20_000)).toBe(false);
  });

  it('culls against frustum planes of an orthographic camera', () => {
    const bounds = createFrustumBounds(createOrthographicCamera(800, 600).viewProjection);

    expect(isVisible(bounds, 400, 300, 0, 0)).toBe(true);
    expect(isVisible(bounds, 10, 590, 0, 0)).toBe(true);
    expect(isVisible(bounds, -50, 300, 0, 0)).toBe(false);
    expect(isVisible(bounds, 400, 650, 0, 0)).toBe(false);
  });
});

describe('createViewportBounds', () => {
  it('orders planes left, right, top, bottom, then two pass-through planes', () => {
    const bounds = createViewportBounds({ x: 10, y: 20, width: 100, height: 50 });

    expect(Array.from(bounds.planes)).toEqual([
      1, 0, 0, -10,
      -1, 0, 0, 110,
      0, 1, 0, -20,
      0, -1, 0, 70,
      0, 0, 0, 1,
      0, 0, 0, 1,
    ]);
  });
});

describe('runSoftwareCulling', () => {
  it('keeps the 50 of 100 points that fall inside an 800x600 viewport', () => {
    const items = Array.from({ length: 100 }, (_, index) =>
      index < 50
        ? { position: { x: 10 + index * 10, y: 300 } }
        : { position: { x: -100 - index, y: 300 } },
    );
    const batch = buildBatch('primitive', items);

    const { result, output, drawArgs } = cull('primitive', batch, 100);

    expect(result).toEqual({ workgroupCount: 2, invocationCount: 128, visibleCount: 50 });
    expect(Array.from(drawArgs)).toEqual([6, 50, 0, 0]);

    const floats = new Float32Array(output.buffer);
    const xs = Array.from({ length: 50 }, (_, slot) => floats[slot * 8]);
    expect(xs).toEqual(Array.from({ length: 50 }, (_, index) => 10 + index * 10));
    expect(floats[50 * 8]).toBe(0);
  });

  it('keeps a 20x20 rect at the viewport centre through the area path', () => {
    const batch = buildBatch('quad', [{ position: { x: 400, y: 300 }, scale: { x: 20, y: 20 } }]);

    const { result, output } = cull('quad', batch, 1);

    expect(classifyRecordShape(20, 20)).toBe('area');
    expect(result.visibleCount).toBe(1);
    expect(Array.from(new Float32Array(output.buffer, 0, 8))).toEqual([
      400, 300, 20, 20, 1, 1, 1, 1,
    ]);
  });

  it('copies whole multi-block records', () => {
    const batch = buildBatch('sprite', [
      { position: { x: -500, y: -500 }, scale: { x: 8, y: 8 } },
      { position: { x: 32, y: 64 }, scale: { x: 8, y: 8 } },
    ]);

    const { result, output } = cull('sprite', batch, 2);

    expect(result.visibleCount).toBe(1);
    expect(Array.from(output.subarray(0, 16))).toEqual(
      Array.from(new Uint32Array(batch.buffer, 16 * 4, 16)),
    );
  });

  it('writes nothing for an empty batch', () => {
    const { result, drawArgs } = cull('quad', new Float32Array(0), 0);

    expect(result).toEqual({ workgroupCount: 0, invocationCount: 0, visibleCount: 0 });
    expect(Array.from(drawArgs)).toEqual([6, 0, 0, 0]);
  });

  it('rejects record sizes that are not whole blocks', () => {
    expect(() =>
      runSoftwareCulling({
        source: new Uint32Array(12),
        recordWords: 12,
        instanceCount: 1,
        bounds: viewport,
        output: new Uint32Array(12),
        drawArgs: createIndirectDrawArgs(),
      }),
    ).toThrow(RangeError);
  });

  it('rejects outputs that cannot hold every record', () => {
    expect(() =>
      runSoftwareCulling({
        source: new Uint32Array(16),
        recordWords: 8,
        instanceCount: 2,
        bounds: viewport,
        output: new Uint32Array(8),
        drawArgs: createIndirectDrawArgs(),
      }),
    ).toThrow('Culling output cannot hold instanceCount records.');
  });
});

describe('getCullWorkgroupCount', () => {
  it('rounds up to whole workgroups of 64', () => {
    expect(getCullWorkgroupCount(0)).toBe(0);
    expect(getCullWorkgroupCount(1)).toBe(1);
    expect(getCullWorkgroupCount(64)).toBe(1);
    expect(getCullWorkgroupCount(65)).toBe(2);
  });
});

describe('culling headers written by the encoder', () => {
  it('keeps a glyph that sits far from an off-screen pivot', () => {
    const [draw] = layoutTextRun({
      position: { x: -5500, y: 300 },
      color: WHITE,
      glyphs: [{ x: 5600, y: 0, width: 8, height: 12, uv: UV }],
    });
    const batch = new Float32Array(INSTANCE_LAYOUTS.glyph.strideWords);
    if (draw) {
      encodeInstanceInto(batch, 0, 'glyph', draw.transform, draw.color, draw.uvRegion);
    }

    expect(Array.from(batch.subarray(0, 4))).toEqual([104, 306, 8, 12]);
    expect(cull('glyph', batch, 1).result.visibleCount).toBe(1);
  });

  it('drops a glyph whose own box is off screen even when its pivot is visible', () => {
    const [draw] = layoutTextRun({
      position: { x: 400, y: 300 },
      color: WHITE,
      glyphs: [{ x: 1000, y: 0, width: 8, height: 12, uv: UV }],
    });
    const batch = new Float32Array(INSTANCE_LAYOUTS.glyph.strideWords);
    if (draw) {
      encodeInstanceInto(batch, 0, 'glyph', draw.transform, draw.color, draw.uvRegion);
    }

    expect(cull('glyph', batch, 1).result.visibleCount).toBe(0);
  });

  it('keeps a mirrored quad whose centre has just left the viewport', () => {
    const batch = buildBatch('quad', [{ position: { x: -1, y: 300 }, scale: { x: -4, y: 4 } }]);

    expect(Array.from(batch.subarray(0, 4))).toEqual([-1, 300, 4, 4]);
    expect(cull('quad', batch, 1).result.visibleCount).toBe(1);
  });
});

describe('packCullingUniforms', () => {
  it('packs planes, counts and the area threshold into 112 bytes', () => {
    const data = packCullingUniforms({
      bounds: viewport,
      instanceCount: 100,
      recordWords: 16,
      maxAreaExtent: 10_000,
    });

    expect(data.byteLength).toBe(112);
    expect(Array.from(new Float32Array(data, 0, 24))).toEqual(Array.from(viewport.planes));
    expect(Array.from(new Uint32Array(data, 96, 2))).toEqual([100, 16]);
    expect(new Float32Array(data, 104, 1)[0]).toBe(10_000);
    expect(new Uint32Array(data, 108, 1)[0]).toBe(0);
  });

  it('rejects malformed bounds', () => {
    expect(() =>
      packCullingUniforms({
        bounds: { planes: new Float32Array(4) },
        instanceCount: 0,
        recordWords: 8,
        maxAreaExtent: 1,
      }),
    ).toThrow('Culling bounds need 24 plane components (got 4).');
  });
});
