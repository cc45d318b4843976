import { describe, expect, it } from 'vitest';
import type { Color } from '@lumen2d/renderer-contract';

import { createStubGpuEnvironment } from './__fixtures__/stub-device.js';
import { ImmediateBatch } from './immediate-batch.js';
import { PipelineSet } from './pipeline-set.js';

const green: Color = { r: 0, g: 1, b: 0, a: 1 };

describe('ImmediateBatch', () => {
  it('counts vertices across both topologies', () => {
    const env = createStubGpuEnvironment();
    const batch = new ImmediateBatch(env.device, 4);

    batch.pushTriangle({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }, green);
    batch.pushLine({ x: 0, y: 0 }, { x: 5, y: 5 }, green);

    expect(batch.vertexCount).toBe(5);
  });

  it('skips the device when nothing is queued', () => {
    const env = createStubGpuEnvironment();
    const batch = new ImmediateBatch(env.device);

    expect(batch.upload()).toBe(false);
    expect(env.createBuffer).not.toHaveBeenCalled();
  });

  it('uploads interleaved position and color', () => {
    const env = createStubGpuEnvironment();
    const batch = new ImmediateBatch(env.device, 2);

    batch.pushLine({ x: 3, y: 4 }, { x: 5, y: 6 }, green);
    expect(batch.upload()).toBe(true);

    expect(env.findBuffer('immediate:line-list')?.size).toBe(48);
    const [payload] = env.writesTo('immediate:line-list');
    expect(Array.from(new Float32Array(payload ?? new ArrayBuffer(0)))).toEqual([
      3, 4, 0, 1, 0, 1, 5, 6, 0, 1, 0, 1,
    ]);
    expect(env.findBuffer('immediate:triangle-list')).toBeUndefined();
  });

  it('grows past its initial capacity', () => {
    const env = createStubGpuEnvironment();
    const batch = new ImmediateBatch(env.device, 2);

    batch.pushTriangle({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }, green);
    batch.pushTriangle({ x: 2, y: 2 }, { x: 3, y: 2 }, { x: 2, y: 3 }, green);
    batch.upload();

    expect(env.findBuffer('immediate:triangle-list')?.size).toBe(6 * 24);
    const [payload] = env.writesTo('immediate:triangle-list');
    expect(new Float32Array(payload ?? new ArrayBuffer(0))[30]).toBe(2);
  });

  it('draws each non-empty topology with its own pipeline', () => {
    const env = createStubGpuEnvironment();
    const pipelines = new PipelineSet(env.device, 'bgra8unorm');
    const batch = new ImmediateBatch(env.device);

    batch.pushTriangle({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }, green);
    batch.pushLine({ x: 0, y: 0 }, { x: 5, y: 5 }, green);
    batch.upload();
    const draws = batch.encode(env.renderPass as unknown as GPURenderPassEncoder, pipelines);

    expect(draws).toBe(2);
    expect(env.renderPass.setPipeline.mock.calls).toEqual([
      [pipelines.getImmediatePipeline('triangle-list')],
      [pipelines.getImmediatePipeline('line-list')],
    ]);
    expect(env.renderPass.draw.mock.calls).toEqual([[3], [2]]);
  });

  it('fills a rectangle with two triangles', () => {
    const env = createStubGpuEnvironment();
    const batch = new ImmediateBatch(env.device);

    batch.fillRect({ x: 10, y: 20, width: 30, height: 40 }, green);
    batch.upload();

    expect(batch.vertexCount).toBe(6);
    const floats = new Float32Array(env.writesTo('immediate:triangle-list')[0] ?? new ArrayBuffer(0));
    const corners = Array.from({ length: 6 }, (_, vertex) => [floats[vertex * 6], floats[vertex * 6 + 1]]);
    expect(corners).toEqual([
      [10, 20],
      [40, 20],
      [40, 60],
      [10, 20],
      [40, 60],
      [10, 60],
    ]);
    expect(env.findBuffer('immediate:line-list')).toBeUndefined();
  });

  it('strokes a rectangle as four closed edges', () => {
    const env = createStubGpuEnvironment();
    const batch = new ImmediateBatch(env.device);

    batch.strokeRect({ x: 0, y: 0, width: 5, height: 2 }, green);
    batch.upload();

    expect(batch.vertexCount).toBe(8);
    const floats = new Float32Array(env.writesTo('immediate:line-list')[0] ?? new ArrayBuffer(0));
    const ends = Array.from({ length: 8 }, (_, vertex) => [floats[vertex * 6], floats[vertex * 6 + 1]]);
    expect(ends).toEqual([
      [0, 0],
      [5, 0],
      [5, 0],
      [5, 2],
      [5, 2],
      [0, 2],
      [0, 2],
      [0, 0],
    ]);
  });

  it('labels screen-layer buffers with their layer', () => {
    const env = createStubGpuEnvironment();
    const batch = new ImmediateBatch(env.device, 4, 'screen');

    batch.pushLine({ x: 0, y: 0 }, { x: 1, y: 1 }, green);
    batch.upload();

    expect(env.findBuffer('immediate:screen:line-list')?.size).toBe(4 * 24);
  });

  it('empties on clear', () => {
    const env = createStubGpuEnvironment();
    const pipelines = new PipelineSet(env.device, 'bgra8unorm');
    const batch = new ImmediateBatch(env.device);
    batch.pushLine({ x: 0, y: 0 }, { x: 1, y: 1 }, green);
    batch.upload();

    batch.clear();

    expect(batch.vertexCount).toBe(0);
    expect(batch.encode(env.renderPass as unknown as GPURenderPassEncoder, pipelines)).toBe(0);
    expect(env.renderPass.draw).not.toHaveBeenCalled();
  });
});
