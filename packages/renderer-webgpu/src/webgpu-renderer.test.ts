import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DeviceDispatchFailureError,
  createOrthographicCamera,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
} from '@lumen2d/renderer-contract';

import { createStubGpuEnvironment } from './__fixtures__/stub-device.js';
import type { StubGpuEnvironment } from './__fixtures__/stub-device.js';
import {
  __test__,
  createWebGpuRenderer,
  WebGpuDeviceLostError,
  WebGpuNotSupportedError,
} from './webgpu-renderer.js';

describe('renderer-webgpu', () => {
  const originalNavigatorDescriptor = Object.getOwnPropertyDescriptor(globalThis, 'navigator');
  const originalDevicePixelRatioDescriptor = Object.getOwnPropertyDescriptor(
    globalThis,
    'devicePixelRatio',
  );

  function setNavigator(value: unknown): void {
    Object.defineProperty(globalThis, 'navigator', {
      value,
      configurable: true,
      enumerable: true,
      writable: true,
    });
  }

  function setDevicePixelRatio(value: number): void {
    Object.defineProperty(globalThis, 'devicePixelRatio', {
      value,
      configurable: true,
      enumerable: true,
      writable: true,
    });
  }

  async function flushMicrotasks(maxTurns = 10): Promise<void> {
    for (let i = 0; i < maxTurns; i += 1) {
      await Promise.resolve();
    }
  }

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    resetTelemetry();
    if (originalNavigatorDescriptor) {
      Object.defineProperty(globalThis, 'navigator', originalNavigatorDescriptor);
    } else {
      delete (globalThis as unknown as { navigator?: unknown }).navigator;
    }

    if (originalDevicePixelRatioDescriptor) {
      Object.defineProperty(globalThis, 'devicePixelRatio', originalDevicePixelRatioDescriptor);
    } else {
      delete (globalThis as unknown as { devicePixelRatio?: number }).devicePixelRatio;
    }
  });

  it('derives a sane canvas pixel size', () => {
    const canvas = {
      clientWidth: 0,
      clientHeight: 10,
    } as HTMLCanvasElement;

    expect(__test__.getCanvasPixelSize(canvas, 2)).toEqual({ width: 1, height: 20 });
  });

  describe('createWebGpuRenderer', () => {
    function createStubCanvasEnvironment(options?: {
      configureImplementation?: (configuration: GPUCanvasConfiguration) => void;
      includeGetPreferredCanvasFormat?: boolean;
      legacyPreferredFormat?: (adapter: GPUAdapter) => GPUTextureFormat;
    }): StubGpuEnvironment & {
      canvas: HTMLCanvasElement;
      context: GPUCanvasContext;
      adapter: GPUAdapter;
      configure: ReturnType<typeof vi.fn>;
      requestDevice: ReturnType<typeof vi.fn>;
    } {
      const gpuEnv = createStubGpuEnvironment();
      const configure = vi.fn(
        options?.configureImplementation ?? ((_configuration: GPUCanvasConfiguration) => undefined),
      );

      const requestDevice = vi.fn(async () => gpuEnv.device);
      const adapter = {
        features: { has: () => true },
        requestDevice,
      } as unknown as GPUAdapter;

      const gpu: Record<string, unknown> = { requestAdapter: vi.fn(async () => adapter) };
      if (options?.includeGetPreferredCanvasFormat !== false) {
        gpu.getPreferredCanvasFormat = vi.fn(() => 'bgra8unorm');
      }
      setNavigator({ gpu });

      const view = { label: 'canvas-view' };
      const texture = { createView: vi.fn(() => view) };
      const context = {
        configure,
        getCurrentTexture: vi.fn(() => texture),
        ...(options?.legacyPreferredFormat
          ? { getPreferredFormat: vi.fn(options.legacyPreferredFormat) }
          : {}),
      } as unknown as GPUCanvasContext;

      const canvas = {
        clientWidth: 100,
        clientHeight: 50,
        width: 0,
        height: 0,
        getContext: vi.fn(() => context),
      } as unknown as HTMLCanvasElement;

      return { ...gpuEnv, canvas, context, adapter, configure, requestDevice };
    }

    it('throws when WebGPU is unavailable', async () => {
      setNavigator(undefined);

      const canvas = {} as unknown as HTMLCanvasElement;
      await expect(createWebGpuRenderer(canvas)).rejects.toBeInstanceOf(WebGpuNotSupportedError);
    });

    it('throws when an adapter cannot be acquired', async () => {
      const requestAdapter = vi.fn(async () => null);
      setNavigator({ gpu: { requestAdapter } });

      const canvas = {} as unknown as HTMLCanvasElement;
      await expect(createWebGpuRenderer(canvas)).rejects.toThrow('WebGPU adapter not found.');
    });

    it('throws when required features are missing', async () => {
      const requestDevice = vi.fn();
      const hasFeature = vi.fn(() => false);
      const adapter = { features: { has: hasFeature }, requestDevice };
      setNavigator({ gpu: { requestAdapter: vi.fn(async () => adapter) } });

      const requiredFeature = 'timestamp-query' as unknown as GPUFeatureName;
      const canvas = {} as unknown as HTMLCanvasElement;

      await expect(
        createWebGpuRenderer(canvas, { requiredFeatures: [requiredFeature] }),
      ).rejects.toThrow(`Required WebGPU feature not supported: ${requiredFeature}`);
      expect(hasFeature).toHaveBeenCalledWith(requiredFeature);
      expect(requestDevice).not.toHaveBeenCalled();
    });

    it('passes requiredFeatures through to requestDevice', async () => {
      const env = createStubCanvasEnvironment();
      const requiredFeature = 'timestamp-query' as unknown as GPUFeatureName;

      await createWebGpuRenderer(env.canvas, {
        requiredFeatures: [requiredFeature],
        deviceDescriptor: {
          requiredFeatures: ['depth-clip-control'] as unknown as GPUFeatureName[],
        },
      });

      expect(env.requestDevice).toHaveBeenCalledTimes(1);
      expect(env.requestDevice.mock.calls[0]?.[0]).toMatchObject({
        requiredFeatures: [requiredFeature],
      });
    });

    it('throws when a WebGPU canvas context cannot be acquired', async () => {
      createStubCanvasEnvironment();
      const canvas = { getContext: vi.fn(() => null) } as unknown as HTMLCanvasElement;

      await expect(createWebGpuRenderer(canvas)).rejects.toThrow(
        'Failed to acquire WebGPU canvas context.',
      );
    });

    it('wraps canvas configuration failures', async () => {
      const env = createStubCanvasEnvironment({
        configureImplementation: () => {
          throw new Error('bad format');
        },
      });

      await expect(createWebGpuRenderer(env.canvas)).rejects.toThrow(
        'Failed to configure WebGPU canvas context (format: bgra8unorm): bad format',
      );
    });

    it('prefers explicit formats, then the navigator, then the legacy context', async () => {
      const explicit = createStubCanvasEnvironment();
      const first = await createWebGpuRenderer(explicit.canvas, {
        preferredFormats: ['rgba8unorm'],
      });
      expect(first.format).toBe('rgba8unorm');

      const legacy = createStubCanvasEnvironment({
        includeGetPreferredCanvasFormat: false,
        legacyPreferredFormat: () => 'rgba16float',
      });
      const second = await createWebGpuRenderer(legacy.canvas);
      expect(second.format).toBe('rgba16float');

      const fallback = createStubCanvasEnvironment({ includeGetPreferredCanvasFormat: false });
      const third = await createWebGpuRenderer(fallback.canvas);
      expect(third.format).toBe('bgra8unorm');
    });

    it('resolves configuration overrides', async () => {
      const env = createStubCanvasEnvironment();

      const renderer = await createWebGpuRenderer(env.canvas, {
        config: { culling: { mode: 'cpu' }, points: { pointSizePx: 3 } },
      });

      expect(renderer.config.culling.mode).toBe('cpu');
      expect(renderer.config.points.pointSizePx).toBe(3);
      expect(renderer.config.limits.maxInstancesPerClass).toBe(1_048_576);
    });

    it('sizes the canvas from its client box and device pixel ratio', async () => {
      setDevicePixelRatio(2);
      const env = createStubCanvasEnvironment();

      const renderer = await createWebGpuRenderer(env.canvas);

      expect(env.canvas.width).toBe(200);
      expect(env.canvas.height).toBe(100);
      expect(env.configure).toHaveBeenCalledTimes(2);

      renderer.resize({ devicePixelRatio: 2 });
      expect(env.configure).toHaveBeenCalledTimes(2);
    });

    it('follows the canvas size with its default camera', async () => {
      const env = createStubCanvasEnvironment();
      const renderer = await createWebGpuRenderer(env.canvas);
      renderer.resize({ devicePixelRatio: 1 });

      renderer.queueInstance('quad', { position: { x: 1, y: 1 }, scale: { x: 2, y: 2 }, rotation: 0 }, {
        r: 1,
        g: 1,
        b: 1,
        a: 1,
      });
      renderer.render();

      const [camera] = env.writesTo('camera');
      const floats = new Float32Array(camera ?? new ArrayBuffer(0));
      expect(Array.from(floats.slice(16, 19))).toEqual([100, 50, 1]);
    });

    it('keeps a custom camera across resizes until it is cleared', async () => {
      const env = createStubCanvasEnvironment();
      const renderer = await createWebGpuRenderer(env.canvas);

      renderer.setCamera(createOrthographicCamera(640, 480));
      renderer.resize({ devicePixelRatio: 3 });
      renderer.render();
      renderer.setCamera(undefined);
      renderer.render();

      const sizes = env
        .writesTo('camera')
        .map((payload) => Array.from(new Float32Array(payload).slice(16, 18)));
      expect(sizes).toEqual([
        [640, 480],
        [300, 150],
      ]);
    });

    it('keeps the screen layer on canvas pixels under a custom camera', async () => {
      const env = createStubCanvasEnvironment();
      const renderer = await createWebGpuRenderer(env.canvas);

      renderer.setCamera(createOrthographicCamera(640, 480));
      renderer.resize({ devicePixelRatio: 3 });
      renderer.layer('screen').strokeRect({ x: 4, y: 4, width: 20, height: 10 }, {
        r: 1,
        g: 0,
        b: 0,
        a: 1,
      });
      const report = renderer.render();

      expect(report.immediateVertices).toBe(8);
      const [screen] = env.writesTo('camera:screen');
      expect(Array.from(new Float32Array(screen ?? new ArrayBuffer(0)).slice(16, 18))).toEqual([
        300, 150,
      ]);
      expect(
        env.writesTo('camera').map((payload) => Array.from(new Float32Array(payload).slice(16, 18))),
      ).toEqual([[640, 480]]);
    });

    it('renders into the current canvas texture', async () => {
      const env = createStubCanvasEnvironment();
      const renderer = await createWebGpuRenderer(env.canvas);

      const report = renderer.render({ clearColor: { r: 0, g: 0, b: 1, a: 1 } });

      expect(report.submitted).toBe(true);
      expect(env.beginRenderPass.mock.calls[0]?.[0]).toMatchObject({
        colorAttachments: [{ view: { label: 'canvas-view' }, clearValue: { r: 0, g: 0, b: 1, a: 1 } }],
      });
    });

    it('notifies and fails frames when the device is lost', async () => {
      const recording = createRecordingTelemetry();
      setTelemetry(recording);
      const env = createStubCanvasEnvironment();
      const onDeviceLost = vi.fn();
      const renderer = await createWebGpuRenderer(env.canvas, { onDeviceLost });

      env.resolveDeviceLost({ reason: 'destroyed', message: 'gpu reset' } as GPUDeviceLostInfo);
      await flushMicrotasks();

      expect(onDeviceLost).toHaveBeenCalledTimes(1);
      const lost: unknown = onDeviceLost.mock.calls[0]?.[0];
      expect(lost).toBeInstanceOf(WebGpuDeviceLostError);
      expect(lost).toMatchObject({ message: 'WebGPU device lost: gpu reset', reason: 'destroyed' });
      expect(recording.payloads('DeviceLost')).toEqual([
        { reason: 'destroyed', message: 'gpu reset' },
      ]);

      const report = renderer.render();
      expect(report.submitted).toBe(false);
      expect(report.error).toBeInstanceOf(DeviceDispatchFailureError);
      expect(report.error?.message).toBe(
        'WebGPU device lost before frame 1: WebGPU device lost: gpu reset',
      );
      expect(() =>
        renderer.setAtlas('sprite', { width: 1, height: 1, pixels: new Uint8Array(4) }),
      ).toThrow('WebGPU device is lost.');
    });

    it('ignores device loss after dispose', async () => {
      const env = createStubCanvasEnvironment();
      const onDeviceLost = vi.fn();
      const renderer = await createWebGpuRenderer(env.canvas, { onDeviceLost });

      renderer.dispose();
      env.resolveDeviceLost({ reason: 'destroyed', message: '' } as GPUDeviceLostInfo);
      await flushMicrotasks();

      expect(onDeviceLost).not.toHaveBeenCalled();
      expect(() => renderer.render()).toThrow('WebGPU renderer is disposed.');
      expect(env.findBuffer('camera')?.destroy).toHaveBeenCalledTimes(1);
    });
  });
});
