import {
  createOrthographicCamera,
  describeError,
  resolveRendererConfig,
  telemetry,
} from '@lumen2d/renderer-contract';
import type {
  AtlasImage,
  BoundsRect,
  CameraState,
  Color,
  DrawClass,
  InstanceTransform,
  RenderLayer,
  RendererConfig,
  RendererConfigOverrides,
  TextRun,
  TexturedDrawClass,
  UvRegion,
  Vec2,
} from '@lumen2d/renderer-contract';

import { FrameOrchestrator } from './frame-orchestrator.js';
import type {
  FrameReport,
  LayerQueue,
  QueueResult,
  QueueTextResult,
  RenderFrameOptions,
} from './frame-orchestrator.js';

export class WebGpuNotSupportedError extends Error {
  override name = 'WebGpuNotSupportedError';
}

export class WebGpuDeviceLostError extends Error {
  override name = 'WebGpuDeviceLostError';

  readonly reason: GPUDeviceLostReason | undefined;

  constructor(message: string, reason?: GPUDeviceLostReason) {
    super(message);
    this.reason = reason;
  }
}

export interface WebGpuRendererResizeOptions {
  readonly devicePixelRatio?: number;
}

export interface WebGpuRendererCreateOptions {
  readonly powerPreference?: GPUPowerPreference;
  readonly alphaMode?: GPUCanvasAlphaMode;
  readonly deviceDescriptor?: GPUDeviceDescriptor;
  readonly requiredFeatures?: readonly GPUFeatureName[];
  readonly preferredFormats?: readonly GPUTextureFormat[];
  readonly config?: RendererConfigOverrides;
  readonly onDeviceLost?: (error: WebGpuDeviceLostError) => void;
}

export interface WebGpuRenderer {
  readonly canvas: HTMLCanvasElement;
  readonly context: GPUCanvasContext;
  readonly device: GPUDevice;
  readonly adapter: GPUAdapter;
  readonly format: GPUTextureFormat;
  readonly config: RendererConfig;

  resize(options?: WebGpuRendererResizeOptions): void;
  /**
   * Replaces the pixel-space camera that otherwise follows the canvas size.
   * Pass `undefined` to go back to it.
   */
  setCamera(camera: CameraState | undefined): void;
  /**
   * Submission surface of `layer`. The screen layer always draws in canvas
   * pixels, after the world.
   */
  layer(layer: RenderLayer): LayerQueue;
  setAtlas(drawClass: TexturedDrawClass, image: AtlasImage): void;
  queueInstance(
    drawClass: DrawClass,
    transform: InstanceTransform,
    color: Color,
    uvRegion?: UvRegion,
  ): QueueResult;
  queueText(run: TextRun): QueueTextResult;
  drawLine(from: Vec2, to: Vec2, color: Color): void;
  drawTriangle(a: Vec2, b: Vec2, c: Vec2, color: Color): void;
  fillRect(rect: BoundsRect, color: Color): void;
  strokeRect(rect: BoundsRect, color: Color): void;
  render(options?: RenderFrameOptions): FrameReport;
  dispose(): void;
}

function getCanvasPixelSize(
  canvas: HTMLCanvasElement,
  devicePixelRatio: number,
): { width: number; height: number } {
  const targetWidth = Math.max(1, Math.floor(canvas.clientWidth * devicePixelRatio));
  const targetHeight = Math.max(1, Math.floor(canvas.clientHeight * devicePixelRatio));
  return { width: targetWidth, height: targetHeight };
}

function configureCanvasContext(options: {
  context: GPUCanvasContext;
  device: GPUDevice;
  format: GPUTextureFormat;
  alphaMode: GPUCanvasAlphaMode;
}): void {
  try {
    options.context.configure({
      device: options.device,
      format: options.format,
      alphaMode: options.alphaMode,
    });
  } catch (error: unknown) {
    const message = describeError(error);
    throw new WebGpuNotSupportedError(
      `Failed to configure WebGPU canvas context (format: ${options.format})${
        message ? `: ${message}` : ''
      }`,
    );
  }
}

class WebGpuRendererImpl implements WebGpuRenderer {
  readonly canvas: HTMLCanvasElement;
  readonly context: GPUCanvasContext;
  readonly adapter: GPUAdapter;
  readonly device: GPUDevice;
  readonly format: GPUTextureFormat;
  readonly config: RendererConfig;

  readonly #alphaMode: GPUCanvasAlphaMode;
  readonly #onDeviceLost: ((error: WebGpuDeviceLostError) => void) | undefined;
  readonly #orchestrator: FrameOrchestrator;
  #disposed = false;
  #lost = false;
  #customCamera = false;

  constructor(options: {
    canvas: HTMLCanvasElement;
    context: GPUCanvasContext;
    adapter: GPUAdapter;
    device: GPUDevice;
    format: GPUTextureFormat;
    alphaMode: GPUCanvasAlphaMode;
    config: RendererConfig;
    onDeviceLost?: (error: WebGpuDeviceLostError) => void;
  }) {
    this.canvas = options.canvas;
    this.context = options.context;
    this.adapter = options.adapter;
    this.device = options.device;
    this.format = options.format;
    this.config = options.config;
    this.#alphaMode = options.alphaMode;
    this.#onDeviceLost = options.onDeviceLost;
    const canvasCamera = createOrthographicCamera(options.canvas.width, options.canvas.height);
    this.#orchestrator = new FrameOrchestrator({
      device: options.device,
      format: options.format,
      config: options.config,
      camera: canvasCamera,
      screenCamera: canvasCamera,
    });

    void this.device.lost
      .then((info) => {
        if (this.#disposed) {
          return;
        }
        this.#lost = true;
        const error = new WebGpuDeviceLostError(
          `WebGPU device lost${info.message ? `: ${info.message}` : ''}`,
          info.reason,
        );
        this.#orchestrator.markDeviceLost(error.message);
        telemetry.emit('DeviceLost', { reason: info.reason, message: info.message });
        try {
          this.#onDeviceLost?.(error);
        } catch (callbackError: unknown) {
          telemetry.emit('DeviceLostCallbackFailed', { message: describeError(callbackError) });
        }
      })
      .catch((error: unknown) => {
        telemetry.emit('DeviceLostWatchFailed', { message: describeError(error) });
      });
  }

  resize(options?: WebGpuRendererResizeOptions): void {
    if (this.#disposed || this.#lost) {
      return;
    }

    const devicePixelRatio =
      options?.devicePixelRatio ?? globalThis.devicePixelRatio ?? 1;
    const { width, height } = getCanvasPixelSize(this.canvas, devicePixelRatio);

    if (this.canvas.width === width && this.canvas.height === height) {
      return;
    }

    this.canvas.width = width;
    this.canvas.height = height;
    configureCanvasContext({
      context: this.context,
      device: this.device,
      format: this.format,
      alphaMode: this.#alphaMode,
    });

    const canvasCamera = createOrthographicCamera(width, height);
    this.#orchestrator.setLayerCamera('screen', canvasCamera);
    if (!this.#customCamera) {
      this.#orchestrator.setCamera(canvasCamera);
    }
  }

  setCamera(camera: CameraState | undefined): void {
    this.#assertNotDisposed();
    if (camera) {
      this.#orchestrator.setCamera(camera);
      this.#customCamera = true;
      return;
    }
    this.#customCamera = false;
    this.#orchestrator.setCamera(createOrthographicCamera(this.canvas.width, this.canvas.height));
  }

  layer(layer: RenderLayer): LayerQueue {
    this.#assertNotDisposed();
    return this.#orchestrator.layer(layer);
  }

  setAtlas(drawClass: TexturedDrawClass, image: AtlasImage): void {
    this.#assertNotDisposed();
    if (this.#lost) {
      throw new Error('WebGPU device is lost.');
    }
    this.#orchestrator.setAtlas(drawClass, image);
  }

  queueInstance(
    drawClass: DrawClass,
    transform: InstanceTransform,
    color: Color,
    uvRegion?: UvRegion,
  ): QueueResult {
    this.#assertNotDisposed();
    return this.#orchestrator.queueInstance(drawClass, transform, color, uvRegion);
  }

  queueText(run: TextRun): QueueTextResult {
    this.#assertNotDisposed();
    return this.#orchestrator.queueText(run);
  }

  drawLine(from: Vec2, to: Vec2, color: Color): void {
    this.#assertNotDisposed();
    this.#orchestrator.drawLine(from, to, color);
  }

  drawTriangle(a: Vec2, b: Vec2, c: Vec2, color: Color): void {
    this.#assertNotDisposed();
    this.#orchestrator.drawTriangle(a, b, c, color);
  }

  fillRect(rect: BoundsRect, color: Color): void {
    this.#assertNotDisposed();
    this.#orchestrator.fillRect(rect, color);
  }

  strokeRect(rect: BoundsRect, color: Color): void {
    this.#assertNotDisposed();
    this.#orchestrator.strokeRect(rect, color);
  }

  /**
   * Renders into the canvas' current texture. After the device is lost every
   * frame reports a dispatch failure instead of throwing.
   */
  render(options?: RenderFrameOptions): FrameReport {
    this.#assertNotDisposed();
    const target = this.context.getCurrentTexture().createView();
    return this.#orchestrator.renderFrame(target, options);
  }

  dispose(): void {
    if (this.#disposed) {
      return;
    }
    this.#disposed = true;
    this.#orchestrator.destroy();
  }

  #assertNotDisposed(): void {
    if (this.#disposed) {
      throw new Error('WebGPU renderer is disposed.');
    }
  }
}

function getNavigatorGpu(): GPU {
  const maybeNavigator = globalThis.navigator as Navigator | undefined;
  if (!maybeNavigator?.gpu) {
    throw new WebGpuNotSupportedError('WebGPU is not available in this environment.');
  }
  return maybeNavigator.gpu;
}

function getDefaultCanvasFormat(
  gpu: GPU,
  context: GPUCanvasContext,
  adapter: GPUAdapter,
): GPUTextureFormat {
  if ('getPreferredCanvasFormat' in gpu && typeof gpu.getPreferredCanvasFormat === 'function') {
    return gpu.getPreferredCanvasFormat();
  }

  const legacyContext = context as unknown as {
    getPreferredFormat?: (adapter: GPUAdapter) => GPUTextureFormat;
  };
  if (typeof legacyContext.getPreferredFormat === 'function') {
    return legacyContext.getPreferredFormat(adapter);
  }

  return 'bgra8unorm';
}

function pickPreferredFormat(options: {
  gpu: GPU;
  context: GPUCanvasContext;
  adapter: GPUAdapter;
  preferredFormats?: readonly GPUTextureFormat[];
}): GPUTextureFormat {
  if (options.preferredFormats?.length) {
    return options.preferredFormats[0];
  }

  return getDefaultCanvasFormat(options.gpu, options.context, options.adapter);
}

export async function createWebGpuRenderer(
  canvas: HTMLCanvasElement,
  options?: WebGpuRendererCreateOptions,
): Promise<WebGpuRenderer> {
  const config = resolveRendererConfig(options?.config);
  const gpu = getNavigatorGpu();

  const adapter = await gpu.requestAdapter({
    powerPreference: options?.powerPreference,
  });
  if (!adapter) {
    throw new WebGpuNotSupportedError('WebGPU adapter not found.');
  }

  const requiredFeatures = options?.requiredFeatures ?? [];
  for (const feature of requiredFeatures) {
    if (!adapter.features.has(feature)) {
      throw new WebGpuNotSupportedError(`Required WebGPU feature not supported: ${feature}`);
    }
  }

  const device = await adapter.requestDevice({
    ...options?.deviceDescriptor,
    requiredFeatures: requiredFeatures.length
      ? Array.from(requiredFeatures)
      : options?.deviceDescriptor?.requiredFeatures,
  });

  const context = canvas.getContext('webgpu');
  if (!context) {
    throw new WebGpuNotSupportedError('Failed to acquire WebGPU canvas context.');
  }

  const format = pickPreferredFormat({
    gpu,
    context,
    adapter,
    preferredFormats: options?.preferredFormats,
  });
  const alphaMode = options?.alphaMode ?? 'opaque';
  configureCanvasContext({ context, device, format, alphaMode });

  const renderer = new WebGpuRendererImpl({
    canvas,
    context,
    adapter,
    device,
    format,
    alphaMode,
    config,
    onDeviceLost: options?.onDeviceLost,
  });
  renderer.resize();

  return renderer;
}

export const __test__ = {
  getCanvasPixelSize,
  pickPreferredFormat,
};
