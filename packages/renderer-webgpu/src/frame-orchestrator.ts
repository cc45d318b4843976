import {
  BufferOverflowError,
  DEFAULT_RENDERER_CONFIG,
  DRAW_CLASSES,
  DeviceDispatchFailureError,
  RENDER_LAYERS,
  InvalidObjectError,
  colorToGpuColor,
  createFrustumBounds,
  createIndirectDrawArgs,
  createOrthographicCamera,
  createViewportBounds,
  describeError,
  isTexturedDrawClass,
  layoutTextRun,
  runSoftwareCulling,
  telemetry,
} from '@lumen2d/renderer-contract';
import type {
  AtlasImage,
  BoundsRect,
  CameraState,
  Color,
  CullingBounds,
  DrawClass,
  InstanceTransform,
  RenderLayer,
  RendererConfig,
  TextRun,
  TexturedDrawClass,
  UvRegion,
  Vec2,
} from '@lumen2d/renderer-contract';

import { createAtlasTexture } from './atlas-texture.js';
import { CameraUniform } from './camera-uniform.js';
import { VisibilityCullingStage } from './culling-stage.js';
import type { CullDispatch } from './culling-stage.js';
import { ImmediateBatch } from './immediate-batch.js';
import { IndirectDrawAssembler } from './indirect-draw.js';
import { InstanceBatchBuffer } from './instance-batch.js';
import type { BatchSlot } from './instance-batch.js';
import { PipelineSet } from './pipeline-set.js';

export type DrawClassStatus = 'drawn' | 'empty' | 'overflow' | 'missing-atlas' | 'aborted';

export interface DrawClassReport {
  readonly layer: RenderLayer;
  readonly drawClass: DrawClass;
  readonly status: DrawClassStatus;
  /**
   * Records queued this frame, before culling.
   */
  readonly queued: number;
  /**
   * Culling workgroups dispatched on the device.
   */
  readonly workgroups: number;
  readonly error?: BufferOverflowError;
}

export interface FrameReport {
  readonly frame: number;
  readonly submitted: boolean;
  /**
   * World classes in draw order, then screen classes.
   */
  readonly classes: readonly DrawClassReport[];
  readonly dispatches: number;
  readonly draws: number;
  readonly immediateVertices: number;
  readonly error?: DeviceDispatchFailureError;
}

export type QueueError = InvalidObjectError | BufferOverflowError;

export type QueueResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: QueueError };

export interface QueueTextResult {
  readonly queued: number;
  readonly errors: readonly QueueError[];
}

/**
 * Submission surface of one render layer.
 */
export interface LayerQueue {
  readonly layer: RenderLayer;
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
}

export interface FrameOrchestratorOptions {
  readonly device: GPUDevice;
  readonly format: GPUTextureFormat;
  readonly config?: RendererConfig;
  readonly camera?: CameraState;
  /**
   * Camera of the screen layer, usually an orthographic camera over the
   * canvas in pixels.
   */
  readonly screenCamera?: CameraState;
}

export interface RenderFrameOptions {
  readonly clearColor?: Color;
}

interface LayerState {
  readonly layer: RenderLayer;
  camera: CameraState;
  readonly cameraUniform: CameraUniform;
  readonly cameraBindGroup: GPUBindGroup;
  readonly batches: ReadonlyMap<DrawClass, InstanceBatchBuffer>;
  readonly overflowed: Map<DrawClass, BufferOverflowError>;
  readonly immediate: ImmediateBatch;
  readonly queue: LayerQueue;
}

interface PreparedLayer {
  readonly state: LayerState;
  readonly classes: readonly PreparedClass[];
  readonly hasImmediate: boolean;
}

interface PreparedClass {
  readonly drawClass: DrawClass;
  readonly slot: BatchSlot;
  readonly queued: number;
  readonly instanceBuffer: GPUBuffer;
  readonly atlasBindGroup: GPUBindGroup | undefined;
  readonly workgroups: number;
}

interface AtlasBinding {
  readonly texture: GPUTexture;
  readonly bindGroup: GPUBindGroup;
}

const BLACK: Color = { r: 0, g: 0, b: 0, a: 1 };

interface EncodingSite {
  readonly drawClass: DrawClass;
  readonly slot: BatchSlot;
}

function toDispatchFailure(
  error: unknown,
  frame: number,
  site: EncodingSite | undefined,
): DeviceDispatchFailureError {
  if (error instanceof DeviceDispatchFailureError) {
    return error;
  }
  const scope = site ? ` while encoding ${site.slot}` : '';
  return new DeviceDispatchFailureError(
    `Frame ${frame} failed${scope}: ${describeError(error)}`,
    { drawClass: site?.drawClass, cause: error },
  );
}

function validateCamera(camera: CameraState): void {
  if (camera.viewProjection.length !== 16) {
    throw new RangeError(
      `Camera viewProjection must have 16 elements (got ${camera.viewProjection.length}).`,
    );
  }
}

/**
 * Drives one frame: camera writes, upload, culling, indirect draws, submit
 * and reset. Owns one batch per draw class and layer for the life of the
 * device. The screen layer is drawn after every world class.
 */
export class FrameOrchestrator {
  readonly config: RendererConfig;

  readonly #device: GPUDevice;
  readonly #pipelines: PipelineSet;
  readonly #culling: VisibilityCullingStage;
  readonly #indirect: IndirectDrawAssembler;
  readonly #layers: ReadonlyMap<RenderLayer, LayerState>;
  readonly #world: LayerState;
  readonly #atlases = new Map<TexturedDrawClass, AtlasBinding>();

  #frame = 0;
  #lostReason: string | undefined;
  #destroyed = false;

  constructor(options: FrameOrchestratorOptions) {
    this.config = options.config ?? DEFAULT_RENDERER_CONFIG;
    this.#device = options.device;

    this.#pipelines = new PipelineSet(options.device, options.format);
    this.#culling = new VisibilityCullingStage(options.device);
    this.#indirect = new IndirectDrawAssembler(options.device);

    const world = this.#createLayer('world', options.camera ?? createOrthographicCamera(1, 1));
    const screen = this.#createLayer(
      'screen',
      options.screenCamera ?? createOrthographicCamera(1, 1),
    );
    this.#world = world;
    this.#layers = new Map<RenderLayer, LayerState>([
      ['world', world],
      ['screen', screen],
    ]);
  }

  /**
   * Frames rendered so far, including aborted ones.
   */
  get frame(): number {
    return this.#frame;
  }

  get camera(): CameraState {
    return this.#world.camera;
  }

  getBatch(drawClass: DrawClass, layer: RenderLayer = 'world'): InstanceBatchBuffer {
    const batch = this.#layer(layer).batches.get(drawClass);
    if (!batch) {
      throw new Error(`No instance batch for draw class ${drawClass}.`);
    }
    return batch;
  }

  layer(layer: RenderLayer): LayerQueue {
    return this.#layer(layer).queue;
  }

  /**
   * Takes effect at the next frame; the uniform is written once per frame.
   */
  setCamera(camera: CameraState): void {
    this.setLayerCamera('world', camera);
  }

  setLayerCamera(layer: RenderLayer, camera: CameraState): void {
    validateCamera(camera);
    this.#layer(layer).camera = camera;
  }

  getLayerCamera(layer: RenderLayer): CameraState {
    return this.#layer(layer).camera;
  }

  setAtlas(drawClass: TexturedDrawClass, image: AtlasImage): void {
    this.#assertUsable();
    const texture = createAtlasTexture(this.#device, drawClass, image);
    const bindGroup = this.#pipelines.createAtlasBindGroup(texture);

    this.#atlases.get(drawClass)?.texture.destroy();
    this.#atlases.set(drawClass, { texture, bindGroup });
  }

  hasAtlas(drawClass: TexturedDrawClass): boolean {
    return this.#atlases.has(drawClass);
  }

  queueInstance(
    drawClass: DrawClass,
    transform: InstanceTransform,
    color: Color,
    uvRegion?: UvRegion,
  ): QueueResult {
    return this.#world.queue.queueInstance(drawClass, transform, color, uvRegion);
  }

  queueText(run: TextRun): QueueTextResult {
    return this.#world.queue.queueText(run);
  }

  drawLine(from: Vec2, to: Vec2, color: Color): void {
    this.#world.queue.drawLine(from, to, color);
  }

  drawTriangle(a: Vec2, b: Vec2, c: Vec2, color: Color): void {
    this.#world.queue.drawTriangle(a, b, c, color);
  }

  fillRect(rect: BoundsRect, color: Color): void {
    this.#world.queue.fillRect(rect, color);
  }

  strokeRect(rect: BoundsRect, color: Color): void {
    this.#world.queue.strokeRect(rect, color);
  }

  /**
   * Every later frame aborts with a dispatch failure.
   */
  markDeviceLost(reason: string): void {
    this.#lostReason = reason;
  }

  renderFrame(target: GPUTextureView, options?: RenderFrameOptions): FrameReport {
    this.#assertUsable();
    this.#frame += 1;
    const frame = this.#frame;
    const layers = RENDER_LAYERS.map((layer) => this.#layer(layer));
    const immediateVertices = layers.reduce(
      (total, state) => total + state.immediate.vertexCount,
      0,
    );
    const queuedBySlot = new Map<BatchSlot, number>();
    for (const state of layers) {
      for (const batch of state.batches.values()) {
        queuedBySlot.set(batch.slot, batch.length);
      }
    }
    const reports = new Map<BatchSlot, DrawClassReport>();

    let dispatches = 0;
    let draws = 0;
    let submitted = false;
    let failure: DeviceDispatchFailureError | undefined;
    let current: EncodingSite | undefined;

    try {
      if (this.#lostReason !== undefined) {
        throw new DeviceDispatchFailureError(
          `WebGPU device lost before frame ${frame}: ${this.#lostReason}`,
        );
      }

      const preparedLayers: PreparedLayer[] = [];
      const cullDispatches: CullDispatch[] = [];
      for (const state of layers) {
        // The world camera is written every frame, other layers only when used.
        if (state !== this.#world && !this.#hasContent(state)) {
          continue;
        }
        state.cameraUniform.write(state.camera, this.config.points.pointSizePx);
        const bounds = this.#createCullingBounds(state.camera);

        const prepared: PreparedClass[] = [];
        for (const drawClass of DRAW_CLASSES) {
          const batch = this.getBatch(drawClass, state.layer);
          current = batch;
          const base = { layer: state.layer, drawClass };
          const overflow = state.overflowed.get(drawClass);
          if (overflow) {
            reports.set(batch.slot, {
              ...base,
              status: 'overflow',
              queued: batch.length,
              workgroups: 0,
              error: overflow,
            });
            continue;
          }
          if (batch.length === 0) {
            reports.set(batch.slot, { ...base, status: 'empty', queued: 0, workgroups: 0 });
            continue;
          }

          let atlasBindGroup: GPUBindGroup | undefined;
          if (isTexturedDrawClass(drawClass)) {
            atlasBindGroup = this.#atlases.get(drawClass)?.bindGroup;
            if (!atlasBindGroup) {
              telemetry.emit('AtlasMissing', { ...base, dropped: batch.length });
              reports.set(batch.slot, {
                ...base,
                status: 'missing-atlas',
                queued: batch.length,
                workgroups: 0,
              });
              continue;
            }
          }

          prepared.push(this.#prepareClass(batch, bounds, atlasBindGroup, cullDispatches));
        }
        current = undefined;
        preparedLayers.push({
          state,
          classes: prepared,
          hasImmediate: state.immediate.upload(),
        });
      }

      const encoder = this.#device.createCommandEncoder({ label: `frame:${frame}` });

      // Ending the compute pass orders its storage writes before the indirect
      // reads of the render pass.
      if (cullDispatches.length > 0) {
        const computePass = encoder.beginComputePass({ label: 'cull' });
        dispatches = this.#culling.encode(computePass, cullDispatches);
        computePass.end();
      }

      const renderPass = encoder.beginRenderPass({
        colorAttachments: [
          {
            view: target,
            loadOp: 'clear',
            storeOp: 'store',
            clearValue: colorToGpuColor(options?.clearColor ?? BLACK),
          },
        ],
      });

      for (const { state, classes, hasImmediate } of preparedLayers) {
        for (const entry of classes) {
          current = entry;
          const { pipeline, vertexBuffer } = this.#pipelines.getInstancedPipeline(entry.drawClass);
          renderPass.setPipeline(pipeline);
          renderPass.setBindGroup(0, state.cameraBindGroup);
          if (entry.atlasBindGroup) {
            renderPass.setBindGroup(1, entry.atlasBindGroup);
          }
          renderPass.setVertexBuffer(0, vertexBuffer);
          renderPass.setVertexBuffer(1, entry.instanceBuffer);
          this.#indirect.encodeDraw(renderPass, entry.slot);
          draws += 1;
        }
        current = undefined;

        if (hasImmediate) {
          renderPass.setBindGroup(0, state.cameraBindGroup);
          draws += state.immediate.encode(renderPass, this.#pipelines);
        }
      }

      renderPass.end();
      this.#device.queue.submit([encoder.finish()]);
      submitted = true;

      for (const { state, classes } of preparedLayers) {
        for (const entry of classes) {
          reports.set(entry.slot, {
            layer: state.layer,
            drawClass: entry.drawClass,
            status: 'drawn',
            queued: entry.queued,
            workgroups: entry.workgroups,
          });
        }
      }
    } catch (error: unknown) {
      failure = toDispatchFailure(error, frame, current);
      dispatches = 0;
      draws = 0;
      telemetry.emit('DeviceDispatchFailure', {
        frame,
        drawClass: failure.drawClass,
        message: failure.message,
      });
    } finally {
      this.#resetFrame();
    }

    const classes = layers.flatMap((state) =>
      DRAW_CLASSES.map((drawClass): DrawClassReport => {
        const slot = this.getBatch(drawClass, state.layer).slot;
        const report = reports.get(slot);
        if (report) {
          return report;
        }
        const queued = queuedBySlot.get(slot) ?? 0;
        // A skipped layer that queued nothing is reported empty, not aborted.
        return submitted
          ? { layer: state.layer, drawClass, status: 'empty', queued, workgroups: 0 }
          : { layer: state.layer, drawClass, status: 'aborted', queued, workgroups: 0 };
      }),
    );

    telemetry.frame({
      frame,
      submitted,
      queued: classes.reduce((total, entry) => total + entry.queued, 0),
      drawnClasses: classes.filter((entry) => entry.status === 'drawn').length,
      dispatches,
      draws,
      immediateVertices: submitted ? immediateVertices : 0,
    });

    return {
      frame,
      submitted,
      classes,
      dispatches,
      draws,
      immediateVertices: submitted ? immediateVertices : 0,
      ...(failure ? { error: failure } : {}),
    };
  }

  destroy(): void {
    if (this.#destroyed) {
      return;
    }
    this.#destroyed = true;
    for (const state of this.#layers.values()) {
      for (const batch of state.batches.values()) {
        batch.destroy();
      }
      state.immediate.destroy();
      state.cameraUniform.destroy();
    }
    for (const atlas of this.#atlases.values()) {
      atlas.texture.destroy();
    }
    this.#atlases.clear();
    this.#culling.destroy();
    this.#indirect.destroy();
    this.#pipelines.destroy();
  }

  #assertUsable(): void {
    if (this.#destroyed) {
      throw new Error('Frame orchestrator has been destroyed.');
    }
  }

  #layer(layer: RenderLayer): LayerState {
    const state = this.#layers.get(layer);
    if (!state) {
      throw new Error(`Unknown render layer ${layer}.`);
    }
    return state;
  }

  #hasContent(state: LayerState): boolean {
    if (state.immediate.vertexCount > 0 || state.overflowed.size > 0) {
      return true;
    }
    for (const batch of state.batches.values()) {
      if (batch.length > 0) {
        return true;
      }
    }
    return false;
  }

  #createLayer(layer: RenderLayer, camera: CameraState): LayerState {
    validateCamera(camera);
    const label = layer === 'world' ? 'camera' : `camera:${layer}`;
    const cameraUniform = new CameraUniform(this.#device, label);
    const batches = new Map<DrawClass, InstanceBatchBuffer>();
    for (const drawClass of DRAW_CLASSES) {
      batches.set(
        drawClass,
        new InstanceBatchBuffer({
          device: this.#device,
          drawClass,
          layer,
          initialCapacity: this.config.limits.initialInstanceCapacity,
          maxInstances: this.config.limits.maxInstancesPerClass,
        }),
      );
    }
    const immediate = new ImmediateBatch(
      this.#device,
      this.config.limits.initialImmediateVertexCapacity,
      layer,
    );
    const overflowed = new Map<DrawClass, BufferOverflowError>();

    const queueInstance = (
      drawClass: DrawClass,
      transform: InstanceTransform,
      color: Color,
      uvRegion?: UvRegion,
    ): QueueResult => {
      this.#assertUsable();
      const overflow = overflowed.get(drawClass);
      if (overflow) {
        return { ok: false, error: overflow };
      }

      try {
        this.getBatch(drawClass, layer).pushEncoded(transform, color, uvRegion);
        return { ok: true };
      } catch (error: unknown) {
        if (error instanceof InvalidObjectError) {
          telemetry.emit('InvalidObject', { layer, drawClass, message: error.message });
          return { ok: false, error };
        }
        if (error instanceof BufferOverflowError) {
          overflowed.set(drawClass, error);
          telemetry.emit('BufferOverflow', { layer, drawClass, capacity: error.capacity });
          return { ok: false, error };
        }
        throw error;
      }
    };

    const queue: LayerQueue = {
      layer,
      queueInstance,
      queueText: (run) => {
        const errors: QueueError[] = [];
        let queued = 0;
        for (const draw of layoutTextRun(run)) {
          const result = queueInstance('glyph', draw.transform, draw.color, draw.uvRegion);
          if (result.ok) {
            queued += 1;
          } else {
            errors.push(result.error);
          }
        }
        return { queued, errors };
      },
      drawLine: (from, to, color) => {
        this.#assertUsable();
        immediate.pushLine(from, to, color);
      },
      drawTriangle: (a, b, c, color) => {
        this.#assertUsable();
        immediate.pushTriangle(a, b, c, color);
      },
      fillRect: (rect, color) => {
        this.#assertUsable();
        immediate.fillRect(rect, color);
      },
      strokeRect: (rect, color) => {
        this.#assertUsable();
        immediate.strokeRect(rect, color);
      },
    };

    return {
      layer,
      camera,
      cameraUniform,
      cameraBindGroup: this.#pipelines.createCameraBindGroup(cameraUniform.buffer, label),
      batches,
      overflowed,
      immediate,
      queue,
    };
  }

  #createCullingBounds(camera: CameraState): CullingBounds {
    if (this.config.culling.bounds === 'frustum') {
      return createFrustumBounds(camera.viewProjection);
    }
    return createViewportBounds(
      camera.viewRect ?? {
        x: 0,
        y: 0,
        width: camera.viewSize.width,
        height: camera.viewSize.height,
      },
    );
  }

  #prepareClass(
    batch: InstanceBatchBuffer,
    bounds: CullingBounds,
    atlasBindGroup: GPUBindGroup | undefined,
    cullDispatches: CullDispatch[],
  ): PreparedClass {
    const { drawClass, slot, layout } = batch;
    const base = { drawClass, slot, queued: batch.length, atlasBindGroup };

    switch (this.config.culling.mode) {
      case 'gpu': {
        batch.upload();
        const argsBuffer = this.#indirect.reset(slot);
        const dispatch = this.#culling.prepare({
          batch,
          argsBuffer,
          bounds,
          maxAreaExtent: this.config.culling.maxAreaExtent,
        });
        cullDispatches.push(dispatch);
        const instanceBuffer = this.#culling.getOutputBuffer(slot);
        if (!instanceBuffer) {
          throw new Error(`Culling output for ${slot} is missing.`);
        }
        return { ...base, instanceBuffer, workgroups: dispatch.workgroupCount };
      }
      case 'cpu': {
        const source = batch.words();
        const output = new Uint32Array(source.length);
        const drawArgs = createIndirectDrawArgs();
        const result = runSoftwareCulling({
          source,
          recordWords: layout.strideWords,
          instanceCount: batch.length,
          bounds,
          output,
          drawArgs,
          maxAreaExtent: this.config.culling.maxAreaExtent,
        });
        const instanceBuffer = this.#culling.writeCompacted(
          slot,
          batch.capacity,
          layout.strideBytes,
          output.subarray(0, result.visibleCount * layout.strideWords),
        );
        this.#indirect.writeHostCount(slot, result.visibleCount);
        return { ...base, instanceBuffer, workgroups: 0 };
      }
      case 'disabled': {
        batch.upload();
        const instanceBuffer = batch.gpuBuffer;
        if (!instanceBuffer) {
          throw new Error(`Instance batch for ${slot} has not been uploaded.`);
        }
        this.#indirect.writeHostCount(slot, batch.length);
        return { ...base, instanceBuffer, workgroups: 0 };
      }
    }
  }

  #resetFrame(): void {
    for (const state of this.#layers.values()) {
      for (const batch of state.batches.values()) {
        batch.clear();
      }
      state.overflowed.clear();
      state.immediate.clear();
    }
  }
}
