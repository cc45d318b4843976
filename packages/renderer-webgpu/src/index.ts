export type {
  WebGpuRenderer,
  WebGpuRendererCreateOptions,
  WebGpuRendererResizeOptions,
} from './webgpu-renderer.js';

export {
  WebGpuNotSupportedError,
  WebGpuDeviceLostError,
  createWebGpuRenderer,
} from './webgpu-renderer.js';

export { FrameOrchestrator } from './frame-orchestrator.js';
export type {
  DrawClassReport,
  DrawClassStatus,
  FrameOrchestratorOptions,
  FrameReport,
  LayerQueue,
  QueueError,
  QueueResult,
  QueueTextResult,
  RenderFrameOptions,
} from './frame-orchestrator.js';

export { InstanceBatchBuffer, batchSlot } from './instance-batch.js';
export type { BatchSlot, InstanceBatchBufferOptions } from './instance-batch.js';

export { VisibilityCullingStage } from './culling-stage.js';
export type { CullDispatch, CullPrepareOptions } from './culling-stage.js';

export { IndirectDrawAssembler } from './indirect-draw.js';

export {
  IMMEDIATE_VERTEX_FLOATS,
  IMMEDIATE_VERTEX_STRIDE_BYTES,
  PipelineSet,
  createInstanceBufferLayout,
} from './pipeline-set.js';
export type { ImmediateTopology, InstancedPipeline } from './pipeline-set.js';

export { ImmediateBatch } from './immediate-batch.js';
export { CameraUniform } from './camera-uniform.js';
export { createAtlasTexture, validateAtlasImage } from './atlas-texture.js';
export { CULL_SHADER, GLYPH_SHADER, IMMEDIATE_SHADER, QUAD_SHADER, SPRITE_SHADER } from './shaders.js';
