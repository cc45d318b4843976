export { DRAW_CLASSES, RENDER_LAYERS } from './types.js';

export type {
  AtlasImage,
  BoundsRect,
  CameraState,
  Color,
  DecodedInstance,
  DrawClass,
  GlyphPlacement,
  InstanceRecord,
  InstanceTransform,
  RenderLayer,
  Rotation,
  Rotation3,
  TexturedDrawClass,
  UvRegion,
  Vec2,
  Vec3,
} from './types.js';

export {
  BYTES_PER_WORD,
  COLOR_WORD,
  GLYPH_WORDS,
  HEADER_EXTENT_WORD,
  HEADER_POSITION_WORD,
  INSTANCE_LAYOUTS,
  RECORD_BLOCK_BYTES,
  RECORD_BLOCK_WORDS,
  SPRITE_WORDS,
  getInstanceLayout,
  isTexturedDrawClass,
} from './layouts.js';
export type { InstanceAttribute, InstanceLayout } from './layouts.js';

export {
  decodeInstance,
  encodeInstance,
  encodeInstanceInto,
  glyphCullBox,
  rotatedBoxExtent,
} from './instance-encoder.js';

export {
  CULL_PLANE_COUNT,
  CULL_UNIFORM_BYTES,
  CULL_WORKGROUP_SIZE,
  DEFAULT_MAX_AREA_EXTENT,
  classifyRecordShape,
  createFrustumBounds,
  createViewportBounds,
  getCullWorkgroupCount,
  isVisible,
  packCullingUniforms,
  runSoftwareCulling,
} from './culling.js';
export type {
  CullingBounds,
  CullingUniforms,
  RecordShape,
  SoftwareCullingOptions,
  SoftwareCullingResult,
} from './culling.js';

export {
  INDIRECT_ARGS_BYTES,
  INDIRECT_ARGS_WORDS,
  INDIRECT_INSTANCE_COUNT_WORD,
  QUAD_VERTEX_COUNT,
  createIndirectDrawArgs,
  readIndirectDrawArgs,
} from './indirect-args.js';
export type { IndirectDrawArgs } from './indirect-args.js';

export {
  CAMERA_UNIFORM_BYTES,
  CAMERA_UNIFORM_FLOATS,
  createOrthographicCamera,
  packCameraUniform,
} from './camera.js';

export { WHITE, colorFromRgba, colorToGpuColor } from './color.js';

export { layoutTextRun } from './text-run.js';
export type { GlyphDraw, PositionedGlyph, TextRun } from './text-run.js';

export {
  atlasManifestSchema,
  createUvRegionLookup,
  parseAtlasManifest,
  uvRegionForEntry,
} from './atlas.js';
export type { AtlasEntry, AtlasManifest } from './atlas.js';

export {
  BufferOverflowError,
  DeviceDispatchFailureError,
  InvalidObjectError,
  describeError,
} from './errors.js';
export type { RendererError, RendererErrorCode } from './errors.js';

export { DEFAULT_RENDERER_CONFIG, resolveRendererConfig } from './config.js';
export type {
  CullingBoundsMode,
  CullingMode,
  RendererConfig,
  RendererConfigOverrides,
} from './config.js';

export {
  EVENT_SEVERITY,
  createConsoleTelemetry,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
} from './telemetry.js';
export type {
  FrameTelemetry,
  RecordingTelemetry,
  RendererEvent,
  RendererEventMap,
  RendererEventName,
  TelemetrySeverity,
  TelemetrySink,
} from './telemetry.js';
