export type DrawClass = 'primitive' | 'quad' | 'sprite' | 'glyph';

export type TexturedDrawClass = Extract<DrawClass, 'sprite' | 'glyph'>;

export const DRAW_CLASSES: readonly DrawClass[] = Object.freeze([
  'primitive',
  'quad',
  'sprite',
  'glyph',
]);

/**
 * Draw order of the layers. Each layer has its own camera; `screen` is drawn
 * over `world` in pixel space.
 */
export type RenderLayer = 'world' | 'screen';

export const RENDER_LAYERS: readonly RenderLayer[] = Object.freeze(['world', 'screen']);

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z?: number;
}

export interface Rotation3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Radians. A number is a rotation about z; 2D classes only consume the z
 * component of a full rotation.
 */
export type Rotation = number | Rotation3;

export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export interface UvRegion {
  readonly offset: { readonly u: number; readonly v: number };
  readonly scale: { readonly u: number; readonly v: number };
}

/**
 * Placement of one glyph quad relative to its text run's pivot, in unscaled
 * font pixels.
 */
export interface GlyphPlacement {
  readonly offset: Vec2;
  readonly size: Vec2;
}

export interface InstanceTransform {
  readonly position: Vec3;
  readonly scale: Vec3;
  readonly rotation: Rotation;
  readonly glyph?: GlyphPlacement;
}

/**
 * One encoded instance. The words are shared by a float and an integer view so
 * the culling pass can copy records without reinterpreting them.
 */
export type InstanceRecord = Float32Array;

export interface DecodedInstance {
  readonly transform: InstanceTransform;
  readonly color: Color;
  readonly uvRegion?: UvRegion;
}

export interface CameraState {
  /**
   * Column-major 4x4 view-projection matrix (WebGPU clip space).
   */
  readonly viewProjection: Float32Array;
  readonly viewSize: { readonly width: number; readonly height: number };
  /**
   * World-space rectangle seen through the camera, used for viewport culling.
   * Defaults to `(0, 0, viewSize.width, viewSize.height)`.
   */
  readonly viewRect?: BoundsRect;
}

export interface BoundsRect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Decoded RGBA8 atlas pixels, row-major with no row padding.
 */
export interface AtlasImage {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8Array;
}
