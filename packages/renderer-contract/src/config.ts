import { DEFAULT_MAX_AREA_EXTENT } from './culling.js';

export type CullingMode = 'gpu' | 'cpu' | 'disabled';

export type CullingBoundsMode = 'viewport' | 'frustum';

const CULLING_MODES: readonly CullingMode[] = ['gpu', 'cpu', 'disabled'];
const CULLING_BOUNDS_MODES: readonly CullingBoundsMode[] = ['viewport', 'frustum'];

export interface RendererConfig {
  readonly limits: {
    /**
     * Records each per-class batch reserves before its first growth.
     *
     * @defaultValue `256`
     */
    readonly initialInstanceCapacity: number;
    /**
     * Hard cap per draw class per frame. Pushing past it overflows the class
     * for the rest of the frame.
     *
     * @defaultValue `1048576`
     */
    readonly maxInstancesPerClass: number;
    /**
     * Vertices the immediate batch reserves before its first growth.
     *
     * @defaultValue `1024`
     */
    readonly initialImmediateVertexCapacity: number;
  };
  readonly culling: {
    /**
     * `gpu` runs the compute pass, `cpu` the host reference pass, `disabled`
     * draws every queued instance.
     *
     * @defaultValue `'gpu'`
     */
    readonly mode: CullingMode;
    /**
     * `viewport` culls against the camera's view rectangle in world pixels,
     * `frustum` against the planes of its view-projection matrix.
     *
     * @defaultValue `'viewport'`
     */
    readonly bounds: CullingBoundsMode;
    /**
     * Extents at or above this value mark a record as a point.
     *
     * @defaultValue `10000`
     */
    readonly maxAreaExtent: number;
  };
  readonly points: {
    /**
     * On-screen size of zero-extent instances.
     *
     * @defaultValue `1`
     */
    readonly pointSizePx: number;
  };
}

export type RendererConfigOverrides = Readonly<{
  readonly limits?: Partial<RendererConfig['limits']>;
  readonly culling?: Partial<RendererConfig['culling']>;
  readonly points?: Partial<RendererConfig['points']>;
}>;

export const DEFAULT_RENDERER_CONFIG: RendererConfig = Object.freeze({
  limits: Object.freeze({
    initialInstanceCapacity: 256,
    maxInstancesPerClass: 1_048_576,
    initialImmediateVertexCapacity: 1024,
  }),
  culling: Object.freeze({
    mode: 'gpu',
    bounds: 'viewport',
    maxAreaExtent: DEFAULT_MAX_AREA_EXTENT,
  }),
  points: Object.freeze({
    pointSizePx: 1,
  }),
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric === undefined || numeric <= 0 ? undefined : numeric;
}

function toPositiveInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(numeric));
}

function toOneOf<T extends string>(value: unknown, allowed: readonly T[]): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function resolveLimitsConfig(
  overrides: RendererConfigOverrides['limits'] | undefined,
): RendererConfig['limits'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_RENDERER_CONFIG.limits;

  const maxInstancesPerClass =
    toPositiveInt(source.maxInstancesPerClass) ?? defaults.maxInstancesPerClass;
  const initialInstanceCapacity =
    toPositiveInt(source.initialInstanceCapacity) ?? defaults.initialInstanceCapacity;

  return {
    initialInstanceCapacity: Math.min(initialInstanceCapacity, maxInstancesPerClass),
    maxInstancesPerClass,
    initialImmediateVertexCapacity:
      toPositiveInt(source.initialImmediateVertexCapacity) ??
      defaults.initialImmediateVertexCapacity,
  };
}

function resolveCullingConfig(
  overrides: RendererConfigOverrides['culling'] | undefined,
): RendererConfig['culling'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_RENDERER_CONFIG.culling;

  return {
    mode: toOneOf(source.mode, CULLING_MODES) ?? defaults.mode,
    bounds: toOneOf(source.bounds, CULLING_BOUNDS_MODES) ?? defaults.bounds,
    maxAreaExtent: toPositiveNumber(source.maxAreaExtent) ?? defaults.maxAreaExtent,
  };
}

function resolvePointsConfig(
  overrides: RendererConfigOverrides['points'] | undefined,
): RendererConfig['points'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_RENDERER_CONFIG.points;

  return {
    pointSizePx: toPositiveNumber(source.pointSizePx) ?? defaults.pointSizePx,
  };
}

export function resolveRendererConfig(overrides?: RendererConfigOverrides): RendererConfig {
  return Object.freeze({
    limits: Object.freeze(resolveLimitsConfig(overrides?.limits)),
    culling: Object.freeze(resolveCullingConfig(overrides?.culling)),
    points: Object.freeze(resolvePointsConfig(overrides?.points)),
  });
}
