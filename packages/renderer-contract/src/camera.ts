import type { CameraState } from './types.js';

/**
 * mat4x4 view projection, vec2 view size, f32 point size, one pad word.
 */
export const CAMERA_UNIFORM_FLOATS = 20;
export const CAMERA_UNIFORM_BYTES = CAMERA_UNIFORM_FLOATS * 4;

/**
 * Pixel-space projection with the origin in the top-left corner and y growing
 * downwards. z passes through unchanged.
 */
export function createOrthographicCamera(width: number, height: number): CameraState {
  const safeWidth = Number.isFinite(width) && width > 0 ? width : 1;
  const safeHeight = Number.isFinite(height) && height > 0 ? height : 1;

  // prettier-ignore
  const viewProjection = new Float32Array([
    2 / safeWidth, 0, 0, 0,
    0, -2 / safeHeight, 0, 0,
    0, 0, 1, 0,
    -1, 1, 0, 1,
  ]);

  return {
    viewProjection,
    viewSize: { width: safeWidth, height: safeHeight },
  };
}

export function packCameraUniform(camera: CameraState, pointSizePx: number): Float32Array {
  if (camera.viewProjection.length !== 16) {
    throw new RangeError(
      `Camera viewProjection must have 16 elements (got ${camera.viewProjection.length}).`,
    );
  }

  const data = new Float32Array(CAMERA_UNIFORM_FLOATS);
  data.set(camera.viewProjection, 0);
  data[16] = camera.viewSize.width;
  data[17] = camera.viewSize.height;
  data[18] = pointSizePx;
  return data;
}
