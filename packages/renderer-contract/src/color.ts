import type { Color } from './types.js';

export const WHITE: Color = Object.freeze({ r: 1, g: 1, b: 1, a: 1 });

export function colorFromRgba(rgba: number): Color {
  const u32 = rgba >>> 0;
  return {
    r: ((u32 >>> 24) & 0xff) / 255,
    g: ((u32 >>> 16) & 0xff) / 255,
    b: ((u32 >>> 8) & 0xff) / 255,
    a: (u32 & 0xff) / 255,
  };
}

export function colorToGpuColor(color: Color): { r: number; g: number; b: number; a: number } {
  return { r: color.r, g: color.g, b: color.b, a: color.a };
}
