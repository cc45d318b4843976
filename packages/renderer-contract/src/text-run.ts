import type { Color, InstanceTransform, UvRegion, Vec2 } from './types.js';

/**
 * A glyph as positioned by the font layout, in unscaled pixels relative to
 * the run origin.
 */
export interface PositionedGlyph {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly uv: UvRegion;
}

export interface TextRun {
  readonly position: Vec2;
  readonly color: Color;
  readonly glyphs: readonly PositionedGlyph[];
  readonly scale?: Vec2;
  readonly rotation?: number;
}

export interface GlyphDraw {
  readonly transform: InstanceTransform;
  readonly color: Color;
  readonly uvRegion: UvRegion;
}

/**
 * Every glyph keeps the run position as its pivot, so the whole run rotates
 * as one rigid body around it. Empty glyphs (spaces) produce no draw.
 */
export function layoutTextRun(run: TextRun): readonly GlyphDraw[] {
  const scale = run.scale ?? { x: 1, y: 1 };
  const rotation = run.rotation ?? 0;
  const draws: GlyphDraw[] = [];

  for (const glyph of run.glyphs) {
    if (glyph.width === 0 || glyph.height === 0) {
      continue;
    }

    draws.push({
      transform: {
        position: run.position,
        scale,
        rotation,
        glyph: {
          offset: { x: glyph.x, y: glyph.y },
          size: { x: glyph.width, y: glyph.height },
        },
      },
      color: run.color,
      uvRegion: glyph.uv,
    });
  }

  return draws;
}
