import { InvalidObjectError } from './errors.js';
import {
  COLOR_WORD,
  GLYPH_WORDS,
  HEADER_EXTENT_WORD,
  HEADER_POSITION_WORD,
  INSTANCE_LAYOUTS,
  SPRITE_WORDS,
} from './layouts.js';
import type {
  Color,
  DecodedInstance,
  DrawClass,
  GlyphPlacement,
  InstanceRecord,
  InstanceTransform,
  Rotation,
  UvRegion,
  Vec2,
} from './types.js';

function requireFinite(drawClass: DrawClass, value: number | undefined, label: string): void {
  if (value !== undefined && !Number.isFinite(value)) {
    throw new InvalidObjectError(drawClass, `${label} must be a finite number (got ${value}).`);
  }
}

function rotationZ(rotation: Rotation): number {
  return typeof rotation === 'number' ? rotation : rotation.z;
}

function validateTransform(drawClass: DrawClass, transform: InstanceTransform): void {
  requireFinite(drawClass, transform.scale.x, 'scale.x');
  requireFinite(drawClass, transform.scale.y, 'scale.y');
  requireFinite(drawClass, transform.scale.z, 'scale.z');
  requireFinite(drawClass, transform.position.x, 'position.x');
  requireFinite(drawClass, transform.position.y, 'position.y');
  requireFinite(drawClass, transform.position.z, 'position.z');

  if (typeof transform.rotation === 'number') {
    requireFinite(drawClass, transform.rotation, 'rotation');
  } else {
    requireFinite(drawClass, transform.rotation.x, 'rotation.x');
    requireFinite(drawClass, transform.rotation.y, 'rotation.y');
    requireFinite(drawClass, transform.rotation.z, 'rotation.z');
  }
}

function validateColor(drawClass: DrawClass, color: Color): void {
  requireFinite(drawClass, color.r, 'color.r');
  requireFinite(drawClass, color.g, 'color.g');
  requireFinite(drawClass, color.b, 'color.b');
  requireFinite(drawClass, color.a, 'color.a');
}

function requireUvRegion(drawClass: DrawClass, uvRegion: UvRegion | undefined): UvRegion {
  if (!uvRegion) {
    throw new InvalidObjectError(drawClass, 'a UV region is required for this draw class.');
  }
  requireFinite(drawClass, uvRegion.offset.u, 'uvRegion.offset.u');
  requireFinite(drawClass, uvRegion.offset.v, 'uvRegion.offset.v');
  requireFinite(drawClass, uvRegion.scale.u, 'uvRegion.scale.u');
  requireFinite(drawClass, uvRegion.scale.v, 'uvRegion.scale.v');
  return uvRegion;
}

function requireGlyphPlacement(transform: InstanceTransform): GlyphPlacement {
  const glyph = transform.glyph;
  if (!glyph) {
    throw new InvalidObjectError('glyph', 'glyph placement (offset and size) is required.');
  }
  requireFinite('glyph', glyph.offset.x, 'glyph.offset.x');
  requireFinite('glyph', glyph.offset.y, 'glyph.offset.y');
  requireFinite('glyph', glyph.size.x, 'glyph.size.x');
  requireFinite('glyph', glyph.size.y, 'glyph.size.y');
  return glyph;
}

/**
 * Axis-aligned extent of a `width` x `height` box rotated about its centre.
 */
export function rotatedBoxExtent(width: number, height: number, radians: number): Vec2 {
  const cos = Math.abs(Math.cos(radians));
  const sin = Math.abs(Math.sin(radians));
  const w = Math.abs(width);
  const h = Math.abs(height);
  return { x: w * cos + h * sin, y: w * sin + h * cos };
}

/**
 * Axis-aligned box around a glyph quad placed at `glyph.offset` from `pivot`,
 * scaled, then rotated about the pivot. The box follows the glyph itself, so
 * its size does not depend on how far the glyph sits from the pivot.
 */
export function glyphCullBox(
  pivot: Vec2,
  glyph: GlyphPlacement,
  scale: Vec2,
  radians: number,
): { readonly center: Vec2; readonly extent: Vec2 } {
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  const localX = (glyph.offset.x + glyph.size.x / 2) * scale.x;
  const localY = (glyph.offset.y + glyph.size.y / 2) * scale.y;

  return {
    center: {
      x: pivot.x + localX * cos - localY * sin,
      y: pivot.y + localX * sin + localY * cos,
    },
    extent: rotatedBoxExtent(glyph.size.x * scale.x, glyph.size.y * scale.y, radians),
  };
}

function writeColor(target: Float32Array, base: number, color: Color): void {
  target[base + COLOR_WORD] = color.r;
  target[base + COLOR_WORD + 1] = color.g;
  target[base + COLOR_WORD + 2] = color.b;
  target[base + COLOR_WORD + 3] = color.a;
}

function writePair(target: Float32Array, word: number, x: number, y: number): void {
  target[word] = x;
  target[word + 1] = y;
}

/**
 * Encodes one instance into `target` starting at `wordOffset`. Validation runs
 * before the first write, so a rejected object leaves `target` untouched.
 */
export function encodeInstanceInto(
  target: Float32Array,
  wordOffset: number,
  drawClass: DrawClass,
  transform: InstanceTransform,
  color: Color,
  uvRegion?: UvRegion,
): void {
  const layout = INSTANCE_LAYOUTS[drawClass];
  if (wordOffset < 0 || wordOffset + layout.strideWords > target.length) {
    throw new RangeError(
      `Cannot encode a ${layout.strideWords}-word ${drawClass} record at word ${wordOffset} of a ${target.length}-word buffer.`,
    );
  }

  validateTransform(drawClass, transform);
  validateColor(drawClass, color);
  const uv = layout.requiresUv ? requireUvRegion(drawClass, uvRegion) : undefined;
  const glyph = drawClass === 'glyph' ? requireGlyphPlacement(transform) : undefined;

  target.fill(0, wordOffset, wordOffset + layout.strideWords);

  const { position, scale } = transform;
  const rotation = rotationZ(transform.rotation);
  writePair(target, wordOffset + HEADER_POSITION_WORD, position.x, position.y);
  writeColor(target, wordOffset, color);

  switch (drawClass) {
    case 'primitive':
      // (0, 0) routes the record through the point test during culling.
      writePair(target, wordOffset + HEADER_EXTENT_WORD, 0, 0);
      return;
    case 'quad':
      // Mirrored quads look the same, and a negative extent would read as a point.
      writePair(target, wordOffset + HEADER_EXTENT_WORD, Math.abs(scale.x), Math.abs(scale.y));
      return;
    case 'sprite': {
      const extent = rotatedBoxExtent(scale.x, scale.y, rotation);
      writePair(target, wordOffset + HEADER_EXTENT_WORD, extent.x, extent.y);
      if (uv) {
        writePair(target, wordOffset + SPRITE_WORDS.uvOffset, uv.offset.u, uv.offset.v);
        writePair(target, wordOffset + SPRITE_WORDS.uvScale, uv.scale.u, uv.scale.v);
      }
      writePair(target, wordOffset + SPRITE_WORDS.size, scale.x, scale.y);
      target[wordOffset + SPRITE_WORDS.rotation] = rotation;
      return;
    }
    case 'glyph': {
      if (!glyph) {
        return;
      }
      const box = glyphCullBox(position, glyph, scale, rotation);
      writePair(target, wordOffset + HEADER_POSITION_WORD, box.center.x, box.center.y);
      writePair(target, wordOffset + HEADER_EXTENT_WORD, box.extent.x, box.extent.y);
      writePair(target, wordOffset + GLYPH_WORDS.pivot, position.x, position.y);
      if (uv) {
        writePair(target, wordOffset + GLYPH_WORDS.uvOffset, uv.offset.u, uv.offset.v);
        writePair(target, wordOffset + GLYPH_WORDS.uvScale, uv.scale.u, uv.scale.v);
      }
      writePair(target, wordOffset + GLYPH_WORDS.pivotOffset, glyph.offset.x, glyph.offset.y);
      writePair(target, wordOffset + GLYPH_WORDS.size, glyph.size.x, glyph.size.y);
      writePair(target, wordOffset + GLYPH_WORDS.scale, scale.x, scale.y);
      target[wordOffset + GLYPH_WORDS.rotation] = rotation;
      return;
    }
  }
}

export function encodeInstance(
  drawClass: DrawClass,
  transform: InstanceTransform,
  color: Color,
  uvRegion?: UvRegion,
): InstanceRecord {
  const record = new Float32Array(INSTANCE_LAYOUTS[drawClass].strideWords);
  encodeInstanceInto(record, 0, drawClass, transform, color, uvRegion);
  return record;
}

function readPair(record: Float32Array, word: number): Vec2 {
  return { x: record[word], y: record[word + 1] };
}

function readUv(record: Float32Array, offsetWord: number, scaleWord: number): UvRegion {
  return {
    offset: { u: record[offsetWord], v: record[offsetWord + 1] },
    scale: { u: record[scaleWord], v: record[scaleWord + 1] },
  };
}

export function decodeInstance(
  drawClass: DrawClass,
  record: Float32Array,
  wordOffset = 0,
): DecodedInstance {
  const layout = INSTANCE_LAYOUTS[drawClass];
  if (wordOffset < 0 || wordOffset + layout.strideWords > record.length) {
    throw new RangeError(
      `Cannot decode a ${layout.strideWords}-word ${drawClass} record at word ${wordOffset} of a ${record.length}-word buffer.`,
    );
  }

  const position = readPair(record, wordOffset + HEADER_POSITION_WORD);
  const color: Color = {
    r: record[wordOffset + COLOR_WORD],
    g: record[wordOffset + COLOR_WORD + 1],
    b: record[wordOffset + COLOR_WORD + 2],
    a: record[wordOffset + COLOR_WORD + 3],
  };

  switch (drawClass) {
    case 'primitive':
      return { transform: { position, scale: { x: 1, y: 1 }, rotation: 0 }, color };
    case 'quad':
      return {
        transform: { position, scale: readPair(record, wordOffset + HEADER_EXTENT_WORD), rotation: 0 },
        color,
      };
    case 'sprite':
      return {
        transform: {
          position,
          scale: readPair(record, wordOffset + SPRITE_WORDS.size),
          rotation: record[wordOffset + SPRITE_WORDS.rotation],
        },
        color,
        uvRegion: readUv(record, wordOffset + SPRITE_WORDS.uvOffset, wordOffset + SPRITE_WORDS.uvScale),
      };
    case 'glyph':
      return {
        transform: {
          position: readPair(record, wordOffset + GLYPH_WORDS.pivot),
          scale: readPair(record, wordOffset + GLYPH_WORDS.scale),
          rotation: record[wordOffset + GLYPH_WORDS.rotation],
          glyph: {
            offset: readPair(record, wordOffset + GLYPH_WORDS.pivotOffset),
            size: readPair(record, wordOffset + GLYPH_WORDS.size),
          },
        },
        color,
        uvRegion: readUv(record, wordOffset + GLYPH_WORDS.uvOffset, wordOffset + GLYPH_WORDS.uvScale),
      };
  }
}
