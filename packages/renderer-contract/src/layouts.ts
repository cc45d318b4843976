import type { DrawClass, TexturedDrawClass } from './types.js';

export const BYTES_PER_WORD = 4;

/**
 * Records are always a whole number of these blocks. The first block of every
 * record starts with the culling header.
 */
export const RECORD_BLOCK_WORDS = 8;
export const RECORD_BLOCK_BYTES = RECORD_BLOCK_WORDS * BYTES_PER_WORD;

export const HEADER_POSITION_WORD = 0;
export const HEADER_EXTENT_WORD = 2;

export const COLOR_WORD = 4;

export interface InstanceAttribute {
  readonly name: string;
  readonly word: number;
  readonly components: 1 | 2 | 4;
}

export interface InstanceLayout {
  readonly drawClass: DrawClass;
  readonly strideWords: number;
  readonly strideBytes: number;
  readonly attributes: readonly InstanceAttribute[];
  readonly requiresUv: boolean;
}

function defineLayout(
  drawClass: DrawClass,
  blocks: number,
  requiresUv: boolean,
  attributes: readonly InstanceAttribute[],
): InstanceLayout {
  const strideWords = blocks * RECORD_BLOCK_WORDS;
  for (const attribute of attributes) {
    if (attribute.word + attribute.components > strideWords) {
      throw new Error(
        `Instance layout ${drawClass} places ${attribute.name} outside its ${strideWords}-word stride.`,
      );
    }
  }

  return Object.freeze({
    drawClass,
    strideWords,
    strideBytes: strideWords * BYTES_PER_WORD,
    attributes: Object.freeze(attributes.slice()),
    requiresUv,
  });
}

export const SPRITE_WORDS = {
  uvOffset: 8,
  uvScale: 10,
  size: 12,
  rotation: 14,
} as const;

export const GLYPH_WORDS = {
  uvOffset: 8,
  uvScale: 10,
  pivotOffset: 12,
  size: 14,
  scale: 16,
  rotation: 18,
  pivot: 20,
} as const;

export const INSTANCE_LAYOUTS: Readonly<Record<DrawClass, InstanceLayout>> = Object.freeze({
  primitive: defineLayout('primitive', 1, false, [
    { name: 'position', word: HEADER_POSITION_WORD, components: 2 },
    { name: 'marker', word: HEADER_EXTENT_WORD, components: 2 },
    { name: 'color', word: COLOR_WORD, components: 4 },
  ]),
  quad: defineLayout('quad', 1, false, [
    { name: 'translation', word: HEADER_POSITION_WORD, components: 2 },
    { name: 'scale', word: HEADER_EXTENT_WORD, components: 2 },
    { name: 'color', word: COLOR_WORD, components: 4 },
  ]),
  sprite: defineLayout('sprite', 2, true, [
    { name: 'position', word: HEADER_POSITION_WORD, components: 2 },
    { name: 'cullExtent', word: HEADER_EXTENT_WORD, components: 2 },
    { name: 'color', word: COLOR_WORD, components: 4 },
    { name: 'uvOffset', word: SPRITE_WORDS.uvOffset, components: 2 },
    { name: 'uvScale', word: SPRITE_WORDS.uvScale, components: 2 },
    { name: 'size', word: SPRITE_WORDS.size, components: 2 },
    { name: 'rotation', word: SPRITE_WORDS.rotation, components: 1 },
  ]),
  glyph: defineLayout('glyph', 3, true, [
    { name: 'cullCenter', word: HEADER_POSITION_WORD, components: 2 },
    { name: 'cullExtent', word: HEADER_EXTENT_WORD, components: 2 },
    { name: 'color', word: COLOR_WORD, components: 4 },
    { name: 'uvOffset', word: GLYPH_WORDS.uvOffset, components: 2 },
    { name: 'uvScale', word: GLYPH_WORDS.uvScale, components: 2 },
    { name: 'pivotOffset', word: GLYPH_WORDS.pivotOffset, components: 2 },
    { name: 'size', word: GLYPH_WORDS.size, components: 2 },
    { name: 'scale', word: GLYPH_WORDS.scale, components: 2 },
    { name: 'rotation', word: GLYPH_WORDS.rotation, components: 1 },
    { name: 'pivot', word: GLYPH_WORDS.pivot, components: 2 },
  ]),
});

export function getInstanceLayout(drawClass: DrawClass): InstanceLayout {
  return INSTANCE_LAYOUTS[drawClass];
}

export function isTexturedDrawClass(drawClass: DrawClass): drawClass is TexturedDrawClass {
  return INSTANCE_LAYOUTS[drawClass].requiresUv;
}
