import { z } from 'zod';

import type { UvRegion } from './types.js';

const pixelInt = z.number().int().nonnegative();

const atlasEntrySchema = z
  .object({
    id: z.string().trim().min(1),
    x: pixelInt,
    y: pixelInt,
    width: pixelInt,
    height: pixelInt,
  })
  .strict();

export const atlasManifestSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    entries: z.array(atlasEntrySchema),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.entries.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index, 'id'],
          message: `Duplicate atlas entry id "${entry.id}".`,
        });
      }
      seen.add(entry.id);

      if (entry.x + entry.width > manifest.width || entry.y + entry.height > manifest.height) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index],
          message: `Atlas entry "${entry.id}" extends past the ${manifest.width}x${manifest.height} atlas.`,
        });
      }
    });
  });

export type AtlasManifest = z.infer<typeof atlasManifestSchema>;
export type AtlasEntry = z.infer<typeof atlasEntrySchema>;

export function parseAtlasManifest(input: unknown): AtlasManifest {
  return atlasManifestSchema.parse(input);
}

export function uvRegionForEntry(manifest: AtlasManifest, entry: AtlasEntry): UvRegion {
  return {
    offset: { u: entry.x / manifest.width, v: entry.y / manifest.height },
    scale: { u: entry.width / manifest.width, v: entry.height / manifest.height },
  };
}

export function createUvRegionLookup(manifest: AtlasManifest): ReadonlyMap<string, UvRegion> {
  const regions = new Map<string, UvRegion>();
  for (const entry of manifest.entries) {
    regions.set(entry.id, uvRegionForEntry(manifest, entry));
  }
  return regions;
}
