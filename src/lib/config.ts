import path from 'path';
import { z } from 'zod';

import { ConfigError } from './errors';
import { OUTPUT_EXTENSIONS } from './raster';

export const DEFAULT_TILE_SIZE = 256;
export const DEFAULT_GRID_SIZE = 4;
export const DEFAULT_SUB_BASE_INDEX = 1;

const OUTPUT_EXTENSION_SET = new Set<string>(OUTPUT_EXTENSIONS);

export const StitchConfigSchema = z.object({
  tileDirectory: z.string().min(1).describe('Flat directory of tile files'),
  sceneId: z.number().int().min(0).describe('Scene to stitch'),
  outputPath: z
    .string()
    .min(1)
    .refine((p) => OUTPUT_EXTENSION_SET.has(path.extname(p).toLowerCase()), {
      message: `must end with one of ${OUTPUT_EXTENSIONS.join(', ')}`,
    }),
  tileSize: z.number().int().min(1).default(DEFAULT_TILE_SIZE),
  gridSize: z.number().int().min(1).default(DEFAULT_GRID_SIZE),
  subBaseIndex: z.number().int().default(DEFAULT_SUB_BASE_INDEX).describe('Sub-id placed at cell (0,0)'),
  compactGaps: z.boolean().default(true),
  // 0 stacks every block at the origin; below block size they overlap
  strideX: z.number().int().min(0).optional().describe('Defaults to gridSize * tileSize'),
  strideY: z.number().int().min(0).optional().describe('Defaults to gridSize * tileSize'),
  debug: z.boolean().default(false),
});

export type StitchConfigInput = z.input<typeof StitchConfigSchema>;

export type StitchConfig = Omit<z.output<typeof StitchConfigSchema>, 'strideX' | 'strideY'> & {
  strideX: number;
  strideY: number;
};

/** Everything but the output; enough to scan a directory for one scene. */
const ListingConfigSchema = StitchConfigSchema.omit({ outputPath: true });

export type ListingConfigInput = z.input<typeof ListingConfigSchema>;
export type ListingConfig = z.output<typeof ListingConfigSchema>;

function toConfigError(error: z.ZodError): ConfigError {
  return new ConfigError(error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`));
}

/**
 * Validate raw options and fill in defaults, including block strides.
 */
export function resolveStitchConfig(input: StitchConfigInput): StitchConfig {
  const parsed = StitchConfigSchema.safeParse(input);
  if (!parsed.success) throw toConfigError(parsed.error);

  const blockPx = parsed.data.gridSize * parsed.data.tileSize;
  return {
    ...parsed.data,
    strideX: parsed.data.strideX ?? blockPx,
    strideY: parsed.data.strideY ?? blockPx,
  };
}

export function resolveListingConfig(input: ListingConfigInput): ListingConfig {
  const parsed = ListingConfigSchema.safeParse(input);
  if (!parsed.success) throw toConfigError(parsed.error);
  return parsed.data;
}
