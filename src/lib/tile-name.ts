import type { TilePosition } from './types';

export const TILE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'tif', 'tiff'] as const;

const TILE_NAME_PATTERN = new RegExp(
  `^(\\d+)_(\\d+)_(\\d+)_(\\d+)\\.(?:${TILE_EXTENSIONS.join('|')})$`,
  'i'
);

/**
 * Parse `<scene>_<col>_<row>_<sub>.<ext>` into a position.
 * Returns null for any other name; callers skip those files.
 */
export function parseTileName(fileName: string): TilePosition | null {
  const match = TILE_NAME_PATTERN.exec(fileName);
  if (!match) return null;

  const [, scene, col, row, sub] = match;
  return {
    sceneId: Number.parseInt(scene, 10),
    colId: Number.parseInt(col, 10),
    rowId: Number.parseInt(row, 10),
    subId: Number.parseInt(sub, 10),
  };
}
