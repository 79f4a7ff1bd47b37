import fs from 'fs/promises';
import path from 'path';

import { layoutGrid, subToCell } from './grid-layout';
import { composeImage, loadTile } from './raster';
import type { Placement } from './raster';
import { parseTileName } from './tile-name';
import { blockKey, formatSceneId } from './types';
import type { Block, BlockMap, GridCell, Tile } from './types';

export type BlockAssemblyOptions = {
  tileDirectory: string;
  sceneId: number;
  gridSize: number;
  tileSize: number;
  subBaseIndex: number;
  debug?: boolean;
};

export type TileGroup = {
  colId: number;
  rowId: number;
  /** subId -> tile; one entry per distinct subId */
  tiles: Map<number, Tile>;
};

/**
 * Find every tile of one scene in a flat directory and group it by block.
 * Foreign files and other scenes are skipped without notice. Entries are
 * read in sorted order, so for a repeated subId the later name wins.
 * Symlinks are followed when the tile is decoded; a matching entry that
 * is not a raster (a directory, say) fails there.
 */
export async function scanSceneTiles(tileDirectory: string, sceneId: number): Promise<Map<string, TileGroup>> {
  const names = (await fs.readdir(tileDirectory)).sort();

  const groups = new Map<string, TileGroup>();
  for (const fileName of names) {
    const position = parseTileName(fileName);
    if (!position || position.sceneId !== sceneId) continue;

    const key = blockKey(position.colId, position.rowId);
    let group = groups.get(key);
    if (!group) {
      group = { colId: position.colId, rowId: position.rowId, tiles: new Map() };
      groups.set(key, group);
    }
    group.tiles.set(position.subId, { ...position, filePath: path.join(tileDirectory, fileName) });
  }
  return groups;
}

/**
 * Build one block image from its sub-tiles. Cells without a tile stay
 * transparent; clamped sub-indices may land on the same cell.
 */
export async function assembleBlock(
  group: TileGroup,
  options: Pick<BlockAssemblyOptions, 'gridSize' | 'tileSize' | 'subBaseIndex'>
): Promise<Block> {
  const { gridSize, tileSize, subBaseIndex } = options;

  const cells = new Map<number, GridCell>();
  for (const subId of group.tiles.keys()) {
    cells.set(subId, subToCell(subId, gridSize, subBaseIndex));
  }
  const offsets = layoutGrid(cells, { strideX: tileSize, strideY: tileSize, compact: false });

  // Tiles of this block only; released once the block is composed
  const placements: Placement[] = [];
  for (const [subId, tile] of group.tiles) {
    const offset = offsets.get(subId);
    if (!offset) continue;
    placements.push({ image: await loadTile(tile.filePath, tileSize), offset });
  }

  // Fixed size regardless of how many sub-tiles exist
  const blockPx = gridSize * tileSize;
  const image = await composeImage(blockPx, blockPx, placements);

  return { colId: group.colId, rowId: group.rowId, image };
}

export async function assembleBlocksFromGroups(
  groups: Map<string, TileGroup>,
  options: BlockAssemblyOptions
): Promise<BlockMap> {
  const blocks: BlockMap = new Map();

  for (const [key, group] of groups) {
    if (options.debug) {
      console.log(
        `[scene ${formatSceneId(options.sceneId)}] block (${group.colId},${group.rowId}): ${group.tiles.size} tile(s)`
      );
    }
    blocks.set(key, await assembleBlock(group, options));
  }
  return blocks;
}

export async function assembleBlocks(options: BlockAssemblyOptions): Promise<BlockMap> {
  const groups = await scanSceneTiles(options.tileDirectory, options.sceneId);
  return assembleBlocksFromGroups(groups, options);
}
