/**
 * Grid placement shared by both levels of the mosaic:
 * sub-tiles inside a block, and blocks inside the scene.
 */
import type { GridCell, Offset } from './types';

/**
 * Map a sub-index to its (row, col) cell inside a block, row-major.
 * Out-of-range indices are clamped to the first or last cell.
 */
export function subToCell(subId: number, gridSize: number, subBase: number): { row: number; col: number } {
  const maxIdx = gridSize * gridSize - 1;
  const idx = Math.min(maxIdx, Math.max(0, subId - subBase));
  return {
    row: Math.floor(idx / gridSize),
    col: idx % gridSize,
  };
}

/**
 * Rank the distinct values in ascending order, so that sparse ids
 * become 0..k-1.
 */
export function compactIndices(values: Iterable<number>): Map<number, number> {
  const uniq = Array.from(new Set(values)).sort((a, b) => a - b);
  return new Map(uniq.map((value, rank) => [value, rank]));
}

export type LayoutOptions = {
  strideX: number;
  strideY: number;
  /** Rank columns and rows independently before scaling */
  compact: boolean;
};

/**
 * Turn integer grid cells into pixel offsets (`cell * stride`).
 */
export function layoutGrid<K>(cells: Map<K, GridCell>, options: LayoutOptions): Map<K, Offset> {
  const cellList = Array.from(cells.values());
  const colRank = options.compact ? compactIndices(cellList.map((c) => c.col)) : null;
  const rowRank = options.compact ? compactIndices(cellList.map((c) => c.row)) : null;

  const offsets = new Map<K, Offset>();
  for (const [key, cell] of cells) {
    const col = colRank?.get(cell.col) ?? cell.col;
    const row = rowRank?.get(cell.row) ?? cell.row;
    offsets.set(key, { x: col * options.strideX, y: row * options.strideY });
  }
  return offsets;
}

/**
 * Smallest canvas holding every item of the given size at its offset.
 */
export function boundingSize(
  offsets: Iterable<Offset>,
  itemWidth: number,
  itemHeight: number
): { width: number; height: number } {
  let maxX = 0;
  let maxY = 0;
  for (const { x, y } of offsets) {
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return { width: maxX + itemWidth, height: maxY + itemHeight };
}
