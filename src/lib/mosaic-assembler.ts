import { EmptyInputError } from './errors';
import { boundingSize, layoutGrid } from './grid-layout';
import { composeImage } from './raster';
import type { BlockMap, GridCell, Mosaic } from './types';

export type MosaicOptions = {
  strideX: number;
  strideY: number;
  /** Close up missing column/row ids instead of leaving empty strides */
  compactGaps: boolean;
};

/**
 * Place every block at its coarse-grid offset on a canvas sized exactly
 * to fit them.
 *
 * Blocks are composited in (rowId, colId) order. With stride >= block size
 * nothing overlaps and the order does not matter; with a smaller stride
 * the later block wins wherever two overlap.
 */
export async function assembleMosaic(blocks: BlockMap, options: MosaicOptions): Promise<Mosaic> {
  const first = blocks.values().next();
  if (first.done) {
    throw new EmptyInputError();
  }
  const { width: blockWidth, height: blockHeight } = first.value.image;

  const cells = new Map<string, GridCell>();
  for (const [key, block] of blocks) {
    cells.set(key, { col: block.colId, row: block.rowId });
  }

  const placements = layoutGrid(cells, {
    strideX: options.strideX,
    strideY: options.strideY,
    compact: options.compactGaps,
  });
  const size = boundingSize(placements.values(), blockWidth, blockHeight);

  const ordered = Array.from(blocks.entries()).sort(
    ([, a], [, b]) => a.rowId - b.rowId || a.colId - b.colId
  );
  const items = ordered.flatMap(([key, block]) => {
    const offset = placements.get(key);
    return offset ? [{ image: block.image, offset }] : [];
  });

  const image = await composeImage(size.width, size.height, items);
  return { image, placements };
}
