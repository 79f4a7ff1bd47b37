/**
 * Scene stitching pipeline
 *
 * tile directory -> blocks -> mosaic -> one output raster.
 * The output is written only after the whole mosaic is composed.
 */
import { assembleBlocksFromGroups, scanSceneTiles, type TileGroup } from './block-assembler';
import { resolveListingConfig, resolveStitchConfig, type ListingConfigInput, type StitchConfigInput } from './config';
import { assembleMosaic } from './mosaic-assembler';
import { writeImage } from './raster';
import { formatSceneId } from './types';
import type { StitchResult } from './types';

export async function stitchScene(input: StitchConfigInput): Promise<StitchResult> {
  const config = resolveStitchConfig(input);
  const logPrefix = `[scene ${formatSceneId(config.sceneId)}]`;

  const groups = await scanSceneTiles(config.tileDirectory, config.sceneId);
  if (groups.size === 0) {
    return { status: 'empty', sceneId: config.sceneId };
  }

  let tileCount = 0;
  for (const group of groups.values()) tileCount += group.tiles.size;

  const blocks = await assembleBlocksFromGroups(groups, config);
  const mosaic = await assembleMosaic(blocks, config);
  if (config.debug) {
    console.log(`${logPrefix} composed ${blocks.size} block(s) into ${mosaic.image.width}x${mosaic.image.height}`);
  }

  await writeImage(mosaic.image, config.outputPath);

  return {
    status: 'written',
    sceneId: config.sceneId,
    outputPath: config.outputPath,
    width: mosaic.image.width,
    height: mosaic.image.height,
    blockCount: blocks.size,
    tileCount,
  };
}

/**
 * Validate the scene options and list the tiles found per block,
 * without decoding or writing anything.
 */
export async function listSceneTiles(input: ListingConfigInput): Promise<Map<string, TileGroup>> {
  const config = resolveListingConfig(input);
  return scanSceneTiles(config.tileDirectory, config.sceneId);
}
