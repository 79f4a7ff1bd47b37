#!/usr/bin/env npx tsx
/**
 * CLI wrapper for stitching one scene from a directory of tiles
 */
import dotenv from 'dotenv';
import { helpText, parseCliArgs } from '../src/lib/cli-args';
import { logErrorDetails } from '../src/lib/errors';
import { listSceneTiles, stitchScene } from '../src/lib/stitcher';
import type { ListingConfigInput } from '../src/lib/config';
import { formatSceneId } from '../src/lib/types';

dotenv.config();

async function dryRun(config: ListingConfigInput) {
  const { sceneId } = config;
  const groups = await listSceneTiles(config);
  if (groups.size === 0) {
    console.log(`⚠️ No tiles found for scene ${formatSceneId(sceneId)}`);
    return;
  }

  console.log(`🔎 Scene ${formatSceneId(sceneId)}: ${groups.size} block(s)`);
  for (const group of groups.values()) {
    const subIds = Array.from(group.tiles.keys()).sort((a, b) => a - b);
    console.log(`   (${group.colId},${group.rowId}) subs: ${subIds.join(', ')}`);
  }
}

async function main() {
  const parsed = parseCliArgs(process.argv.slice(2), process.env);

  if (parsed.kind === 'help') {
    console.log(helpText(process.env));
    return;
  }
  if (parsed.kind === 'error') {
    console.error(`❌ ${parsed.message}`);
    console.error(`   Usage: npx tsx scripts/stitch-scene.ts <tile-dir> --scene <id> --out <path>`);
    process.exit(1);
  }

  for (const warning of parsed.warnings) {
    console.warn(`⚠️ ${warning}`);
  }

  const { dryRun: listOnly, ...config } = parsed.options;

  if (listOnly) {
    await dryRun(config);
    return;
  }

  console.log(`🧩 Stitching scene ${formatSceneId(config.sceneId)}...`);
  console.log(`   Input:  ${config.tileDirectory}`);
  console.log(`   Output: ${config.outputPath}`);

  const result = await stitchScene(config);
  if (result.status === 'empty') {
    console.log(`⚠️ No tiles found for scene ${formatSceneId(result.sceneId)}, nothing written.`);
    return;
  }

  console.log(
    `🎉 [scene ${formatSceneId(result.sceneId)}] saved to ${result.outputPath}, size=${result.width}x${result.height} ` +
      `(${result.blockCount} block(s), ${result.tileCount} tile(s))`
  );
}

main().catch((error: unknown) => {
  logErrorDetails('❌ ', error);
  process.exit(1);
});
