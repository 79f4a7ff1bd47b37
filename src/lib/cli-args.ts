/**
 * Command-line parsing for scripts/stitch-scene.ts
 *
 * Environment values (loaded through dotenv by the script) give the
 * defaults; flags override them. Range checks beyond "is a number" are
 * left to the config schema.
 */
import { DEFAULT_GRID_SIZE, DEFAULT_SUB_BASE_INDEX, DEFAULT_TILE_SIZE } from './config';
import type { StitchConfigInput } from './config';

export type CliOptions = StitchConfigInput & { dryRun: boolean };

export type CliParseResult =
  | { kind: 'run'; options: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

type Env = Record<string, string | undefined>;

function envFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value !== '0' && value.toLowerCase() !== 'false';
}

function envNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  return Number(value);
}

export function cliDefaults(env: Env) {
  return {
    tileSize: envNumber(env.TILE_SIZE, DEFAULT_TILE_SIZE),
    gridSize: envNumber(env.GRID_SIZE, DEFAULT_GRID_SIZE),
    subBaseIndex: envNumber(env.SUB_BASE_INDEX, DEFAULT_SUB_BASE_INDEX),
    compactGaps: envFlag(env.COMPACT_GAPS, true),
    debug: envFlag(env.DEBUG, false),
  };
}

export function helpText(env: Env): string {
  const defaults = cliDefaults(env);
  return `
Usage: npx tsx scripts/stitch-scene.ts <tile-dir> --scene <id> --out <path> [options]

Stitch tiles named <scene>_<col>_<row>_<sub>.<ext> into one scene image.

Options:
      --scene <n>         Scene id to stitch (required)
  -o, --out <path>        Output image (.png, .jpg, .webp, .tif) (required)
      --tile <px>         Tile size in pixels (default: ${defaults.tileSize})
      --grid <n>          Sub-tiles per block side (default: ${defaults.gridSize})
      --sub-base <n>      Sub-index of the top-left cell (default: ${defaults.subBaseIndex})
      --dense             Close up gaps in column/row ids${defaults.compactGaps ? ' (default)' : ''}
      --no-dense          Place blocks at their raw column/row ids${defaults.compactGaps ? '' : ' (default)'}
      --stride-x <px>     Horizontal block spacing (default: grid * tile)
      --stride-y <px>     Vertical block spacing (default: grid * tile)
      --dry-run           List the blocks found, write nothing
      --debug             Per-block progress output
  -h, --help              Show help
`;
}

/** Value following the flag at `index`, or null when absent. Negative numbers count as values. */
function readValue(args: string[], index: number): string | null {
  const value = args[index + 1];
  if (value === undefined) return null;
  if (value.startsWith('-') && !/^-\d/.test(value)) return null;
  return value;
}

export function parseCliArgs(args: string[], env: Env = {}): CliParseResult {
  const defaults = cliDefaults(env);
  const positional: string[] = [];
  const warnings: string[] = [];
  let sceneId: number | undefined;
  let outputPath = '';
  let strideX: number | undefined;
  let strideY: number | undefined;
  let dryRun = false;
  const options = { ...defaults };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-o':
      case '--out': {
        const value = readValue(args, i);
        if (value === null) return { kind: 'error', message: `Missing value for ${arg}` };
        outputPath = value;
        i++;
        break;
      }
      case '--scene':
      case '--tile':
      case '--grid':
      case '--sub-base':
      case '--stride-x':
      case '--stride-y': {
        const raw = readValue(args, i);
        if (raw === null) return { kind: 'error', message: `Missing value for ${arg}` };
        const value = Number(raw);
        if (raw.trim() === '' || !Number.isFinite(value)) {
          return { kind: 'error', message: `Invalid value for ${arg}: ${raw}` };
        }
        i++;
        if (arg === '--scene') sceneId = value;
        else if (arg === '--tile') options.tileSize = value;
        else if (arg === '--grid') options.gridSize = value;
        else if (arg === '--sub-base') options.subBaseIndex = value;
        else if (arg === '--stride-x') strideX = value;
        else strideY = value;
        break;
      }
      case '--dense':
        options.compactGaps = true;
        break;
      case '--no-dense':
        options.compactGaps = false;
        break;
      case '--dry-run':
        dryRun = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown argument ignored: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  const tileDirectory = positional[0];
  if (!tileDirectory) return { kind: 'error', message: 'No tile directory specified.' };
  if (sceneId === undefined) return { kind: 'error', message: 'Missing required --scene <id>.' };
  if (!outputPath && !dryRun) return { kind: 'error', message: 'Missing required --out <path>.' };
  if (positional.length > 1) warnings.push(`Extra arguments ignored: ${positional.slice(1).join(' ')}`);

  return {
    kind: 'run',
    warnings,
    options: {
      ...options,
      tileDirectory,
      sceneId,
      outputPath,
      strideX,
      strideY,
      dryRun,
    },
  };
}
