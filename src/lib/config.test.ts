import { describe, it, expect } from 'vitest';

import { resolveListingConfig, resolveStitchConfig } from './config';
import { ConfigError } from './errors';

describe('resolveStitchConfig', () => {
  it('fills in defaults and derives strides from the block size', () => {
    expect(resolveStitchConfig({ tileDirectory: 'tiles', sceneId: 4, outputPath: 'out/scene.png' })).toEqual({
      tileDirectory: 'tiles',
      sceneId: 4,
      outputPath: 'out/scene.png',
      tileSize: 256,
      gridSize: 4,
      subBaseIndex: 1,
      compactGaps: true,
      debug: false,
      strideX: 1024,
      strideY: 1024,
    });
  });

  it('keeps explicit strides and derives the missing one', () => {
    const config = resolveStitchConfig({
      tileDirectory: 'tiles',
      sceneId: 1,
      outputPath: 'scene.tif',
      tileSize: 16,
      gridSize: 2,
      strideX: 40,
    });
    expect(config.strideX).toBe(40);
    expect(config.strideY).toBe(32);
  });

  it('allows a negative or zero sub-base index', () => {
    expect(resolveStitchConfig({ tileDirectory: 't', sceneId: 0, outputPath: 'a.png', subBaseIndex: 0 }).subBaseIndex).toBe(0);
    expect(resolveStitchConfig({ tileDirectory: 't', sceneId: 0, outputPath: 'a.png', subBaseIndex: -2 }).subBaseIndex).toBe(-2);
  });

  it('lists every problem in a ConfigError', () => {
    let caught: unknown;
    try {
      resolveStitchConfig({ tileDirectory: '', sceneId: 1.5, outputPath: 'scene.gif', gridSize: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
      'gridSize',
      'outputPath',
      'sceneId',
      'tileDirectory',
    ]);
    expect(issues).toContain('outputPath: must end with one of .png, .jpg, .jpeg, .webp, .tif, .tiff');
  });

  it('accepts a zero stride and rejects negative ones', () => {
    const config = resolveStitchConfig({ tileDirectory: 't', sceneId: 0, outputPath: 'a.png', strideX: 0, strideY: 0 });
    expect(config.strideX).toBe(0);
    expect(config.strideY).toBe(0);
    expect(() =>
      resolveStitchConfig({ tileDirectory: 't', sceneId: 0, outputPath: 'a.png', strideY: -1 })
    ).toThrow(ConfigError);
  });
});

describe('resolveListingConfig', () => {
  it('validates the scene options without requiring an output path', () => {
    expect(resolveListingConfig({ tileDirectory: 'tiles', sceneId: 3 })).toMatchObject({
      tileDirectory: 'tiles',
      sceneId: 3,
      gridSize: 4,
    });
  });

  it('rejects a fractional or negative scene id', () => {
    expect(() => resolveListingConfig({ tileDirectory: 'tiles', sceneId: 1.5 })).toThrow(ConfigError);
    expect(() => resolveListingConfig({ tileDirectory: 'tiles', sceneId: -1 })).toThrow(ConfigError);
  });
});
