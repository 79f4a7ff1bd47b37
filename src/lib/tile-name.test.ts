import { describe, it, expect } from 'vitest';
import { parseTileName, TILE_EXTENSIONS } from './tile-name';

describe('parseTileName', () => {
  it('extracts scene, col, row and sub ids', () => {
    expect(parseTileName('004_1_2_10.png')).toEqual({ sceneId: 4, colId: 1, rowId: 2, subId: 10 });
  });

  it('accepts every supported extension in any case', () => {
    for (const ext of TILE_EXTENSIONS) {
      expect(parseTileName(`7_0_0_1.${ext}`)).not.toBeNull();
      expect(parseTileName(`7_0_0_1.${ext.toUpperCase()}`)).not.toBeNull();
    }
    expect(parseTileName('12_3_4_5.JpEg')).toEqual({ sceneId: 12, colId: 3, rowId: 4, subId: 5 });
  });

  it('keeps large digit groups intact', () => {
    expect(parseTileName('000123_0045_9000_016.tif')).toEqual({
      sceneId: 123,
      colId: 45,
      rowId: 9000,
      subId: 16,
    });
  });

  it.each([
    '004_1_2.png',
    '004_1_2_3_4.png',
    '004-1-2-3.png',
    '004_a_2_3.png',
    '004_1_2_-3.png',
    '004_1_2_3.gif',
    '004_1_2_3.png.bak',
    '004_1_2_3',
    'tiles/004_1_2_3.png',
    ' 004_1_2_3.png',
    'readme.txt',
    '',
  ])('rejects %j', (name) => {
    expect(parseTileName(name)).toBeNull();
  });
});
