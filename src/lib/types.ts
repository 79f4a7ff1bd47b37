/** Position encoded in a tile filename: `<scene>_<col>_<row>_<sub>.<ext>` */
export type TilePosition = {
  readonly sceneId: number;
  readonly colId: number;
  readonly rowId: number;
  readonly subId: number;
};

export type Tile = TilePosition & {
  filePath: string;
};

/** 8-bit RGBA pixels, row-major, straight (non-premultiplied) alpha. */
export type RgbaImage = {
  width: number;
  height: number;
  data: Buffer;
};

export type Block = {
  colId: number;
  rowId: number;
  image: RgbaImage;
};

/** Blocks of one scene keyed by `blockKey(colId, rowId)`. */
export type BlockMap = Map<string, Block>;

export type GridCell = {
  col: number;
  row: number;
};

export type Offset = {
  x: number;
  y: number;
};

export type Mosaic = {
  image: RgbaImage;
  placements: Map<string, Offset>;
};

export type StitchResult =
  | { status: 'empty'; sceneId: number }
  | {
      status: 'written';
      sceneId: number;
      outputPath: string;
      width: number;
      height: number;
      blockCount: number;
      tileCount: number;
    };

export function blockKey(colId: number, rowId: number): string {
  return `${colId},${rowId}`;
}

export function formatSceneId(sceneId: number): string {
  return String(sceneId).padStart(3, '0');
}
