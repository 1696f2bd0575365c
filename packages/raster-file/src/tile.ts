/** Bytes per 16-bit sample. */
export const BYTES_PER_SAMPLE = 2;

/** Objects partitioned into a row-major grid of equally sized tiles. */
export interface TileGrid {
  /** The width of the image in pixels. */
  readonly imageWidth: number;

  /** The height of the image in pixels. */
  readonly imageHeight: number;

  /** The width of tiles in pixels. */
  readonly tileWidth: number;

  /** The height of tiles in pixels. */
  readonly tileLength: number;
}

/** Where a pixel lives within the tile grid. */
export type PixelLocation = {
  /** Tile column index. */
  tileX: number;
  /** Tile row index. */
  tileY: number;
  /** Row-major index into the tile offset table. */
  tileIndex: number;
  /** Column within the tile. */
  xt: number;
  /** Row within the tile. */
  yt: number;
};

/** Tile columns and rows needed to cover the image, partial edge tiles included. */
export function tileCount(grid: TileGrid): [number, number] {
  return [
    Math.ceil(grid.imageWidth / grid.tileWidth),
    Math.ceil(grid.imageHeight / grid.tileLength),
  ];
}

/**
 * Decompose integer pixel coordinates into tile and in-tile coordinates.
 *
 * Callers are expected to have checked that (x, y) is a non-negative integer
 * pair; division is floor division.
 */
export function locatePixel(
  grid: TileGrid,
  x: number,
  y: number,
): PixelLocation {
  const [tilesAcross] = tileCount(grid);
  const tileX = Math.floor(x / grid.tileWidth);
  const tileY = Math.floor(y / grid.tileLength);
  return {
    tileX,
    tileY,
    tileIndex: tileY * tilesAcross + tileX,
    xt: x % grid.tileWidth,
    yt: y % grid.tileLength,
  };
}

/** Rebuild the pixel coordinates from a tile index and in-tile position. */
export function pixelFromLocation(
  grid: TileGrid,
  { tileIndex, xt, yt }: Pick<PixelLocation, "tileIndex" | "xt" | "yt">,
): [number, number] {
  const [tilesAcross] = tileCount(grid);
  const tileX = tileIndex % tilesAcross;
  const tileY = Math.floor(tileIndex / tilesAcross);
  return [tileX * grid.tileWidth + xt, tileY * grid.tileLength + yt];
}

/** Byte offset of a sample, given the start of its tile. Rows are tileWidth samples long. */
export function pixelByteOffset(
  tileOffset: number,
  tileWidth: number,
  xt: number,
  yt: number,
): number {
  return tileOffset + (yt * tileWidth + xt) * BYTES_PER_SAMPLE;
}
