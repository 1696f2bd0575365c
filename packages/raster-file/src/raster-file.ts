import { FormatError, IoError, OutOfRangeError } from "@geotile-sampler/errors";
import type { RasterHeader } from "./header.js";
import { HEADER_SIZE, parseHeader } from "./header.js";
import type { TagDirectory } from "./ifd.js";
import { readTagDirectory, requireTag, resolveTags } from "./ifd.js";
import type { ByteSource } from "./source.js";
import { closeSource, FileSource, memorySource, readAt } from "./source.js";
import type { PixelLocation, TileGrid } from "./tile.js";
import {
  BYTES_PER_SAMPLE,
  locatePixel,
  pixelByteOffset,
  tileCount,
} from "./tile.js";

/** Options for opening a raster. */
export type RasterFileOptions = {
  /**
   * Require the tile offset table to hold exactly tilesAcross × tilesDown
   * entries. When false, a short table only fails once a missing tile is
   * sampled. Defaults to true.
   */
  verifyTileCount?: boolean;
};

/**
 * A tiled, single-band, 16-bit signed raster read lazily from a byte source.
 *
 * The tag directory is parsed once when the raster is opened; pixels are read
 * on demand, two bytes at a time, without loading the image.
 *
 * Construct via `RasterFile.open(path)`, `RasterFile.fromSource(source)` or
 * `RasterFile.fromArrayBuffer(buffer)`.
 */
export class RasterFile implements TileGrid {
  /** The byte source pixels are read from. */
  readonly source: ByteSource;

  /** Byte-order mark from the header. */
  readonly identifier: number;

  /** Format version from the header. */
  readonly version: number;

  /** Byte offset of the tag directory. */
  readonly directoryOffset: number;

  /** Offset of a following directory, ignored. */
  readonly nextDirectoryOffset: number;

  /** Bits per sample; always 16. */
  readonly bitsPerSample: number;

  /** Image width in pixels. */
  readonly imageWidth: number;

  /** Image height in pixels. */
  readonly imageHeight: number;

  /** Tile width in pixels. */
  readonly tileWidth: number;

  /** Tile height in pixels. */
  readonly tileLength: number;

  /** Number of tile columns. */
  readonly tilesAcross: number;

  /** Number of tile rows. */
  readonly tilesDown: number;

  /** Byte offset of each tile, left to right then top to bottom. */
  readonly tileOffsets: readonly number[];

  private closed = false;

  private constructor(
    source: ByteSource,
    header: RasterHeader,
    directory: TagDirectory,
    dims: {
      bitsPerSample: number;
      imageWidth: number;
      imageHeight: number;
      tileWidth: number;
      tileLength: number;
      tileOffsets: number[];
    },
  ) {
    this.source = source;
    this.identifier = header.identifier;
    this.version = header.version;
    this.directoryOffset = header.directoryOffset;
    this.nextDirectoryOffset = directory.nextDirectoryOffset;
    this.bitsPerSample = dims.bitsPerSample;
    this.imageWidth = dims.imageWidth;
    this.imageHeight = dims.imageHeight;
    this.tileWidth = dims.tileWidth;
    this.tileLength = dims.tileLength;
    this.tileOffsets = Object.freeze(dims.tileOffsets);

    const [tilesAcross, tilesDown] = tileCount(this);
    this.tilesAcross = tilesAcross;
    this.tilesDown = tilesDown;
  }

  /**
   * Parse the header and tag directory from a byte source.
   *
   * The source is not closed on failure; whoever opened it owns it.
   *
   * @throws IoError if the header or directory cannot be read in full.
   * @throws FormatError if the header is not little-endian classic TIFF, a
   *   required tag is missing, a dimension is zero, the samples are not 16
   *   bits, or the tile offset table does not match the tile grid.
   */
  static async fromSource(
    source: ByteSource,
    { verifyTileCount = true }: RasterFileOptions = {},
  ): Promise<RasterFile> {
    const header = parseHeader(await readAt(source, 0, HEADER_SIZE));
    const directory = await readTagDirectory(source, header.directoryOffset);
    const tags = await resolveTags(source, directory);

    const imageWidth = requireTag(tags.imageWidth, "ImageWidth (256)");
    const imageHeight = requireTag(tags.imageHeight, "ImageLength (257)");
    const tileWidth = requireTag(tags.tileWidth, "TileWidth (322)");
    const tileLength = requireTag(tags.tileLength, "TileLength (323)");
    const tileOffsets = requireTag(tags.tileOffsets, "TileOffsets (324)");

    if (imageWidth === 0 || imageHeight === 0) {
      throw new FormatError(
        `Image has zero extent: ${imageWidth}x${imageHeight}`,
      );
    }
    if (tileWidth === 0 || tileLength === 0) {
      throw new FormatError(
        `Tiles have zero extent: ${tileWidth}x${tileLength}`,
      );
    }

    let bitsPerSample = tags.bitsPerSample;
    if (bitsPerSample === null) {
      console.warn(
        `[raster-file] No BitsPerSample tag in ${source.url.href}, assuming 16`,
      );
      bitsPerSample = BYTES_PER_SAMPLE * 8;
    } else if (bitsPerSample !== BYTES_PER_SAMPLE * 8) {
      throw new FormatError(
        `Unsupported BitsPerSample ${bitsPerSample}, expected 16`,
      );
    }

    if (directory.nextDirectoryOffset !== 0) {
      console.warn(
        `[raster-file] ${source.url.href} has more than one image; only the first is read`,
      );
    }

    const raster = new RasterFile(source, header, directory, {
      bitsPerSample,
      imageWidth,
      imageHeight,
      tileWidth,
      tileLength,
      tileOffsets,
    });

    const expected = raster.tilesAcross * raster.tilesDown;
    if (verifyTileCount && tileOffsets.length !== expected) {
      throw new FormatError(
        `Tile offset table has ${tileOffsets.length} entries, expected ${expected} (${raster.tilesAcross}x${raster.tilesDown} tiles)`,
      );
    }

    return raster;
  }

  /** Open a raster file from disk. The file stays open until `close`. */
  static async open(
    path: string,
    options: RasterFileOptions = {},
  ): Promise<RasterFile> {
    const source = await FileSource.open(path);
    try {
      return await RasterFile.fromSource(source, options);
    } catch (err) {
      await source.close();
      throw err;
    }
  }

  static async fromArrayBuffer(
    buffer: ArrayBuffer,
    options: RasterFileOptions = {},
  ): Promise<RasterFile> {
    return await RasterFile.fromSource(memorySource(buffer), options);
  }

  /**
   * Open a raster, hand it to `fn`, and close it however `fn` finishes.
   */
  static async withFile<T>(
    path: string,
    fn: (raster: RasterFile) => Promise<T>,
    options: RasterFileOptions = {},
  ): Promise<T> {
    const raster = await RasterFile.open(path, options);
    try {
      return await fn(raster);
    } finally {
      await raster.close();
    }
  }

  /**
   * Locate pixel (x, y) in the tile grid.
   *
   * @throws OutOfRangeError if (x, y) is not an integer pair inside the image.
   */
  locate(x: number, y: number): PixelLocation {
    if (!Number.isInteger(x) || !Number.isInteger(y)) {
      throw new OutOfRangeError(
        `Pixel coordinates must be integers, got (${x}, ${y})`,
      );
    }
    if (x < 0 || x >= this.imageWidth || y < 0 || y >= this.imageHeight) {
      throw new OutOfRangeError(
        `Pixel (${x}, ${y}) is outside the ${this.imageWidth}x${this.imageHeight} image`,
      );
    }
    return locatePixel(this, x, y);
  }

  /**
   * Byte offset of the sample for pixel (x, y).
   *
   * @throws OutOfRangeError if the pixel is outside the image or its tile has
   *   no entry in the offset table.
   */
  byteOffset(x: number, y: number): number {
    const { tileIndex, xt, yt } = this.locate(x, y);
    const tileOffset = this.tileOffsets[tileIndex];
    if (tileOffset === undefined) {
      throw new OutOfRangeError(
        `Tile ${tileIndex} for pixel (${x}, ${y}) is beyond the ${this.tileOffsets.length}-entry offset table`,
      );
    }
    return pixelByteOffset(tileOffset, this.tileWidth, xt, yt);
  }

  /**
   * Read the signed 16-bit sample at pixel (x, y).
   *
   * Each call reads two bytes at an explicit offset, so concurrent calls on
   * one raster do not interfere.
   *
   * @throws OutOfRangeError if the pixel is outside the image or tile table.
   * @throws IoError if the raster is closed or the file is truncated.
   */
  async samplePixel(x: number, y: number): Promise<number> {
    if (this.closed) {
      throw new IoError(`Raster is closed: ${this.source.url.href}`);
    }
    const offset = this.byteOffset(x, y);
    const view = await readAt(this.source, offset, BYTES_PER_SAMPLE);
    return view.getInt16(0, true);
  }

  /** Release the underlying source. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await closeSource(this.source);
  }
}
