import { TiffTag } from "@cogeotiff/core";

/** TIFF data types used by the fixtures. */
const SHORT = 3;
const LONG = 4;

/** A raw tag record, written verbatim. */
export type TagRecord = {
  tag: number;
  type: number;
  count: number;
  value: number;
};

/** Byte-exact description of a raster file. */
export type RasterLayout = {
  byteLength: number;
  identifier?: number;
  version?: number;
  directoryOffset: number;
  tags: TagRecord[];
  nextDirectoryOffset?: number;
  /** u32 tables written at the given offsets. */
  tables?: { offset: number; values: number[] }[];
  /** int16 samples written at the given offsets. */
  samples?: { offset: number; values: number[] }[];
};

/** Write a raster exactly as described, little-endian throughout. */
export function writeRaster(layout: RasterLayout): ArrayBuffer {
  const buffer = new ArrayBuffer(layout.byteLength);
  const view = new DataView(buffer);

  view.setUint16(0, layout.identifier ?? 0x4949, true);
  view.setUint16(2, layout.version ?? 42, true);
  view.setInt32(4, layout.directoryOffset, true);

  let pos = layout.directoryOffset;
  view.setUint16(pos, layout.tags.length, true);
  pos += 2;
  for (const { tag, type, count, value } of layout.tags) {
    view.setUint16(pos, tag, true);
    view.setUint16(pos + 2, type, true);
    view.setUint32(pos + 4, count, true);
    view.setUint32(pos + 8, value, true);
    pos += 12;
  }
  view.setInt32(pos, layout.nextDirectoryOffset ?? 0, true);

  for (const { offset, values } of layout.tables ?? []) {
    values.forEach((v, i) => view.setUint32(offset + i * 4, v, true));
  }
  for (const { offset, values } of layout.samples ?? []) {
    values.forEach((v, i) => view.setInt16(offset + i * 2, v, true));
  }

  return buffer;
}

/** Options for {@link buildRaster}. */
export type BuildOptions = {
  width: number;
  height: number;
  tileWidth: number;
  tileLength: number;
  /** Sample value for each pixel; edge padding is written as 0. */
  pixel: (x: number, y: number) => number;
  /** BitsPerSample value, or null to leave the tag out. Defaults to 16. */
  bitsPerSample?: number | null;
  /** Tag ids to leave out of the directory. */
  omit?: number[];
  /** Number of tile offsets to write; defaults to the full grid. */
  tileOffsetCount?: number;
  nextDirectoryOffset?: number;
};

/**
 * Build a well-formed raster: header, directory at byte 8, the tile offset
 * table right after it, then full-size tiles in row-major order.
 */
export function buildRaster(opts: BuildOptions): {
  buffer: ArrayBuffer;
  tileOffsets: number[];
} {
  const { width, height, tileWidth, tileLength } = opts;
  const tilesAcross = Math.ceil(width / tileWidth);
  const tilesDown = Math.ceil(height / tileLength);
  const tileOffsetCount = opts.tileOffsetCount ?? tilesAcross * tilesDown;
  const omit = new Set(opts.omit ?? []);
  const bitsPerSample =
    opts.bitsPerSample === undefined ? 16 : opts.bitsPerSample;

  const candidates: (TagRecord | null)[] = [
    { tag: TiffTag.ImageWidth, type: LONG, count: 1, value: width },
    { tag: TiffTag.ImageHeight, type: LONG, count: 1, value: height },
    bitsPerSample === null
      ? null
      : { tag: TiffTag.BitsPerSample, type: SHORT, count: 1, value: bitsPerSample },
    // Compression = none, not read by the reader
    { tag: 259, type: SHORT, count: 1, value: 1 },
    { tag: TiffTag.TileWidth, type: SHORT, count: 1, value: tileWidth },
    { tag: TiffTag.TileHeight, type: SHORT, count: 1, value: tileLength },
    // value is patched below once the table offset is known
    { tag: TiffTag.TileOffsets, type: LONG, count: tileOffsetCount, value: 0 },
  ];
  const tags = candidates.filter(
    (t): t is TagRecord => t !== null && !omit.has(t.tag),
  );

  const directoryOffset = 8;
  const tableOffset = directoryOffset + 2 + tags.length * 12 + 4;
  const dataOffset = tableOffset + tileOffsetCount * 4;
  const tileBytes = tileWidth * tileLength * 2;

  for (const t of tags) {
    if (t.tag === TiffTag.TileOffsets) t.value = tableOffset;
  }

  const tileOffsets: number[] = [];
  const samples: { offset: number; values: number[] }[] = [];
  for (let i = 0; i < tileOffsetCount; i++) {
    const offset = dataOffset + i * tileBytes;
    tileOffsets.push(offset);

    const tileX = i % tilesAcross;
    const tileY = Math.floor(i / tilesAcross);
    const values: number[] = [];
    for (let yt = 0; yt < tileLength; yt++) {
      for (let xt = 0; xt < tileWidth; xt++) {
        const x = tileX * tileWidth + xt;
        const y = tileY * tileLength + yt;
        values.push(x < width && y < height ? opts.pixel(x, y) : 0);
      }
    }
    samples.push({ offset, values });
  }

  const buffer = writeRaster({
    byteLength: dataOffset + tileOffsetCount * tileBytes,
    directoryOffset,
    tags,
    nextDirectoryOffset: opts.nextDirectoryOffset,
    tables: [{ offset: tableOffset, values: tileOffsets }],
    samples,
  });

  return { buffer, tileOffsets };
}
