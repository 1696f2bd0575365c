import { TiffTag } from "@cogeotiff/core";
import { FormatError } from "@geotile-sampler/errors";
import type { ByteSource } from "./source.js";
import { readAt } from "./source.js";

/** Size in bytes of one tag record. */
export const TAG_RECORD_SIZE = 12;

/** One record of the tag directory. */
export interface TagEntry {
  /** Tag id, e.g. 256 for ImageWidth. */
  tag: number;
  /** TIFF data type; read for diagnostics only. */
  type: number;
  /** Number of values the tag carries. */
  count: number;
  /** The value itself, or the offset of the values when they don't fit. */
  value: number;
}

/** The parsed tag directory. */
export interface TagDirectory {
  offset: number;
  entries: TagEntry[];
  /** Offset of a following directory; multi-image files are not read. */
  nextDirectoryOffset: number;
}

/** The tags this reader needs, as they appeared in the directory. */
export interface RasterTags {
  imageWidth: number | null;
  imageHeight: number | null;
  bitsPerSample: number | null;
  tileWidth: number | null;
  tileLength: number | null;
  tileOffsets: number[] | null;
}

/**
 * Read the tag directory at `offset`.
 *
 * The directory is a u16 record count, that many 12-byte records, and a
 * trailing i32 next-directory offset. Records and trailer are fetched in
 * one read once the count is known.
 *
 * @throws IoError if the directory runs past the end of the source.
 */
export async function readTagDirectory(
  source: ByteSource,
  offset: number,
): Promise<TagDirectory> {
  const countView = await readAt(source, offset, 2);
  const entryCount = countView.getUint16(0, true);

  const view = await readAt(
    source,
    offset + 2,
    entryCount * TAG_RECORD_SIZE + 4,
  );

  const entries: TagEntry[] = [];
  for (let i = 0; i < entryCount; i++) {
    entries.push(parseTagEntry(view, i * TAG_RECORD_SIZE));
  }

  const nextDirectoryOffset = view.getInt32(
    entryCount * TAG_RECORD_SIZE,
    true,
  );

  return { offset, entries, nextDirectoryOffset };
}

/** Parse the 12-byte record starting at `offset` within `view`. */
export function parseTagEntry(view: DataView, offset: number): TagEntry {
  return {
    tag: view.getUint16(offset, true),
    type: view.getUint16(offset + 2, true),
    count: view.getUint32(offset + 4, true),
    value: view.getUint32(offset + 8, true),
  };
}

/**
 * Read the out-of-line tile offset table a TileOffsets entry points at.
 *
 * The entry's value field is a byte offset to `count` consecutive u32
 * values, ordered left to right then top to bottom across the tile grid.
 */
export async function readTileOffsets(
  source: ByteSource,
  entry: TagEntry,
): Promise<number[]> {
  const view = await readAt(source, entry.value, entry.count * 4);
  const offsets = new Array<number>(entry.count);
  for (let i = 0; i < entry.count; i++) {
    offsets[i] = view.getUint32(i * 4, true);
  }
  return offsets;
}

/**
 * Pick out the tags the reader understands. Unknown tags are skipped; when a
 * tag repeats, the last record wins.
 */
export async function resolveTags(
  source: ByteSource,
  directory: TagDirectory,
): Promise<RasterTags> {
  const tags: RasterTags = {
    imageWidth: null,
    imageHeight: null,
    bitsPerSample: null,
    tileWidth: null,
    tileLength: null,
    tileOffsets: null,
  };

  for (const entry of directory.entries) {
    switch (entry.tag) {
      case TiffTag.ImageWidth:
        tags.imageWidth = entry.value;
        break;
      case TiffTag.ImageHeight:
        tags.imageHeight = entry.value;
        break;
      case TiffTag.BitsPerSample:
        tags.bitsPerSample = entry.value;
        break;
      case TiffTag.TileWidth:
        tags.tileWidth = entry.value;
        break;
      case TiffTag.TileHeight:
        tags.tileLength = entry.value;
        break;
      case TiffTag.TileOffsets:
        tags.tileOffsets = await readTileOffsets(source, entry);
        break;
    }
  }

  return tags;
}

/**
 * Return the value of a required tag, or fail naming it.
 */
export function requireTag<T>(value: T | null, name: string): T {
  if (value === null) {
    throw new FormatError(`Missing required tag ${name}`);
  }
  return value;
}
