export type { RasterHeader } from "./header.js";
export { HEADER_SIZE, parseHeader } from "./header.js";
export type { RasterTags, TagDirectory, TagEntry } from "./ifd.js";
export { readTagDirectory, readTileOffsets, resolveTags } from "./ifd.js";
export type { RasterFileOptions } from "./raster-file.js";
export { RasterFile } from "./raster-file.js";
export type { ByteSource } from "./source.js";
export { closeSource, FileSource, memorySource, readAt } from "./source.js";
export type { PixelLocation, TileGrid } from "./tile.js";
export {
  BYTES_PER_SAMPLE,
  locatePixel,
  pixelByteOffset,
  pixelFromLocation,
  tileCount,
} from "./tile.js";
