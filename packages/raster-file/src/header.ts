import { TiffEndian, TiffVersion } from "@cogeotiff/core";
import { FormatError } from "@geotile-sampler/errors";

/** Size in bytes of the fixed file header. */
export const HEADER_SIZE = 8;

/** The fixed 8-byte header at the start of the raster. */
export interface RasterHeader {
  /** Byte-order mark, read little-endian (0x4949 for "II"). */
  identifier: number;
  /** Format version; 42 for classic TIFF. */
  version: number;
  /** Byte offset of the tag directory. */
  directoryOffset: number;
}

/**
 * Parse the header from the first {@link HEADER_SIZE} bytes of the file.
 *
 * Only little-endian classic TIFF is accepted: big-endian files and BigTIFF
 * lay out the directory differently.
 *
 * @throws FormatError for any other byte order, version, or a negative
 *   directory offset.
 */
export function parseHeader(view: DataView): RasterHeader {
  // Bytes 0-1: byte order marker, symmetric so endianness does not matter
  const identifier = view.getUint16(0, true);
  if (identifier !== TiffEndian.Little) {
    const hex = identifier.toString(16).padStart(4, "0");
    throw new FormatError(
      `Unsupported byte order marker 0x${hex}, expected little-endian "II"`,
    );
  }

  // Bytes 2-3: version, 42 = classic TIFF
  const version = view.getUint16(2, true);
  if (version !== TiffVersion.Tiff) {
    throw new FormatError(`Unsupported TIFF version ${version}`);
  }

  // Bytes 4-7: signed offset of the first (and only) tag directory
  const directoryOffset = view.getInt32(4, true);
  if (directoryOffset < HEADER_SIZE) {
    throw new FormatError(`Invalid tag directory offset ${directoryOffset}`);
  }

  return { identifier, version, directoryOffset };
}
