/**
 * Errors raised while reading a tiled raster or its world file.
 *
 * Every failure is a structural problem with the input, so none of these are
 * retried. Catch {@link RasterError} to handle all of them at once.
 */
export class RasterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RasterError";
  }
}

/** The source could not be opened, or a read came back short. */
export class IoError extends RasterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IoError";
  }
}

/** Required tags are missing or the header, directory or world file is malformed. */
export class FormatError extends RasterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FormatError";
  }
}

/** A pixel coordinate, tile index or window falls outside the raster. */
export class OutOfRangeError extends RasterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OutOfRangeError";
  }
}

/** An inverse transform was asked to divide by a zero resolution. */
export class DivisionError extends RasterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DivisionError";
  }
}
