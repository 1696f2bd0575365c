import { OutOfRangeError } from "@geotile-sampler/errors";
import type { RasterFileOptions } from "@geotile-sampler/raster-file";
import { RasterFile } from "@geotile-sampler/raster-file";
import type { WorldTransformOptions } from "@geotile-sampler/world-file";
import { WorldTransform } from "@geotile-sampler/world-file";

/** Raw sample value that marks a pixel with no measurement. */
export const NODATA = 32767;

/** Anything that can be sampled one pixel at a time. */
export interface PixelSampler {
  readonly imageWidth: number;
  readonly imageHeight: number;
  samplePixel(x: number, y: number): Promise<number>;
}

/** Anything that maps pixel positions to world positions. */
export interface PixelProjector {
  pixelToWorld(x: number, y: number): [number, number];
}

/** Default cap on reads in flight at once. */
export const READ_BATCH_SIZE = 256;

/** A half-open pixel rectangle: startX <= x < endX, startY <= y < endY. */
export type PixelWindow = {
  startX: number;
  startY: number;
  endX: number;
  endY: number;
};

export type SampleWindowOptions = {
  /** Raw value to drop. Defaults to {@link NODATA}. */
  nodata?: number;
  /**
   * Shift points so the window centre sits at the world origin. Defaults to
   * true.
   */
  recenter?: boolean;
  /**
   * Most pixel reads started at once. Rows wider than this are read in
   * consecutive batches. Defaults to {@link READ_BATCH_SIZE}.
   */
  batchSize?: number;
};

/** Points sampled from a window, flattened as x, y, z triples. */
export type PointCloud = {
  /** [x0, y0, z0, x1, y1, z1, ...] */
  positions: Float64Array;
  /** Number of points kept. */
  count: number;
  /** Number of nodata pixels dropped. */
  skipped: number;
  /** World offset subtracted from every point; [0, 0] when not recentred. */
  center: [number, number];
};

/** The window covering the whole raster. */
export function defaultWindow(raster: PixelSampler): PixelWindow {
  return {
    startX: 0,
    startY: 0,
    endX: raster.imageWidth,
    endY: raster.imageHeight,
  };
}

/**
 * Sample every pixel of `window` and project it to world space.
 *
 * Pixels are visited row by row. Samples equal to `nodata` are dropped; all
 * other values become the z of a point verbatim.
 *
 * @throws OutOfRangeError if the window is not inside the raster.
 * @throws RangeError if `batchSize` is not a positive integer.
 */
export async function sampleWindow(
  raster: PixelSampler,
  transform: PixelProjector,
  window: PixelWindow = defaultWindow(raster),
  {
    nodata = NODATA,
    recenter = true,
    batchSize = READ_BATCH_SIZE,
  }: SampleWindowOptions = {},
): Promise<PointCloud> {
  assertWindow(raster, window);
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(
      `batchSize must be a positive integer, got ${batchSize}`,
    );
  }
  const { startX, startY, endX, endY } = window;

  let center: [number, number] = [0, 0];
  if (recenter) {
    center = transform.pixelToWorld(
      Math.floor((startX + endX) / 2),
      Math.floor((startY + endY) / 2),
    );
  }

  const positions: number[] = [];
  let skipped = 0;

  for (let y = startY; y < endY; y++) {
    for (let batchX = startX; batchX < endX; batchX += batchSize) {
      const batchEnd = Math.min(batchX + batchSize, endX);
      const reads: Promise<number>[] = [];
      for (let x = batchX; x < batchEnd; x++) {
        reads.push(raster.samplePixel(x, y));
      }
      const values = await Promise.all(reads);

      values.forEach((z, i) => {
        if (z === nodata) {
          skipped++;
          return;
        }
        const [wx, wy] = transform.pixelToWorld(batchX + i, y);
        positions.push(wx - center[0], wy - center[1], z);
      });
    }
  }

  return {
    positions: Float64Array.from(positions),
    count: positions.length / 3,
    skipped,
    center,
  };
}

/**
 * Open a raster and its world file, sample a window, and close the raster.
 */
export async function sampleFiles(
  rasterPath: string,
  worldFilePath: string,
  window?: PixelWindow,
  options: SampleWindowOptions &
    RasterFileOptions &
    WorldTransformOptions = {},
): Promise<PointCloud> {
  const transform = await WorldTransform.open(worldFilePath, options);
  return await RasterFile.withFile(
    rasterPath,
    (raster) => sampleWindow(raster, transform, window, options),
    options,
  );
}

function assertWindow(raster: PixelSampler, window: PixelWindow): void {
  const { startX, startY, endX, endY } = window;
  const corners = [startX, startY, endX, endY];
  if (!corners.every(Number.isInteger)) {
    throw new OutOfRangeError(
      `Window corners must be integers, got (${startX}, ${startY})-(${endX}, ${endY})`,
    );
  }
  if (
    startX < 0 ||
    startY < 0 ||
    endX > raster.imageWidth ||
    endY > raster.imageHeight ||
    startX > endX ||
    startY > endY
  ) {
    throw new OutOfRangeError(
      `Window (${startX}, ${startY})-(${endX}, ${endY}) is not inside the ${raster.imageWidth}x${raster.imageHeight} image`,
    );
  }
}
