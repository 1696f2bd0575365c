import { readFile } from "node:fs/promises";
import { DivisionError, IoError } from "@geotile-sampler/errors";
import type { Affine } from "./affine.js";
import { apply, fromWorldFile, invert } from "./affine.js";
import type { WorldFileParameters } from "./parser.js";
import { parseWorldFile } from "./parser.js";

/**
 * Metres per degree of latitude at the equator, rounded. Scales pixel
 * offsets into approximate metres when the world file is in degrees.
 */
export const METERS_PER_DEGREE = 110_000;

/** Options for {@link WorldTransform}. */
export type WorldTransformOptions = {
  /** Scale applied by `pixelToWorld`. Defaults to {@link METERS_PER_DEGREE}. */
  metersPerDegree?: number;
};

/**
 * Axis-aligned pixel/world mapping read from a world file.
 *
 * `pixelToWorld` gives offsets from the raster origin in approximate metres
 * and ignores the rotation terms. `worldToPixel` goes the other way from
 * absolute degrees and does not scale by metres; the two are not inverses of
 * each other. `pixelFromWorld` is the exact inverse of `pixelToWorld`, and
 * `geotransform` carries all six terms for callers that need the full affine.
 */
export class WorldTransform {
  readonly xRes: number;
  readonly rotation1: number;
  readonly rotation2: number;
  readonly yRes: number;
  readonly originLat: number;
  readonly originLon: number;
  readonly metersPerDegree: number;

  constructor(
    parameters: WorldFileParameters,
    { metersPerDegree = METERS_PER_DEGREE }: WorldTransformOptions = {},
  ) {
    this.xRes = parameters.xRes;
    this.rotation1 = parameters.rotation1;
    this.rotation2 = parameters.rotation2;
    this.yRes = parameters.yRes;
    this.originLat = parameters.originLat;
    this.originLon = parameters.originLon;
    this.metersPerDegree = metersPerDegree;
  }

  /**
   * Read and parse a world file from disk.
   *
   * @throws IoError if the file cannot be read.
   * @throws FormatError if it is not a six-line world file.
   */
  static async open(
    path: string,
    options: WorldTransformOptions = {},
  ): Promise<WorldTransform> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (err) {
      throw new IoError(`Could not read world file ${path}`, { cause: err });
    }
    return WorldTransform.fromString(text, options);
  }

  static fromString(
    text: string,
    options: WorldTransformOptions = {},
  ): WorldTransform {
    return new WorldTransform(parseWorldFile(text), options);
  }

  /** The six world file terms as a geotransform. */
  get geotransform(): Affine {
    return fromWorldFile(this);
  }

  /**
   * Scale a pixel position to approximate metres from the raster origin.
   *
   *   worldX = xRes * metersPerDegree * x
   *   worldY = yRes * metersPerDegree * y
   */
  pixelToWorld(x: number, y: number): [number, number] {
    return [
      this.xRes * this.metersPerDegree * x,
      this.yRes * this.metersPerDegree * y,
    ];
  }

  /**
   * Pixel position of an absolute (lat, lon), in the world file's own units.
   *
   *   x = (lat - originLat) / xRes
   *   y = (lon - originLon) / yRes
   *
   * @throws DivisionError if either resolution is zero.
   */
  worldToPixel(lat: number, lon: number): [number, number] {
    this.assertResolution();
    return [
      (lat - this.originLat) / this.xRes,
      (lon - this.originLon) / this.yRes,
    ];
  }

  /**
   * Exact inverse of {@link WorldTransform.pixelToWorld}.
   *
   * @throws DivisionError if either resolution or the scale is zero.
   */
  pixelFromWorld(worldX: number, worldY: number): [number, number] {
    this.assertResolution();
    if (this.metersPerDegree === 0) {
      throw new DivisionError("World transform scale is zero");
    }
    return [
      worldX / (this.xRes * this.metersPerDegree),
      worldY / (this.yRes * this.metersPerDegree),
    ];
  }

  /** World coordinate of the centre of pixel (col, row), rotation included. */
  pixelCenter(col: number, row: number): [number, number] {
    return apply(this.geotransform, col, row);
  }

  /**
   * Fractional (col, row) of a world coordinate under the full affine.
   *
   * @throws DivisionError if the geotransform is singular.
   */
  pixelAt(x: number, y: number): [number, number] {
    return apply(invert(this.geotransform), x, y);
  }

  private assertResolution(): void {
    if (this.xRes === 0 || this.yRes === 0) {
      throw new DivisionError(
        `World file resolution is zero (x: ${this.xRes}, y: ${this.yRes})`,
      );
    }
  }
}
