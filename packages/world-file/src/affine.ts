import { DivisionError } from "@geotile-sampler/errors";
import type { WorldFileParameters } from "./parser.js";

/**
 * Six-term pixel-to-world transform, in the order GDAL calls a geotransform.
 *
 *   worldX = a * col + b * row + c
 *   worldY = d * col + e * row + f
 *
 * With zero rotation, a and e are the pixel sizes and (c, f) is the world
 * position of pixel (0, 0).
 */
export type Affine = [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
];

/**
 * Arrange world file terms as a geotransform.
 *
 * World files list the terms as A, D, B, E, C, F: the rotation on line 2
 * couples the column into y, the one on line 3 couples the row into x.
 * (c, f) is the centre of the top-left pixel.
 */
export function fromWorldFile({
  xRes,
  rotation1,
  rotation2,
  yRes,
  originLat,
  originLon,
}: WorldFileParameters): Affine {
  return [xRes, rotation2, originLat, rotation1, yRes, originLon];
}

/** World position of pixel (col, row); fractional positions are allowed. */
export function apply(
  [a, b, c, d, e, f]: Affine,
  col: number,
  row: number,
): [number, number] {
  return [a * col + b * row + c, d * col + e * row + f];
}

/**
 * The world-to-pixel transform undoing `transform`.
 *
 * Solves the 2x2 linear part by its determinant, then carries the world
 * offset through the inverse.
 *
 * @throws DivisionError if the determinant is zero, as when both axes
 *   collapse onto one line.
 */
export function invert(transform: Affine): Affine {
  const [a, b, c, d, e, f] = transform;
  const det = a * e - b * d;
  if (det === 0) {
    throw new DivisionError(
      `Cannot invert degenerate transform [${transform.join(", ")}]`,
    );
  }

  const colPerX = e / det;
  const colPerY = -b / det;
  const rowPerX = -d / det;
  const rowPerY = a / det;

  return [
    colPerX,
    colPerY,
    -(colPerX * c + colPerY * f),
    rowPerX,
    rowPerY,
    -(rowPerX * c + rowPerY * f),
  ];
}
