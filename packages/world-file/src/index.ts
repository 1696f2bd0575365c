export type { Affine } from "./affine.js";
export { apply, fromWorldFile, invert } from "./affine.js";
export type { WorldFileParameters } from "./parser.js";
export { parseWorldFile } from "./parser.js";
export type { WorldTransformOptions } from "./world-transform.js";
export { METERS_PER_DEGREE, WorldTransform } from "./world-transform.js";
