import { FormatError } from "@geotile-sampler/errors";

/** The six terms of a world file, in file order. */
export type WorldFileParameters = {
  /** Line 1: pixel size along x. */
  xRes: number;
  /** Line 2: rotation term (y per column). */
  rotation1: number;
  /** Line 3: rotation term (x per row). */
  rotation2: number;
  /** Line 4: pixel size along y, usually negative. */
  yRes: number;
  /** Line 5: x of the top-left pixel centre. */
  originLat: number;
  /** Line 6: y of the top-left pixel centre. */
  originLon: number;
};

const LINE_NAMES = [
  "x resolution",
  "rotation",
  "rotation",
  "y resolution",
  "x origin",
  "y origin",
] as const;

// Decimal literal with optional exponent; rejects hex, Infinity and NaN
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse the text of a six-line world file (.tfw, .tifw, .wld).
 *
 * Lines are trimmed and may end in LF or CRLF. Anything after the sixth line
 * is ignored.
 *
 * @throws FormatError if there are fewer than six lines or a line is not a
 *   decimal number.
 */
export function parseWorldFile(text: string): WorldFileParameters {
  const lines = text.split(/\r?\n/).map((line) => line.trim());

  return {
    xRes: readLine(lines, 0),
    rotation1: readLine(lines, 1),
    rotation2: readLine(lines, 2),
    yRes: readLine(lines, 3),
    originLat: readLine(lines, 4),
    originLon: readLine(lines, 5),
  };
}

function readLine(lines: string[], index: number): number {
  const name = LINE_NAMES[index];
  const line = lines[index];
  if (line === undefined || line === "") {
    throw new FormatError(
      `World file has ${countLines(lines)} of 6 required lines; line ${index + 1} (${name}) is missing`,
    );
  }
  if (!DECIMAL.test(line)) {
    throw new FormatError(
      `World file line ${index + 1} (${name}) is not a number: "${line}"`,
    );
  }
  return Number(line);
}

/** Number of leading non-blank lines. */
function countLines(lines: string[]): number {
  const blank = lines.findIndex((line) => line === "");
  return blank === -1 ? lines.length : blank;
}
