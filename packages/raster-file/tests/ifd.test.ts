import { IoError } from "@geotile-sampler/errors";
import { describe, expect, it } from "vitest";
import { readTagDirectory, resolveTags } from "../src/ifd.js";
import { memorySource } from "../src/source.js";
import { writeRaster } from "./helpers.js";

describe("readTagDirectory", () => {
  it("reads every record and the next-directory offset", async () => {
    const buffer = writeRaster({
      byteLength: 64,
      directoryOffset: 8,
      tags: [
        { tag: 256, type: 4, count: 1, value: 640 },
        { tag: 257, type: 4, count: 1, value: 480 },
      ],
      nextDirectoryOffset: 0,
    });

    const directory = await readTagDirectory(memorySource(buffer), 8);

    expect(directory).toEqual({
      offset: 8,
      entries: [
        { tag: 256, type: 4, count: 1, value: 640 },
        { tag: 257, type: 4, count: 1, value: 480 },
      ],
      nextDirectoryOffset: 0,
    });
  });

  it("fails with IoError when the tag count runs past the end of the file", async () => {
    const buffer = writeRaster({
      byteLength: 40,
      directoryOffset: 8,
      tags: [{ tag: 256, type: 4, count: 1, value: 4 }],
    });
    // Claim 200 records in a 40-byte file
    new DataView(buffer).setUint16(8, 200, true);

    await expect(
      readTagDirectory(memorySource(buffer), 8),
    ).rejects.toBeInstanceOf(IoError);
  });

  it("fails with IoError when the directory offset is past the end of the file", async () => {
    const buffer = writeRaster({
      byteLength: 40,
      directoryOffset: 8,
      tags: [],
    });

    await expect(
      readTagDirectory(memorySource(buffer), 4096),
    ).rejects.toBeInstanceOf(IoError);
  });
});

describe("resolveTags", () => {
  it("follows the tile offset pointer and skips unknown tags", async () => {
    const buffer = writeRaster({
      byteLength: 200,
      directoryOffset: 8,
      tags: [
        { tag: 256, type: 4, count: 1, value: 4 },
        { tag: 257, type: 4, count: 1, value: 2 },
        { tag: 258, type: 3, count: 1, value: 16 },
        // PhotometricInterpretation, ignored
        { tag: 262, type: 3, count: 1, value: 1 },
        { tag: 322, type: 3, count: 1, value: 2 },
        { tag: 323, type: 3, count: 1, value: 2 },
        { tag: 324, type: 4, count: 2, value: 160 },
      ],
      tables: [{ offset: 160, values: [168, 176] }],
    });
    const source = memorySource(buffer);

    const tags = await resolveTags(source, await readTagDirectory(source, 8));

    expect(tags).toEqual({
      imageWidth: 4,
      imageHeight: 2,
      bitsPerSample: 16,
      tileWidth: 2,
      tileLength: 2,
      tileOffsets: [168, 176],
    });
  });

  it("leaves absent tags as null", async () => {
    const buffer = writeRaster({
      byteLength: 64,
      directoryOffset: 8,
      tags: [{ tag: 256, type: 4, count: 1, value: 4 }],
    });
    const source = memorySource(buffer);

    const tags = await resolveTags(source, await readTagDirectory(source, 8));

    expect(tags.imageWidth).toBe(4);
    expect(tags.imageHeight).toBeNull();
    expect(tags.tileOffsets).toBeNull();
  });

  it("fails with IoError when the tile offset table is truncated", async () => {
    const buffer = writeRaster({
      byteLength: 64,
      directoryOffset: 8,
      tags: [{ tag: 324, type: 4, count: 100, value: 40 }],
    });
    const source = memorySource(buffer);
    const directory = await readTagDirectory(source, 8);

    await expect(resolveTags(source, directory)).rejects.toBeInstanceOf(
      IoError,
    );
  });
});
