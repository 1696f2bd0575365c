import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { SourceMemory } from "@chunkd/source-memory";
import type { Source } from "@cogeotiff/core";
import { IoError } from "@geotile-sampler/errors";

/**
 * An offset-addressed byte source.
 *
 * Every read names its own offset, so there is no shared cursor between
 * concurrent reads. Sources that hold an OS handle release it in `close`.
 */
export type ByteSource = Source & {
  close?: () => Promise<void>;
};

/**
 * Local file source that reads byte ranges through a single open handle.
 *
 * Construct via `FileSource.open(path)`; the handle stays open until `close`.
 * The file size is taken once at open and bounds every read, so a length
 * read from a corrupt directory never allocates more than the file holds.
 */
export class FileSource implements Source {
  readonly url: URL;
  /** Size of the file in bytes when it was opened. */
  readonly size: number;
  private handle: FileHandle | null;

  private constructor(path: string, handle: FileHandle, size: number) {
    this.url = pathToFileURL(path);
    this.handle = handle;
    this.size = size;
  }

  static async open(path: string): Promise<FileSource> {
    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (err) {
      throw new IoError(`Could not open ${path}`, { cause: err });
    }

    let size: number;
    try {
      size = (await handle.stat()).size;
    } catch (err) {
      await handle.close();
      throw new IoError(`Could not stat ${path}`, { cause: err });
    }
    return new FileSource(path, handle, size);
  }

  /** Whether `close` has released the handle. */
  get closed(): boolean {
    return this.handle === null;
  }

  async fetch(offset: number, length?: number): Promise<ArrayBuffer> {
    const handle = this.handle;
    if (handle === null) {
      throw new IoError(`Source is closed: ${this.url.href}`);
    }

    const remaining = Math.max(this.size - offset, 0);
    const size =
      length === undefined ? remaining : Math.min(length, remaining);
    const buf = Buffer.alloc(size);
    const { bytesRead } = await handle.read(buf, 0, size, offset);

    const arrayBuffer = buf.buffer.slice(
      buf.byteOffset,
      buf.byteOffset + bytesRead,
    );
    if (arrayBuffer instanceof SharedArrayBuffer) {
      throw new Error("Expected ArrayBuffer, got SharedArrayBuffer");
    }
    return arrayBuffer;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle !== null) {
      await handle.close();
    }
  }
}

/** Wrap an in-memory copy of a raster as a byte source. */
export function memorySource(
  buffer: ArrayBuffer,
  name = "memory://input.tif",
): ByteSource {
  return new SourceMemory(name, buffer);
}

/**
 * Read exactly `length` bytes at `offset`.
 *
 * @throws IoError if the source rejects the read or returns fewer bytes.
 */
export async function readAt(
  source: ByteSource,
  offset: number,
  length: number,
): Promise<DataView> {
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new IoError(`Invalid read offset ${offset} in ${source.url.href}`);
  }

  let bytes: ArrayBuffer;
  try {
    bytes = await source.fetch(offset, length);
  } catch (err) {
    if (err instanceof IoError) throw err;
    throw new IoError(
      `Failed to read ${length} bytes at offset ${offset} from ${source.url.href}`,
      { cause: err },
    );
  }

  if (bytes.byteLength < length) {
    throw new IoError(
      `Short read at offset ${offset} in ${source.url.href}: expected ${length} bytes, got ${bytes.byteLength}`,
    );
  }

  return new DataView(bytes, 0, length);
}

/** Release the source's handle, if it holds one. */
export async function closeSource(source: ByteSource): Promise<void> {
  await source.close?.();
}
