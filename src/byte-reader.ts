import type { ByteReaderOptions, FieldReader } from "./types";

/**
 * Thrown when a read needs more bytes than are left in the buffer.
 */
export class ShortReadError extends Error {
  readonly offset: number;
  readonly needed: number;
  readonly available: number;

  constructor(offset: number, needed: number, available: number) {
    super(
      `Short read at offset ${offset}: needed ${needed} bytes, ${available} available`,
    );
    this.name = "ShortReadError";
    this.offset = offset;
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Cursor over an in-memory TIFF buffer.
 *
 * Wraps a DataView and reads fields in the byte order given at
 * construction, which is normally taken from the file header
 * ("II" for little-endian, "MM" for big-endian).
 *
 * A failed read throws {@link ShortReadError} and does not move the
 * cursor, so the position after a failure is the end of the last
 * field that was read in full.
 *
 * @example
 * ```typescript
 * const bytes = new Uint8Array(await readFile("image.tif"));
 * const reader = new ByteReader(bytes, { littleEndian: true, offset: 10 });
 * const entry = decodeEntry(reader);
 * ```
 */
export class ByteReader implements FieldReader {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private pos: number;
  readonly littleEndian: boolean;

  constructor(data: Uint8Array, options: ByteReaderOptions) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.littleEndian = options.littleEndian;
    this.pos = 0;
    this.seek(options.offset ?? 0);
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.data.length;
  }

  get remaining(): number {
    return this.data.length - this.pos;
  }

  /**
   * Moves the cursor to an absolute offset. Offsets equal to the
   * buffer length are allowed (nothing left to read).
   */
  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.data.length) {
      throw new RangeError(
        `Seek offset ${offset} outside buffer of ${this.data.length} bytes`,
      );
    }
    this.pos = offset;
  }

  readUint16(): number {
    this.require(2);
    const value = this.view.getUint16(this.pos, this.littleEndian);
    this.pos += 2;
    return value;
  }

  readUint32(): number {
    this.require(4);
    const value = this.view.getUint32(this.pos, this.littleEndian);
    this.pos += 4;
    return value;
  }

  readBigUint64(): bigint {
    this.require(8);
    const value = this.view.getBigUint64(this.pos, this.littleEndian);
    this.pos += 8;
    return value;
  }

  /**
   * Reads raw bytes in file order. Byte order does not apply here.
   *
   * @returns A copy, detached from the underlying buffer
   */
  readBytes(length: number): Uint8Array {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid byte count ${length}`);
    }
    this.require(length);
    const bytes = this.data.slice(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  private require(width: number): void {
    if (this.remaining < width) {
      throw new ShortReadError(this.pos, width, this.remaining);
    }
  }
}
