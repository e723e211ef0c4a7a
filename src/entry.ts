import { byteValues, formatEntry } from "./format";
import type { EntryJSON, FieldReader } from "./types";

/** Size in bytes of a classic TIFF IFD entry. */
export const ENTRY_SIZE = 12;

const VALUE_OFFSET_SIZE = 4;

/**
 * One 12-byte entry of a classic TIFF Image File Directory.
 *
 * Layout:
 * - Bytes 0-1: tag ID
 * - Bytes 2-3: type ID
 * - Bytes 4-7: count of values of that type
 * - Bytes 8-11: value offset, either the value itself when it fits in
 *   four bytes or the file offset of the value
 *
 * The entry is left uninterpreted. Which of the two meanings the value
 * offset has depends on the type and count, so it is kept as raw bytes.
 */
export class Entry {
  readonly tagID: number;
  readonly typeID: number;
  readonly count: number;
  private readonly rawValueOffset: Uint8Array;

  private constructor(
    tagID: number,
    typeID: number,
    count: number,
    valueOffset: Uint8Array,
  ) {
    if (valueOffset.length !== VALUE_OFFSET_SIZE) {
      throw new RangeError(
        `Entry value offset must be ${VALUE_OFFSET_SIZE} bytes, got ${valueOffset.length}`,
      );
    }
    this.tagID = tagID;
    this.typeID = typeID;
    this.count = count;
    this.rawValueOffset = valueOffset.slice();
    Object.freeze(this);
  }

  /**
   * Reads an entry from the reader's current position.
   *
   * Fields are read in layout order. Any error thrown by the reader
   * propagates as is, and the reader is left wherever the failing read
   * left it.
   */
  static decode(reader: FieldReader): Entry {
    const tagID = reader.readUint16();
    const typeID = reader.readUint16();
    const count = reader.readUint32();
    const valueOffset = reader.readBytes(VALUE_OFFSET_SIZE);
    return new Entry(tagID, typeID, count, valueOffset);
  }

  /** Bytes 8-11 as stored in the file. Returns a copy. */
  get valueOffset(): Uint8Array {
    return this.rawValueOffset.slice();
  }

  toJSON(): EntryJSON {
    return {
      tagID: this.tagID,
      typeID: this.typeID,
      count: this.count,
      valueOffset: byteValues(this.rawValueOffset),
    };
  }

  toString(): string {
    return formatEntry(
      this.tagID,
      this.typeID,
      this.count,
      this.rawValueOffset,
    );
  }
}

/**
 * Decodes a classic TIFF IFD entry, advancing the reader by 12 bytes.
 *
 * @example
 * ```typescript
 * const reader = new ByteReader(bytes, { littleEndian: false, offset: 10 });
 * const entry = decodeEntry(reader);
 * console.log(entry.tagID); // 256 for ImageWidth
 * ```
 */
export function decodeEntry(reader: FieldReader): Entry {
  return Entry.decode(reader);
}
