import { byteValues, formatEntry } from "./format";
import type { EntryBigJSON, FieldReader } from "./types";

/** Size in bytes of a BigTIFF IFD entry. */
export const ENTRY_BIG_SIZE = 20;

const VALUE_OFFSET_SIZE = 8;

/**
 * One 20-byte entry of a BigTIFF Image File Directory.
 *
 * Same fields as a classic {@link Entry}, with a 64-bit count at
 * bytes 4-11 and an 8-byte value offset at bytes 12-19.
 */
export class EntryBig {
  readonly tagID: number;
  readonly typeID: number;
  readonly count: bigint;
  private readonly rawValueOffset: Uint8Array;

  private constructor(
    tagID: number,
    typeID: number,
    count: bigint,
    valueOffset: Uint8Array,
  ) {
    if (valueOffset.length !== VALUE_OFFSET_SIZE) {
      throw new RangeError(
        `EntryBig value offset must be ${VALUE_OFFSET_SIZE} bytes, got ${valueOffset.length}`,
      );
    }
    this.tagID = tagID;
    this.typeID = typeID;
    this.count = count;
    this.rawValueOffset = valueOffset.slice();
    Object.freeze(this);
  }

  static decode(reader: FieldReader): EntryBig {
    const tagID = reader.readUint16();
    const typeID = reader.readUint16();
    const count = reader.readBigUint64();
    const valueOffset = reader.readBytes(VALUE_OFFSET_SIZE);
    return new EntryBig(tagID, typeID, count, valueOffset);
  }

  /** Bytes 12-19 as stored in the file. Returns a copy. */
  get valueOffset(): Uint8Array {
    return this.rawValueOffset.slice();
  }

  toJSON(): EntryBigJSON {
    return {
      tagID: this.tagID,
      typeID: this.typeID,
      count: this.count.toString(),
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
 * Decodes a BigTIFF IFD entry, advancing the reader by 20 bytes.
 * Errors from the reader are rethrown untouched.
 */
export function decodeEntryBig(reader: FieldReader): EntryBig {
  return EntryBig.decode(reader);
}
