/**
 * Sequential reader of fixed-width fields.
 *
 * Byte order is a property of the reader, set up by whoever created it.
 * Every method consumes exactly the width it reads and throws if the
 * field cannot be read in full.
 */
export interface FieldReader {
  readUint16(): number;
  readUint32(): number;
  readBigUint64(): bigint;
  readBytes(length: number): Uint8Array;
}

export interface ByteReaderOptions {
  littleEndian: boolean;
  /** Starting position, defaults to 0. */
  offset?: number;
}

export interface EntryJSON {
  tagID: number;
  typeID: number;
  count: number;
  valueOffset: number[];
}

export interface EntryBigJSON {
  tagID: number;
  typeID: number;
  // decimal string: JSON numbers lose precision past 2^53
  count: string;
  valueOffset: number[];
}
