export { ByteReader, ShortReadError } from "./byte-reader";
export { ENTRY_SIZE, Entry, decodeEntry } from "./entry";
export { ENTRY_BIG_SIZE, EntryBig, decodeEntryBig } from "./entry-big";
export { formatEntry } from "./format";
export type {
  ByteReaderOptions,
  EntryBigJSON,
  EntryJSON,
  FieldReader,
} from "./types";
