/**
 * Display helpers shared by the classic and BigTIFF entry types.
 */

/**
 * Copies raw bytes into a plain array so they serialize as a JSON list.
 */
export function byteValues(bytes: Uint8Array): number[] {
  return Array.from(bytes);
}

/**
 * Renders an entry as a single line.
 *
 * Tag and type IDs are right-aligned in five columns (the width of the
 * largest uint16) so consecutive entries of a directory line up. The
 * value offset is shown as its raw bytes, never as an integer.
 *
 * @example
 * ```typescript
 * formatEntry(1, 3, 2, new Uint8Array([0, 0, 0, 16]));
 * // "<TagID:     1, TypeID:     3, Count: 2, ValueOffset: [0 0 0 16]>"
 * ```
 */
export function formatEntry(
  tagID: number,
  typeID: number,
  count: number | bigint,
  valueOffset: Uint8Array,
): string {
  const tag = String(tagID).padStart(5);
  const type = String(typeID).padStart(5);
  return `<TagID: ${tag}, TypeID: ${type}, Count: ${count}, ValueOffset: [${valueOffset.join(" ")}]>`;
}
