/**
 * chain-ext — Sandbox memory I/O
 *
 * Bounds-checked reads and writes of guest linear memory. Reads return
 * copies; a range that is not fully inside memory fails with
 * MEMORY_ACCESS_OUT_OF_BOUNDS before any byte is touched.
 */

import type { Result } from '../types.js';
import { memoryAccessOutOfBounds } from '../errors.js';

/** Size of a u32 in guest memory. */
export const U32_SIZE = 4;

// ---------------------------------------------------------------------------
// Range Check
// ---------------------------------------------------------------------------

/**
 * Check that `[ptr, ptr + len)` lies inside `memory`.
 *
 * @returns Ok(undefined) when the range fits, Err otherwise.
 */
export function checkRange(
  memory: WebAssembly.Memory,
  ptr: number,
  len: number,
): Result<undefined> {
  const memorySize = memory.buffer.byteLength;

  if (ptr < 0 || len < 0 || ptr + len > memorySize) {
    return { ok: false, error: memoryAccessOutOfBounds(ptr, len, memorySize) };
  }

  return { ok: true, value: undefined };
}

// ---------------------------------------------------------------------------
// Memory Read / Write
// ---------------------------------------------------------------------------

/**
 * Write data into guest memory at the given byte offset.
 *
 * @returns Ok(undefined) on success, Err on out-of-bounds write.
 */
export function writeToMemory(
  memory: WebAssembly.Memory,
  data: Uint8Array,
  ptr: number,
): Result<undefined> {
  const range = checkRange(memory, ptr, data.length);
  if (!range.ok) {
    return range;
  }

  new Uint8Array(memory.buffer).set(data, ptr);
  return { ok: true, value: undefined };
}

/**
 * Read data from guest memory at the given byte offset.
 *
 * @returns Ok with a copy of the bytes, or Err on out-of-bounds read.
 */
export function readFromMemory(
  memory: WebAssembly.Memory,
  ptr: number,
  len: number,
): Result<Uint8Array> {
  const range = checkRange(memory, ptr, len);
  if (!range.ok) {
    return range;
  }

  // Copy: the view dies with memory.buffer when the guest grows its memory
  return { ok: true, value: new Uint8Array(memory.buffer).slice(ptr, ptr + len) };
}

// ---------------------------------------------------------------------------
// u32 Helpers
// ---------------------------------------------------------------------------

/** Read a little-endian u32 from guest memory. */
export function readU32(memory: WebAssembly.Memory, ptr: number): Result<number> {
  const range = checkRange(memory, ptr, U32_SIZE);
  if (!range.ok) {
    return range;
  }

  return { ok: true, value: new DataView(memory.buffer).getUint32(ptr, true) };
}

/** Encode a u32 as four little-endian bytes. */
export function encodeU32(value: number): Uint8Array {
  const bytes = new Uint8Array(U32_SIZE);
  new DataView(bytes.buffer).setUint32(0, value >>> 0, true);
  return bytes;
}
