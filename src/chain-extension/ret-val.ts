/**
 * chain-ext — Return value protocol
 *
 * What a chain extension call hands back to the outer dispatch loop:
 * either a value the guest keeps running with, or an early termination of
 * the whole guest execution carrying return flags and data.
 */

import type { Result } from '../types.js';
import { isU32 } from '../types.js';
import { decodingFailed } from '../errors.js';

// ---------------------------------------------------------------------------
// Return Flags
// ---------------------------------------------------------------------------

/** Bit set attached to a terminating result. */
export type ReturnFlags = number;

/** No flags set. */
export const RETURN_FLAGS_EMPTY: ReturnFlags = 0;

/** The execution is reverted: the caller discards its state changes. */
export const REVERT: ReturnFlags = 0x0000_0001;

const KNOWN_RETURN_FLAGS = REVERT;

/** Validate raw flag bits; values outside u32 and unknown bits are rejected. */
export function decodeReturnFlags(bits: number): Result<ReturnFlags> {
  if (!isU32(bits)) {
    return { ok: false, error: decodingFailed(`Return flags are not a u32: ${String(bits)}`) };
  }
  if ((bits & ~KNOWN_RETURN_FLAGS) !== 0) {
    return {
      ok: false,
      error: decodingFailed(`Unknown return flag bits: 0x${bits.toString(16)}`),
    };
  }
  return { ok: true, value: bits };
}

/** Whether `flags` carries the revert bit. */
export function isRevert(flags: ReturnFlags): boolean {
  return (flags & REVERT) !== 0;
}

// ---------------------------------------------------------------------------
// RetVal
// ---------------------------------------------------------------------------

/** Result of a chain extension call. */
export type RetVal =
  | {
      /** Resume the guest; the host call returns `value`. */
      readonly kind: 'converging';
      readonly value: number;
    }
  | {
      /** Terminate the whole guest execution with `flags` and `data`. */
      readonly kind: 'diverging';
      readonly flags: ReturnFlags;
      readonly data: Uint8Array;
    };

/** Resume guest execution, returning `value` from the host call. */
export function converging(value: number): RetVal {
  return { kind: 'converging', value };
}

/** Stop guest execution now with the given flags and output. */
export function diverging(flags: ReturnFlags, data: Uint8Array): RetVal {
  return { kind: 'diverging', flags, data };
}

/**
 * Check a RetVal before it reaches the guest: a converging value must be a
 * u32 and diverging flags must decode. Fails with DECODING_FAILED.
 */
export function validateRetVal(retVal: RetVal): Result<RetVal> {
  if (retVal.kind === 'converging') {
    if (!isU32(retVal.value)) {
      return {
        ok: false,
        error: decodingFailed(`Converging value is not a u32: ${String(retVal.value)}`),
      };
    }
    return { ok: true, value: retVal };
  }

  const flags = decodeReturnFlags(retVal.flags);
  if (!flags.ok) {
    return flags;
  }
  return { ok: true, value: retVal };
}
