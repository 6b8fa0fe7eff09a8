/**
 * chain-ext — Return value protocol tests
 */

import { describe, it, expect } from 'vitest';
import {
  converging,
  decodeReturnFlags,
  diverging,
  isRevert,
  RETURN_FLAGS_EMPTY,
  REVERT,
  validateRetVal,
} from '../ret-val.js';

describe('converging', () => {
  it('carries the value', () => {
    expect(converging(0)).toEqual({ kind: 'converging', value: 0 });
    expect(converging(0xffff_ffff)).toEqual({ kind: 'converging', value: 0xffff_ffff });
  });

  it('keeps out-of-range values as given', () => {
    expect(converging(2 ** 32 + 5)).toEqual({ kind: 'converging', value: 2 ** 32 + 5 });
  });
});

describe('diverging', () => {
  it('carries flags and data', () => {
    const data = new TextEncoder().encode('invalid arg');
    expect(diverging(REVERT, data)).toEqual({ kind: 'diverging', flags: 1, data });
  });
});

describe('decodeReturnFlags', () => {
  it('accepts empty and REVERT', () => {
    expect(decodeReturnFlags(0)).toEqual({ ok: true, value: RETURN_FLAGS_EMPTY });
    expect(decodeReturnFlags(1)).toEqual({ ok: true, value: REVERT });
  });

  it('rejects unknown bits', () => {
    expect(decodeReturnFlags(2)).toEqual({
      ok: false,
      error: { code: 'DECODING_FAILED', reason: 'Unknown return flag bits: 0x2' },
    });
    expect(decodeReturnFlags(0xff)).toEqual({
      ok: false,
      error: { code: 'DECODING_FAILED', reason: 'Unknown return flag bits: 0xff' },
    });
  });

  it('rejects values that are not a u32 instead of wrapping them', () => {
    expect(decodeReturnFlags(-1)).toEqual({
      ok: false,
      error: { code: 'DECODING_FAILED', reason: 'Return flags are not a u32: -1' },
    });
    expect(decodeReturnFlags(2 ** 32 + 1)).toEqual({
      ok: false,
      error: { code: 'DECODING_FAILED', reason: 'Return flags are not a u32: 4294967297' },
    });
    expect(decodeReturnFlags(0.5).ok).toBe(false);
  });
});

describe('isRevert', () => {
  it('reads the revert bit', () => {
    expect(isRevert(REVERT)).toBe(true);
    expect(isRevert(RETURN_FLAGS_EMPTY)).toBe(false);
  });
});

describe('validateRetVal', () => {
  it('accepts converging u32 values', () => {
    expect(validateRetVal(converging(0))).toEqual({ ok: true, value: converging(0) });
    expect(validateRetVal(converging(0xffff_ffff))).toEqual({
      ok: true,
      value: converging(0xffff_ffff),
    });
  });

  it('rejects converging values outside u32', () => {
    expect(validateRetVal(converging(2 ** 32 + 5))).toEqual({
      ok: false,
      error: { code: 'DECODING_FAILED', reason: 'Converging value is not a u32: 4294967301' },
    });
    expect(validateRetVal(converging(-1))).toEqual({
      ok: false,
      error: { code: 'DECODING_FAILED', reason: 'Converging value is not a u32: -1' },
    });
    expect(validateRetVal(converging(1.5)).ok).toBe(false);
  });

  it('accepts diverging results with known flags', () => {
    const data = new Uint8Array([1]);
    expect(validateRetVal(diverging(REVERT, data))).toEqual({
      ok: true,
      value: { kind: 'diverging', flags: REVERT, data },
    });
    expect(validateRetVal(diverging(RETURN_FLAGS_EMPTY, data)).ok).toBe(true);
  });

  it('rejects diverging results with unknown flag bits', () => {
    expect(validateRetVal(diverging(0xff, new Uint8Array(0)))).toEqual({
      ok: false,
      error: { code: 'DECODING_FAILED', reason: 'Unknown return flag bits: 0xff' },
    });
  });
});
