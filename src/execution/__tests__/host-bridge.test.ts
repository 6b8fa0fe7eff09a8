/**
 * chain-ext — Host function bridge unit tests
 */

import { describe, it, expect } from 'vitest';
import { HostTrap, wrapHostFunction } from '../../execution/host-bridge.js';
import type { TrapReason } from '../../execution/host-bridge.js';
import { createGasMeter } from '../../resources/gas-meter.js';
import { converging, diverging, REVERT } from '../../chain-extension/ret-val.js';
import { extensionError } from '../../errors.js';

function trapOf(fn: () => unknown): TrapReason | undefined {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof HostTrap) {
      return err.reason;
    }
    throw err;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// HostTrap
// ---------------------------------------------------------------------------

describe('HostTrap', () => {
  it('extends Error', () => {
    const trap = new HostTrap({ kind: 'error', error: { code: 'NO_CHAIN_EXTENSION' } });
    expect(trap).toBeInstanceOf(Error);
    expect(trap.name).toBe('HostTrap');
    expect(trap.message).toBe('Host function failed: NO_CHAIN_EXTENSION');
  });

  it('describes a return trap', () => {
    const trap = new HostTrap({ kind: 'return', flags: REVERT, data: new Uint8Array(0) });
    expect(trap.message).toBe('Guest terminated with flags 1');
  });
});

// ---------------------------------------------------------------------------
// wrapHostFunction
// ---------------------------------------------------------------------------

describe('wrapHostFunction', () => {
  it('passes arguments as u32 and returns the converging value', () => {
    const seen: number[][] = [];
    const wrapped = wrapHostFunction('test_fn', createGasMeter(100), 1, (args) => {
      seen.push([...args]);
      return { ok: true, value: converging(11) };
    });

    expect(wrapped(-1, 2, 3)).toBe(11);
    expect(seen).toEqual([[0xffff_ffff, 2, 3]]);
  });

  it('charges its weight on every entry', () => {
    const meter = createGasMeter(100);
    const wrapped = wrapHostFunction('test_fn', meter, 7, () => ({ ok: true, value: converging(0) }));

    wrapped();
    wrapped();

    expect(meter.gasUsed).toBe(14);
  });

  it('traps with OUT_OF_GAS before running the handler when the entry charge fails', () => {
    let ran = false;
    const wrapped = wrapHostFunction('test_fn', createGasMeter(5), 6, () => {
      ran = true;
      return { ok: true, value: converging(0) };
    });

    expect(trapOf(() => wrapped())).toEqual({
      kind: 'error',
      error: { code: 'OUT_OF_GAS', gasUsed: 5, gasLimit: 5, requested: 6 },
    });
    expect(ran).toBe(false);
  });

  it('traps with INVALID_WEIGHT for an invalid entry weight', () => {
    const meter = createGasMeter(100);
    const wrapped = wrapHostFunction('test_fn', meter, -3, () => ({ ok: true, value: converging(0) }));

    expect(trapOf(() => wrapped())).toEqual({
      kind: 'error',
      error: { code: 'INVALID_WEIGHT', weight: -3 },
    });
    expect(meter.gasUsed).toBe(0);
  });

  it('traps with the handler error', () => {
    const error = extensionError(9, 'denied');
    const wrapped = wrapHostFunction('test_fn', createGasMeter(100), 0, () => ({ ok: false, error }));

    expect(trapOf(() => wrapped())).toEqual({ kind: 'error', error });
  });

  it('traps with flags and data for a diverging result', () => {
    const data = new Uint8Array([1, 2, 3]);
    const wrapped = wrapHostFunction('test_fn', createGasMeter(100), 0, () => ({
      ok: true,
      value: diverging(REVERT, data),
    }));

    expect(trapOf(() => wrapped())).toEqual({ kind: 'return', flags: REVERT, data });
  });

  it('lets non-trap exceptions through', () => {
    const wrapped = wrapHostFunction('test_fn', createGasMeter(100), 0, () => {
      throw new Error('bug');
    });

    expect(() => wrapped()).toThrow('bug');
  });
});
