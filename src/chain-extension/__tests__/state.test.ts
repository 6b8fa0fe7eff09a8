/**
 * chain-ext — State capability table tests
 *
 * Enumerates every state/capability pair at run time and pins the same
 * table at the type level (checked by `tsc --noEmit`).
 */

import { describe, it, expect, expectTypeOf } from 'vitest';
import {
  CAPABILITIES,
  ENVIRONMENT_STATES,
  STATE_CAPABILITIES,
  stateHasCapability,
} from '../state.js';
import type { CapabilitiesOf, Capability, EnvironmentState, HasCapability } from '../state.js';
import type { Environment } from '../environment.js';
import type { Ext } from '../ext.js';

const EXPECTED: Record<EnvironmentState, Record<Capability, boolean>> = {
  Init: { PrimIn: false, PrimOut: false, BufIn: false, BufOut: false },
  OnlyIn: { PrimIn: true, PrimOut: true, BufIn: false, BufOut: false },
  PrimInBufOut: { PrimIn: true, PrimOut: false, BufIn: false, BufOut: true },
  BufInBufOut: { PrimIn: false, PrimOut: false, BufIn: true, BufOut: true },
};

// ---------------------------------------------------------------------------
// Run-time table
// ---------------------------------------------------------------------------

describe('STATE_CAPABILITIES', () => {
  it('lists exactly four states and four capabilities', () => {
    expect(ENVIRONMENT_STATES).toEqual(['Init', 'OnlyIn', 'PrimInBufOut', 'BufInBufOut']);
    expect(CAPABILITIES).toEqual(['PrimIn', 'PrimOut', 'BufIn', 'BufOut']);
    expect(Object.keys(STATE_CAPABILITIES).sort()).toEqual([...ENVIRONMENT_STATES].sort());
  });

  for (const state of ENVIRONMENT_STATES) {
    for (const capability of CAPABILITIES) {
      it(`${state} ${EXPECTED[state][capability] ? 'grants' : 'lacks'} ${capability}`, () => {
        expect(stateHasCapability(state, capability)).toBe(EXPECTED[state][capability]);
      });
    }
  }

  it('grants nothing in Init', () => {
    expect(STATE_CAPABILITIES.Init).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Type-level table
// ---------------------------------------------------------------------------

describe('CapabilityTable (type level)', () => {
  it('matches the run-time table', () => {
    expectTypeOf<CapabilitiesOf<'Init'>>().toBeNever();
    expectTypeOf<CapabilitiesOf<'OnlyIn'>>().toEqualTypeOf<'PrimIn' | 'PrimOut'>();
    expectTypeOf<CapabilitiesOf<'PrimInBufOut'>>().toEqualTypeOf<'PrimIn' | 'BufOut'>();
    expectTypeOf<CapabilitiesOf<'BufInBufOut'>>().toEqualTypeOf<'BufIn' | 'BufOut'>();
  });

  it('answers HasCapability per pair', () => {
    expectTypeOf<HasCapability<'Init', 'PrimIn'>>().toEqualTypeOf<false>();
    expectTypeOf<HasCapability<'OnlyIn', 'PrimOut'>>().toEqualTypeOf<true>();
    expectTypeOf<HasCapability<'OnlyIn', 'BufOut'>>().toEqualTypeOf<false>();
    expectTypeOf<HasCapability<'PrimInBufOut', 'BufOut'>>().toEqualTypeOf<true>();
    expectTypeOf<HasCapability<'PrimInBufOut', 'PrimOut'>>().toEqualTypeOf<false>();
    expectTypeOf<HasCapability<'BufInBufOut', 'BufIn'>>().toEqualTypeOf<true>();
    expectTypeOf<HasCapability<'BufInBufOut', 'PrimIn'>>().toEqualTypeOf<false>();
  });

  it('gives each environment type only the accessors its state grants', () => {
    type Init = Environment<Ext, 'Init'>;
    type OnlyIn = Environment<Ext, 'OnlyIn'>;
    type PrimInBufOut = Environment<Ext, 'PrimInBufOut'>;
    type BufInBufOut = Environment<Ext, 'BufInBufOut'>;

    expectTypeOf<Init>().toHaveProperty('onlyIn');
    expectTypeOf<Init>().toHaveProperty('ext');
    expectTypeOf<Init>().not.toHaveProperty('val0');
    expectTypeOf<Init>().not.toHaveProperty('val2');
    expectTypeOf<Init>().not.toHaveProperty('read');
    expectTypeOf<Init>().not.toHaveProperty('write');

    expectTypeOf<OnlyIn>().toHaveProperty('val0');
    expectTypeOf<OnlyIn>().toHaveProperty('val3');
    expectTypeOf<OnlyIn>().not.toHaveProperty('read');
    expectTypeOf<OnlyIn>().not.toHaveProperty('write');
    expectTypeOf<OnlyIn>().not.toHaveProperty('onlyIn');

    expectTypeOf<PrimInBufOut>().toHaveProperty('val1');
    expectTypeOf<PrimInBufOut>().toHaveProperty('write');
    expectTypeOf<PrimInBufOut>().not.toHaveProperty('val2');
    expectTypeOf<PrimInBufOut>().not.toHaveProperty('read');
    expectTypeOf<PrimInBufOut>().not.toHaveProperty('bufInBufOut');

    expectTypeOf<BufInBufOut>().toHaveProperty('read');
    expectTypeOf<BufInBufOut>().toHaveProperty('write');
    expectTypeOf<BufInBufOut>().not.toHaveProperty('val0');
    expectTypeOf<BufInBufOut>().not.toHaveProperty('val3');
    expectTypeOf<BufInBufOut>().not.toHaveProperty('primInBufOut');
  });
});
