/**
 * chain-ext — Host runtime contract
 *
 * The narrow surface a chain extension environment needs from the host:
 * gas charging, bounds-checked sandbox memory access and the execution
 * context. `createHostRuntime` in `execution/runtime.ts` is the reference
 * implementation.
 */

import type { Result, RuntimeToken } from '../types.js';
import type { Ext } from './ext.js';

/** Produces the token to charge for writing `len` bytes, or `undefined` for a free write. */
export type CostFn = (len: number) => RuntimeToken | undefined;

/** Host services available during one chain extension dispatch. */
export interface HostRuntime<E extends Ext = Ext> {
  /** Charge the gas meter; fails with OUT_OF_GAS when the budget is exhausted. */
  chargeGas(token: RuntimeToken): Result<void>;

  /** Copy `len` bytes starting at guest address `ptr`. */
  readSandboxMemory(ptr: number, len: number): Result<Uint8Array>;

  /**
   * Write `data` to guest address `outPtr` and its length to the u32 at
   * `outLenPtr`, whose current value is the capacity the guest declared.
   * With `allowSkip`, an `outPtr` equal to SENTINEL skips the write.
   */
  writeSandboxOutput(
    outPtr: number,
    outLenPtr: number,
    data: Uint8Array,
    allowSkip: boolean,
    createToken: CostFn,
  ): Result<void>;

  /** The execution context of the running call. */
  ext(): E;
}
