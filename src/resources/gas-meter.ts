/**
 * chain-ext — Gas metering
 *
 * Tracks the gas budget of one guest call. Host functions and chain
 * extensions charge it with runtime tokens before doing the work they
 * price. A charge that does not fit the remaining budget fails with
 * OUT_OF_GAS and exhausts the meter, so every later charge fails too.
 * A weight that is negative, fractional or not finite is refused with
 * INVALID_WEIGHT and leaves the meter unchanged.
 */

import type { Result, RuntimeToken, Weight } from '../types.js';
import { isValidWeight } from '../types.js';
import { invalidWeight, outOfGas } from '../errors.js';

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

/** Weight a token stands for. */
export function tokenWeight(token: RuntimeToken): Weight {
  return token.weight;
}

// ---------------------------------------------------------------------------
// Gas Meter
// ---------------------------------------------------------------------------

/** Gas metering interface. */
export interface GasMeter {
  /** Gas consumed so far. */
  readonly gasUsed: number;
  /** Configured gas budget. */
  readonly gasLimit: number;
  /** Gas still available. */
  readonly gasLeft: number;
  /** Whether a charge has failed since the last reset. */
  readonly isExhausted: boolean;
  /** Charge the weight of `token`. */
  charge(token: RuntimeToken): Result<void>;
  /** Reset gasUsed to 0 for a new call. */
  reset(): void;
}

/**
 * Create a gas meter with the given budget.
 *
 * @param gasLimit - Maximum gas allowed per call.
 * @throws RangeError if `gasLimit` is not a non-negative safe integer.
 */
export function createGasMeter(gasLimit: number): GasMeter {
  if (!isValidWeight(gasLimit)) {
    throw new RangeError(`Invalid gas limit: ${String(gasLimit)}`);
  }
  let gasUsed = 0;
  let exhausted = false;

  return {
    get gasUsed(): number {
      return gasUsed;
    },

    get gasLimit(): number {
      return gasLimit;
    },

    get gasLeft(): number {
      return gasLimit - gasUsed;
    },

    get isExhausted(): boolean {
      return exhausted;
    },

    charge(token: RuntimeToken): Result<void> {
      const amount = tokenWeight(token);
      if (!isValidWeight(amount)) {
        return { ok: false, error: invalidWeight(amount) };
      }

      if (exhausted || amount > gasLimit - gasUsed) {
        exhausted = true;
        gasUsed = gasLimit;
        return { ok: false, error: outOfGas(gasUsed, gasLimit, amount) };
      }

      gasUsed += amount;
      return { ok: true, value: undefined };
    },

    reset(): void {
      gasUsed = 0;
      exhausted = false;
    },
  };
}
