/**
 * chain-ext — Typed chain extension environment
 *
 * The handle a chain extension receives for one dispatch. It starts in the
 * `Init` state and is moved exactly once into a calling-convention state;
 * the accessors that interpret the four call words are only present on the
 * types of states that grant the matching capability.
 *
 * TypeScript cannot move values, so the one-shot transition and the
 * dispatch-scoped lifetime are also enforced at run time: a consumed `Init`
 * handle, or any handle used after its dispatch returned, throws
 * EnvironmentMisuseError.
 */

import type { CallWords, Result, Weight } from '../types.js';
import { isValidWeight, saturatingMul } from '../types.js';
import { invalidWeight } from '../errors.js';
import type { Ext } from './ext.js';
import type { HostRuntime } from './host-runtime.js';
import type { Capability, EnvironmentState, HasCapability } from './state.js';
import { stateHasCapability } from './state.js';

// ---------------------------------------------------------------------------
// Misuse Signal
// ---------------------------------------------------------------------------

/** Thrown when an environment is used outside the rules of its state. */
export class EnvironmentMisuseError extends Error {
  readonly state: EnvironmentState;

  constructor(state: EnvironmentState, message: string) {
    super(`Environment (${state}): ${message}`);
    this.name = 'EnvironmentMisuseError';
    this.state = state;
  }
}

// ---------------------------------------------------------------------------
// Capability Surfaces
// ---------------------------------------------------------------------------

/** Available in every state. */
export interface EnvironmentCore<E extends Ext, S extends EnvironmentState> {
  /** Current calling-convention state. */
  readonly state: S;
  /**
   * Charge `amount` to the gas meter. Call before size-dependent memory access.
   * Fails with INVALID_WEIGHT unless `amount` is a non-negative safe integer.
   */
  chargeWeight(amount: Weight): Result<void>;
  /** The execution context of the running call. */
  ext(): E;
}

/** One-way transitions out of `Init`. Each consumes the `Init` handle. */
export interface InitTransitions<E extends Ext> {
  /** Two primitive inputs (`val0`, `val1`) and two primitive words (`val2`, `val3`). */
  onlyIn(): Environment<E, 'OnlyIn'>;
  /** Primitive inputs plus an output buffer. */
  primInBufOut(): Environment<E, 'PrimInBufOut'>;
  /** Input buffer (`val0`/`val1`) and output buffer (`val2`/`val3`). */
  bufInBufOut(): Environment<E, 'BufInBufOut'>;
}

/** Raw access to the first two call words. */
export interface PrimInAccessors {
  val0(): number;
  val1(): number;
}

/** Raw access to the last two call words. */
export interface PrimOutAccessors {
  val2(): number;
  val3(): number;
}

/** Reads the input buffer described by `val0` (pointer) and `val1` (length). */
export interface BufInAccessors {
  /** Fails with MEMORY_ACCESS_OUT_OF_BOUNDS without returning partial data. */
  read(): Result<Uint8Array>;
}

/** Writes the output buffer described by `val2` (pointer) and `val3` (length pointer). */
export interface BufOutAccessors {
  /**
   * Write `buf` to the guest's output buffer and its length to the length
   * pointer. With `weightPerByte`, `weightPerByte * buf.length` is charged
   * first; a `weightPerByte` that is not a non-negative safe integer fails
   * with INVALID_WEIGHT. With `allowSkip`, a SENTINEL output pointer skips
   * the write.
   */
  write(buf: Uint8Array, allowSkip: boolean, weightPerByte?: Weight): Result<void>;
}

type Grant<S extends EnvironmentState, C extends Capability, T> =
  HasCapability<S, C> extends true ? T : unknown;

/** The environment in state `S`: exactly the accessors `S` grants. */
export type Environment<E extends Ext, S extends EnvironmentState> = EnvironmentCore<E, S> &
  (S extends 'Init' ? InitTransitions<E> : unknown) &
  Grant<S, 'PrimIn', PrimInAccessors> &
  Grant<S, 'PrimOut', PrimOutAccessors> &
  Grant<S, 'BufIn', BufInAccessors> &
  Grant<S, 'BufOut', BufOutAccessors>;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/** State shared by every handle of one dispatch. */
interface DispatchScope<E extends Ext> {
  readonly runtime: HostRuntime<E>;
  readonly words: CallWords;
  released: boolean;
}

class ScopedEnvironment<E extends Ext, S extends EnvironmentState>
  implements
    EnvironmentCore<E, S>,
    InitTransitions<E>,
    PrimInAccessors,
    PrimOutAccessors,
    BufInAccessors,
    BufOutAccessors
{
  readonly state: S;
  private readonly scope: DispatchScope<E>;
  private consumed = false;

  constructor(scope: DispatchScope<E>, state: S) {
    this.scope = scope;
    this.state = state;
  }

  chargeWeight(amount: Weight): Result<void> {
    this.guard();
    if (!isValidWeight(amount)) {
      return { ok: false, error: invalidWeight(amount) };
    }
    return this.scope.runtime.chargeGas({ kind: 'chain_extension', weight: amount });
  }

  ext(): E {
    this.guard();
    return this.scope.runtime.ext();
  }

  onlyIn(): Environment<E, 'OnlyIn'> {
    return this.transition('OnlyIn');
  }

  primInBufOut(): Environment<E, 'PrimInBufOut'> {
    return this.transition('PrimInBufOut');
  }

  bufInBufOut(): Environment<E, 'BufInBufOut'> {
    return this.transition('BufInBufOut');
  }

  val0(): number {
    this.guard('PrimIn');
    return this.scope.words.val0;
  }

  val1(): number {
    this.guard('PrimIn');
    return this.scope.words.val1;
  }

  val2(): number {
    this.guard('PrimOut');
    return this.scope.words.val2;
  }

  val3(): number {
    this.guard('PrimOut');
    return this.scope.words.val3;
  }

  read(): Result<Uint8Array> {
    this.guard('BufIn');
    const { runtime, words } = this.scope;
    return runtime.readSandboxMemory(words.val0, words.val1);
  }

  write(buf: Uint8Array, allowSkip: boolean, weightPerByte?: Weight): Result<void> {
    this.guard('BufOut');
    if (weightPerByte !== undefined && !isValidWeight(weightPerByte)) {
      return { ok: false, error: invalidWeight(weightPerByte) };
    }
    const { runtime, words } = this.scope;
    return runtime.writeSandboxOutput(words.val2, words.val3, buf, allowSkip, (len) =>
      weightPerByte === undefined
        ? undefined
        : { kind: 'chain_extension', weight: saturatingMul(weightPerByte, len) },
    );
  }

  private transition<T extends Exclude<EnvironmentState, 'Init'>>(
    target: T,
  ): ScopedEnvironment<E, T> {
    this.guard();
    if (this.state !== 'Init') {
      throw new EnvironmentMisuseError(this.state, `no transition to ${target} from a terminal state`);
    }
    this.consumed = true;
    return new ScopedEnvironment(this.scope, target);
  }

  private guard(capability?: Capability): void {
    if (this.scope.released) {
      throw new EnvironmentMisuseError(this.state, 'used after its dispatch returned');
    }
    if (this.consumed) {
      throw new EnvironmentMisuseError(this.state, 'already consumed by a transition');
    }
    if (capability !== undefined && !stateHasCapability(this.state, capability)) {
      throw new EnvironmentMisuseError(this.state, `lacks the ${capability} capability`);
    }
  }
}

/**
 * Run `fn` with a fresh `Init` environment over `runtime` and `words`.
 * Every handle derived from it is released when `fn` returns or throws.
 *
 * Only the dispatch loop calls this; it is not part of the package entry point.
 */
export function withEnvironment<E extends Ext, T>(
  runtime: HostRuntime<E>,
  words: CallWords,
  fn: (env: Environment<E, 'Init'>) => T,
): T {
  const scope: DispatchScope<E> = { runtime, words, released: false };
  try {
    return fn(new ScopedEnvironment(scope, 'Init'));
  } finally {
    scope.released = true;
  }
}
