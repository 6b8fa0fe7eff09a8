/**
 * chain-ext — Host function bridge
 *
 * Turns host functions that return `Result<RetVal>` into WASM imports.
 * Each import charges its flat weight on entry; an error or a diverging
 * result is thrown as a HostTrap, which unwinds the guest back to the
 * executor.
 */

import type { Result, Weight } from '../types.js';
import type { ChainExtensionError } from '../errors.js';
import type { ReturnFlags, RetVal } from '../chain-extension/ret-val.js';
import type { GasMeter } from '../resources/gas-meter.js';
import type { InternalContractState } from '../internal-types.js';
import { createHostRuntime } from './runtime.js';
import { dispatchChainExtension, toCallWords } from './dispatch.js';

// ---------------------------------------------------------------------------
// Trap Signal
// ---------------------------------------------------------------------------

/** Why a host function stopped the guest. */
export type TrapReason =
  | {
      /** The guest asked to stop with output, through a diverging host call. */
      readonly kind: 'return';
      readonly flags: ReturnFlags;
      readonly data: Uint8Array;
    }
  | {
      readonly kind: 'error';
      readonly error: ChainExtensionError;
    };

/**
 * Internal signal thrown from a host function to stop the guest.
 * Not exported from the package — caught by the executor.
 */
export class HostTrap extends Error {
  readonly reason: TrapReason;

  constructor(reason: TrapReason) {
    super(
      reason.kind === 'return'
        ? `Guest terminated with flags ${String(reason.flags)}`
        : `Host function failed: ${reason.error.code}`,
    );
    this.name = 'HostTrap';
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Host Function Wrapping
// ---------------------------------------------------------------------------

/** A WASM-callable host import. */
export type HostImport = (...args: number[]) => number;

/** Host function body: receives its arguments as u32. */
export type HostHandler = (args: readonly number[]) => Result<RetVal>;

/**
 * Wrap a host function body as a WASM import.
 *
 * @param name - Import name, recorded on the gas token.
 * @param gasMeter - Meter charged `weight` on every entry.
 */
export function wrapHostFunction(
  name: string,
  gasMeter: GasMeter,
  weight: Weight,
  handler: HostHandler,
): HostImport {
  return (...args: number[]): number => {
    const charged = gasMeter.charge({ kind: 'host_fn', name, weight });
    if (!charged.ok) {
      throw new HostTrap({ kind: 'error', error: charged.error });
    }

    const result = handler(args.map((arg) => arg >>> 0));
    if (!result.ok) {
      throw new HostTrap({ kind: 'error', error: result.error });
    }

    const retVal = result.value;
    if (retVal.kind === 'diverging') {
      throw new HostTrap({ kind: 'return', flags: retVal.flags, data: retVal.data });
    }
    return retVal.value;
  };
}

// ---------------------------------------------------------------------------
// Import Object
// ---------------------------------------------------------------------------

/** Module namespace of the host imports. */
export const HOST_MODULE = 'seal0';

/** Name of the chain extension import. */
export const CALL_CHAIN_EXTENSION = 'seal_call_chain_extension';

/**
 * Build the import object for a contract instance: `env.memory` plus
 * `seal0.seal_call_chain_extension(func_id, input_ptr, input_len, output_ptr, output_len_ptr) -> u32`.
 */
export function buildHostImports(state: InternalContractState): WebAssembly.Imports {
  const { config } = state;

  const callChainExtension = wrapHostFunction(
    CALL_CHAIN_EXTENSION,
    state.gasMeter,
    config.hostCallWeight,
    (args) => {
      const runtime = createHostRuntime({
        memory: state.memory,
        gasMeter: state.gasMeter,
        ext: config.ext,
      });
      const words = toCallWords(args[1] ?? 0, args[2] ?? 0, args[3] ?? 0, args[4] ?? 0);
      return dispatchChainExtension(
        runtime,
        config.chainExtension,
        args[0] ?? 0,
        words,
        config.trace !== undefined ? { trace: config.trace } : undefined,
      );
    },
  );

  return {
    env: { memory: state.memory },
    [HOST_MODULE]: { [CALL_CHAIN_EXTENSION]: callChainExtension },
  };
}
