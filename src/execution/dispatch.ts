/**
 * chain-ext — Chain extension dispatch
 *
 * One guest call of `seal_call_chain_extension`: refuse it when the
 * extension is disabled, otherwise hand the extension a fresh `Init`
 * environment and return what it produces. The environment does not
 * outlive the call.
 */

import type { CallWords, Result } from '../types.js';
import { noChainExtensionError } from '../errors.js';
import type { ChainExtension } from '../chain-extension/chain-extension.js';
import { isChainExtensionEnabled } from '../chain-extension/chain-extension.js';
import { withEnvironment } from '../chain-extension/environment.js';
import type { Ext } from '../chain-extension/ext.js';
import type { HostRuntime } from '../chain-extension/host-runtime.js';
import type { RetVal } from '../chain-extension/ret-val.js';
import { validateRetVal } from '../chain-extension/ret-val.js';
import { recordDispatch } from '../trace/dispatch-trace.js';

/** Options for dispatchChainExtension. */
export interface DispatchOptions {
  /** Record trace events. Default: follows `CHAIN_EXT_TRACE`. */
  readonly trace?: boolean;
}

/** Build call words from raw guest arguments, normalizing them to u32. */
export function toCallWords(val0: number, val1: number, val2: number, val3: number): CallWords {
  return { val0: val0 >>> 0, val1: val1 >>> 0, val2: val2 >>> 0, val3: val3 >>> 0 };
}

/**
 * Dispatch function `funcId` to `extension`.
 *
 * @returns The extension's RetVal, or its error. NO_CHAIN_EXTENSION when the
 *   extension is disabled, in which case `call` is never invoked;
 *   DECODING_FAILED when the RetVal carries a non-u32 value or unknown flags.
 */
export function dispatchChainExtension<E extends Ext>(
  runtime: HostRuntime<E>,
  extension: ChainExtension,
  funcId: number,
  words: CallWords,
  options?: DispatchOptions,
): Result<RetVal> {
  const trace = options?.trace;
  recordDispatch({ kind: 'dispatched', funcId }, trace);

  if (!isChainExtensionEnabled(extension)) {
    recordDispatch({ kind: 'failed', funcId, code: 'NO_CHAIN_EXTENSION' }, trace);
    return { ok: false, error: noChainExtensionError() };
  }

  const called = withEnvironment(runtime, words, (env) => extension.call(funcId, env));
  const result = called.ok ? validateRetVal(called.value) : called;

  if (!result.ok) {
    recordDispatch({ kind: 'failed', funcId, code: result.error.code }, trace);
  } else if (result.value.kind === 'converging') {
    recordDispatch({ kind: 'converged', funcId, value: result.value.value }, trace);
  } else {
    recordDispatch(
      {
        kind: 'diverged',
        funcId,
        flags: result.value.flags,
        dataLength: result.value.data.length,
      },
      trace,
    );
  }

  return result;
}
