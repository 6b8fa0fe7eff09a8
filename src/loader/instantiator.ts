/**
 * chain-ext — WASM module instantiation.
 *
 * Instantiates a compiled WASM module into a contract instance, wiring up
 * guest memory and the host imports.
 */

import type { Result, ResultErr } from '../types.js';
import type { ChainExtensionError } from '../errors.js';
import { instanceDestroyed, invalidModule } from '../errors.js';
import type { InternalContractState } from '../internal-types.js';
import { buildHostImports } from '../execution/host-bridge.js';

/**
 * Instantiate a compiled WASM module into a contract instance.
 * Updates internal state on success.
 */
export async function instantiate(
  state: InternalContractState,
  module: WebAssembly.Module,
): Promise<Result<void>> {
  if (state.status === 'destroyed') {
    return { ok: false, error: instanceDestroyed(state.id) };
  }

  try {
    const wasmInstance = await WebAssembly.instantiate(module, buildHostImports(state));
    state.wasmModule = module;
    state.wasmInstance = wasmInstance;
    state.status = 'loaded';
    state.metrics = {
      ...state.metrics,
      memoryUsedBytes: state.memory.buffer.byteLength,
    };
    return { ok: true, value: undefined };
  } catch (err: unknown) {
    return classifyInstantiationError(err);
  }
}

/**
 * Classify an instantiation error. Import mismatches and start-function
 * failures both surface as INVALID_MODULE.
 */
export function classifyInstantiationError(err: unknown): ResultErr<ChainExtensionError> {
  const message = err instanceof Error ? err.message : 'Unknown instantiation error';

  if (message.includes('import')) {
    return {
      ok: false,
      error: invalidModule(`WASM instantiation failed — missing or incompatible imports: ${message}`),
    };
  }

  return {
    ok: false,
    error: invalidModule(`WASM instantiation failed: ${message}`),
  };
}
