/**
 * chain-ext — Execution engine
 *
 * Calls a guest export with i32 arguments, with a fresh gas budget, and
 * turns the way it ended into an ExecutionResult: a normal return, an
 * early termination requested through a diverging chain extension result,
 * a host error, or a WASM trap.
 */

import type { ExecutionMetrics, ExecutionResult } from '../types.js';
import { instanceDestroyed, wasmTrap } from '../errors.js';
import type { InternalContractState } from '../internal-types.js';
import { HostTrap } from './host-bridge.js';

function buildMetrics(state: InternalContractState): ExecutionMetrics {
  return {
    memoryUsedBytes: state.memory.buffer.byteLength,
    memoryLimitBytes: state.config.maxMemoryBytes,
    gasUsed: state.gasMeter.gasUsed,
    gasLimit: state.config.maxGas,
  };
}

/**
 * Execute an exported function of a contract instance.
 *
 * @param state - Internal mutable state for the instance.
 * @param exportName - Name of the exported WASM function to call.
 * @param args - i32 arguments passed to the export.
 * @returns An ExecutionResult (ok with outcome + metrics, or error + metrics).
 */
export function execute(
  state: InternalContractState,
  exportName: string,
  args: readonly number[],
): ExecutionResult {
  if (state.status === 'destroyed') {
    return { ok: false, error: instanceDestroyed(state.id), metrics: state.metrics };
  }

  // Host calls run synchronously inside the export, so a nested call here is a bug
  if (state.status !== 'loaded' || state.wasmInstance === null) {
    return {
      ok: false,
      error: wasmTrap('invalid_state', `Cannot execute: instance status is '${state.status}'`),
      metrics: state.metrics,
    };
  }

  const exportedFn = state.wasmInstance.exports[exportName];
  if (typeof exportedFn !== 'function') {
    return {
      ok: false,
      error: wasmTrap('missing_export', `WASM module does not export a function named '${exportName}'`),
      metrics: state.metrics,
    };
  }

  state.gasMeter.reset();
  state.status = 'running';

  try {
    const returned: unknown = exportedFn(...args);
    const metrics = buildMetrics(state);
    state.metrics = metrics;

    if (typeof returned !== 'number') {
      return {
        ok: false,
        error: wasmTrap('bad_signature', `Export '${exportName}' must return a single i32`),
        metrics,
      };
    }
    return { ok: true, outcome: { kind: 'returned', value: returned >>> 0 }, metrics };
  } catch (err: unknown) {
    const metrics = buildMetrics(state);
    state.metrics = metrics;

    if (err instanceof HostTrap) {
      const { reason } = err;
      if (reason.kind === 'return') {
        return {
          ok: true,
          outcome: { kind: 'terminated', flags: reason.flags, data: reason.data },
          metrics,
        };
      }
      return { ok: false, error: reason.error, metrics };
    }

    // WASM traps and exceptions thrown by extension code
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: wasmTrap('runtime_error', message), metrics };
  } finally {
    state.status = 'loaded';
  }
}
