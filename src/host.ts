/**
 * chain-ext — Main contract host factory.
 *
 * Creates a `ContractHost` that manages guest contracts able to reach a
 * chain extension. Internal state is tracked per-instance via an internal Map.
 */

import type {
  ContractHost,
  ContractHostConfig,
  ContractInstance,
  ExecutionMetrics,
  ExecutionResult,
  Result,
} from './types.js';
import type { Ext } from './chain-extension/ext.js';
import { instanceDestroyed } from './errors.js';
import type { InternalContractState } from './internal-types.js';
import { createContractInstance } from './loader/instance-factory.js';
import { loadModule } from './loader/module-loader.js';
import { instantiate } from './loader/instantiator.js';
import { execute } from './execution/executor.js';
import { readFromMemory, writeToMemory } from './execution/memory-io.js';

/**
 * Create a new `ContractHost` — the main entry point for running guests.
 *
 * Each host maintains its own registry of instances.
 * All methods look up internal state by instance ID.
 */
export function createContractHost(): ContractHost {
  const instances = new Map<string, InternalContractState>();

  function requireState(instance: ContractInstance): InternalContractState {
    const state = instances.get(instance.id);
    if (state === undefined) {
      throw new Error(`Unknown contract instance: ${instance.id}`);
    }
    return state;
  }

  const host: ContractHost = {
    create<E extends Ext>(config: ContractHostConfig<E>): ContractInstance<E> {
      const { instance, state } = createContractInstance(config);
      instances.set(state.id, state);
      return instance;
    },

    async load(instance: ContractInstance, module: Uint8Array): Promise<Result<void>> {
      const state = requireState(instance);

      if (state.status === 'destroyed') {
        return { ok: false, error: instanceDestroyed(state.id) };
      }

      const loaded = await loadModule(module);
      if (!loaded.ok) {
        return loaded;
      }

      return instantiate(state, loaded.value);
    },

    call(instance: ContractInstance, exportName: string, args: readonly number[]): ExecutionResult {
      return execute(requireState(instance), exportName, args);
    },

    destroy(instance: ContractInstance): void {
      const state = requireState(instance);
      state.wasmInstance = null;
      state.wasmModule = null;
      state.status = 'destroyed';
    },

    readMemory(instance: ContractInstance, ptr: number, len: number): Result<Uint8Array> {
      const state = requireState(instance);
      if (state.status === 'destroyed') {
        return { ok: false, error: instanceDestroyed(state.id) };
      }
      return readFromMemory(state.memory, ptr, len);
    },

    writeMemory(instance: ContractInstance, ptr: number, data: Uint8Array): Result<void> {
      const state = requireState(instance);
      if (state.status === 'destroyed') {
        return { ok: false, error: instanceDestroyed(state.id) };
      }
      return writeToMemory(state.memory, data, ptr);
    },

    getMetrics(instance: ContractInstance): ExecutionMetrics {
      const state = requireState(instance);
      return {
        ...state.metrics,
        memoryUsedBytes: state.memory.buffer.byteLength,
      };
    },
  };

  return host;
}
