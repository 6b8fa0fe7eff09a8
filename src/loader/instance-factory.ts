/**
 * chain-ext — Contract instance creation.
 *
 * Creates a new contract instance with its memory, gas meter and initial
 * metrics.
 */

import type { ContractHostConfig, ContractInstance } from '../types.js';
import type { Ext } from '../chain-extension/ext.js';
import type { InternalContractState } from '../internal-types.js';
import { bytesToPages } from '../internal-types.js';
import { createGasMeter } from '../resources/gas-meter.js';

/** Counter for deterministic ID generation. */
let instanceCounter = 0;

/** Reset the instance counter (for testing only). */
export function resetInstanceCounter(): void {
  instanceCounter = 0;
}

/**
 * Create a new contract instance with the given configuration.
 *
 * Allocates `WebAssembly.Memory` with a maximum derived from `maxMemoryBytes`.
 * Returns both the public `ContractInstance` and the internal mutable state.
 */
export function createContractInstance<E extends Ext>(config: ContractHostConfig<E>): {
  readonly instance: ContractInstance<E>;
  readonly state: InternalContractState;
} {
  const id = `contract-${String(instanceCounter)}`;
  instanceCounter += 1;

  const maxPages = Math.max(1, bytesToPages(config.maxMemoryBytes));
  const memory = new WebAssembly.Memory({ initial: 1, maximum: maxPages });

  const state: InternalContractState = {
    id,
    config,
    status: 'created',
    metrics: {
      memoryUsedBytes: memory.buffer.byteLength,
      memoryLimitBytes: config.maxMemoryBytes,
      gasUsed: 0,
      gasLimit: config.maxGas,
    },
    memory,
    gasMeter: createGasMeter(config.maxGas),
    wasmModule: null,
    wasmInstance: null,
  };

  const instance: ContractInstance<E> = {
    id: state.id,
    config: Object.freeze({ ...config }),
    status: state.status,
  };

  return { instance, state };
}
