/**
 * chain-ext — Internal types
 *
 * Mutable internal state backing the public readonly ContractInstance.
 * These types are NOT exported from the package.
 */

import type { ContractHostConfig, ExecutionMetrics, InstanceStatus } from './types.js';
import type { GasMeter } from './resources/gas-meter.js';

/** WASM page size in bytes (64 KB). */
export const WASM_PAGE_SIZE = 65_536;

/** Mutable internal state for a contract instance. */
export interface InternalContractState {
  readonly id: string;
  readonly config: Readonly<ContractHostConfig>;
  status: InstanceStatus;
  metrics: ExecutionMetrics;
  /** Guest linear memory, imported by the module as `env.memory`. */
  readonly memory: WebAssembly.Memory;
  /** Reset at the start of every call; host imports charge it. */
  readonly gasMeter: GasMeter;
  wasmModule: WebAssembly.Module | null;
  wasmInstance: WebAssembly.Instance | null;
}

/** Convert bytes to WASM page count (each page = 64 KB). */
export function bytesToPages(bytes: number): number {
  return Math.ceil(bytes / WASM_PAGE_SIZE);
}
