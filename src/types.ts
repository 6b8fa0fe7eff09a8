/**
 * chain-ext — Core type definitions
 *
 * Public types shared by the chain extension core and the reference
 * contract host: results, weights, call words, configuration and metrics.
 */

import type { ChainExtensionError } from './errors.js';
import type { ChainExtension } from './chain-extension/chain-extension.js';
import type { Ext } from './chain-extension/ext.js';
import type { ReturnFlags } from './chain-extension/ret-val.js';

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/** Success branch of a Result. */
export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failure branch of a Result. */
export interface ResultErr<E> {
  readonly ok: false;
  readonly error: E;
}

/** Discriminated union for fallible operations. */
export type Result<T, E = ChainExtensionError> = ResultOk<T> | ResultErr<E>;

/** Build a success result. */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Build a failure result. */
export function err<E>(error: E): ResultErr<E> {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Weights & Call Words
// ---------------------------------------------------------------------------

/** Gas amount charged for host-side work. A non-negative integer. */
export type Weight = number;

/** Largest value a u32 call word can hold. */
export const U32_MAX = 0xffff_ffff;

/** Whether `value` is an integer in `0..=U32_MAX`. */
export function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= U32_MAX;
}

/**
 * Output pointer a guest passes to say it does not want the output.
 * Only honoured by writes that allow skipping.
 */
export const SENTINEL = U32_MAX;

/** The four raw words a guest passes with a chain extension call. */
export interface CallWords {
  readonly val0: number;
  readonly val1: number;
  readonly val2: number;
  readonly val3: number;
}

/** Whether `weight` is a non-negative safe integer. */
export function isValidWeight(weight: Weight): boolean {
  return Number.isSafeInteger(weight) && weight >= 0;
}

/** Multiply two valid weights, clamping at `Number.MAX_SAFE_INTEGER`. */
export function saturatingMul(a: Weight, b: Weight): Weight {
  const product = a * b;
  return product > Number.MAX_SAFE_INTEGER ? Number.MAX_SAFE_INTEGER : product;
}

// ---------------------------------------------------------------------------
// Runtime Tokens
// ---------------------------------------------------------------------------

/** Something the gas meter can be charged for. */
export type RuntimeToken =
  | {
      /** Weight charged on behalf of a chain extension. */
      readonly kind: 'chain_extension';
      readonly weight: Weight;
    }
  | {
      /** Flat weight charged each time the guest enters a host function. */
      readonly kind: 'host_fn';
      readonly name: string;
      readonly weight: Weight;
    };

// ---------------------------------------------------------------------------
// Contract Host Configuration
// ---------------------------------------------------------------------------

/** Default values for ContractHostConfig. */
export const DEFAULT_MAX_MEMORY_BYTES = 16_777_216; // 16 MB
export const DEFAULT_MAX_GAS = 1_000_000;
export const DEFAULT_HOST_CALL_WEIGHT = 1;

/** Configuration for creating a contract instance. */
export interface ContractHostConfig<E extends Ext = Ext> {
  /** Hard memory limit for the guest's linear memory in bytes. Default: 16,777,216 (16 MB). */
  readonly maxMemoryBytes: number;
  /** Gas budget per call. Default: 1,000,000. */
  readonly maxGas: number;
  /** Weight charged every time the guest enters a host function. Default: 1. */
  readonly hostCallWeight: Weight;
  /** The chain extension the guest reaches through `seal_call_chain_extension`. */
  readonly chainExtension: ChainExtension;
  /** Execution context handed to the chain extension. */
  readonly ext: E;
  /** Record dispatch events in the trace buffer. Default: follows `CHAIN_EXT_TRACE`. */
  readonly trace?: boolean;
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

/** Resource usage of a contract instance after its last call. */
export interface ExecutionMetrics {
  /** Current guest linear memory size in bytes. */
  readonly memoryUsedBytes: number;
  /** Configured memory limit in bytes. */
  readonly memoryLimitBytes: number;
  /** Gas consumed by the last call. */
  readonly gasUsed: number;
  /** Configured gas budget. */
  readonly gasLimit: number;
}

// ---------------------------------------------------------------------------
// Contract Instance
// ---------------------------------------------------------------------------

/** Possible states of a contract instance. */
export type InstanceStatus = 'created' | 'loaded' | 'running' | 'destroyed';

/** A loaded guest plus the host state it runs against. */
export interface ContractInstance<E extends Ext = Ext> {
  /** Unique instance identifier. */
  readonly id: string;
  /** Frozen configuration for this instance. */
  readonly config: Readonly<ContractHostConfig<E>>;
  /** Lifecycle state when the handle was issued. */
  readonly status: InstanceStatus;
}

// ---------------------------------------------------------------------------
// Execution Result
// ---------------------------------------------------------------------------

/** How a guest call ended. */
export type ExecutionOutcome =
  | {
      /** The export returned normally with this u32 value. */
      readonly kind: 'returned';
      readonly value: number;
    }
  | {
      /** A host call ended the whole execution early with flags and data. */
      readonly kind: 'terminated';
      readonly flags: ReturnFlags;
      readonly data: Uint8Array;
    };

/** Successful execution with metrics. */
export interface ExecutionSuccess {
  readonly ok: true;
  readonly outcome: ExecutionOutcome;
  readonly metrics: ExecutionMetrics;
}

/** Failed execution with a typed error. */
export interface ExecutionFailure {
  readonly ok: false;
  readonly error: ChainExtensionError;
  readonly metrics: ExecutionMetrics;
}

/** Result of calling a guest export. */
export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

// ---------------------------------------------------------------------------
// ContractHost Interface
// ---------------------------------------------------------------------------

/** Lifecycle of guest contracts that can reach a chain extension. */
export interface ContractHost {
  /** Create a new contract instance with the given configuration. */
  create<E extends Ext>(config: ContractHostConfig<E>): ContractInstance<E>;

  /** Load a WASM module into an existing instance. */
  load(instance: ContractInstance, module: Uint8Array): Promise<Result<void>>;

  /** Call an exported guest function with i32 arguments. */
  call(instance: ContractInstance, exportName: string, args: readonly number[]): ExecutionResult;

  /** Destroy an instance, releasing its memory and module. */
  destroy(instance: ContractInstance): void;

  /** Read guest memory of an instance (bounds-checked copy). */
  readMemory(instance: ContractInstance, ptr: number, len: number): Result<Uint8Array>;

  /** Write into guest memory of an instance, e.g. to stage call input. */
  writeMemory(instance: ContractInstance, ptr: number, data: Uint8Array): Result<void>;

  /** Get resource metrics for an instance. */
  getMetrics(instance: ContractInstance): ExecutionMetrics;
}

export type { ChainExtensionError, ChainExtensionErrorCode } from './errors.js';
