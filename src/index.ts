/**
 * chain-ext — Typed chain extension dispatch for sandboxed WASM contracts.
 *
 * @packageDocumentation
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  Result,
  ResultOk,
  ResultErr,
  Weight,
  CallWords,
  RuntimeToken,
  ContractHostConfig,
  ExecutionMetrics,
  InstanceStatus,
  ContractInstance,
  ExecutionOutcome,
  ExecutionSuccess,
  ExecutionFailure,
  ExecutionResult,
  ContractHost,
  ChainExtensionError,
  ChainExtensionErrorCode,
} from './types.js';

export {
  ok,
  err,
  saturatingMul,
  isU32,
  isValidWeight,
  U32_MAX,
  SENTINEL,
  DEFAULT_MAX_MEMORY_BYTES,
  DEFAULT_MAX_GAS,
  DEFAULT_HOST_CALL_WEIGHT,
} from './types.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  outOfGas,
  invalidWeight,
  memoryAccessOutOfBounds,
  outputBufferTooSmall,
  noChainExtensionError,
  unknownFunction,
  decodingFailed,
  extensionError,
  invalidModule,
  wasmTrap,
  instanceDestroyed,
  isMemoryAccessError,
  describeError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Chain Extension Core
// ---------------------------------------------------------------------------

export type {
  EnvironmentState,
  TerminalState,
  Capability,
  CapabilityTable,
  CapabilitiesOf,
  HasCapability,
} from './chain-extension/state.js';
export {
  STATE_CAPABILITIES,
  ENVIRONMENT_STATES,
  CAPABILITIES,
  stateHasCapability,
} from './chain-extension/state.js';

export type {
  Environment,
  EnvironmentCore,
  InitTransitions,
  PrimInAccessors,
  PrimOutAccessors,
  BufInAccessors,
  BufOutAccessors,
} from './chain-extension/environment.js';
export { EnvironmentMisuseError } from './chain-extension/environment.js';

export type {
  ChainExtension,
  ChainExtensionHandler,
  ChainExtensionRouterOptions,
} from './chain-extension/chain-extension.js';
export {
  isChainExtensionEnabled,
  noChainExtension,
  createChainExtensionRouter,
} from './chain-extension/chain-extension.js';

export type { RetVal, ReturnFlags } from './chain-extension/ret-val.js';
export {
  converging,
  diverging,
  decodeReturnFlags,
  validateRetVal,
  isRevert,
  REVERT,
  RETURN_FLAGS_EMPTY,
} from './chain-extension/ret-val.js';

export type { Ext, AccountId } from './chain-extension/ext.js';
export type { HostRuntime, CostFn } from './chain-extension/host-runtime.js';

// ---------------------------------------------------------------------------
// Reference Host
// ---------------------------------------------------------------------------

export type { GasMeter } from './resources/gas-meter.js';
export { createGasMeter } from './resources/gas-meter.js';
export type { HostRuntimeOptions } from './execution/runtime.js';
export { createHostRuntime } from './execution/runtime.js';
export type { DispatchOptions } from './execution/dispatch.js';
export { dispatchChainExtension, toCallWords } from './execution/dispatch.js';
export { createContractHost } from './host.js';

export type { DispatchEvent } from './trace/dispatch-trace.js';
export { takeTrace } from './trace/dispatch-trace.js';
