/**
 * chain-ext — Error types
 *
 * Discriminated union of all errors a chain extension dispatch can produce,
 * plus factory functions for constructing each variant.
 */

// ---------------------------------------------------------------------------
// Error Codes
// ---------------------------------------------------------------------------

/** All possible error codes produced by the host. */
export type ChainExtensionErrorCode =
  | 'OUT_OF_GAS'
  | 'INVALID_WEIGHT'
  | 'MEMORY_ACCESS_OUT_OF_BOUNDS'
  | 'OUTPUT_BUFFER_TOO_SMALL'
  | 'NO_CHAIN_EXTENSION'
  | 'UNKNOWN_FUNCTION'
  | 'DECODING_FAILED'
  | 'EXTENSION_ERROR'
  | 'INVALID_MODULE'
  | 'WASM_TRAP'
  | 'INSTANCE_DESTROYED';

// ---------------------------------------------------------------------------
// Error Union
// ---------------------------------------------------------------------------

/** Discriminated union of all host errors. */
export type ChainExtensionError =
  | {
      readonly code: 'OUT_OF_GAS';
      readonly gasUsed: number;
      readonly gasLimit: number;
      readonly requested: number;
    }
  | {
      /** A weight that is not a non-negative safe integer. */
      readonly code: 'INVALID_WEIGHT';
      readonly weight: number;
    }
  | {
      readonly code: 'MEMORY_ACCESS_OUT_OF_BOUNDS';
      readonly ptr: number;
      readonly len: number;
      readonly memorySize: number;
    }
  | {
      readonly code: 'OUTPUT_BUFFER_TOO_SMALL';
      readonly required: number;
      readonly available: number;
    }
  | {
      readonly code: 'NO_CHAIN_EXTENSION';
    }
  | {
      readonly code: 'UNKNOWN_FUNCTION';
      readonly funcId: number;
    }
  | {
      readonly code: 'DECODING_FAILED';
      readonly reason: string;
    }
  | {
      readonly code: 'EXTENSION_ERROR';
      readonly funcId: number;
      readonly message: string;
    }
  | {
      readonly code: 'INVALID_MODULE';
      readonly reason: string;
    }
  | {
      readonly code: 'WASM_TRAP';
      readonly trapKind: string;
      readonly message: string;
    }
  | {
      readonly code: 'INSTANCE_DESTROYED';
      readonly instanceId: string;
    };

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create an OUT_OF_GAS error. */
export function outOfGas(gasUsed: number, gasLimit: number, requested: number): ChainExtensionError {
  return { code: 'OUT_OF_GAS', gasUsed, gasLimit, requested } as const;
}

/** Create an INVALID_WEIGHT error. */
export function invalidWeight(weight: number): ChainExtensionError {
  return { code: 'INVALID_WEIGHT', weight } as const;
}

/** Create a MEMORY_ACCESS_OUT_OF_BOUNDS error. */
export function memoryAccessOutOfBounds(
  ptr: number,
  len: number,
  memorySize: number,
): ChainExtensionError {
  return { code: 'MEMORY_ACCESS_OUT_OF_BOUNDS', ptr, len, memorySize } as const;
}

/** Create an OUTPUT_BUFFER_TOO_SMALL error. */
export function outputBufferTooSmall(required: number, available: number): ChainExtensionError {
  return { code: 'OUTPUT_BUFFER_TOO_SMALL', required, available } as const;
}

/** Create a NO_CHAIN_EXTENSION error. */
export function noChainExtensionError(): ChainExtensionError {
  return { code: 'NO_CHAIN_EXTENSION' } as const;
}

/** Create an UNKNOWN_FUNCTION error. */
export function unknownFunction(funcId: number): ChainExtensionError {
  return { code: 'UNKNOWN_FUNCTION', funcId } as const;
}

/** Create a DECODING_FAILED error. */
export function decodingFailed(reason: string): ChainExtensionError {
  return { code: 'DECODING_FAILED', reason } as const;
}

/** Create an EXTENSION_ERROR error for a domain failure raised by an extension. */
export function extensionError(funcId: number, message: string): ChainExtensionError {
  return { code: 'EXTENSION_ERROR', funcId, message } as const;
}

/** Create an INVALID_MODULE error. */
export function invalidModule(reason: string): ChainExtensionError {
  return { code: 'INVALID_MODULE', reason } as const;
}

/** Create a WASM_TRAP error. */
export function wasmTrap(trapKind: string, message: string): ChainExtensionError {
  return { code: 'WASM_TRAP', trapKind, message } as const;
}

/** Create an INSTANCE_DESTROYED error. */
export function instanceDestroyed(instanceId: string): ChainExtensionError {
  return { code: 'INSTANCE_DESTROYED', instanceId } as const;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Whether the error belongs to the memory-access class: an access outside
 * guest memory, or output larger than the buffer the guest declared.
 */
export function isMemoryAccessError(error: ChainExtensionError): boolean {
  return error.code === 'MEMORY_ACCESS_OUT_OF_BOUNDS' || error.code === 'OUTPUT_BUFFER_TOO_SMALL';
}

/** Render an error as a single human-readable line. */
export function describeError(error: ChainExtensionError): string {
  switch (error.code) {
    case 'OUT_OF_GAS':
      return `Out of gas: requested ${String(error.requested)} with ${String(error.gasUsed)} of ${String(error.gasLimit)} used`;
    case 'INVALID_WEIGHT':
      return `Invalid weight: ${String(error.weight)}`;
    case 'MEMORY_ACCESS_OUT_OF_BOUNDS':
      return `Memory access out of bounds: ptr=${String(error.ptr)}, len=${String(error.len)}, memorySize=${String(error.memorySize)}`;
    case 'OUTPUT_BUFFER_TOO_SMALL':
      return `Output buffer too small: need ${String(error.required)} bytes, guest declared ${String(error.available)}`;
    case 'NO_CHAIN_EXTENSION':
      return 'No chain extension is available';
    case 'UNKNOWN_FUNCTION':
      return `Unknown chain extension function: ${String(error.funcId)}`;
    case 'DECODING_FAILED':
      return `Decoding failed: ${error.reason}`;
    case 'EXTENSION_ERROR':
      return `Chain extension function ${String(error.funcId)} failed: ${error.message}`;
    case 'INVALID_MODULE':
      return `Invalid module: ${error.reason}`;
    case 'WASM_TRAP':
      return `WASM trap (${error.trapKind}): ${error.message}`;
    case 'INSTANCE_DESTROYED':
      return `Instance destroyed: ${error.instanceId}`;
  }
}
