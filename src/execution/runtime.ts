/**
 * chain-ext — Host runtime
 *
 * Reference HostRuntime over a guest's WebAssembly.Memory, a gas meter and
 * an execution context.
 */

import type { Result, RuntimeToken } from '../types.js';
import { SENTINEL } from '../types.js';
import { outputBufferTooSmall } from '../errors.js';
import type { CostFn, HostRuntime } from '../chain-extension/host-runtime.js';
import type { Ext } from '../chain-extension/ext.js';
import type { GasMeter } from '../resources/gas-meter.js';
import { checkRange, encodeU32, readFromMemory, readU32, U32_SIZE } from './memory-io.js';

/** Collaborators of a host runtime. */
export interface HostRuntimeOptions<E extends Ext> {
  readonly memory: WebAssembly.Memory;
  readonly gasMeter: GasMeter;
  readonly ext: E;
}

/** Create a HostRuntime for one guest call. */
export function createHostRuntime<E extends Ext>(options: HostRuntimeOptions<E>): HostRuntime<E> {
  const { memory, gasMeter, ext } = options;

  return {
    chargeGas(token: RuntimeToken): Result<void> {
      return gasMeter.charge(token);
    },

    readSandboxMemory(ptr: number, len: number): Result<Uint8Array> {
      return readFromMemory(memory, ptr, len);
    },

    writeSandboxOutput(
      outPtr: number,
      outLenPtr: number,
      data: Uint8Array,
      allowSkip: boolean,
      createToken: CostFn,
    ): Result<void> {
      if (allowSkip && outPtr === SENTINEL) {
        return { ok: true, value: undefined };
      }

      const declared = readU32(memory, outLenPtr);
      if (!declared.ok) {
        return declared;
      }
      if (declared.value < data.length) {
        return { ok: false, error: outputBufferTooSmall(data.length, declared.value) };
      }

      const token = createToken(data.length);
      if (token !== undefined) {
        const charged = gasMeter.charge(token);
        if (!charged.ok) {
          return charged;
        }
      }

      // Both ranges are checked before the first byte is written
      const outRange = checkRange(memory, outPtr, data.length);
      if (!outRange.ok) {
        return outRange;
      }
      const lenRange = checkRange(memory, outLenPtr, U32_SIZE);
      if (!lenRange.ok) {
        return lenRange;
      }

      const view = new Uint8Array(memory.buffer);
      view.set(data, outPtr);
      view.set(encodeU32(data.length), outLenPtr);
      return { ok: true, value: undefined };
    },

    ext(): E {
      return ext;
    },
  };
}
