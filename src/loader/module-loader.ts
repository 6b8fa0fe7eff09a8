/**
 * chain-ext — WASM module loading and validation.
 *
 * Validates WASM magic bytes and compiles the module.
 */

import type { Result } from '../types.js';
import { invalidModule } from '../errors.js';

/** WASM magic bytes: `\0asm` */
const WASM_MAGIC = new Uint8Array([0x00, 0x61, 0x73, 0x6d]);

/** Minimum valid WASM module size (magic + version = 8 bytes). */
const MIN_WASM_SIZE = 8;

function hasValidMagic(bytes: Uint8Array): boolean {
  return WASM_MAGIC.every((byte, i) => bytes[i] === byte);
}

/**
 * Load and compile a WASM module from raw bytes.
 *
 * Returns INVALID_MODULE for empty, truncated or non-WASM input and for
 * compilation failures.
 */
export async function loadModule(bytes: Uint8Array): Promise<Result<WebAssembly.Module>> {
  if (bytes.length < MIN_WASM_SIZE) {
    return {
      ok: false,
      error: invalidModule(
        `WASM module too small: ${String(bytes.length)} bytes (minimum ${String(MIN_WASM_SIZE)})`,
      ),
    };
  }

  if (!hasValidMagic(bytes)) {
    return {
      ok: false,
      error: invalidModule('Invalid WASM magic bytes — expected \\0asm header'),
    };
  }

  try {
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    const module = await WebAssembly.compile(buffer);
    return { ok: true, value: module };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : 'Unknown compilation error';
    return { ok: false, error: invalidModule(`WASM compilation failed: ${message}`) };
  }
}
