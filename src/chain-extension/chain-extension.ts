/**
 * chain-ext — Chain extension dispatch interface
 *
 * What a host implements to expose chain-specific native operations to
 * guests, the disabled default, and a function-id router for hosts that
 * expose several operations.
 */

import type { Result } from '../types.js';
import { noChainExtensionError, unknownFunction } from '../errors.js';
import type { Environment } from './environment.js';
import type { Ext } from './ext.js';
import type { RetVal } from './ret-val.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

/**
 * Entry point for guest calls to `seal_call_chain_extension`.
 *
 * `call` inspects `funcId`, moves `env` into the calling convention that
 * function uses, does the work (charging gas as it goes) and returns a
 * RetVal or an error. It must be deterministic for the same execution
 * context and inputs.
 */
export interface ChainExtension {
  call<E extends Ext>(funcId: number, env: Environment<E, 'Init'>): Result<RetVal>;

  /** When false the host rejects every guest call with NO_CHAIN_EXTENSION. Default: true. */
  enabled?(): boolean;
}

/** Whether the host should route calls to `extension`. */
export function isChainExtensionEnabled(extension: ChainExtension): boolean {
  return extension.enabled?.() ?? true;
}

// ---------------------------------------------------------------------------
// Disabled Default
// ---------------------------------------------------------------------------

/**
 * The extension a host uses when it exposes none.
 *
 * `call` still reads the caller before failing so that its measured cost
 * stays comparable to a real extension. Do not remove the read.
 */
export const noChainExtension: ChainExtension = {
  call<E extends Ext>(_funcId: number, env: Environment<E, 'Init'>): Result<RetVal> {
    env.ext().caller();
    return { ok: false, error: noChainExtensionError() };
  },

  enabled(): boolean {
    return false;
  },
};

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

/** Handles one function id. */
export type ChainExtensionHandler = <E extends Ext>(env: Environment<E, 'Init'>) => Result<RetVal>;

/** Options for createChainExtensionRouter. */
export interface ChainExtensionRouterOptions {
  /** Reported by `enabled()`. Default: true. */
  readonly enabled?: boolean;
}

/**
 * Build a ChainExtension that dispatches on function id.
 * Ids without a handler fail with UNKNOWN_FUNCTION.
 */
export function createChainExtensionRouter(
  handlers: Readonly<Record<number, ChainExtensionHandler>>,
  options?: ChainExtensionRouterOptions,
): ChainExtension {
  const enabled = options?.enabled ?? true;
  const table = new Map<number, ChainExtensionHandler>();
  for (const [key, handler] of Object.entries(handlers)) {
    table.set(Number(key), handler);
  }

  return {
    call<E extends Ext>(funcId: number, env: Environment<E, 'Init'>): Result<RetVal> {
      const handler = table.get(funcId);
      if (handler === undefined) {
        return { ok: false, error: unknownFunction(funcId) };
      }
      return handler(env);
    },

    enabled(): boolean {
      return enabled;
    },
  };
}
