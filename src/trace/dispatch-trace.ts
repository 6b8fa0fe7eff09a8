/**
 * chain-ext — Dispatch trace
 *
 * In-process log of chain extension dispatches. Recording is off unless
 * `CHAIN_EXT_TRACE=1` is set or a caller opts in per dispatch; `takeTrace`
 * drains what has been recorded.
 */

import type { ChainExtensionErrorCode } from '../errors.js';
import type { ReturnFlags } from '../chain-extension/ret-val.js';

/** One recorded dispatch step. */
export type DispatchEvent =
  | { readonly kind: 'dispatched'; readonly funcId: number }
  | { readonly kind: 'converged'; readonly funcId: number; readonly value: number }
  | {
      readonly kind: 'diverged';
      readonly funcId: number;
      readonly flags: ReturnFlags;
      readonly dataLength: number;
    }
  | { readonly kind: 'failed'; readonly funcId: number; readonly code: ChainExtensionErrorCode };

const events: DispatchEvent[] = [];

let cached: boolean | undefined;

/** Whether `CHAIN_EXT_TRACE=1` is set. Read once. */
export function traceEnabledByEnv(): boolean {
  if (cached === undefined) {
    cached = process.env['CHAIN_EXT_TRACE'] === '1';
  }
  return cached;
}

/**
 * Record `event` when `enabled` is true, or when it is undefined and the
 * environment flag is set.
 */
export function recordDispatch(event: DispatchEvent, enabled?: boolean): void {
  if (!(enabled ?? traceEnabledByEnv())) return;
  events.push(event);
}

/** Return and clear the recorded events. */
export function takeTrace(): DispatchEvent[] {
  const out = events.slice();
  events.length = 0;
  return out;
}

export function resetTraceForTest(): void {
  cached = undefined;
  events.length = 0;
}
