/**
 * chain-ext — Execution context
 *
 * The chain state a contract call runs against, as seen by chain extensions.
 * The host embeds its own implementation; this package only consumes it.
 */

/** Account identifier bytes. */
export type AccountId = Uint8Array;

/** Capability set giving chain extensions access to chain state. */
export interface Ext {
  /** Account that called the running contract. */
  caller(): AccountId;
  /** Account of the running contract. */
  address(): AccountId;
  /** Free balance of the running contract. */
  balance(): bigint;
  /** Current block number. */
  blockNumber(): number;
  /** Read a storage value of the running contract, `undefined` when unset. */
  getStorage(key: Uint8Array): Uint8Array | undefined;
  /** Write a storage value of the running contract; `undefined` clears it. */
  setStorage(key: Uint8Array, value: Uint8Array | undefined): void;
}
