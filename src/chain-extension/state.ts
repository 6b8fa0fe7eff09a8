/**
 * chain-ext — Environment states and capabilities
 *
 * The closed set of states a chain extension environment can be in, and the
 * fixed table of which accessor capabilities each state grants. The type
 * level table gates accessors at compile time; `STATE_CAPABILITIES` mirrors
 * it for run-time assertions.
 */

// ---------------------------------------------------------------------------
// Vocabulary
// ---------------------------------------------------------------------------

/** Calling-convention state of an environment. `Init` is the only entry state. */
export type EnvironmentState = 'Init' | 'OnlyIn' | 'PrimInBufOut' | 'BufInBufOut';

/** Terminal states, reachable from `Init` by exactly one transition each. */
export type TerminalState = Exclude<EnvironmentState, 'Init'>;

/** Accessor capability a state may grant. */
export type Capability = 'PrimIn' | 'PrimOut' | 'BufIn' | 'BufOut';

// ---------------------------------------------------------------------------
// Membership Table
// ---------------------------------------------------------------------------

/** Capability membership per state. */
export interface CapabilityTable {
  readonly Init: never;
  readonly OnlyIn: 'PrimIn' | 'PrimOut';
  readonly PrimInBufOut: 'PrimIn' | 'BufOut';
  readonly BufInBufOut: 'BufIn' | 'BufOut';
}

/** Union of the capabilities state `S` grants. */
export type CapabilitiesOf<S extends EnvironmentState> = CapabilityTable[S];

/** `true` when state `S` grants capability `C`. */
export type HasCapability<S extends EnvironmentState, C extends Capability> = [C] extends [
  CapabilitiesOf<S>,
]
  ? true
  : false;

/** Run-time mirror of {@link CapabilityTable}. */
export const STATE_CAPABILITIES = {
  Init: [],
  OnlyIn: ['PrimIn', 'PrimOut'],
  PrimInBufOut: ['PrimIn', 'BufOut'],
  BufInBufOut: ['BufIn', 'BufOut'],
} as const satisfies { readonly [S in EnvironmentState]: readonly CapabilitiesOf<S>[] };

/** All states, in declaration order. */
export const ENVIRONMENT_STATES: readonly EnvironmentState[] = [
  'Init',
  'OnlyIn',
  'PrimInBufOut',
  'BufInBufOut',
];

/** All capabilities, in declaration order. */
export const CAPABILITIES: readonly Capability[] = ['PrimIn', 'PrimOut', 'BufIn', 'BufOut'];

/** Whether `state` grants `capability` at run time. */
export function stateHasCapability(state: EnvironmentState, capability: Capability): boolean {
  const granted: readonly Capability[] = STATE_CAPABILITIES[state];
  return granted.includes(capability);
}
