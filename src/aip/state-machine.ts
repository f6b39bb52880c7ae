/**
 * Lifecycle transitions for AIPs.
 *
 * AIPs progress through: discovered -> named -> filtered -> restructured
 * -> extracted -> preserved -> packaged. Any non-terminal state may
 * move to `errored`; `packaged` and `errored` are terminal.
 *
 * @module aip/state-machine
 */

import type { AipState, AipWorkItem } from './types.js';

/**
 * Allowed lifecycle transitions.
 */
export const VALID_TRANSITIONS: Record<AipState, AipState[]> = {
  discovered: ['named', 'errored'],
  named: ['filtered', 'errored'],
  filtered: ['restructured', 'errored'],
  restructured: ['extracted', 'errored'],
  extracted: ['preserved', 'errored'],
  preserved: ['packaged', 'errored'],
  packaged: [],
  errored: [],
};

/** True once an AIP can no longer change state. */
export function isTerminal(state: AipState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

/**
 * Return a copy of `item` in state `to`, applying any field updates.
 *
 * @throws Error if the transition is not in VALID_TRANSITIONS
 */
export function transition(
  item: AipWorkItem,
  to: AipState,
  updates: Partial<Omit<AipWorkItem, 'state' | 'sourceName'>> = {},
): AipWorkItem {
  if (!VALID_TRANSITIONS[item.state].includes(to)) {
    throw new Error(`Invalid AIP state transition for ${item.sourceName}: ${item.state} -> ${to}`);
  }
  return { ...item, ...updates, state: to };
}
