/**
 * Widget state machine.
 *
 * closed ──toggle──▶ loading ──success──▶ ready
 *   ▲                   │                   │
 *   └──────toggle───────┴──failure──▶ error ┘
 *
 * Every transition returns a new UIState. Responses carry the id of the
 * request that produced them; anything older than `appliedRequestId` is
 * dropped so a slow early response never overwrites a newer one.
 */
import type { Snapshot, UIState } from './types';

export const INITIAL_STATE: UIState = {
  isOpen: false,
  phase: 'closed',
  lastSnapshot: null,
  lastError: null,
  lastUpdateTimestamp: null,
  appliedRequestId: 0,
};

export function toggleOpen(state: UIState): UIState {
  if (state.isOpen) {
    return { ...state, isOpen: false, phase: 'closed' };
  }
  return { ...state, isOpen: true, phase: 'loading' };
}

function isStale(state: UIState, requestId: number): boolean {
  return requestId < state.appliedRequestId;
}

export function refreshSucceeded(
  state: UIState,
  requestId: number,
  snapshot: Snapshot,
  at: number,
): UIState {
  if (isStale(state, requestId)) return state;
  return {
    ...state,
    phase: state.isOpen ? 'ready' : 'closed',
    lastSnapshot: snapshot,
    lastError: null,
    lastUpdateTimestamp: at,
    appliedRequestId: requestId,
  };
}

/** Keeps the previous snapshot so stale numbers stay on screen */
export function refreshFailed(state: UIState, requestId: number, message: string): UIState {
  if (isStale(state, requestId)) return state;
  return {
    ...state,
    phase: state.isOpen ? 'error' : 'closed',
    lastError: message,
    appliedRequestId: requestId,
  };
}
