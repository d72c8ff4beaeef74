/**
 * Replay State - Reducer pattern for stepping through a parsed hand
 */

import type { Card, ParsedHand, Street } from '~/types/poker';

export interface BoardState {
  flop: readonly Card[];
  turn: readonly Card[];
  river: readonly Card[];
}

export interface ReplayState {
  hand: ParsedHand;
  cursor: number; // index of the current action, -1 when the hand has none

  // Derived from actions[0..cursor]
  board: BoardState;
  street: Street;
  activeSeat: number | null;
  caption: string;
}

export type ReplayAction =
  | { type: 'NEXT' }
  | { type: 'PREV' }
  | { type: 'SEEK'; index: number }
  | { type: 'RESET' };

const EMPTY_BOARD: BoardState = { flop: [], turn: [], river: [] };

function clampCursor(hand: ParsedHand, index: number): number {
  if (hand.actions.length === 0) {
    return -1;
  }
  return Math.min(Math.max(0, Math.trunc(index)), hand.actions.length - 1);
}

/**
 * Helper: Board, street and acting seat as of `cursor`
 */
export function deriveReplayView(
  hand: ParsedHand,
  cursor: number
): Pick<ReplayState, 'board' | 'street' | 'activeSeat' | 'caption'> {
  let board = EMPTY_BOARD;
  let street: Street = 'preflop';
  let activeSeat: number | null = null;

  for (const action of hand.actions.slice(0, cursor + 1)) {
    if (action.type === 'street_deal') {
      board = { ...board, [action.street]: action.cards };
      street = action.street;
    } else {
      activeSeat = action.seat;
    }
  }

  return {
    board,
    street,
    activeSeat,
    caption: cursor >= 0 ? hand.actions[cursor].raw : '',
  };
}

function moveTo(state: ReplayState, index: number): ReplayState {
  if (!Number.isFinite(index)) {
    return state;
  }
  const cursor = clampCursor(state.hand, index);
  if (cursor === state.cursor) {
    return state;
  }
  return {
    ...state,
    cursor,
    ...deriveReplayView(state.hand, cursor),
  };
}

export function initialReplayState(hand: ParsedHand): ReplayState {
  const cursor = clampCursor(hand, 0);
  return {
    hand,
    cursor,
    ...deriveReplayView(hand, cursor),
  };
}

/**
 * Replay state reducer
 */
export function replayReducer(state: ReplayState, action: ReplayAction): ReplayState {
  switch (action.type) {
    case 'NEXT':
      return moveTo(state, state.cursor + 1);

    case 'PREV':
      return moveTo(state, state.cursor - 1);

    case 'SEEK':
      return moveTo(state, action.index);

    case 'RESET':
      return initialReplayState(state.hand);

    default:
      return state;
  }
}
