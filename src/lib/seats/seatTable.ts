/**
 * Seat Table
 *
 * Maps seat names from a hand script to seat indices for a given table size.
 * Index 0 is the earliest seat to act preflop and the big blind is always the
 * last index. Smaller tables drop seats from the front following
 * SEAT_TRIM_PRIORITY, so a 6-max table runs LJ, HJ, CO, BTN, SB, BB.
 */

import { z } from 'zod';
import type { SeatPosition } from '~/types/poker';
import { HandScriptError } from '../errors';

export const MIN_TABLE_SIZE = 2;
export const MAX_TABLE_SIZE = 9;

export const tableSizeSchema = z.number().int().min(MIN_TABLE_SIZE).max(MAX_TABLE_SIZE);

export const CANONICAL_SEAT_ORDER = [
  'UTG',
  'UTG+1',
  'UTG+2',
  'LJ',
  'HJ',
  'CO',
  'BTN',
  'SB',
  'BB',
] as const satisfies readonly SeatPosition[];

// Removed in this order as the table shrinks from 9 seats down to 2
export const SEAT_TRIM_PRIORITY = [
  'UTG+2',
  'UTG+1',
  'UTG',
  'LJ',
  'HJ',
  'CO',
  'BTN',
] as const satisfies readonly SeatPosition[];

const SEAT_ALIASES: Readonly<Record<string, SeatPosition>> = {
  UTG1: 'UTG+1',
  UTG2: 'UTG+2',
  BUTTON: 'BTN',
  DEALER: 'BTN',
  D: 'BTN',
};

function buildActivePositions(tableSize: number): readonly SeatPosition[] {
  const trimmed = new Set<SeatPosition>(SEAT_TRIM_PRIORITY.slice(0, MAX_TABLE_SIZE - tableSize));
  return Object.freeze(CANONICAL_SEAT_ORDER.filter((seat) => !trimmed.has(seat)));
}

// Indexed by tableSize - MIN_TABLE_SIZE
const ACTIVE_POSITIONS: readonly (readonly SeatPosition[])[] = Array.from(
  { length: MAX_TABLE_SIZE - MIN_TABLE_SIZE + 1 },
  (_, i) => buildActivePositions(MIN_TABLE_SIZE + i)
);

export function assertTableSize(tableSize: number): void {
  if (!tableSizeSchema.safeParse(tableSize).success) {
    throw new HandScriptError(
      'InvalidTableSize',
      `table size must be an integer from ${MIN_TABLE_SIZE} to ${MAX_TABLE_SIZE}, got ${tableSize}`
    );
  }
}

/**
 * Seats in play at a table of `tableSize`, earliest to act first
 */
export function activePositions(tableSize: number): readonly SeatPosition[] {
  assertTableSize(tableSize);
  return ACTIVE_POSITIONS[tableSize - MIN_TABLE_SIZE];
}

export function isSeatPosition(token: string): token is SeatPosition {
  return CANONICAL_SEAT_ORDER.some((seat) => seat === token);
}

/**
 * Apply seat aliases. Heads-up, the button posts the small blind, so any
 * button token becomes SB.
 */
export function normalizeSeatToken(token: string, tableSize: number): string {
  const upper = token.toUpperCase();
  const seat = SEAT_ALIASES[upper] ?? upper;
  if (tableSize === 2 && seat === 'BTN') {
    return 'SB';
  }
  return seat;
}

export function resolveSeat(token: string, tableSize: number): number {
  const positions = activePositions(tableSize);
  const normalized = normalizeSeatToken(token, tableSize);
  if (!isSeatPosition(normalized)) {
    throw new HandScriptError('UnknownSeat', `unknown seat '${token}'`);
  }
  const index = positions.indexOf(normalized);
  if (index < 0) {
    throw new HandScriptError(
      'SeatNotAtTable',
      `seat '${normalized}' is not in play at a ${tableSize}-handed table`
    );
  }
  return index;
}

/**
 * Name of the seat at `index`; inverse of resolveSeat
 */
export function seatAt(index: number, tableSize: number): SeatPosition {
  const positions = activePositions(tableSize);
  const seat = positions[index];
  if (seat === undefined) {
    throw new RangeError(`seat index ${index} is outside a ${tableSize}-handed table`);
  }
  return seat;
}
