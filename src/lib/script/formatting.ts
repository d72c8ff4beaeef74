// lib/script/formatting.ts

import type { Action, Card, ParsedHand } from '~/types/poker';
import { formatCard } from '../cards/card';
import { seatAt } from '../seats/seatTable';

const EXPONENT_FORM = /^(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Plain decimal text for an amount; String() switches to exponent form
 * below 1e-6 and from 1e21, which scripts cannot express.
 */
export function formatAmount(amount: number): string {
  const text = String(amount);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }
  const digits = match[1] + (match[2] ?? '');
  const exponent = Number(match[3]);
  if (exponent >= 0) {
    return digits.padEnd(exponent + 1, '0');
  }
  return `0.${'0'.repeat(-exponent - 1)}${digits}`;
}

/**
 * Render an action as the script line that produces it
 */
export function formatAction(action: Action, tableSize: number): string {
  if (action.type === 'street_deal') {
    const cards: readonly Card[] = action.cards;
    return [action.street.toUpperCase(), ...cards.map(formatCard)].join(' ');
  }

  const parts: string[] = [seatAt(action.seat, tableSize), action.verb];
  if (action.amount !== undefined) {
    parts.push(formatAmount(action.amount));
  }
  return parts.join(' ');
}

/**
 * HAND line for a seat, or null while either hole card is unknown
 */
export function formatHoleCards(hand: ParsedHand, seat: number): string | null {
  const row = hand.holeCards[seat];
  if (!row) {
    return null;
  }
  const [first, second] = row;
  if (!first || !second) {
    return null;
  }
  return `HAND ${seatAt(seat, hand.tableSize)} ${formatCard(first)} ${formatCard(second)}`;
}

export function formatHandScript(hand: ParsedHand): string[] {
  const setup = hand.holeCards
    .map((_, seat) => formatHoleCards(hand, seat))
    .filter((line): line is string => line !== null);
  return [...setup, ...hand.actions.map((action) => formatAction(action, hand.tableSize))];
}
