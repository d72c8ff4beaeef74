/**
 * Card tokens
 *
 * Reads script tokens such as `Ah`, `tc` or `10D` into canonical card values.
 */

import type { Card, Rank, Suit } from '~/types/poker';
import { HandScriptError } from '../errors';

export const SUITS = ['c', 'd', 'h', 's'] as const satisfies readonly Suit[];
export const RANKS = [
  '2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A',
] as const satisfies readonly Rank[];

const CARD_TOKEN = /^(10|[2-9TJQKA])([CDHS])$/i;

function toRank(token: string): Rank {
  const upper = token.toUpperCase();
  if (upper === 'T') {
    return '10';
  }
  const rank = RANKS.find((r) => r === upper);
  if (!rank) {
    throw new HandScriptError('InvalidCardToken', `bad card rank '${token}'`);
  }
  return rank;
}

function toSuit(token: string): Suit {
  const suit = SUITS.find((s) => s === token.toLowerCase());
  if (!suit) {
    throw new HandScriptError('InvalidCardToken', `bad card suit '${token}'`);
  }
  return suit;
}

export function createCard(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/**
 * Parse a rank immediately followed by a suit, case-insensitively.
 * `T` and `10` both give rank `10`.
 */
export function parseCard(token: string): Card {
  const match = CARD_TOKEN.exec(token);
  if (!match) {
    throw new HandScriptError('InvalidCardToken', `bad card token '${token}'`);
  }
  return createCard(toRank(match[1]), toSuit(match[2]));
}

export function formatCard(card: Card): string {
  return `${card.rank}${card.suit}`;
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}
