/**
 * Deck Generation
 *
 * Builds ordered and shuffled 52-card decks. Only used to produce fixture
 * hands; nothing here is cryptographically secure.
 */

import type { Card } from '~/types/poker';
import { RANKS, SUITS, createCard } from './card';

/**
 * Generate ordered 52-card deck (clubs first, deuce to ace within a suit)
 */
export function generateOrderedDeck(): Card[] {
  return SUITS.flatMap((suit) => RANKS.map((rank) => createCard(rank, suit)));
}

/**
 * Fisher-Yates shuffle, returns a new array
 */
export function shuffleDeck(deck: readonly Card[], random: () => number = Math.random): Card[] {
  const shuffled = [...deck];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Linear congruential source in [0, 1), same sequence for the same seed
 */
function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) % 2 ** 32;
    return state / 2 ** 32;
  };
}

export function shuffleDeckSeeded(seed: number): Card[] {
  return shuffleDeck(generateOrderedDeck(), lcg(seed));
}

export interface DealResult {
  dealt: Card[];
  rest: Card[];
}

/**
 * Take `count` cards off the top without touching the input deck
 */
export function dealCards(deck: readonly Card[], count: number): DealResult {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Invalid deal count: ${count}`);
  }
  if (count > deck.length) {
    throw new Error(`Cannot deal ${count} cards from a deck of ${deck.length}`);
  }
  return {
    dealt: deck.slice(0, count),
    rest: deck.slice(count),
  };
}
