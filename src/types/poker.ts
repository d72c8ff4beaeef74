export type Suit = 'c' | 'd' | 'h' | 's';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export type SeatPosition = 'UTG' | 'UTG+1' | 'UTG+2' | 'LJ' | 'HJ' | 'CO' | 'BTN' | 'SB' | 'BB';

export type Street = 'preflop' | 'flop' | 'turn' | 'river';
export type BoardStreet = Exclude<Street, 'preflop'>;

export type BetAction = 'raise' | 'call' | 'bet' | 'check' | 'fold';

export interface FlopDeal {
  readonly type: 'street_deal';
  readonly street: 'flop';
  readonly cards: readonly [Card, Card, Card];
  readonly raw: string;
}

export interface SingleCardDeal {
  readonly type: 'street_deal';
  readonly street: 'turn' | 'river';
  readonly cards: readonly [Card];
  readonly raw: string;
}

export type StreetDeal = FlopDeal | SingleCardDeal;

export interface PlayerMove {
  readonly type: 'player_move';
  readonly seat: number; // index into activePositions(tableSize)
  readonly verb: BetAction;
  readonly amount?: number; // only when the line supplied one
  readonly raw: string;
}

export type Action = StreetDeal | PlayerMove;

export type HoleCards = readonly [Card | null, Card | null];

export interface ParsedHand {
  readonly tableSize: number;
  readonly holeCards: readonly HoleCards[];
  readonly actions: readonly Action[];
}
