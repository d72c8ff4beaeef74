export type {
  Action,
  BetAction,
  BoardStreet,
  Card,
  FlopDeal,
  HoleCards,
  ParsedHand,
  PlayerMove,
  Rank,
  SeatPosition,
  SingleCardDeal,
  Street,
  StreetDeal,
  Suit,
} from './types/poker';

export { RANKS, SUITS, cardsEqual, createCard, formatCard, parseCard } from './lib/cards/card';
export { dealCards, generateOrderedDeck, shuffleDeck, shuffleDeckSeeded } from './lib/cards/deck';
export type { DealResult } from './lib/cards/deck';
export { config, readConfig } from './lib/config';
export type { HandScriptConfig } from './lib/config';
export { HandScriptError, ScriptLineError, isHandScriptError } from './lib/errors';
export type { HandScriptErrorCode } from './lib/errors';
export { createReplayStore } from './lib/replay/replayStore';
export type { ReplayStore } from './lib/replay/replayStore';
export { deriveReplayView, initialReplayState, replayReducer } from './lib/replay/replayState';
export type { BoardState, ReplayAction, ReplayState } from './lib/replay/replayState';
export { actionSchema, parseParsedHand, parsedHandSchema } from './lib/schemas/parsedHandSchema';
export type { ParsedHandInput } from './lib/schemas/parsedHandSchema';
export { formatAction, formatAmount, formatHandScript, formatHoleCards } from './lib/script/formatting';
export { HandBuilder, tokenizeLine } from './lib/script/handBuilder';
export type { ScriptLine } from './lib/script/handBuilder';
export { loadHandScript, parseHandScript, parseHandScriptText } from './lib/script/parser';
export {
  CANONICAL_SEAT_ORDER,
  MAX_TABLE_SIZE,
  MIN_TABLE_SIZE,
  SEAT_TRIM_PRIORITY,
  activePositions,
  isSeatPosition,
  normalizeSeatToken,
  resolveSeat,
  seatAt,
  tableSizeSchema,
} from './lib/seats/seatTable';
