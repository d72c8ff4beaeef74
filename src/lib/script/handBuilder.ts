/**
 * Hand Builder - Classifies script lines and accumulates the parsed hand
 */

import { z } from 'zod';
import type { Action, BetAction, Card, HoleCards, ParsedHand, PlayerMove, StreetDeal } from '~/types/poker';
import { parseCard } from '../cards/card';
import { HandScriptError } from '../errors';
import { assertTableSize, resolveSeat } from '../seats/seatTable';

export interface ScriptLine {
  lineNumber: number; // 1-based
  text: string; // exactly as read
  tokens: string[];
}

const BET_ACTIONS = ['raise', 'call', 'bet', 'check', 'fold'] as const satisfies readonly BetAction[];
const SIZED_ACTIONS: ReadonlySet<BetAction> = new Set<BetAction>(['raise', 'call', 'bet']);

const betActionSchema = z.enum(BET_ACTIONS);
const amountTokenSchema = z
  .string()
  .regex(/^(?:\d+(?:\.\d*)?|\.\d+)$/, 'expected a decimal amount')
  .transform(Number)
  .pipe(z.number().finite());

export function tokenizeLine(text: string): string[] {
  return text.trim().split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Handles every retained line of one script. Create one per parse.
 */
export class HandBuilder {
  private readonly holeCards: Array<[Card | null, Card | null]>;
  private readonly actions: Action[] = [];

  constructor(private readonly tableSize: number) {
    assertTableSize(tableSize);
    this.holeCards = Array.from({ length: tableSize }, (): [Card | null, Card | null] => [null, null]);
  }

  /**
   * Main entry point, dispatches on the line keyword
   */
  applyLine(line: ScriptLine): void {
    const [keyword] = line.tokens;
    switch (keyword?.toUpperCase()) {
      case 'HAND':
        this.handleHand(line);
        break;

      case 'FLOP':
        this.actions.push(this.buildFlop(line));
        break;

      case 'TURN':
        this.actions.push(this.buildSingleCardDeal('turn', line));
        break;

      case 'RIVER':
        this.actions.push(this.buildSingleCardDeal('river', line));
        break;

      default:
        this.actions.push(this.buildMove(line));
    }
  }

  get actionCount(): number {
    return this.actions.length;
  }

  build(): ParsedHand {
    const holeCards: HoleCards[] = this.holeCards.map(([first, second]) => Object.freeze([first, second] as const));
    return Object.freeze({
      tableSize: this.tableSize,
      holeCards: Object.freeze(holeCards),
      actions: Object.freeze([...this.actions]),
    });
  }

  private handleHand(line: ScriptLine): void {
    if (line.tokens.length !== 4) {
      throw new HandScriptError(
        'MalformedHand',
        `HAND needs a seat and 2 cards, got ${line.tokens.length - 1} tokens`
      );
    }
    const [, seatToken, first, second] = line.tokens;
    const seat = resolveSeat(seatToken, this.tableSize);
    this.holeCards[seat] = [parseCard(first), parseCard(second)];
  }

  private buildFlop(line: ScriptLine): StreetDeal {
    const cardTokens = line.tokens.slice(1);
    if (cardTokens.length !== 3) {
      throw new HandScriptError('MalformedStreet', `FLOP needs 3 cards, got ${cardTokens.length}`);
    }
    const [a, b, c] = cardTokens;
    return {
      type: 'street_deal',
      street: 'flop',
      cards: [parseCard(a), parseCard(b), parseCard(c)],
      raw: line.text.trim(),
    };
  }

  private buildSingleCardDeal(street: 'turn' | 'river', line: ScriptLine): StreetDeal {
    const cardTokens = line.tokens.slice(1);
    if (cardTokens.length !== 1) {
      throw new HandScriptError(
        'MalformedStreet',
        `${street.toUpperCase()} needs 1 card, got ${cardTokens.length}`
      );
    }
    return {
      type: 'street_deal',
      street,
      cards: [parseCard(cardTokens[0])],
      raw: line.text.trim(),
    };
  }

  private buildMove(line: ScriptLine): PlayerMove {
    if (line.tokens.length < 2 || line.tokens.length > 3) {
      throw new HandScriptError(
        'MalformedMove',
        `expected '<seat> <action> [amount]', got ${line.tokens.length} tokens`
      );
    }
    const [seatToken, verbToken, amountToken] = line.tokens;
    const seat = resolveSeat(seatToken, this.tableSize);

    const verb = betActionSchema.safeParse(verbToken.toLowerCase());
    if (!verb.success) {
      throw new HandScriptError('UnknownVerb', `unknown action '${verbToken}'`);
    }

    const move: PlayerMove = {
      type: 'player_move',
      seat,
      verb: verb.data,
      raw: line.text.trim(),
    };
    if (amountToken === undefined) {
      return move;
    }
    if (!SIZED_ACTIONS.has(verb.data)) {
      throw new HandScriptError('InvalidAmount', `${verb.data} does not take an amount`);
    }
    const amount = amountTokenSchema.safeParse(amountToken);
    if (!amount.success) {
      throw new HandScriptError('InvalidAmount', `bad amount '${amountToken}'`);
    }
    return { ...move, amount: amount.data };
  }
}
