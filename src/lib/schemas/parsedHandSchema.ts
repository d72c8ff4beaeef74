import { z } from 'zod';
import type { ParsedHand } from '~/types/poker';
import { RANKS, SUITS } from '../cards/card';
import { MAX_TABLE_SIZE, MIN_TABLE_SIZE } from '../seats/seatTable';

/**
 * Helpers
 */
const cardSchema = z.object({
  rank: z.enum(RANKS),
  suit: z.enum(SUITS),
});
const SIZED_VERBS: ReadonlySet<string> = new Set(['raise', 'call', 'bet']);
const seatIndexSchema = z.number().int().min(0).max(MAX_TABLE_SIZE - 1);

/**
 * Board deals. The flop carries three cards, turn and river one.
 */
const flopDealSchema = z.object({
  type: z.literal('street_deal'),
  street: z.literal('flop'),
  cards: z.tuple([cardSchema, cardSchema, cardSchema]),
  raw: z.string(),
});

const singleCardDealSchema = z.object({
  type: z.literal('street_deal'),
  street: z.enum(['turn', 'river']),
  cards: z.tuple([cardSchema]),
  raw: z.string(),
});

const playerMoveSchema = z.object({
  type: z.literal('player_move'),
  seat: seatIndexSchema,
  verb: z.enum(['raise', 'call', 'bet', 'check', 'fold']),
  amount: z.number().finite().nonnegative().optional(),
  raw: z.string(),
});

export const actionSchema = z.union([flopDealSchema, singleCardDealSchema, playerMoveSchema]);

/**
 * ParsedHand as handed to the renderer, with the cross-field invariants
 * that per-field checks cannot express.
 */
export const parsedHandSchema = z
  .object({
    tableSize: z.number().int().min(MIN_TABLE_SIZE).max(MAX_TABLE_SIZE),
    holeCards: z.array(z.tuple([cardSchema.nullable(), cardSchema.nullable()])),
    actions: z.array(actionSchema),
  })
  .superRefine((hand, ctx) => {
    if (hand.holeCards.length !== hand.tableSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['holeCards'],
        message: `expected ${hand.tableSize} hole card rows, got ${hand.holeCards.length}`,
      });
    }
    hand.actions.forEach((action, index) => {
      if (action.type !== 'player_move') {
        return;
      }
      if (action.seat >= hand.tableSize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['actions', index, 'seat'],
          message: `seat ${action.seat} is outside a ${hand.tableSize}-handed table`,
        });
      }
      if (action.amount !== undefined && !SIZED_VERBS.has(action.verb)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['actions', index, 'amount'],
          message: `${action.verb} does not take an amount`,
        });
      }
    });
  });

export type ParsedHandInput = z.input<typeof parsedHandSchema>;

/**
 * Validate a parsed hand received as JSON
 */
export function parseParsedHand(data: unknown): ParsedHand {
  return parsedHandSchema.parse(data);
}
