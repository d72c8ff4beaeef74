import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { parseCard } from '~/lib/cards/card';
import { ScriptLineError } from '~/lib/errors';
import { resolveSeat } from '~/lib/seats/seatTable';
import { catchScriptError } from '~/test/helpers';
import { loadHandScript, parseHandScript, parseHandScriptText } from './parser';

const SIX_MAX_FIXTURE = fileURLToPath(new URL('../../test/fixtures/six-max.hand', import.meta.url));

describe('parseHandScript', () => {
  it('parses a heads-up hand with the button on the small blind', () => {
    const hand = parseHandScript(
      ['HAND BTN Ah Kh', 'HAND BB 9c 9d', 'BTN bet 3.5', 'BB call 3.5', 'FLOP 7h Tc Js'],
      2
    );
    const button = resolveSeat('BTN', 2);
    const bigBlind = resolveSeat('BB', 2);

    expect(hand.tableSize).toBe(2);
    expect(hand.holeCards).toHaveLength(2);
    expect(hand.holeCards[button]).toEqual([parseCard('Ah'), parseCard('Kh')]);
    expect(hand.holeCards[bigBlind]).toEqual([parseCard('9c'), parseCard('9d')]);
    expect(hand.actions).toEqual([
      { type: 'player_move', seat: button, verb: 'bet', amount: 3.5, raw: 'BTN bet 3.5' },
      { type: 'player_move', seat: bigBlind, verb: 'call', amount: 3.5, raw: 'BB call 3.5' },
      {
        type: 'street_deal',
        street: 'flop',
        cards: [parseCard('7h'), parseCard('Tc'), parseCard('Js')],
        raw: 'FLOP 7h Tc Js',
      },
    ]);
  });

  it('never defaults a missing amount to zero', () => {
    const hand = parseHandScript(['BTN raise'], 6);
    expect(hand.actions).toEqual([{ type: 'player_move', seat: 3, verb: 'raise', raw: 'BTN raise' }]);
  });

  it('skips blank and comment lines but keeps counting them', () => {
    const error = catchScriptError(() =>
      parseHandScript(['# setup', '', '   ', '  # indented comment', 'XX fold'], 6)
    );
    expect(error).toBeInstanceOf(ScriptLineError);
    expect(error.code).toBe('UnknownSeat');
    expect(error).toMatchObject({ lineNumber: 5, line: 'XX fold' });
    expect(error.message).toBe("[line 5] unknown seat 'XX': XX fold");
  });

  it('keeps the original line text and the underlying error', () => {
    const error = catchScriptError(() => parseHandScript(['BTN bet 1', '  CO  shove  '], 6));
    expect(error).toMatchObject({ code: 'UnknownVerb', lineNumber: 2, line: '  CO  shove  ' });
    expect(error.cause).toBeInstanceOf(Error);
    expect(error.cause).toMatchObject({ name: 'HandScriptError', code: 'UnknownVerb' });
  });

  it('stops at the first bad line', () => {
    const error = catchScriptError(() => parseHandScript(['FLOP 7h Tc', 'XX fold'], 6));
    expect(error).toMatchObject({ code: 'MalformedStreet', lineNumber: 1 });
  });

  it('rejects a table size before reading any line', () => {
    let linesRead = 0;
    function* lines() {
      linesRead++;
      yield 'BTN fold';
    }

    const error = catchScriptError(() => parseHandScript(lines(), 10));
    expect(error.code).toBe('InvalidTableSize');
    expect(error).not.toBeInstanceOf(ScriptLineError);
    expect(linesRead).toBe(0);
  });

  it('returns a new hand on every call', () => {
    const lines = ['HAND BB 9c 9d', 'BB check'];
    const first = parseHandScript(lines, 6);
    const second = parseHandScript(lines, 6);
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(second.holeCards).not.toBe(first.holeCards);
  });

  it('returns an empty hand for a script with no events', () => {
    expect(parseHandScript(['# nothing yet'], 3)).toEqual({
      tableSize: 3,
      holeCards: [
        [null, null],
        [null, null],
        [null, null],
      ],
      actions: [],
    });
  });
});

describe('parseHandScriptText', () => {
  it('splits on LF and CRLF line endings', () => {
    const hand = parseHandScriptText('HAND BB 9c 9d\r\nSB bet 1\nBB call 1\n', 2);
    expect(hand.actions.map((action) => action.raw)).toEqual(['SB bet 1', 'BB call 1']);
  });

  it('reports line numbers across mixed endings', () => {
    const error = catchScriptError(() => parseHandScriptText('SB bet 1\r\n\nBB rase 1', 2));
    expect(error).toMatchObject({ code: 'UnknownVerb', lineNumber: 3, line: 'BB rase 1' });
  });
});

describe('loadHandScript', () => {
  it('reads and parses a script file', async () => {
    const hand = await loadHandScript(SIX_MAX_FIXTURE, 6);
    expect(hand.holeCards[3]).toEqual([parseCard('Ah'), parseCard('Kh')]);
    expect(hand.holeCards[5]).toEqual([parseCard('9c'), parseCard('9d')]);
    expect(hand.actions).toHaveLength(18);
    const streets = hand.actions.flatMap((action) => (action.type === 'street_deal' ? [action.street] : []));
    expect(streets).toEqual(['flop', 'turn', 'river']);
    expect(hand.actions[hand.actions.length - 1]).toEqual({
      type: 'player_move',
      seat: 2,
      verb: 'fold',
      raw: 'CO fold',
    });
  });

  it('fails before touching the file on a bad table size', async () => {
    await expect(loadHandScript('does-not-exist.hand', 1)).rejects.toMatchObject({
      code: 'InvalidTableSize',
    });
  });
});
