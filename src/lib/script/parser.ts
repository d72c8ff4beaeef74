/**
 * Hand script parser
 *
 * Turns the lines of a hand script into a ParsedHand. A script is all or
 * nothing: the first bad line aborts the parse with a ScriptLineError.
 */

import { readFile } from 'node:fs/promises';
import type { ParsedHand } from '~/types/poker';
import { config } from '../config';
import { ScriptLineError, isHandScriptError } from '../errors';
import { assertTableSize } from '../seats/seatTable';
import { HandBuilder, tokenizeLine } from './handBuilder';

function isRetained(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length > 0 && !trimmed.startsWith('#');
}

export function parseHandScript(lines: Iterable<string>, tableSize: number): ParsedHand {
  assertTableSize(tableSize);

  const builder = new HandBuilder(tableSize);
  let lineNumber = 0;
  for (const text of lines) {
    lineNumber++;
    if (!isRetained(text)) {
      continue;
    }
    try {
      builder.applyLine({ lineNumber, text, tokens: tokenizeLine(text) });
    } catch (error) {
      if (isHandScriptError(error)) {
        throw new ScriptLineError(lineNumber, text, error);
      }
      throw error;
    }
  }

  if (config.debug) {
    console.debug(
      `[HandScript] Parsed ${lineNumber} lines into ${builder.actionCount} actions (${tableSize}-handed)`
    );
  }
  return builder.build();
}

export function parseHandScriptText(text: string, tableSize: number): ParsedHand {
  return parseHandScript(text.split(/\r?\n/), tableSize);
}

/**
 * Read a UTF-8 script file and parse it
 */
export async function loadHandScript(
  path: string,
  tableSize: number = config.defaultTableSize
): Promise<ParsedHand> {
  assertTableSize(tableSize);
  const text = await readFile(path, 'utf-8');
  if (config.debug) {
    console.debug(`[HandScript] Loaded ${path} (${text.length} chars)`);
  }
  return parseHandScriptText(text, tableSize);
}
