import { HandScriptError } from '~/lib/errors';

/**
 * Run `fn` and return the HandScriptError it throws
 */
export function catchScriptError(fn: () => unknown): HandScriptError {
  try {
    fn();
  } catch (error) {
    if (error instanceof HandScriptError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a HandScriptError to be thrown');
}
