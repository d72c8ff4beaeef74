export type HandScriptErrorCode =
  | 'InvalidTableSize'
  | 'UnknownSeat'
  | 'SeatNotAtTable'
  | 'InvalidCardToken'
  | 'MalformedHand'
  | 'MalformedStreet'
  | 'UnknownVerb'
  | 'InvalidAmount'
  | 'MalformedMove';

export class HandScriptError extends Error {
  constructor(
    public readonly code: HandScriptErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'HandScriptError';
  }
}

/**
 * A builder failure annotated with where it happened in the script.
 * `code` is copied from the wrapped error, which is kept as `cause`.
 */
export class ScriptLineError extends HandScriptError {
  constructor(
    public readonly lineNumber: number,
    public readonly line: string,
    inner: HandScriptError
  ) {
    super(inner.code, `[line ${lineNumber}] ${inner.message}: ${line.trim()}`, { cause: inner });
    this.name = 'ScriptLineError';
  }
}

export function isHandScriptError(value: unknown): value is HandScriptError {
  return value instanceof HandScriptError;
}
