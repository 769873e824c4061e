/**
 * Error types for misuse of tree handles and engine loading failures.
 *
 * Structural absence (no parent, no such child) and parse errors in the
 * source are not errors here: they surface as null nodes, `false` returns and
 * error/missing nodes inside the tree.
 */

export type BoughErrorCode =
  | 'INVALID_SYMBOL'
  | 'NULL_NODE'
  | 'TREE_DELETED'
  | 'CURSOR_RELEASED'
  | 'PARSER_DELETED'
  | 'ENGINE_UNAVAILABLE'
  | 'GRAMMAR_LOAD';

export class BoughError extends Error {
  constructor(
    message: string,
    public readonly code: BoughErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BoughError';
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

export class InvalidSymbolError extends BoughError {
  constructor(
    public readonly symbol: number,
    public readonly symbolCount: number
  ) {
    super(`Symbol ${symbol} is out of range (grammar defines ${symbolCount} symbols)`, 'INVALID_SYMBOL');
    this.name = 'InvalidSymbolError';
  }
}

export class NullNodeError extends BoughError {
  constructor(public readonly operation: string) {
    super(`Cannot call ${operation} on a null node`, 'NULL_NODE');
    this.name = 'NullNodeError';
  }
}

export class TreeDeletedError extends BoughError {
  constructor(operation: string) {
    super(`Cannot call ${operation}: the owning tree has been deleted`, 'TREE_DELETED');
    this.name = 'TreeDeletedError';
  }
}

export class CursorReleasedError extends BoughError {
  constructor(operation: string) {
    super(`Cannot call ${operation}: the cursor has been released`, 'CURSOR_RELEASED');
    this.name = 'CursorReleasedError';
  }
}

export class ParserDeletedError extends BoughError {
  constructor(operation: string) {
    super(`Cannot call ${operation}: the parser has been deleted`, 'PARSER_DELETED');
    this.name = 'ParserDeletedError';
  }
}

export class EngineUnavailableError extends BoughError {
  constructor(engine: string, reason: string, options?: { cause?: unknown }) {
    super(`${engine} engine is not available: ${reason}`, 'ENGINE_UNAVAILABLE', options);
    this.name = 'EngineUnavailableError';
  }
}

export class GrammarLoadError extends BoughError {
  constructor(
    public readonly grammar: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load grammar '${grammar}': ${reason}`, 'GRAMMAR_LOAD', options);
    this.name = 'GrammarLoadError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown error';
}
