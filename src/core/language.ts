import type { EngineLanguage } from '../engine/types.js';
import { InvalidSymbolError } from './errors.js';

/** Numeric grammar symbol id */
export type SymbolId = number;

/** Returned by {@link Language.getSymbolForName} when nothing matches */
export const NO_SYMBOL = -1;

/** Symbol the engine assigns to synthetic error nodes */
export const ERROR_SYMBOL = 0xffff;

const wrappers = new WeakMap<EngineLanguage, Language>();

/**
 * Reference to a grammar descriptor.
 *
 * Descriptors are static for the life of the process, so a Language is never
 * released. There is one wrapper per descriptor: `Language.fromEngine` on the
 * same descriptor returns the same object.
 */
export class Language {
  private constructor(private readonly raw: EngineLanguage) {}

  /**
   * Wrap an engine grammar descriptor. This is the one place a raw
   * descriptor enters the handle layer.
   */
  static fromEngine(raw: EngineLanguage): Language {
    let language = wrappers.get(raw);
    if (!language) {
      language = new Language(raw);
      wrappers.set(raw, language);
    }
    return language;
  }

  /** @internal */
  get engineLanguage(): EngineLanguage {
    return this.raw;
  }

  getName(): string {
    return this.raw.name ?? '';
  }

  /**
   * Number of distinct symbol ids, named and anonymous.
   */
  getNumSymbols(): number {
    return this.raw.symbolCount;
  }

  /**
   * Grammar-defined name of a symbol.
   *
   * @throws InvalidSymbolError when the id is outside the symbol table
   */
  getSymbolName(symbol: SymbolId): string {
    this.assertSymbol(symbol);
    if (symbol === ERROR_SYMBOL) return 'ERROR';
    return this.raw.symbolName(symbol) ?? '';
  }

  /**
   * Inverse of {@link getSymbolName}. `isNamed` selects rule names over
   * literal tokens with the same spelling. A miss returns {@link NO_SYMBOL}.
   */
  getSymbolForName(name: string, isNamed: boolean): SymbolId {
    return this.raw.symbolForName(name, isNamed) ?? NO_SYMBOL;
  }

  isSymbolNamed(symbol: SymbolId): boolean {
    this.assertSymbol(symbol);
    return symbol === ERROR_SYMBOL || this.raw.symbolIsNamed(symbol);
  }

  /**
   * ABI version of the compiled grammar, 0 when the engine does not report it.
   */
  getVersion(): number {
    return this.raw.version;
  }

  getNumFields(): number {
    return this.raw.fieldCount;
  }

  /**
   * Field name for a field id; empty for ids that name no field.
   */
  getFieldNameForId(fieldId: number): string {
    return this.raw.fieldNameForId(fieldId) ?? '';
  }

  equals(other: Language): boolean {
    return this.raw === other.raw;
  }

  private assertSymbol(symbol: SymbolId): void {
    if (symbol === ERROR_SYMBOL) return;
    if (!Number.isInteger(symbol) || symbol < 0 || symbol >= this.raw.symbolCount) {
      throw new InvalidSymbolError(symbol, this.raw.symbolCount);
    }
  }
}
