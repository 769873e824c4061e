import { describe, it, expect } from 'vitest';
import { Language, NO_SYMBOL, ERROR_SYMBOL } from './language.js';
import { InvalidSymbolError } from './errors.js';
import { ARITHMETIC_VERSION, SYM, arithmeticLanguage } from '../testing/arithmetic-engine.js';

describe('Language', () => {
  const language = Language.fromEngine(arithmeticLanguage);

  it('should wrap a descriptor only once', () => {
    expect(Language.fromEngine(arithmeticLanguage)).toBe(language);
    expect(language.equals(Language.fromEngine(arithmeticLanguage))).toBe(true);
  });

  it('should report grammar name and version', () => {
    expect(language.getName()).toBe('arithmetic');
    expect(language.getVersion()).toBe(ARITHMETIC_VERSION);
  });

  it('should count named and anonymous symbols', () => {
    expect(language.getNumSymbols()).toBe(12);
  });

  describe('getSymbolName', () => {
    it('should name rules and tokens', () => {
      expect(language.getSymbolName(SYM.binaryExpression)).toBe('binary_expression');
      expect(language.getSymbolName(SYM.plus)).toBe('+');
      expect(language.getSymbolName(SYM.end)).toBe('end');
    });

    it('should name the error symbol', () => {
      expect(language.getSymbolName(ERROR_SYMBOL)).toBe('ERROR');
    });

    it('should throw InvalidSymbolError past the symbol table', () => {
      expect(() => language.getSymbolName(12)).toThrow(InvalidSymbolError);
      expect(() => language.getSymbolName(-1)).toThrow(InvalidSymbolError);
      expect(() => language.getSymbolName(1.5)).toThrow(InvalidSymbolError);
    });

    it('should carry the offending symbol on the error', () => {
      try {
        language.getSymbolName(40);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidSymbolError);
        expect(error).toMatchObject({ symbol: 40, symbolCount: 12, code: 'INVALID_SYMBOL' });
      }
    });
  });

  describe('getSymbolForName', () => {
    it('should find named rules', () => {
      expect(language.getSymbolForName('binary_expression', true)).toBe(SYM.binaryExpression);
      expect(language.getSymbolForName('number', true)).toBe(SYM.number);
    });

    it('should find anonymous tokens only when not asking for named', () => {
      expect(language.getSymbolForName('+', false)).toBe(SYM.plus);
      expect(language.getSymbolForName('+', true)).toBe(NO_SYMBOL);
      expect(language.getSymbolForName('number', false)).toBe(NO_SYMBOL);
    });

    it('should return the sentinel for unknown names', () => {
      expect(language.getSymbolForName('nonexistent_rule_xyz', true)).toBe(NO_SYMBOL);
      expect(NO_SYMBOL).toBe(-1);
    });

    it('should invert getSymbolName', () => {
      for (let symbol = 0; symbol < language.getNumSymbols(); symbol++) {
        const name = language.getSymbolName(symbol);
        expect(language.getSymbolForName(name, language.isSymbolNamed(symbol))).toBe(symbol);
      }
    });
  });

  it('should tell named symbols apart', () => {
    expect(language.isSymbolNamed(SYM.program)).toBe(true);
    expect(language.isSymbolNamed(SYM.lparen)).toBe(false);
    expect(language.isSymbolNamed(ERROR_SYMBOL)).toBe(true);
    expect(() => language.isSymbolNamed(99)).toThrow(InvalidSymbolError);
  });

  it('should expose field names', () => {
    expect(language.getNumFields()).toBe(3);
    expect(language.getFieldNameForId(1)).toBe('left');
    expect(language.getFieldNameForId(3)).toBe('right');
    expect(language.getFieldNameForId(0)).toBe('');
    expect(language.getFieldNameForId(7)).toBe('');
  });

  it('should answer repeated queries identically', () => {
    expect(language.getSymbolName(SYM.number)).toBe(language.getSymbolName(SYM.number));
    expect(language.getSymbolForName('comment', true)).toBe(
      language.getSymbolForName('comment', true)
    );
  });
});
