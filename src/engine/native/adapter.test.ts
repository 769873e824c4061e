import { describe, it, expect } from 'vitest';
import { NativeEngine, NativeLanguageAdapter } from './adapter.js';
import type {
  NativeBinding,
  NativeLookaheadIterator,
  NativeParser,
  NativeTree,
} from './types.js';
import { Language } from '../../core/language.js';
import { arithmeticLanguage } from '../../testing/arithmetic-engine.js';

const descriptor = { name: 'sums' };

// Addon tables name regular symbols only
const TYPES = [null, 'number', null, 'binary_expression', null];
const FIELDS = [null, 'left', 'right'];

// Lookaheads per parse state: [symbol id, symbol name]
const STATES: ReadonlyArray<ReadonlyArray<[number, string]>> = [
  [[1, 'number']],
  [
    [2, '+'],
    [0, 'end'],
  ],
  [
    [3, 'binary_expression'],
    [4, '_expression'],
  ],
];

class FakeLookahead implements NativeLookaheadIterator {
  currentTypeId = 0;
  private entries: ReadonlyArray<[number, string]> = [];

  constructor(_language: object, stateId: number) {
    if (!this.resetState(stateId)) throw new Error('Invalid state argument');
  }

  resetState(stateId: number): boolean {
    const entries = STATES[stateId];
    if (!entries) return false;
    this.entries = entries;
    return true;
  }

  *[Symbol.iterator](): Generator<string, void, undefined> {
    for (const [id, name] of this.entries) {
      this.currentTypeId = id;
      yield name;
    }
  }
}

class FakeParser implements NativeParser {
  setLanguage(language: object): void {
    if (language !== descriptor) throw new TypeError('Invalid language object');
  }

  parse(): NativeTree {
    throw new Error('not used here');
  }
}

function createBinding(withLookahead: boolean): NativeBinding {
  return {
    Parser: FakeParser,
    LookaheadIterator: withLookahead ? FakeLookahead : null,
    languageMethods: {
      getNodeTypeNamesById: language => (language === descriptor ? TYPES : undefined),
      getNodeFieldNamesById: language => (language === descriptor ? FIELDS : undefined),
    },
  };
}

describe('NativeLanguageAdapter', () => {
  const engine = new NativeEngine(createBinding(true));
  const adapter = new NativeLanguageAdapter(engine, descriptor, 'sums', 14);

  it('should size its tables from the addon', () => {
    expect(adapter.symbolCount).toBe(5);
    expect(adapter.fieldCount).toBe(2);
    expect(adapter.version).toBe(14);
  });

  it('should name regular symbols from the addon table', () => {
    expect(adapter.symbolName(1)).toBe('number');
    expect(adapter.symbolIsNamed(1)).toBe(true);
    expect(adapter.symbolForName('binary_expression', true)).toBe(3);
  });

  it('should name the remaining symbols from parse state lookaheads', () => {
    expect(adapter.symbolName(0)).toBe('end');
    expect(adapter.symbolName(2)).toBe('+');
    expect(adapter.symbolName(4)).toBe('_expression');
    expect(adapter.symbolIsNamed(2)).toBe(false);
  });

  it('should keep named and literal lookups apart', () => {
    expect(adapter.symbolForName('+', false)).toBe(2);
    expect(adapter.symbolForName('+', true)).toBeNull();
    expect(adapter.symbolForName('number', false)).toBeNull();
    expect(adapter.symbolForName('-', false)).toBeNull();
  });

  it('should resolve field ids', () => {
    expect(adapter.fieldNameForId(1)).toBe('left');
    expect(adapter.fieldNameForId(2)).toBe('right');
    expect(adapter.fieldNameForId(0)).toBeNull();
  });

  it('should serve the Language wrapper', () => {
    const language = Language.fromEngine(adapter);
    expect(language.getNumSymbols()).toBe(5);
    expect(language.getSymbolName(2)).toBe('+');
    expect(language.getSymbolForName('+', false)).toBe(2);
    expect(language.getVersion()).toBe(14);
  });

  it('should leave tokens unnamed without a lookahead iterator', () => {
    const bare = new NativeLanguageAdapter(new NativeEngine(createBinding(false)), descriptor, 'sums');

    expect(bare.symbolName(2)).toBeNull();
    expect(bare.symbolName(1)).toBe('number');
    expect(bare.version).toBe(0);
    expect(Language.fromEngine(bare).getSymbolName(2)).toBe('');
  });
});

describe('NativeParserAdapter', () => {
  const engine = new NativeEngine(createBinding(true));

  it('should accept its own languages', () => {
    const parser = engine.createParser();
    expect(() =>
      parser.setLanguage(new NativeLanguageAdapter(engine, descriptor, 'sums'))
    ).not.toThrow();
  });

  it('should refuse grammars of another engine', () => {
    expect(() => engine.createParser().setLanguage(arithmeticLanguage)).toThrow(
      'A tree-sitter parser cannot use a arithmetic grammar'
    );
  });

  it('should refuse to parse before a language is set', () => {
    expect(() => engine.createParser().parse('1')).toThrow('No language set on tree-sitter parser');
  });
});
