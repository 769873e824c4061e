/**
 * Engine boundary over the native tree-sitter binding.
 */

import type {
  Engine,
  EngineCursor,
  EngineLanguage,
  EngineNode,
  EngineParser,
  EnginePoint,
  EngineTree,
} from '../types.js';
import type {
  NativeBinding,
  NativeFlag,
  NativeLookaheadIteratorConstructor,
  NativeParser,
  NativeSyntaxNode,
  NativeTree,
  NativeTreeCursor,
} from './types.js';

/** Symbol the engine gives to error nodes */
const ERROR_TYPE_ID = 0xffff;

/** Smallest input buffer handed to the binding, in code units */
const MIN_BUFFER_SIZE = 32 * 1024;

type NativeFlagKey = 'isNamed' | 'isMissing' | 'isExtra' | 'isError' | 'hasError';

function readFlag(node: NativeSyntaxNode, key: NativeFlagKey): boolean {
  const flag: NativeFlag | undefined = node[key];
  if (typeof flag === 'function') return flag.call(node);
  return flag ?? false;
}

function readStringTable(value: unknown): Array<string | null> {
  if (!Array.isArray(value)) return [];
  return value.map((entry: unknown) => (typeof entry === 'string' ? entry : null));
}

/** Parse state ids are 16-bit */
const MAX_STATE_ID = 0xffff;

// ============================================
// Engine
// ============================================

export class NativeEngine implements Engine {
  readonly name = 'tree-sitter';

  constructor(readonly binding: NativeBinding) {}

  createParser(): NativeParserAdapter {
    return new NativeParserAdapter(new this.binding.Parser());
  }
}

// ============================================
// Language
// ============================================

export interface LanguageTables {
  /** Names of regular (visible, named) symbols; null for every other id */
  types: Array<string | null>;
  fields: Array<string | null>;
}

/**
 * Grammar descriptor exported by a grammar module.
 *
 * Regular symbol names and field names come from the addon's tables. The
 * addon leaves anonymous and hidden symbols unnamed, so their names are
 * collected from the parse states that list them, on first use. Hidden rules
 * therefore read as anonymous, and a token that no parse state lists keeps
 * an empty name.
 */
export class NativeLanguageAdapter implements EngineLanguage {
  private tables: LanguageTables | null = null;
  private tokens: Array<string | null> | null = null;

  constructor(
    readonly engine: NativeEngine,
    readonly descriptor: object,
    readonly name: string | null,
    /** ABI version, when the grammar module reports one */
    readonly version: number = 0
  ) {}

  get symbolCount(): number {
    return this.loadTables().types.length;
  }

  get fieldCount(): number {
    return Math.max(0, this.loadTables().fields.length - 1);
  }

  symbolName(symbol: number): string | null {
    return this.loadTables().types[symbol] ?? this.tokenNames()[symbol] ?? null;
  }

  symbolIsNamed(symbol: number): boolean {
    return typeof this.loadTables().types[symbol] === 'string';
  }

  symbolForName(name: string, isNamed: boolean): number | null {
    const table = isNamed ? this.loadTables().types : this.tokenNames();
    const index = table.indexOf(name);
    return index === -1 ? null : index;
  }

  fieldNameForId(fieldId: number): string | null {
    return this.loadTables().fields[fieldId] ?? null;
  }

  /**
   * Read the symbol and field tables. The addon rejects descriptors that are
   * not languages, so this runs only after a parser has accepted this one.
   *
   * @internal
   */
  loadTables(): LanguageTables {
    if (!this.tables) {
      const methods = this.engine.binding.languageMethods;
      this.tables = {
        types: readStringTable(methods.getNodeTypeNamesById(this.descriptor)),
        fields: readStringTable(methods.getNodeFieldNamesById(this.descriptor)),
      };
    }
    return this.tables;
  }

  private tokenNames(): Array<string | null> {
    if (!this.tokens) {
      this.tokens = collectTokenNames(
        this.engine.binding.LookaheadIterator,
        this.descriptor,
        this.loadTables().types
      );
    }
    return this.tokens;
  }
}

/**
 * Names of the symbols `types` leaves out, gathered by walking the
 * lookaheads of every parse state.
 */
function collectTokenNames(
  Iterator: NativeLookaheadIteratorConstructor | null,
  descriptor: object,
  types: ReadonlyArray<string | null>
): Array<string | null> {
  const names: Array<string | null> = types.map(() => null);
  if (!Iterator || types.length === 0) return names;

  const iterator = new Iterator(descriptor, 0);
  // resetState fails past the last state
  for (let state = 0; state <= MAX_STATE_ID && iterator.resetState(state); state++) {
    for (const name of iterator) {
      const symbol = iterator.currentTypeId;
      if (symbol < names.length && types[symbol] === null && names[symbol] === null) {
        names[symbol] = name;
      }
    }
  }
  return names;
}

// ============================================
// Parser and tree
// ============================================

export class NativeParserAdapter implements EngineParser {
  private language: NativeLanguageAdapter | null = null;

  constructor(private readonly parser: NativeParser) {}

  setLanguage(language: EngineLanguage): void {
    if (!(language instanceof NativeLanguageAdapter)) {
      throw new TypeError(`A tree-sitter parser cannot use a ${language.engine.name} grammar`);
    }
    this.parser.setLanguage(language.descriptor);
    this.language = language;
  }

  parse(source: string): NativeTreeAdapter {
    if (!this.language) {
      throw new Error('No language set on tree-sitter parser');
    }
    const bufferSize = Math.max(MIN_BUFFER_SIZE, source.length + 1);
    return new NativeTreeAdapter(this.parser.parse(source, null, { bufferSize }), this.language);
  }

  delete(): void {
    this.parser.reset?.();
    this.language = null;
  }
}

export class NativeTreeAdapter implements EngineTree {
  constructor(
    private readonly tree: NativeTree,
    readonly language: NativeLanguageAdapter
  ) {}

  get rootNode(): NativeNodeAdapter {
    return new NativeNodeAdapter(this.tree.rootNode);
  }

  delete(): void {
    this.tree.delete?.();
  }
}

// ============================================
// Node
// ============================================

export class NativeNodeAdapter implements EngineNode {
  constructor(readonly native: NativeSyntaxNode) {}

  get id(): number {
    return this.native.id;
  }

  get typeId(): number {
    return this.native.typeId;
  }

  get type(): string {
    return this.native.type;
  }

  get isNamed(): boolean {
    return readFlag(this.native, 'isNamed');
  }

  get isMissing(): boolean {
    return readFlag(this.native, 'isMissing');
  }

  get isExtra(): boolean {
    return readFlag(this.native, 'isExtra');
  }

  get isError(): boolean {
    return this.native.isError === undefined
      ? this.native.typeId === ERROR_TYPE_ID
      : readFlag(this.native, 'isError');
  }

  get hasError(): boolean {
    return readFlag(this.native, 'hasError');
  }

  get startIndex(): number {
    return this.native.startIndex;
  }

  get endIndex(): number {
    return this.native.endIndex;
  }

  get startPosition(): EnginePoint {
    return this.native.startPosition;
  }

  get endPosition(): EnginePoint {
    return this.native.endPosition;
  }

  get parent(): NativeNodeAdapter | null {
    return wrapNode(this.native.parent);
  }

  get previousSibling(): NativeNodeAdapter | null {
    return wrapNode(this.native.previousSibling);
  }

  get nextSibling(): NativeNodeAdapter | null {
    return wrapNode(this.native.nextSibling);
  }

  get previousNamedSibling(): NativeNodeAdapter | null {
    return wrapNode(this.native.previousNamedSibling);
  }

  get nextNamedSibling(): NativeNodeAdapter | null {
    return wrapNode(this.native.nextNamedSibling);
  }

  get childCount(): number {
    return this.native.childCount;
  }

  get namedChildCount(): number {
    return this.native.namedChildCount;
  }

  child(index: number): NativeNodeAdapter | null {
    return wrapNode(this.native.child(index));
  }

  namedChild(index: number): NativeNodeAdapter | null {
    return wrapNode(this.native.namedChild(index));
  }

  fieldNameForChild(index: number): string | null {
    if (this.native.fieldNameForChild) {
      return this.native.fieldNameForChild(index);
    }
    // Older bindings only expose field names through a cursor
    const cursor = this.native.walk();
    try {
      if (!cursor.gotoFirstChild()) return null;
      for (let i = 0; i < index; i++) {
        if (!cursor.gotoNextSibling()) return null;
      }
      return cursor.currentFieldName ?? null;
    } finally {
      cursor.delete?.();
    }
  }

  childForFieldName(fieldName: string): NativeNodeAdapter | null {
    return wrapNode(this.native.childForFieldName(fieldName));
  }

  toString(): string {
    return this.native.toString();
  }

  walk(): NativeCursorAdapter {
    return new NativeCursorAdapter(this);
  }
}

function wrapNode(node: NativeSyntaxNode | null): NativeNodeAdapter | null {
  return node ? new NativeNodeAdapter(node) : null;
}

// ============================================
// Cursor
// ============================================

/**
 * Cursor over a native tree cursor.
 *
 * The adapter records the child index taken at each level below the origin.
 * That path gives the depth, lets copies and `resetTo` replay a position, and
 * stands in for moves a binding release lacks.
 */
export class NativeCursorAdapter implements EngineCursor {
  private cursor: NativeTreeCursor;
  private path: number[] = [];

  constructor(
    private origin: NativeNodeAdapter,
    path: readonly number[] = []
  ) {
    this.cursor = origin.native.walk();
    this.replay(path);
  }

  get currentNode(): NativeNodeAdapter {
    return new NativeNodeAdapter(this.cursor.currentNode);
  }

  get currentDepth(): number {
    return this.path.length;
  }

  get currentFieldName(): string | null {
    if (this.path.length === 0) return null;
    return this.cursor.currentFieldName ?? null;
  }

  gotoParent(): boolean {
    if (this.path.length === 0 || !this.cursor.gotoParent()) return false;
    this.path.pop();
    return true;
  }

  gotoFirstChild(): boolean {
    if (!this.cursor.gotoFirstChild()) return false;
    this.path.push(0);
    return true;
  }

  gotoLastChild(): boolean {
    const count = this.cursor.currentNode.childCount;
    if (count === 0) return false;
    if (this.cursor.gotoLastChild) {
      if (!this.cursor.gotoLastChild()) return false;
    } else {
      this.cursor.gotoFirstChild();
      while (this.cursor.gotoNextSibling()) {
        // advance to the last sibling
      }
    }
    this.path.push(count - 1);
    return true;
  }

  gotoNextSibling(): boolean {
    if (this.path.length === 0 || !this.cursor.gotoNextSibling()) return false;
    this.path[this.path.length - 1]++;
    return true;
  }

  gotoPreviousSibling(): boolean {
    const last = this.path.length - 1;
    if (last < 0 || this.path[last] === 0) return false;
    const target = this.path[last] - 1;
    if (this.cursor.gotoPreviousSibling) {
      if (!this.cursor.gotoPreviousSibling()) return false;
    } else {
      this.cursor.gotoParent();
      this.cursor.gotoFirstChild();
      for (let i = 0; i < target; i++) this.cursor.gotoNextSibling();
    }
    this.path[last] = target;
    return true;
  }

  reset(node: EngineNode): void {
    if (!(node instanceof NativeNodeAdapter)) {
      throw new TypeError('Cannot reset a tree-sitter cursor to a node from another engine');
    }
    // A fresh native cursor also rebinds to the node's tree
    this.cursor.delete?.();
    this.cursor = node.native.walk();
    this.origin = node;
    this.path = [];
  }

  resetTo(cursor: EngineCursor): void {
    if (!(cursor instanceof NativeCursorAdapter)) {
      throw new TypeError('Cannot reset a tree-sitter cursor to a cursor from another engine');
    }
    const path = [...cursor.path];
    this.reset(cursor.origin);
    this.replay(path);
  }

  copy(): NativeCursorAdapter {
    return new NativeCursorAdapter(this.origin, this.path);
  }

  delete(): void {
    this.cursor.delete?.();
  }

  private replay(path: readonly number[]): void {
    for (const index of path) {
      this.cursor.gotoFirstChild();
      for (let i = 0; i < index; i++) this.cursor.gotoNextSibling();
      this.path.push(index);
    }
  }
}
