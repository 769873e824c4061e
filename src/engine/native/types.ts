/**
 * TypeScript type definitions for the native tree-sitter binding objects.
 *
 * Only what the adapter touches is declared. Binding releases differ in
 * whether node flags are getters or methods, and in which cursor moves they
 * provide, so those members are typed loosely and bridged in the adapter.
 */

export interface NativePoint {
  row: number;
  column: number;
}

/** Getter on newer bindings, method on older ones */
export type NativeFlag = boolean | (() => boolean);

export interface NativeSyntaxNode {
  id: number;
  typeId: number;
  type: string;
  isNamed: NativeFlag;
  isMissing: NativeFlag;
  isExtra?: NativeFlag;
  isError?: NativeFlag;
  hasError: NativeFlag;
  startIndex: number;
  endIndex: number;
  startPosition: NativePoint;
  endPosition: NativePoint;
  parent: NativeSyntaxNode | null;
  previousSibling: NativeSyntaxNode | null;
  nextSibling: NativeSyntaxNode | null;
  previousNamedSibling: NativeSyntaxNode | null;
  nextNamedSibling: NativeSyntaxNode | null;
  childCount: number;
  namedChildCount: number;
  child(index: number): NativeSyntaxNode | null;
  namedChild(index: number): NativeSyntaxNode | null;
  childForFieldName(fieldName: string): NativeSyntaxNode | null;
  fieldNameForChild?(index: number): string | null;
  toString(): string;
  walk(): NativeTreeCursor;
}

export interface NativeTreeCursor {
  readonly currentNode: NativeSyntaxNode;
  readonly currentFieldName?: string | null;
  gotoParent(): boolean;
  gotoFirstChild(): boolean;
  gotoNextSibling(): boolean;
  gotoLastChild?(): boolean;
  gotoPreviousSibling?(): boolean;
  delete?(): void;
}

export interface NativeTree {
  readonly rootNode: NativeSyntaxNode;
  delete?(): void;
}

export interface NativeParseOptions {
  bufferSize?: number;
}

export interface NativeParser {
  setLanguage(language: object): void;
  parse(input: string, oldTree?: NativeTree | null, options?: NativeParseOptions): NativeTree;
  reset?(): void;
}

export type NativeParserConstructor = new () => NativeParser;

/** Valid lookaheads of one parse state, from the binding's LookaheadIterator */
export interface NativeLookaheadIterator extends Iterable<string> {
  readonly currentTypeId: number;
  resetState(stateId: number): boolean;
}

export type NativeLookaheadIteratorConstructor = new (
  language: object,
  stateId: number
) => NativeLookaheadIterator;

/**
 * Table functions of the compiled addon. The binding's JS entry calls them
 * while building node classes but does not re-export them.
 */
export interface NativeLanguageMethods {
  getNodeTypeNamesById(language: object): unknown;
  getNodeFieldNamesById(language: object): unknown;
}

export interface NativeBinding {
  Parser: NativeParserConstructor;
  LookaheadIterator: NativeLookaheadIteratorConstructor | null;
  languageMethods: NativeLanguageMethods;
}
