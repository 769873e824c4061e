/**
 * Engine boundary: the interfaces the handle layer consumes.
 *
 * An engine hands out raw handles with no ownership semantics of their own.
 * Wrappers in `src/core` add lifetimes, null-node sentinels and iteration on
 * top of these; every semantic query still goes through the engine.
 */

export interface EnginePoint {
  row: number;
  column: number;
}

export interface Engine {
  readonly name: string;
  createParser(): EngineParser;
}

/**
 * Grammar descriptor. Static for the life of the process; never released.
 */
export interface EngineLanguage {
  readonly engine: Engine;
  readonly name: string | null;
  /** ABI version, 0 when the engine does not report one */
  readonly version: number;
  readonly symbolCount: number;
  readonly fieldCount: number;
  symbolName(symbol: number): string | null;
  symbolIsNamed(symbol: number): boolean;
  symbolForName(name: string, isNamed: boolean): number | null;
  fieldNameForId(fieldId: number): string | null;
}

export interface EngineNode {
  readonly id: number;
  readonly typeId: number;
  readonly type: string;
  readonly isNamed: boolean;
  readonly isMissing: boolean;
  readonly isExtra: boolean;
  readonly isError: boolean;
  readonly hasError: boolean;
  readonly startIndex: number;
  readonly endIndex: number;
  readonly startPosition: EnginePoint;
  readonly endPosition: EnginePoint;
  readonly parent: EngineNode | null;
  readonly previousSibling: EngineNode | null;
  readonly nextSibling: EngineNode | null;
  readonly previousNamedSibling: EngineNode | null;
  readonly nextNamedSibling: EngineNode | null;
  readonly childCount: number;
  readonly namedChildCount: number;
  child(index: number): EngineNode | null;
  namedChild(index: number): EngineNode | null;
  fieldNameForChild(index: number): string | null;
  childForFieldName(fieldName: string): EngineNode | null;
  toString(): string;
  walk(): EngineCursor;
}

/**
 * Traversal state with an ancestor stack. Depth is measured from the node the
 * cursor was created at or last reset to; moving above that node fails.
 */
export interface EngineCursor {
  readonly currentNode: EngineNode;
  readonly currentDepth: number;
  readonly currentFieldName: string | null;
  gotoParent(): boolean;
  gotoFirstChild(): boolean;
  gotoLastChild(): boolean;
  gotoNextSibling(): boolean;
  gotoPreviousSibling(): boolean;
  reset(node: EngineNode): void;
  resetTo(cursor: EngineCursor): void;
  copy(): EngineCursor;
  delete(): void;
}

export interface EngineTree {
  readonly rootNode: EngineNode;
  readonly language: EngineLanguage;
  delete(): void;
}

export interface EngineParser {
  setLanguage(language: EngineLanguage): void;
  parse(source: string): EngineTree;
  delete(): void;
}
