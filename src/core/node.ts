import type { EngineNode } from '../engine/types.js';
import { ChildRange, namedChildren } from './children.js';
import { Cursor } from './cursor.js';
import { NullNodeError } from './errors.js';
import { extent, type ByteRange, type PointRange } from './extent.js';
import type { Language, SymbolId } from './language.js';
import type { Tree } from './tree.js';

/**
 * Borrowed view of one position in a tree.
 *
 * A Node is a light value: copying it is free, it never extends the life of
 * its Tree, and it becomes unusable once the Tree is deleted. Navigation that
 * finds no relative returns a null node (`isNull()` is true) instead of
 * throwing. Reading an attribute of a null node throws {@link NullNodeError}.
 */
export class Node {
  /** @internal */
  constructor(
    private readonly tree: Tree,
    private readonly raw: EngineNode | null
  ) {}

  // ---------------------------------------------------------------------------
  // Flags
  // ---------------------------------------------------------------------------

  isNull(): boolean {
    return this.live('isNull') === null;
  }

  isNamed(): boolean {
    return this.live('isNamed')?.isNamed ?? false;
  }

  /**
   * Inserted by error recovery; has no text in the source.
   */
  isMissing(): boolean {
    return this.live('isMissing')?.isMissing ?? false;
  }

  /**
   * Allowed anywhere by the grammar (comments and the like).
   */
  isExtra(): boolean {
    return this.live('isExtra')?.isExtra ?? false;
  }

  /**
   * True when this node or any descendant is an error or missing node.
   */
  hasError(): boolean {
    return this.live('hasError')?.hasError ?? false;
  }

  isError(): boolean {
    return this.live('isError')?.isError ?? false;
  }

  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------

  getParent(): Node {
    return this.wrap(this.live('getParent')?.parent ?? null);
  }

  getPreviousSibling(): Node {
    return this.wrap(this.live('getPreviousSibling')?.previousSibling ?? null);
  }

  getNextSibling(): Node {
    return this.wrap(this.live('getNextSibling')?.nextSibling ?? null);
  }

  getPreviousNamedSibling(): Node {
    return this.wrap(this.live('getPreviousNamedSibling')?.previousNamedSibling ?? null);
  }

  getNextNamedSibling(): Node {
    return this.wrap(this.live('getNextNamedSibling')?.nextNamedSibling ?? null);
  }

  getNumChildren(): number {
    return this.live('getNumChildren')?.childCount ?? 0;
  }

  /**
   * Child at `position` counting anonymous tokens. Past the last child the
   * result is a null node.
   */
  getChild(position: number): Node {
    assertIndex(position);
    const raw = this.live('getChild');
    if (!raw || position >= raw.childCount) return this.wrap(null);
    return this.wrap(raw.child(position));
  }

  getNumNamedChildren(): number {
    return this.live('getNumNamedChildren')?.namedChildCount ?? 0;
  }

  /**
   * Named child at `position`. Indices here do not line up with
   * {@link getChild} indices.
   */
  getNamedChild(position: number): Node {
    assertIndex(position);
    const raw = this.live('getNamedChild');
    if (!raw || position >= raw.namedChildCount) return this.wrap(null);
    return this.wrap(raw.namedChild(position));
  }

  /**
   * Field name of the child at `position` in all-children indexing, or an
   * empty string when that child fills no field.
   */
  getFieldNameForChild(position: number): string {
    assertIndex(position);
    const raw = this.live('getFieldNameForChild');
    if (!raw || position >= raw.childCount) return '';
    return raw.fieldNameForChild(position) ?? '';
  }

  getChildByFieldName(name: string): Node {
    return this.wrap(this.live('getChildByFieldName')?.childForFieldName(name) ?? null);
  }

  /**
   * New cursor positioned here. The caller owns it and must `delete()` it.
   */
  getCursor(): Cursor {
    return new Cursor(this);
  }

  /**
   * Lazy sequence of direct children, all kinds included.
   */
  children(): ChildRange {
    return new ChildRange(this);
  }

  namedChildren(): Iterable<Node> {
    return { [Symbol.iterator]: () => namedChildren(this) };
  }

  // ---------------------------------------------------------------------------
  // Attributes
  // ---------------------------------------------------------------------------

  /**
   * Identity of the tree position. Equal for two nodes iff they denote the
   * same position of the same live tree.
   */
  getID(): number {
    return this.present('getID').id;
  }

  /**
   * Parenthesized dump of the subtree, for debugging. The format belongs to
   * the engine.
   */
  getSExpr(): string {
    return this.present('getSExpr').toString();
  }

  getSymbol(): SymbolId {
    return this.present('getSymbol').typeId;
  }

  getType(): string {
    return this.present('getType').type;
  }

  getLanguage(): Language {
    this.present('getLanguage');
    return this.tree.getLanguage();
  }

  getTree(): Tree {
    return this.tree;
  }

  /**
   * Start and end in UTF-16 code units of the parsed string.
   */
  getByteRange(): ByteRange {
    const raw = this.present('getByteRange');
    return extent(raw.startIndex, raw.endIndex);
  }

  getPointRange(): PointRange {
    const raw = this.present('getPointRange');
    return extent(
      { row: raw.startPosition.row, column: raw.startPosition.column },
      { row: raw.endPosition.row, column: raw.endPosition.column }
    );
  }

  /**
   * Text of this node in `source`, which must be the string that was parsed.
   * Nothing checks that it is.
   */
  getSourceRange(source: string): string {
    const { start, end } = this.getByteRange();
    return source.slice(start, end);
  }

  equals(other: Node): boolean {
    const mine = this.live('equals');
    const theirs = other.live('equals');
    if (mine === null || theirs === null) return mine === theirs;
    return this.tree === other.tree && mine.id === theirs.id;
  }

  toString(): string {
    return this.live('toString')?.toString() ?? '(null)';
  }

  /** @internal */
  unwrap(operation: string): EngineNode {
    return this.present(operation);
  }

  private live(operation: string): EngineNode | null {
    this.tree.ensureAlive(`Node.${operation}`);
    return this.raw;
  }

  private present(operation: string): EngineNode {
    const raw = this.live(operation);
    if (!raw) {
      throw new NullNodeError(`Node.${operation}`);
    }
    return raw;
  }

  private wrap(raw: EngineNode | null): Node {
    return new Node(this.tree, raw);
  }
}

function assertIndex(position: number): void {
  if (!Number.isInteger(position) || position < 0) {
    throw new RangeError(`Child index must be a non-negative integer, got ${position}`);
  }
}
