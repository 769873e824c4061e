import type { EngineCursor } from '../engine/types.js';
import { CursorReleasedError } from './errors.js';
import { Node } from './node.js';
import type { Tree } from './tree.js';

/**
 * Stateful walk over one tree.
 *
 * A cursor keeps the engine's ancestor stack, so long descents and climbs
 * cost less than chains of `getParent()`/`getChild()`. It owns that stack:
 * call `delete()` when done. Copying is explicit, through `copy()` or
 * `new Cursor(otherCursor)`.
 *
 * Moves return `false` and leave the cursor where it was when there is no
 * such relative. The node the cursor was created at (or last reset to) is its
 * origin; `gotoParent()` never climbs above it.
 */
export class Cursor {
  private raw: EngineCursor | null;
  private tree: Tree;

  constructor(source: Node | Cursor) {
    if (source instanceof Node) {
      this.raw = source.unwrap('getCursor').walk();
      this.tree = source.getTree();
    } else {
      this.raw = source.live('Cursor.copy').copy();
      this.tree = source.tree;
    }
  }

  /**
   * Deep copy of position, origin and ancestor stack.
   */
  copy(): Cursor {
    return new Cursor(this);
  }

  /**
   * Move to `target`. A node becomes the new origin; a cursor is matched
   * exactly, origin and depth included. Either may belong to another tree,
   * which rebinds this cursor to it.
   */
  reset(target: Node | Cursor): void {
    const raw = this.live('Cursor.reset');
    if (target instanceof Node) {
      raw.reset(target.unwrap('Cursor.reset'));
      this.tree = target.getTree();
    } else {
      raw.resetTo(target.live('Cursor.reset'));
      this.tree = target.tree;
    }
  }

  getCurrentNode(): Node {
    return new Node(this.tree, this.live('Cursor.getCurrentNode').currentNode);
  }

  /**
   * Field the current node fills in its parent, or an empty string.
   */
  getCurrentFieldName(): string {
    return this.live('Cursor.getCurrentFieldName').currentFieldName ?? '';
  }

  gotoParent(): boolean {
    return this.live('Cursor.gotoParent').gotoParent();
  }

  gotoFirstChild(): boolean {
    return this.live('Cursor.gotoFirstChild').gotoFirstChild();
  }

  gotoLastChild(): boolean {
    return this.live('Cursor.gotoLastChild').gotoLastChild();
  }

  gotoNextSibling(): boolean {
    return this.live('Cursor.gotoNextSibling').gotoNextSibling();
  }

  gotoPreviousSibling(): boolean {
    return this.live('Cursor.gotoPreviousSibling').gotoPreviousSibling();
  }

  /**
   * Edges between the current node and the origin.
   */
  getDepthFromOrigin(): number {
    return this.live('Cursor.getDepthFromOrigin').currentDepth;
  }

  getTree(): Tree {
    return this.tree;
  }

  /**
   * Release the engine traversal state. Safe to call more than once.
   */
  delete(): void {
    if (!this.raw) return;
    this.raw.delete();
    this.raw = null;
  }

  isReleased(): boolean {
    return this.raw === null;
  }

  private live(operation: string): EngineCursor {
    if (!this.raw) {
      throw new CursorReleasedError(operation);
    }
    this.tree.ensureAlive(operation);
    return this.raw;
  }
}
