import type { Node } from './node.js';

/**
 * Direct children of a node as an iterable.
 *
 * Every `for...of` starts over at the first child on a fresh cursor, which
 * is released when the loop finishes or breaks.
 */
export class ChildRange implements Iterable<Node> {
  constructor(private readonly parent: Node) {}

  *[Symbol.iterator](): Generator<Node, void, undefined> {
    if (this.parent.isNull()) return;
    const cursor = this.parent.getCursor();
    try {
      if (!cursor.gotoFirstChild()) return;
      do {
        yield cursor.getCurrentNode();
      } while (cursor.gotoNextSibling());
    } finally {
      cursor.delete();
    }
  }

  toArray(): Node[] {
    return [...this];
  }
}

export function children(node: Node): ChildRange {
  return new ChildRange(node);
}

export function* namedChildren(node: Node): Generator<Node, void, undefined> {
  for (const child of new ChildRange(node)) {
    if (child.isNamed()) yield child;
  }
}
