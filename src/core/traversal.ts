/**
 * Tree walks built on a single cursor.
 */

import type { Node } from './node.js';

export interface DescendantOptions {
  /** Deepest level to visit, in edges below the start node */
  maxDepth?: number;
}

/**
 * Pre-order walk over `root` and its descendants. Siblings of `root` are not
 * visited. Breaking out of the loop releases the cursor.
 */
export function* descendants(
  root: Node,
  options: DescendantOptions = {}
): Generator<Node, void, undefined> {
  if (root.isNull()) return;
  const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
  const cursor = root.getCursor();

  try {
    for (;;) {
      yield cursor.getCurrentNode();

      if (cursor.getDepthFromOrigin() < maxDepth && cursor.gotoFirstChild()) {
        continue;
      }

      // Climb until a sibling is found or we are back at the start
      for (;;) {
        if (cursor.getDepthFromOrigin() === 0) return;
        if (cursor.gotoNextSibling()) break;
        cursor.gotoParent();
      }
    }
  } finally {
    cursor.delete();
  }
}

/**
 * Walk a tree and find all nodes matching any of the given types, in
 * document order.
 */
export function findNodesByTypes(root: Node, types: readonly string[]): Node[] {
  const typeSet = new Set(types);
  const results: Node[] = [];

  for (const node of descendants(root)) {
    if (typeSet.has(node.getType())) {
      results.push(node);
    }
  }

  return results;
}

/**
 * Walk a tree and find all nodes of a given type.
 */
export function findNodes(root: Node, type: string): Node[] {
  return findNodesByTypes(root, [type]);
}

/**
 * First node in pre-order that satisfies `predicate`.
 */
export function findFirst(root: Node, predicate: (node: Node) => boolean): Node | undefined {
  for (const node of descendants(root)) {
    if (predicate(node)) return node;
  }
  return undefined;
}
