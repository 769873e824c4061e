import type { EngineTree } from '../engine/types.js';
import { getConfig } from '../config.js';
import type { Cursor } from './cursor.js';
import { logDebug } from './debug.js';
import { TreeDeletedError } from './errors.js';
import type { Language } from './language.js';
import { Node } from './node.js';

/**
 * Sole owner of a parsed syntax tree.
 *
 * Every Node and Cursor derived from a Tree borrows it. `delete()` releases
 * the engine tree; with liveness checks on, any later use of a derived handle
 * throws {@link TreeDeletedError}.
 */
export class Tree {
  private deleted = false;

  /** @internal */
  constructor(
    private readonly raw: EngineTree,
    private readonly language: Language
  ) {}

  /**
   * Entry point for all traversal.
   */
  getRootNode(): Node {
    this.ensureAlive('Tree.getRootNode');
    return new Node(this, this.raw.rootNode);
  }

  getLanguage(): Language {
    this.ensureAlive('Tree.getLanguage');
    return this.language;
  }

  hasError(): boolean {
    return this.getRootNode().hasError();
  }

  /**
   * Cursor positioned at the root node.
   */
  walk(): Cursor {
    return this.getRootNode().getCursor();
  }

  /**
   * Release the engine tree. Safe to call more than once.
   */
  delete(): void {
    if (this.deleted) return;
    this.deleted = true;
    this.raw.delete();
    logDebug('tree', `deleted ${this.language.getName() || 'anonymous'} tree`);
  }

  isDeleted(): boolean {
    return this.deleted;
  }

  /** @internal */
  ensureAlive(operation: string): void {
    if (this.deleted && getConfig().livenessChecks) {
      throw new TreeDeletedError(operation);
    }
  }
}
