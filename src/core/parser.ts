import { getConfig } from '../config.js';
import type { EngineParser } from '../engine/types.js';
import { logDebug } from './debug.js';
import { ParserDeletedError } from './errors.js';
import type { Language } from './language.js';
import { Tree } from './tree.js';

/**
 * Parsing session bound to one grammar.
 *
 * Trees it produces are independent of it: deleting the parser leaves them
 * usable.
 */
export class Parser {
  private raw: EngineParser | null;

  constructor(private readonly language: Language) {
    const engineLanguage = language.engineLanguage;
    const raw = engineLanguage.engine.createParser();
    try {
      raw.setLanguage(engineLanguage);
    } catch (error) {
      raw.delete();
      throw error;
    }
    this.raw = raw;
  }

  getLanguage(): Language {
    return this.language;
  }

  /**
   * Parse `source` from scratch. Invalid source still yields a tree; its
   * problems show up as error and missing nodes and `hasError()`.
   */
  parseString(source: string): Tree {
    const raw = this.live('parseString');
    const tree = new Tree(raw.parse(source), this.language);
    if (getConfig().debug) {
      const root = tree.getRootNode();
      logDebug(
        'parser',
        `parsed ${source.length} code units into ${root.getType()} (hasError=${root.hasError()})`
      );
    }
    return tree;
  }

  /**
   * Parse, hand the tree to `fn`, and delete the tree once `fn` returns or
   * throws. `fn` must be synchronous and must not keep nodes or cursors.
   */
  parseScoped<T>(source: string, fn: (tree: Tree) => T): T {
    const tree = this.parseString(source);
    try {
      return fn(tree);
    } finally {
      tree.delete();
    }
  }

  /**
   * Release the engine parser. Safe to call more than once.
   */
  delete(): void {
    if (!this.raw) return;
    this.raw.delete();
    this.raw = null;
  }

  isDeleted(): boolean {
    return this.raw === null;
  }

  private live(operation: string): EngineParser {
    if (!this.raw) {
      throw new ParserDeletedError(`Parser.${operation}`);
    }
    return this.raw;
  }
}
