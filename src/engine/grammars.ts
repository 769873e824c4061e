/**
 * Registry of tree-sitter grammar modules.
 * Single source of truth for grammar names, module names and file extensions.
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { logDebug } from '../core/debug.js';
import { GrammarLoadError, describeError } from '../core/errors.js';
import type { Language } from '../core/language.js';
import { loadNativeLanguage, requireNativeModule, resolveNativeModule } from './native/loader.js';

export interface GrammarDefinition {
  name: string;
  module: string;
  extensions: readonly string[];
  /** Export holding the descriptor, when the module exports several grammars */
  exportName?: string;
}

export const GRAMMARS: readonly GrammarDefinition[] = [
  {
    name: 'javascript',
    module: 'tree-sitter-javascript',
    extensions: ['.js', '.mjs', '.cjs', '.jsx'],
  },
  { name: 'python', module: 'tree-sitter-python', extensions: ['.py'] },
];

export const ALL_GRAMMAR_EXTENSIONS = GRAMMARS.flatMap(g => g.extensions);

// Loaded grammars, keyed by registry name
const loaded = new Map<string, Language>();

// The version define sits in the first lines of a generated parser
const PARSER_HEADER_BYTES = 4096;
const LANGUAGE_VERSION_PATTERN = /#define LANGUAGE_VERSION (\d+)/;

export function getGrammar(name: string): GrammarDefinition | undefined {
  return GRAMMARS.find(g => g.name === name);
}

export function getGrammarForExtension(extension: string): GrammarDefinition | undefined {
  return GRAMMARS.find(g => g.extensions.includes(extension));
}

export function isSupportedExtension(extension: string): boolean {
  return ALL_GRAMMAR_EXTENSIONS.includes(extension);
}

/**
 * Load a registered grammar into a Language for the native engine.
 *
 * @throws GrammarLoadError for unknown names, modules that are not installed
 * and descriptors the binding rejects
 * @throws EngineUnavailableError if the native binding cannot be loaded
 */
export function loadGrammar(name: string): Language {
  const cached = loaded.get(name);
  if (cached) {
    return cached;
  }

  const definition = getGrammar(name);
  if (!definition) {
    throw new GrammarLoadError(name, 'not a registered grammar');
  }

  let mod: unknown;
  try {
    mod = requireNativeModule(definition.module);
  } catch (error) {
    throw new GrammarLoadError(
      name,
      `cannot load ${definition.module} (${describeError(error)}). Install with: npm install ${definition.module}`,
      { cause: error }
    );
  }

  const descriptor = definition.exportName ? pickExport(mod, definition.exportName) : mod;
  const language = loadNativeLanguage(descriptor, definition.name, {
    version: readGrammarVersion(definition),
  });
  loaded.set(name, language);
  logDebug('grammars', `loaded ${definition.module}`);
  return language;
}

/**
 * Load the grammar registered for a file extension, or null when none is.
 */
export function loadGrammarForExtension(extension: string): Language | null {
  const definition = getGrammarForExtension(extension);
  return definition ? loadGrammar(definition.name) : null;
}

/**
 * ABI version from the generated parser the grammar module ships, or 0 when
 * the module does not ship it.
 */
export function readGrammarVersion(definition: GrammarDefinition): number {
  let fd: number | null = null;
  try {
    const root = dirname(resolveNativeModule(`${definition.module}/package.json`));
    fd = openSync(join(root, 'src', 'parser.c'), 'r');
    const header = Buffer.alloc(PARSER_HEADER_BYTES);
    const length = readSync(fd, header, 0, PARSER_HEADER_BYTES, 0);
    const match = LANGUAGE_VERSION_PATTERN.exec(header.toString('utf8', 0, length));
    return match ? Number(match[1]) : 0;
  } catch (error) {
    logDebug('grammars', `no ABI version for ${definition.module}: ${describeError(error)}`);
    return 0;
  } finally {
    if (fd !== null) closeSync(fd);
  }
}

function pickExport(mod: unknown, exportName: string): unknown {
  if (typeof mod !== 'object' || mod === null) return undefined;
  return Reflect.get(mod, exportName);
}
