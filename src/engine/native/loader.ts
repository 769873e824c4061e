/**
 * Native tree-sitter loader.
 *
 * Loads the `tree-sitter` binding on first use and caches the outcome, so
 * callers can check availability without try/catch and the handle layer
 * keeps working (with other engines) where the binding cannot be built.
 */

import { createRequire } from 'node:module';
import { dirname } from 'node:path';
import { Language } from '../../core/language.js';
import { logDebug } from '../../core/debug.js';
import { EngineUnavailableError, GrammarLoadError, describeError } from '../../core/errors.js';
import { NativeEngine, NativeLanguageAdapter } from './adapter.js';
import type {
  NativeBinding,
  NativeLanguageMethods,
  NativeLookaheadIteratorConstructor,
  NativeParserConstructor,
} from './types.js';

// Create require function for ESM compatibility
const require = createRequire(import.meta.url);

const BINDING_MODULE = 'tree-sitter';

// Loader the binding's own entry uses for its compiled addon
const ADDON_LOADER = 'node-gyp-build';

// ============================================
// Module State
// ============================================

/** Whether the binding loaded; null until the first attempt */
let nativeAvailable: boolean | null = null;

let cachedEngine: NativeEngine | null = null;

let loadingError: string | null = null;

const languageAdapters = new WeakMap<object, NativeLanguageAdapter>();

// ============================================
// Public API
// ============================================

/**
 * Check if the native binding is available. The first call attempts the load.
 */
export function isNativeEngineAvailable(): boolean {
  if (nativeAvailable !== null) {
    return nativeAvailable;
  }

  try {
    cachedEngine = new NativeEngine(loadBinding());
    nativeAvailable = true;
    logDebug('native', `${BINDING_MODULE} binding loaded`);
  } catch (error) {
    nativeAvailable = false;
    loadingError = describeError(error);
    logDebug('native', `${BINDING_MODULE} binding not available: ${loadingError}`);
  }

  return nativeAvailable;
}

/**
 * The native engine.
 *
 * @throws EngineUnavailableError if the binding cannot be loaded
 */
export function getNativeEngine(): NativeEngine {
  if (!isNativeEngineAvailable() || !cachedEngine) {
    throw new EngineUnavailableError(BINDING_MODULE, loadingError ?? 'unknown error');
  }
  return cachedEngine;
}

/**
 * Get the loading error message if the binding failed to load.
 */
export function getNativeLoadingError(): string | null {
  isNativeEngineAvailable();
  return loadingError;
}

/**
 * Reset the loader state (useful for testing).
 */
export function resetNativeEngine(): void {
  nativeAvailable = null;
  cachedEngine = null;
  loadingError = null;
}

/**
 * Load a module through the same resolver as the binding.
 */
export function requireNativeModule(specifier: string): unknown {
  return require(specifier);
}

/**
 * Resolve a module path through the same resolver as the binding.
 */
export function resolveNativeModule(specifier: string): string {
  return require.resolve(specifier);
}

export interface NativeLanguageOptions {
  /** ABI version of the compiled grammar, when the caller knows it */
  version?: number;
}

/**
 * Wrap a grammar descriptor exported by a tree-sitter grammar module.
 *
 * The descriptor is handed to a parser once so the binding can check its ABI
 * version, then its symbol tables are read. The same descriptor always
 * yields the same Language.
 *
 * @throws GrammarLoadError if the descriptor is not an object or the binding
 * rejects it
 */
export function loadNativeLanguage(
  descriptor: unknown,
  name: string,
  options: NativeLanguageOptions = {}
): Language {
  if (typeof descriptor !== 'object' || descriptor === null) {
    throw new GrammarLoadError(name, 'grammar module did not export a language object');
  }

  let adapter = languageAdapters.get(descriptor);
  if (!adapter) {
    const engine = getNativeEngine();
    const parser = engine.createParser();
    adapter = new NativeLanguageAdapter(engine, descriptor, name, options.version);
    try {
      parser.setLanguage(adapter);
      adapter.loadTables();
    } catch (error) {
      throw new GrammarLoadError(name, describeError(error), { cause: error });
    } finally {
      parser.delete();
    }
    languageAdapters.set(descriptor, adapter);
    logDebug('native', `grammar '${name}' loaded with ${adapter.symbolCount} symbols`);
  }

  return Language.fromEngine(adapter);
}

// ============================================
// Internal Functions
// ============================================

function loadBinding(): NativeBinding {
  let Parser: unknown;
  try {
    Parser = require(BINDING_MODULE);
  } catch (error) {
    throw new Error(
      `Failed to load ${BINDING_MODULE}: ${describeError(error)}. Install with: npm install ${BINDING_MODULE}`,
      { cause: error }
    );
  }

  if (!isParserConstructor(Parser)) {
    throw new Error(`${BINDING_MODULE} did not export a Parser constructor`);
  }

  const LookaheadIterator: unknown = Reflect.get(Parser, 'LookaheadIterator');
  return {
    Parser,
    LookaheadIterator: isLookaheadConstructor(LookaheadIterator) ? LookaheadIterator : null,
    languageMethods: loadLanguageMethods(),
  };
}

/**
 * The binding's entry keeps the symbol and field tables to itself, so read
 * the table functions off the compiled addon it wraps. Requiring the addon
 * again returns the instance the entry already loaded.
 */
function loadLanguageMethods(): NativeLanguageMethods {
  const root = dirname(require.resolve(`${BINDING_MODULE}/package.json`));
  const loader: unknown = require(ADDON_LOADER);
  if (!isAddonLoader(loader)) {
    throw new Error(`${ADDON_LOADER} did not export a loader function`);
  }

  const addon = loader(root);
  if (typeof addon !== 'object' || addon === null) {
    throw new Error(`${BINDING_MODULE} addon did not load`);
  }

  const getNodeTypeNamesById: unknown = Reflect.get(addon, 'getNodeTypeNamesById');
  const getNodeFieldNamesById: unknown = Reflect.get(addon, 'getNodeFieldNamesById');
  if (!isTableFunction(getNodeTypeNamesById) || !isTableFunction(getNodeFieldNamesById)) {
    throw new Error(`${BINDING_MODULE} addon does not expose its language tables`);
  }
  return { getNodeTypeNamesById, getNodeFieldNamesById };
}

function isParserConstructor(value: unknown): value is NativeParserConstructor {
  return typeof value === 'function';
}

function isLookaheadConstructor(value: unknown): value is NativeLookaheadIteratorConstructor {
  return typeof value === 'function';
}

function isAddonLoader(value: unknown): value is (root: string) => unknown {
  return typeof value === 'function';
}

function isTableFunction(value: unknown): value is (language: object) => unknown {
  return typeof value === 'function';
}
