// Handle layer
export { Parser } from './core/parser.js';
export { Tree } from './core/tree.js';
export { Node } from './core/node.js';
export { Cursor } from './core/cursor.js';
export { Language, NO_SYMBOL, ERROR_SYMBOL, type SymbolId } from './core/language.js';
export { ChildRange, children, namedChildren } from './core/children.js';
export {
  descendants,
  findNodes,
  findNodesByTypes,
  findFirst,
  type DescendantOptions,
} from './core/traversal.js';
export {
  extent,
  comparePoints,
  type Extent,
  type Point,
  type ByteRange,
  type PointRange,
} from './core/extent.js';
export {
  BoughError,
  InvalidSymbolError,
  NullNodeError,
  TreeDeletedError,
  CursorReleasedError,
  ParserDeletedError,
  EngineUnavailableError,
  GrammarLoadError,
  type BoughErrorCode,
} from './core/errors.js';

// Engines
export type {
  Engine,
  EngineCursor,
  EngineLanguage,
  EngineNode,
  EngineParser,
  EnginePoint,
  EngineTree,
} from './engine/types.js';
export {
  isNativeEngineAvailable,
  getNativeEngine,
  getNativeLoadingError,
  resetNativeEngine,
  loadNativeLanguage,
  type NativeLanguageOptions,
} from './engine/native/loader.js';
export {
  GRAMMARS,
  ALL_GRAMMAR_EXTENSIONS,
  getGrammar,
  getGrammarForExtension,
  isSupportedExtension,
  loadGrammar,
  loadGrammarForExtension,
  readGrammarVersion,
  type GrammarDefinition,
} from './engine/grammars.js';

// Configuration
export {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  getConfig,
  configure,
  resetConfig,
  getConfigValue,
  setConfigValue,
  type BoughConfig,
} from './config.js';
