/**
 * @mantle/manifest-dsl
 *
 * Mantle manifest language — lexer, interpolation splitter, parser, printer,
 * resource identity and the error taxonomy.
 *
 * All other Mantle packages depend on this package. This package has no
 * internal Mantle dependencies.
 */

// Types
export type {
  Attribute,
  AttributeValue,
  ChainLink,
  ChainOperand,
  InterpolationSpan,
  ManifestAST,
  ManifestString,
  ParseResult,
  Punctuator,
  RelationshipChain,
  ResourceBody,
  ResourceDeclaration,
  ResourceReference,
  ResourceTitle,
  SourcePosition,
  Statement,
  StringSegment,
  StringToken,
  Token,
} from './types.js';
export { ChainOperator } from './types.js';

// Identity
export type { IdentityKey, ResourceIdentity } from './identity.js';
export {
  capitalizeTypeName,
  identityKey,
  isLiteralTitle,
  makeIdentity,
  normalizeTypeName,
  sameIdentity,
} from './identity.js';

// Errors
export type { ManifestErrorCode } from './errors.js';
export {
  CycleError,
  DuplicateResourceError,
  LexError,
  ManifestError,
  ParseError,
  UnresolvedReferenceError,
  formatDiagnostic,
} from './errors.js';

// Functions
export { tokenize } from './lexer.js';
export { literal, literalText, splitInterpolation } from './interpolation.js';
export { MAX_NESTING, parse, parseManifest } from './parser.js';
export {
  formatIdentity,
  printDeclaration,
  printReference,
  printString,
  printValue,
} from './printer.js';
