export { createScanner, createDebugState, scanTokens } from './scanner/scanner.js';
export type { Scanner, ScanOptions, ScannerDebugState, Token } from './scanner/scanner.js';
export { SyntaxKind, TokenFlags, syntaxKindToString } from './scanner/token-types.js';

// Document Tree
export * from './ast-types.js';
export * from './ast-factory.js';
export * from './ast-traversal.js';

// Parsing, rendering and conversion
export * from './parser-interfaces.js';
export * from './errors.js';
export { DEFAULT_OPTIONS, resolveOptions } from './conversion-options.js';
export { MAX_NESTING_DEPTH, createParser, parseDocument } from './core-parser.js';
export { renderDocument } from './renderer.js';
export { convert, convertWithDiagnostics } from './convert.js';
