/**
 * Parser Interfaces and Types
 *
 * Options, diagnostics and results shared by the scanner, parser and renderer.
 */

import { Document } from './ast-types.js';

/**
 * Math dialects the renderer can target
 */
export type MathMode = 'katex';

/**
 * Conversion options as accepted from callers
 */
export interface ConvertOptions {
  /** Math delimiter dialect (default: 'katex', the only one supported) */
  mathMode?: string;

  /** Added to every heading level; the result is clamped to 1..3 (default: 0) */
  headingLevelOffset?: number;

  /** Keep % comments as literal text instead of dropping them (default: false) */
  preserveComments?: boolean;

  /** Icon placed on the first line of a quote callout; '' for none (default: '💡') */
  calloutIcon?: string;
}

/**
 * Options after validation; resolved once per conversion and passed by value
 */
export interface ResolvedOptions {
  readonly mathMode: MathMode;
  readonly headingLevelOffset: number;
  readonly preserveComments: boolean;
  readonly calloutIcon: string;
}

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info'
}

/**
 * Diagnostic categories for structured error reporting
 */
export enum DiagnosticCategory {
  Syntax = 'syntax',
  Structure = 'structure',
  Nesting = 'nesting',
  Unsupported = 'unsupported',
  Configuration = 'configuration'
}

/**
 * Parse error codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  // Structural errors (always thrown)
  UNCLOSED_ENVIRONMENT = 'unclosed-environment',
  MISMATCHED_ENVIRONMENT = 'mismatched-environment',
  UNEXPECTED_ENVIRONMENT_END = 'unexpected-environment-end',
  UNCLOSED_GROUP = 'unclosed-group',
  UNEXPECTED_GROUP_CLOSE = 'unexpected-group-close',
  MISSING_ARGUMENT = 'missing-argument',
  MALFORMED_LINK = 'malformed-link',
  UNCLOSED_MATH = 'unclosed-math',
  INVALID_NESTING = 'invalid-nesting',
  NESTING_TOO_DEEP = 'nesting-too-deep',

  // Best-effort degradations (reported as warnings)
  MALFORMED_ESCAPE = 'malformed-escape',
  UNKNOWN_COMMAND = 'unknown-command',
  UNKNOWN_ENVIRONMENT = 'unknown-environment',
  RAGGED_TABLE_ROW = 'ragged-table-row',
  HEADING_LEVEL_CLAMPED = 'heading-level-clamped',
  IMPLICIT_LIST_ITEM = 'implicit-list-item'
}

/**
 * Parse diagnostic information
 */
export interface ParseDiagnostic {
  /** Diagnostic severity */
  severity: DiagnosticSeverity;

  /** Diagnostic category */
  category: DiagnosticCategory;

  /** Machine-readable error code */
  code: ParseErrorCode;

  /** Human-readable message */
  message: string;

  /** Subject of the diagnostic (e.g., command or environment name) */
  subject?: string;

  /** Start position in source */
  pos: number;

  /** End position in source */
  end: number;
}

/**
 * Result of a parse operation
 */
export interface ParseResult {
  /** Root document node (frozen) */
  document: Document;

  /** Best-effort degradations encountered while parsing */
  diagnostics: ParseDiagnostic[];

  /** Source text that was parsed */
  sourceText: string;
}

/**
 * Parser interface
 */
export interface Parser {
  /**
   * Parse a complete document. Throws StructuralError on malformed structure
   * and ConfigurationError on invalid options.
   */
  parseDocument(text: string, options?: ConvertOptions): ParseResult;
}

/**
 * Result of a conversion that also reports diagnostics
 */
export interface ConversionResult {
  output: string;
  diagnostics: ParseDiagnostic[];
}

/**
 * Position mapping for diagnostics
 */
export interface SourcePosition {
  /** 1-based line */
  line: number;

  /** 1-based column */
  column: number;
}
