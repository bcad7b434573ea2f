/**
 * Errors raised by a conversion.
 *
 * StructuralError comes from the parser and is never recovered from;
 * ConfigurationError is raised before any scanning starts.
 */

import { ParseErrorCode, SourcePosition } from './parser-interfaces.js';

export abstract class ConversionError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface StructuralErrorDetails {
  code: ParseErrorCode;
  subject?: string;
  pos: number;
  tokenIndex: number;
  position: SourcePosition;
}

export class StructuralError extends ConversionError {
  readonly code: ParseErrorCode;
  readonly subject: string | undefined;
  readonly pos: number;
  readonly tokenIndex: number;
  readonly line: number;
  readonly column: number;

  constructor(message: string, details: StructuralErrorDetails) {
    super(`${message} (line ${details.position.line}, column ${details.position.column})`);
    this.code = details.code;
    this.subject = details.subject;
    this.pos = details.pos;
    this.tokenIndex = details.tokenIndex;
    this.line = details.position.line;
    this.column = details.position.column;
  }
}

export class ConfigurationError extends ConversionError {
  readonly code = 'invalid-option';
  readonly option: string;
  readonly value: unknown;

  constructor(option: string, value: unknown, expected: string) {
    super(`Invalid value for option '${option}': ${formatValue(value)} (expected ${expected})`);
    this.option = option;
    this.value = value;
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}
