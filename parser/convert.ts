import { resolveOptions } from './conversion-options.js';
import { parseResolved } from './core-parser.js';
import { ConversionResult, ConvertOptions } from './parser-interfaces.js';
import { renderResolved } from './renderer.js';

/**
 * Convert LaTeX-like source to Notion-flavoured markdown.
 *
 * Throws ConfigurationError for invalid options (before any scanning) and
 * StructuralError for malformed structure. Warnings are discarded; use
 * {@link convertWithDiagnostics} to see them.
 */
export function convert(source: string, options?: ConvertOptions): string {
  return convertWithDiagnostics(source, options).output;
}

export function convertWithDiagnostics(source: string, options?: ConvertOptions): ConversionResult {
  const resolved = resolveOptions(options);
  const { document, diagnostics } = parseResolved(source, resolved);
  return {
    output: renderResolved(document, resolved),
    diagnostics
  };
}
