/**
 * Command and environment tables
 *
 * Lookup data for the commands and environments the parser gives meaning to.
 * Anything missing from these tables takes the unknown-command or
 * unknown-environment path.
 */

import { HeadingLevel } from './ast-types.js';

/**
 * How the parser treats the body of an environment
 */
export enum EnvironmentKind {
  /** Body parsed as blocks in place */
  Transparent,
  UnorderedList,
  OrderedList,
  Table,
  /** Float wrapping a tabular; caption and label are skipped */
  TableFloat,
  CodeBlock,
  /** Body discarded */
  Comment,
  Blockquote,
  MathBlock,
  /** Multi-line math re-wrapped by the renderer */
  AlignedMath
}

const ENVIRONMENTS: ReadonlyMap<string, EnvironmentKind> = new Map([
  ['itemize', EnvironmentKind.UnorderedList],
  ['description', EnvironmentKind.UnorderedList],
  ['enumerate', EnvironmentKind.OrderedList],

  ['tabular', EnvironmentKind.Table],
  ['tabular*', EnvironmentKind.Table],
  ['tabularx', EnvironmentKind.Table],
  ['longtable', EnvironmentKind.Table],
  ['array', EnvironmentKind.Table],
  ['table', EnvironmentKind.TableFloat],
  ['table*', EnvironmentKind.TableFloat],

  ['verbatim', EnvironmentKind.CodeBlock],
  ['verbatim*', EnvironmentKind.CodeBlock],
  ['lstlisting', EnvironmentKind.CodeBlock],
  ['minted', EnvironmentKind.CodeBlock],
  ['comment', EnvironmentKind.Comment],

  ['quote', EnvironmentKind.Blockquote],
  ['quotation', EnvironmentKind.Blockquote],

  ['equation', EnvironmentKind.MathBlock],
  ['equation*', EnvironmentKind.MathBlock],
  ['displaymath', EnvironmentKind.MathBlock],
  ['math', EnvironmentKind.MathBlock],
  ['align', EnvironmentKind.AlignedMath],
  ['align*', EnvironmentKind.AlignedMath],
  ['gather', EnvironmentKind.AlignedMath],
  ['gather*', EnvironmentKind.AlignedMath],
  ['multline', EnvironmentKind.AlignedMath],
  ['multline*', EnvironmentKind.AlignedMath],
  ['eqnarray', EnvironmentKind.AlignedMath],
  ['eqnarray*', EnvironmentKind.AlignedMath],

  ['document', EnvironmentKind.Transparent],
  ['center', EnvironmentKind.Transparent],
  ['flushleft', EnvironmentKind.Transparent],
  ['flushright', EnvironmentKind.Transparent],
  ['minipage', EnvironmentKind.Transparent],
  ['figure', EnvironmentKind.Transparent],
  ['figure*', EnvironmentKind.Transparent],
  ['abstract', EnvironmentKind.Transparent]
]);

/**
 * Kind of a known environment, undefined for an unknown one
 */
export function getEnvironmentKind(name: string): EnvironmentKind | undefined {
  return ENVIRONMENTS.get(name);
}

/**
 * Required `{...}` arguments skipped right after `\begin{name}`
 */
export function getEnvironmentArgumentCount(name: string): number {
  switch (name) {
    case 'tabular':
    case 'longtable':
    case 'array':
    case 'minipage':
      return 1;
    case 'tabular*':
    case 'tabularx':
      return 2;
    default:
      return 0;
  }
}

const HEADINGS: ReadonlyMap<string, HeadingLevel> = new Map<string, HeadingLevel>([
  ['section', 1],
  ['section*', 1],
  ['subsection', 2],
  ['subsection*', 2],
  ['subsubsection', 3],
  ['subsubsection*', 3]
]);

/**
 * Base heading level of a sectioning command, undefined otherwise
 */
export function getHeadingLevel(command: string): HeadingLevel | undefined {
  return HEADINGS.get(command);
}

/**
 * Preamble and layout commands dropped together with this many `{...}`
 * arguments (a leading `[...]` is always skipped too)
 */
const DROPPED_COMMANDS: ReadonlyMap<string, number> = new Map([
  ['documentclass', 1],
  ['usepackage', 1],
  ['maketitle', 0],
  ['noindent', 0],
  ['centering', 0],
  ['raggedright', 0],
  ['newpage', 0],
  ['clearpage', 0],
  ['tableofcontents', 0],
  ['smallskip', 0],
  ['medskip', 0],
  ['bigskip', 0],
  ['vspace', 1],
  ['vspace*', 1],
  ['hspace', 1],
  ['hspace*', 1],
  ['label', 1]
]);

export function getDroppedArgumentCount(command: string): number | undefined {
  return DROPPED_COMMANDS.get(command);
}

/**
 * Commands skipped between table rows, with their `{...}` argument count
 */
const TABLE_RULES: ReadonlyMap<string, number> = new Map([
  ['hline', 0],
  ['toprule', 0],
  ['midrule', 0],
  ['bottomrule', 0],
  ['centering', 0],
  ['cline', 1],
  ['caption', 1],
  ['label', 1]
]);

export function getTableRuleArgumentCount(command: string): number | undefined {
  return TABLE_RULES.get(command);
}

/**
 * Inline formatting a one-argument command maps to
 */
export enum InlineStyle {
  Strong,
  Emphasis,
  Code,
  /** Content kept, formatting dropped */
  Plain
}

const INLINE_STYLES: ReadonlyMap<string, InlineStyle> = new Map([
  ['textbf', InlineStyle.Strong],
  ['textit', InlineStyle.Emphasis],
  ['emph', InlineStyle.Emphasis],
  ['texttt', InlineStyle.Code],
  ['textrm', InlineStyle.Plain],
  ['textsf', InlineStyle.Plain],
  ['textup', InlineStyle.Plain],
  ['textnormal', InlineStyle.Plain],
  ['underline', InlineStyle.Plain],
  ['mbox', InlineStyle.Plain]
]);

export function getInlineStyle(command: string): InlineStyle | undefined {
  return INLINE_STYLES.get(command);
}

/**
 * Environment a multi-line math body is re-wrapped in
 */
export function getAlignedWrapper(environment: string): string {
  const base = environment.endsWith('*') ? environment.slice(0, -1) : environment;
  return base === 'gather' ? 'gathered' : 'aligned';
}
