import { promises as fs } from 'fs';

import { convertWithDiagnostics } from './convert.js';
import { ConversionError } from './errors.js';
import { ConvertOptions } from './parser-interfaces.js';
import { computeLineStarts, offsetToPosition } from './parser-utils.js';

export const USAGE = [
  'Usage: tex2notion <input.tex> [output.md] [options]',
  '',
  'Options:',
  '  --heading-offset=N     add N to every heading level (result clamped to 1..3)',
  '  --preserve-comments    keep % comments as text',
  '  --math-mode=katex      math delimiter dialect',
  '  --callout-icon=X       icon on the first line of quotes (empty for none)',
  '  -h, --help             show this message'
].join('\n');

/**
 * Where the CLI reads, writes and reports
 */
export interface CliIO {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  stdout(line: string): void;
  stderr(line: string): void;
}

const nodeIO: CliIO = {
  readFile: path => fs.readFile(path, 'utf8'),
  writeFile: (path, content) => fs.writeFile(path, content, 'utf8'),
  stdout: line => console.log(line),
  stderr: line => console.error(line)
};

interface CliArguments {
  input?: string;
  output?: string;
  options: ConvertOptions;
  help: boolean;
  problem?: string;
}

export function parseArguments(argv: readonly string[]): CliArguments {
  const positional: string[] = [];
  const args: CliArguments = { options: {}, help: false };

  for (const arg of argv) {
    if (arg === '-h' || arg === '--help') {
      args.help = true;
    } else if (arg === '--preserve-comments') {
      args.options.preserveComments = true;
    } else if (arg.startsWith('--heading-offset=')) {
      args.options.headingLevelOffset = Number(arg.slice('--heading-offset='.length));
    } else if (arg.startsWith('--math-mode=')) {
      args.options.mathMode = arg.slice('--math-mode='.length);
    } else if (arg.startsWith('--callout-icon=')) {
      args.options.calloutIcon = arg.slice('--callout-icon='.length);
    } else if (arg.startsWith('--')) {
      args.problem ??= `Unknown option: ${arg}`;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 2) args.problem ??= `Unexpected argument: ${positional[2]}`;
  args.input = positional[0];
  args.output = positional[1];
  return args;
}

/**
 * Run the command line; resolves to the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = nodeIO): Promise<number> {
  const args = parseArguments(argv);

  if (args.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (args.problem || !args.input) {
    if (args.problem) io.stderr(args.problem);
    io.stderr(USAGE);
    return 1;
  }

  const input = args.input;
  let source: string;
  try {
    source = await io.readFile(input);
  } catch (error) {
    io.stderr(`error: cannot read '${input}': ${describe(error)}`);
    return 1;
  }

  let output: string;
  try {
    const result = convertWithDiagnostics(source, args.options);
    output = result.output;

    const lineStarts = computeLineStarts(source);
    for (const diagnostic of result.diagnostics) {
      const { line, column } = offsetToPosition(lineStarts, diagnostic.pos);
      io.stderr(`${input}:${line}:${column}: warning: ${diagnostic.message}`);
    }
  } catch (error) {
    if (error instanceof ConversionError) {
      io.stderr(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (args.output === undefined) {
    io.stdout(output);
    return 0;
  }

  try {
    await io.writeFile(args.output, output + '\n');
  } catch (error) {
    io.stderr(`error: cannot write '${args.output}': ${describe(error)}`);
    return 1;
  }
  io.stdout(`Converted ${input} -> ${args.output}`);
  return 0;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
