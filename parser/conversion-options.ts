import { ConfigurationError } from './errors.js';
import { ConvertOptions, MathMode, ResolvedOptions } from './parser-interfaces.js';

const SUPPORTED_MATH_MODES: readonly MathMode[] = ['katex'];

export const DEFAULT_OPTIONS: ResolvedOptions = Object.freeze({
  mathMode: 'katex',
  headingLevelOffset: 0,
  preserveComments: false,
  calloutIcon: '💡'
});

/**
 * Validate caller options once, before scanning. Options typed loosely at
 * runtime (CLI flags, JS callers) are checked value by value.
 */
export function resolveOptions(options?: ConvertOptions): ResolvedOptions {
  const merged = { ...DEFAULT_OPTIONS, ...stripUndefined(options) };

  if (!isMathMode(merged.mathMode)) {
    throw new ConfigurationError('mathMode', merged.mathMode, SUPPORTED_MATH_MODES.map(m => `'${m}'`).join(' or '));
  }
  if (typeof merged.headingLevelOffset !== 'number' || !Number.isInteger(merged.headingLevelOffset)) {
    throw new ConfigurationError('headingLevelOffset', merged.headingLevelOffset, 'an integer');
  }
  if (typeof merged.preserveComments !== 'boolean') {
    throw new ConfigurationError('preserveComments', merged.preserveComments, 'a boolean');
  }
  if (typeof merged.calloutIcon !== 'string') {
    throw new ConfigurationError('calloutIcon', merged.calloutIcon, 'a string');
  }

  return Object.freeze({
    mathMode: merged.mathMode,
    headingLevelOffset: merged.headingLevelOffset,
    preserveComments: merged.preserveComments,
    calloutIcon: merged.calloutIcon
  });
}

function isMathMode(value: unknown): value is MathMode {
  return SUPPORTED_MATH_MODES.some(mode => mode === value);
}

function stripUndefined(options: ConvertOptions | undefined): ConvertOptions {
  const result: ConvertOptions = {};
  if (!options) return result;
  if (options.mathMode !== undefined) result.mathMode = options.mathMode;
  if (options.headingLevelOffset !== undefined) result.headingLevelOffset = options.headingLevelOffset;
  if (options.preserveComments !== undefined) result.preserveComments = options.preserveComments;
  if (options.calloutIcon !== undefined) result.calloutIcon = options.calloutIcon;
  return result;
}
