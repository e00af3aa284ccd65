/**
 * Sequence numbering for templates
 *
 * The nth template of a run is named `${prefix}${nn}` (CA01, CA02, ... CA100).
 * The same value replaces <PREFIX> in the display name and suffixes the
 * template's exclusion group name.
 */

import type { SequenceContext, SequenceGenerator } from './types.js';

/**
 * Zero-pad a sequence number to at least two digits
 */
export function formatSequenceNumber(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Build the sequence context for one number
 */
export function sequenceContext(prefix: string, value: number): SequenceContext {
  return { number: value, prefixAndNumber: `${prefix}${formatSequenceNumber(value)}` };
}

/**
 * Create a counter-backed generator starting at `start`
 */
export function createSequenceGenerator(prefix: string, start = 1): SequenceGenerator {
  if (!Number.isInteger(start) || start < 1) {
    throw new RangeError(`Sequence start must be a positive integer, got ${start}`);
  }

  let current = start;
  return {
    next(): SequenceContext {
      const context = sequenceContext(prefix, current);
      current += 1;
      return context;
    },
  };
}
