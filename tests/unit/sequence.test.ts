/**
 * Unit Tests: Sequence Numbering
 *
 * @see src/reconcilers/policies/sequence.ts
 */

import { describe, it, expect } from 'vitest';
import {
  createSequenceGenerator,
  formatSequenceNumber,
  sequenceContext,
} from '../../src/reconcilers/policies/sequence.js';

describe('formatSequenceNumber', () => {
  it('pads to two digits', () => {
    expect(formatSequenceNumber(1)).toBe('01');
    expect(formatSequenceNumber(42)).toBe('42');
  });

  it('does not truncate numbers over 99', () => {
    expect(formatSequenceNumber(100)).toBe('100');
  });
});

describe('createSequenceGenerator', () => {
  it('starts at 1 and increments', () => {
    const sequence = createSequenceGenerator('CA');

    expect(sequence.next()).toEqual({ number: 1, prefixAndNumber: 'CA01' });
    expect(sequence.next()).toEqual({ number: 2, prefixAndNumber: 'CA02' });
    expect(sequence.next()).toEqual({ number: 3, prefixAndNumber: 'CA03' });
  });

  it('honours a start value and rolls past 99', () => {
    const sequence = createSequenceGenerator('POL', 99);

    expect(sequence.next().prefixAndNumber).toBe('POL99');
    expect(sequence.next().prefixAndNumber).toBe('POL100');
  });

  it('is deterministic for the same prefix and start', () => {
    const a = createSequenceGenerator('CA', 5);
    const b = createSequenceGenerator('CA', 5);

    const fromA = [a.next(), a.next(), a.next()].map((c) => c.prefixAndNumber);
    const fromB = [b.next(), b.next(), b.next()].map((c) => c.prefixAndNumber);

    expect(fromA).toEqual(['CA05', 'CA06', 'CA07']);
    expect(fromB).toEqual(fromA);
  });

  it('rejects a start below 1', () => {
    expect(() => createSequenceGenerator('CA', 0)).toThrow(RangeError);
    expect(() => createSequenceGenerator('CA', 1.5)).toThrow(RangeError);
  });
});

describe('sequenceContext', () => {
  it('joins prefix and padded number', () => {
    expect(sequenceContext('CA', 7)).toEqual({ number: 7, prefixAndNumber: 'CA07' });
  });
});
