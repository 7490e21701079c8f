import { describe, it, expect } from 'vitest';
import { formatHeaderSize, formatPercentage, formatReport } from './reporter';
import { DtypeAggregate } from '../types/safetensors';

function aggregateOf(rows: [string, bigint][]): DtypeAggregate {
  return {
    buckets: new Map(rows),
    totalElements: rows.reduce<bigint>((s, [, c]) => s + c, 0n),
  };
}

describe('reporter', () => {
  it('formats the header size line', () => {
    expect(formatHeaderSize(128)).toBe('Header size: 128');
  });

  it('formats percentages with two decimals', () => {
    expect(formatPercentage(10n, 10n)).toBe('100.00');
    expect(formatPercentage(1n, 3n)).toBe('33.33');
    expect(formatPercentage(2n, 3n)).toBe('66.67');
  });

  it('returns 0.00 instead of dividing by zero', () => {
    expect(formatPercentage(0n, 0n)).toBe('0.00');
  });

  it('renders headings and one row per dtype', () => {
    const lines = formatReport(aggregateOf([['F32', 2n], ['I64', 2n]]));

    expect(lines).toEqual([
      '',
      'Tensor analysis:',
      '',
      'Data Type Distribution (by number of elements):',
      'F32: 2 elements (50.00%)',
      'I64: 2 elements (50.00%)',
    ]);
  });

  it('renders only headings for an empty aggregate', () => {
    expect(formatReport(aggregateOf([]))).toEqual([
      '',
      'Tensor analysis:',
      '',
      'Data Type Distribution (by number of elements):',
    ]);
  });

  it('lists zero-element buckets at 0.00% when the total is zero', () => {
    const lines = formatReport(aggregateOf([['F32', 0n]]));
    expect(lines[4]).toBe('F32: 0 elements (0.00%)');
  });

  it('prints counts beyond the safe integer range exactly', () => {
    const lines = formatReport(aggregateOf([['BF16', 2n ** 60n]]));
    expect(lines[4]).toBe('BF16: 1152921504606846976 elements (100.00%)');
  });

  it('printed percentages sum to 100 within rounding', () => {
    const lines = formatReport(aggregateOf([['A', 1n], ['B', 1n], ['C', 1n], ['D', 4n]]));
    const total = lines
      .slice(4)
      .map((line) => Number(/\(([\d.]+)%\)$/.exec(line)?.[1]))
      .reduce((s, p) => s + p, 0);

    expect(Math.abs(total - 100)).toBeLessThanOrEqual(0.02);
  });
});
