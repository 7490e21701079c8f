import { DtypeAggregate } from '../types/safetensors';

export const ANALYSIS_HEADING = 'Tensor analysis:';
export const DISTRIBUTION_HEADING = 'Data Type Distribution (by number of elements):';

export function formatHeaderSize(headerLength: number | bigint): string {
  return `Header size: ${headerLength}`;
}

/**
 * Share of `count` in `total` as a percentage with two decimals.
 * An empty total yields "0.00" rather than dividing by zero.
 */
export function formatPercentage(count: bigint, total: bigint): string {
  if (total === 0n) {
    return (0).toFixed(2);
  }
  return ((Number(count) / Number(total)) * 100).toFixed(2);
}

/**
 * Report lines for an aggregate, one row per dtype in first-seen order.
 */
export function formatReport(aggregate: DtypeAggregate): string[] {
  const lines = ['', ANALYSIS_HEADING, '', DISTRIBUTION_HEADING];
  for (const [dtype, count] of aggregate.buckets) {
    lines.push(`${dtype}: ${count} elements (${formatPercentage(count, aggregate.totalElements)}%)`);
  }
  return lines;
}
