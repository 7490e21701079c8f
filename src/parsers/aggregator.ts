import { DtypeAggregate, Dtype, ParsedHeader } from '../types/safetensors';

/**
 * Number of elements in a tensor of the given shape. A scalar (empty shape) holds one.
 */
export function elementCount(shape: readonly number[]): bigint {
  return shape.reduce<bigint>((product, dim) => product * BigInt(dim), 1n);
}

/**
 * Sum element counts per dtype across every tensor entry. Metadata entries never
 * contribute. Buckets keep the order in which each dtype is first seen.
 */
export function aggregateByDtype(header: ParsedHeader): DtypeAggregate {
  const buckets = new Map<Dtype, bigint>();
  let totalElements = 0n;

  for (const entry of header.entries) {
    if (entry.kind === 'metadata') {
      continue;
    }

    const { dtype, shape } = entry.descriptor;
    const count = elementCount(shape);
    buckets.set(dtype, (buckets.get(dtype) ?? 0n) + count);
    totalElements += count;
  }

  return { buckets, totalElements };
}
