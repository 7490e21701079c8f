/** Reserved header key holding file-level metadata. */
export const METADATA_KEY = '__metadata__';

/**
 * Declared dtype of a tensor, e.g. "F32" or "BF16". Kept as an opaque label:
 * files may carry dtypes this tool has never heard of.
 */
export type Dtype = string;

export interface TensorDescriptor {
  dtype: Dtype;
  shape: number[];
}

export type HeaderEntry =
  | { kind: 'tensor'; name: string; descriptor: TensorDescriptor }
  | { kind: 'metadata'; value: unknown };

export interface ParsedHeader {
  /** Byte length of the JSON header, excluding the 8-byte prefix. */
  headerLength: number;
  /** Entries in the order they appear in the header JSON. */
  entries: HeaderEntry[];
}

export interface DtypeAggregate {
  /** Element totals keyed by dtype, in first-seen order. */
  buckets: Map<Dtype, bigint>;
  totalElements: bigint;
}
