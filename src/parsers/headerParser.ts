import * as fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { MAX_HEADER_SIZE } from '../config';
import { HeaderEntry, METADATA_KEY, ParsedHeader, TensorDescriptor } from '../types/safetensors';
import { SafetensorsError, describeError } from '../utils/errors';

const LENGTH_PREFIX_SIZE = 8;

export interface ReadHeaderOptions {
  maxHeaderSize?: number;
  /** Called once the length prefix is known, before any size check or header read. */
  onHeaderSize?: (headerLength: bigint) => void;
}

/**
 * Read and validate the header of a safetensors file without touching tensor data.
 *
 * Binary format: 8-byte LE uint64 header length, UTF-8 JSON header, raw tensor bytes.
 * Only the first 8 + headerLength bytes are read.
 */
export async function readHeader(filePath: string, options: ReadHeaderOptions = {}): Promise<ParsedHeader> {
  const maxHeaderSize = options.maxHeaderSize ?? MAX_HEADER_SIZE;

  let fd: FileHandle;
  try {
    fd = await fs.promises.open(filePath, 'r');
  } catch (err) {
    throw new SafetensorsError('OPEN_FAILED', `Cannot open ${filePath}: ${describeError(err)}`, {
      cause: err,
    });
  }

  try {
    const lengthBuf = Buffer.alloc(LENGTH_PREFIX_SIZE);
    const { bytesRead } = await fd.read(lengthBuf, 0, LENGTH_PREFIX_SIZE, 0);
    if (bytesRead < LENGTH_PREFIX_SIZE) {
      throw new SafetensorsError('TRUNCATED_HEADER_LENGTH', 'File too short');
    }

    // Kept as bigint until the guards pass so a huge prefix can't lose precision.
    const declaredLength = lengthBuf.readBigUInt64LE(0);
    options.onHeaderSize?.(declaredLength);

    const { size } = await fd.stat();
    const available = BigInt(Math.max(0, size - LENGTH_PREFIX_SIZE));
    if (declaredLength > available) {
      throw new SafetensorsError(
        'TRUNCATED_HEADER',
        `Header truncated: expected ${declaredLength} bytes, got ${available}`,
      );
    }
    if (declaredLength > BigInt(maxHeaderSize)) {
      throw new SafetensorsError(
        'HEADER_TOO_LARGE',
        `Header size ${declaredLength} bytes exceeds maximum allowed ${maxHeaderSize} bytes`,
      );
    }
    const headerLength = Number(declaredLength);

    const headerBuf = Buffer.alloc(headerLength);
    const headerRead = await fd.read(headerBuf, 0, headerLength, LENGTH_PREFIX_SIZE);
    if (headerRead.bytesRead < headerLength) {
      throw new SafetensorsError(
        'TRUNCATED_HEADER',
        `Header truncated: expected ${headerLength} bytes, got ${headerRead.bytesRead}`,
      );
    }

    return decodeHeader(headerBuf, headerLength);
  } finally {
    await fd.close();
  }
}

/**
 * Decode the JSON header bytes into typed entries, in the order the keys appear in the file.
 */
export function decodeHeader(headerBuf: Buffer, headerLength: number = headerBuf.length): ParsedHeader {
  const json = headerBuf.toString('utf-8');
  let rawHeader: unknown;
  try {
    rawHeader = JSON.parse(json);
  } catch (err) {
    throw new SafetensorsError('MALFORMED_HEADER', `Malformed header: ${describeError(err)}`, {
      cause: err,
    });
  }

  if (!isRecord(rawHeader)) {
    throw new SafetensorsError('MALFORMED_HEADER', 'Malformed header: expected a JSON object');
  }

  const entries: HeaderEntry[] = [];
  for (const key of topLevelKeys(json)) {
    const value = rawHeader[key];
    if (key === METADATA_KEY) {
      entries.push({ kind: 'metadata', value });
      continue;
    }

    entries.push({ kind: 'tensor', name: key, descriptor: parseDescriptor(key, value) });
  }

  return { headerLength, entries };
}

/**
 * Keys of a JSON object in source order. Object.entries would hoist
 * integer-like names ("0", "1") ahead of the rest. A repeated key keeps the
 * position of its first occurrence; JSON.parse already holds its last value.
 * `json` must already be known to parse as an object.
 */
function topLevelKeys(json: string): string[] {
  const keys = new Set<string>();
  let depth = 0;
  let expectKey = false;

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (ch === '"') {
      const end = stringEnd(json, i);
      if (depth === 1 && expectKey) {
        keys.add(String(JSON.parse(json.slice(i, end + 1))));
        expectKey = false;
      }
      i = end;
    } else if (ch === '{' || ch === '[') {
      depth++;
      expectKey = depth === 1;
    } else if (ch === '}' || ch === ']') {
      depth--;
    } else if (ch === ',' && depth === 1) {
      expectKey = true;
    }
  }

  return [...keys];
}

function stringEnd(json: string, start: number): number {
  let i = start + 1;
  while (json[i] !== '"') {
    i += json[i] === '\\' ? 2 : 1;
  }
  return i;
}

function parseDescriptor(name: string, value: unknown): TensorDescriptor {
  if (!isRecord(value)) {
    throw invalidDescriptor(name, 'expected an object');
  }

  const { dtype, shape } = value;
  if (typeof dtype !== 'string') {
    throw invalidDescriptor(name, 'missing or non-string "dtype"');
  }
  if (!Array.isArray(shape)) {
    throw invalidDescriptor(name, 'missing or non-array "shape"');
  }

  const dims: unknown[] = shape;
  const checked: number[] = [];
  for (const dim of dims) {
    if (typeof dim !== 'number' || !Number.isInteger(dim)) {
      throw invalidDescriptor(name, `"shape" must contain only integers, got ${JSON.stringify(dim)}`);
    }
    if (dim < 0) {
      throw new SafetensorsError('INVALID_SHAPE', `Invalid shape for tensor "${name}": negative dimension ${dim}`, {
        tensorName: name,
      });
    }
    if (!Number.isSafeInteger(dim)) {
      throw new SafetensorsError('INVALID_SHAPE', `Invalid shape for tensor "${name}": dimension ${dim} is too large`, {
        tensorName: name,
      });
    }
    checked.push(dim);
  }

  return { dtype, shape: checked };
}

function invalidDescriptor(name: string, detail: string): SafetensorsError {
  return new SafetensorsError('INVALID_TENSOR_DESCRIPTOR', `Invalid tensor descriptor for "${name}": ${detail}`, {
    tensorName: name,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
