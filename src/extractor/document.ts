/**
 * Decoded measurement documents.
 *
 * The document tree is built straight from cborg's token stream rather than
 * from `decode()`, so a float leaf stays distinct from an integer leaf even
 * when both hold a whole number.
 */

import { Tokenizer, Type, type Token } from 'cborg';
import { DocumentDecodeError } from '../utils/errors.js';

export type CborValue =
  | { kind: 'map'; entries: ReadonlyArray<readonly [CborValue, CborValue]> }
  | { kind: 'array'; items: readonly CborValue[] }
  | { kind: 'text'; value: string }
  | { kind: 'float'; value: number }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'bool'; value: boolean }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'tagged'; tag: number; value: CborValue }
  | { kind: 'null' }
  | { kind: 'undefined' };

export type CborKind = CborValue['kind'];

const MAX_DEPTH = 256;
const BREAK = Symbol('break');

function nextToken(tokens: Tokenizer): Token {
  if (tokens.done()) {
    throw new Error('unexpected end of data');
  }
  return tokens.next();
}

function readValue(tokens: Tokenizer, depth: number): CborValue {
  const item = readItem(tokens, depth);
  if (item === BREAK) {
    throw new Error('unexpected break');
  }
  return item;
}

// Indefinite-length containers report Infinity and end with a break token.
function readItem(tokens: Tokenizer, depth: number): CborValue | typeof BREAK {
  if (depth > MAX_DEPTH) {
    throw new Error(`nesting deeper than ${MAX_DEPTH}`);
  }

  const token = nextToken(tokens);
  switch (token.type) {
    case Type.uint:
    case Type.negint:
      return { kind: 'integer', value: token.value };
    case Type.float:
      return { kind: 'float', value: token.value };
    case Type.string:
      return { kind: 'text', value: token.value };
    case Type.bytes:
      return { kind: 'bytes', value: token.value };
    case Type.true:
      return { kind: 'bool', value: true };
    case Type.false:
      return { kind: 'bool', value: false };
    case Type.null:
      return { kind: 'null' };
    case Type.undefined:
      return { kind: 'undefined' };
    case Type.break:
      return BREAK;
    case Type.tag:
      return { kind: 'tagged', tag: token.value, value: readValue(tokens, depth + 1) };
    case Type.array: {
      const length: number = token.value;
      const items: CborValue[] = [];
      for (let i = 0; i < length; i++) {
        const item = readItem(tokens, depth + 1);
        if (item === BREAK) {
          if (length !== Infinity) throw new Error('unexpected break');
          break;
        }
        items.push(item);
      }
      return { kind: 'array', items };
    }
    case Type.map: {
      const length: number = token.value;
      const entries: (readonly [CborValue, CborValue])[] = [];
      for (let i = 0; i < length; i++) {
        const key = readItem(tokens, depth + 1);
        if (key === BREAK) {
          if (length !== Infinity) throw new Error('unexpected break');
          break;
        }
        entries.push([key, readValue(tokens, depth + 1)]);
      }
      return { kind: 'map', entries };
    }
    default:
      throw new Error(`unsupported token type ${token.type.name}`);
  }
}

export function decodeDocument(buffer: Uint8Array, sourcePath: string): CborValue {
  if (buffer.length === 0) {
    throw new DocumentDecodeError(`${sourcePath} is empty`, { sourcePath });
  }

  try {
    const tokens = new Tokenizer(buffer);
    const document = readValue(tokens, 0);
    if (!tokens.done()) {
      throw new Error(`${buffer.length - tokens.pos()} trailing byte(s)`);
    }
    return document;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DocumentDecodeError(
      `Failed to decode ${sourcePath}: ${reason}`,
      { sourcePath, bytes: buffer.length },
      { cause: error }
    );
  }
}

/**
 * Look up a text key; undefined unless `value` is a map holding that key.
 * A repeated key resolves to its last occurrence.
 */
export function lookup(value: CborValue, key: string): CborValue | undefined {
  if (value.kind !== 'map') {
    return undefined;
  }

  let found: CborValue | undefined;
  for (const [entryKey, entryValue] of value.entries) {
    if (entryKey.kind === 'text' && entryKey.value === key) {
      found = entryValue;
    }
  }
  return found;
}

export function lookupPath(value: CborValue, path: readonly string[]): CborValue | undefined {
  let current = value;
  for (const key of path) {
    const next = lookup(current, key);
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }
  return current;
}

export function asFloat(value: CborValue | undefined): number | undefined {
  return value?.kind === 'float' ? value.value : undefined;
}

export const POINT_ESTIMATE_PATH = ['estimates', 'median', 'point_estimate'] as const;

/** The median point estimate, when the document has the expected statistics shape. */
export function medianPointEstimate(document: CborValue): number | undefined {
  return asFloat(lookupPath(document, POINT_ESTIMATE_PATH));
}
