/**
 * Literal values usable as map keys: text, integer, boolean, or a tuple of keys.
 * Floats, null and holes are excluded so key equality stays exact.
 */
export type KeyValue = string | bigint | boolean | TupleKey;

export interface TupleKey {
  readonly tuple: readonly KeyValue[];
}

/**
 * How a child is addressed from its parent.
 *
 * - `ident`    : a plain identifier; the same entry as the text key of that spelling.
 * - `extension`: an entry of the node's extension table (`$name`).
 * - `value`    : an arbitrary literal key.
 */
export type ObjectKey =
  | { readonly kind: 'ident'; readonly name: string }
  | { readonly kind: 'extension'; readonly name: string }
  | { readonly kind: 'value'; readonly value: KeyValue };

const IDENTIFIER_RE = /^[\p{L}_][\p{L}\p{N}_-]*$/u;

/** True when `text` can be written as a bare identifier segment. */
export function isIdentifier(text: string): boolean {
  return IDENTIFIER_RE.test(text);
}

export function isTupleKey(key: KeyValue): key is TupleKey {
  return typeof key === 'object';
}

/**
 * Canonical string for a key, used to index map entries.
 * Distinct keys always produce distinct strings.
 */
export function keyId(key: KeyValue): string {
  if (typeof key === 'string') return `s:${key}`;
  if (typeof key === 'bigint') return `i:${key.toString()}`;
  if (typeof key === 'boolean') return `b:${String(key)}`;
  return `t:[${key.tuple.map(keyId).join(',')}]`;
}

export function keyEquals(a: KeyValue, b: KeyValue): boolean {
  return keyId(a) === keyId(b);
}

function quote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Renders a key the way it appears in a path: text quoted, everything else plain.
 */
export function formatKey(key: KeyValue): string {
  if (typeof key === 'string') return quote(key);
  if (typeof key === 'bigint') return key.toString();
  if (typeof key === 'boolean') return String(key);
  return `(${key.tuple.map(formatKey).join(', ')})`;
}

/**
 * Plain-text name of a key, used where a record field name is expected.
 * Text keys are returned unquoted.
 */
export function keyName(key: KeyValue): string {
  return typeof key === 'string' ? key : formatKey(key);
}
