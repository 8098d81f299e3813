import { keyEquals } from './key.js';
import type { KeyValue } from './key.js';

/**
 * Language tag of a text value.
 *
 * - `plaintext`: an ordinary string.
 * - `implicit` : code whose language is left to the reader.
 * - `tagged`   : code in a named language (`rust`, `sql`, ...).
 */
export type TextLanguage =
  | { readonly kind: 'plaintext' }
  | { readonly kind: 'implicit' }
  | { readonly kind: 'tagged'; readonly tag: string };

export type PrimitiveValue =
  | { readonly type: 'null' }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'integer'; readonly value: bigint }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'text'; readonly value: string; readonly language: TextLanguage };

export const PLAINTEXT: TextLanguage = { kind: 'plaintext' };

export const prim = {
  null: (): PrimitiveValue => ({ type: 'null' }),
  bool: (value: boolean): PrimitiveValue => ({ type: 'boolean', value }),
  int: (value: bigint | number): PrimitiveValue => ({ type: 'integer', value: BigInt(value) }),
  float: (value: number): PrimitiveValue => ({ type: 'float', value }),
  text: (value: string, language: TextLanguage = PLAINTEXT): PrimitiveValue => ({
    type: 'text',
    value,
    language,
  }),
} as const;

/** Value data without the extension table. */
export type ValueData =
  | { readonly kind: 'hole'; readonly label?: string }
  | { readonly kind: 'primitive'; readonly value: PrimitiveValue }
  | { readonly kind: 'array'; readonly items: readonly Value[] }
  | { readonly kind: 'tuple'; readonly items: readonly Value[] }
  | { readonly kind: 'map'; readonly entries: ReadonlyArray<readonly [KeyValue, Value]> };

/**
 * Generic interchange projection of a document subtree. Extension entries are
 * kept in `extensions`, so projecting and rebuilding a document is lossless.
 */
export type Value = ValueData & { readonly extensions?: Readonly<Record<string, Value>> };

/** Names used in diagnostics for the runtime kind of a value. */
export type ValueKindName =
  | 'hole'
  | 'null'
  | 'boolean'
  | 'integer'
  | 'float'
  | 'text'
  | 'array'
  | 'tuple'
  | 'map';

export function primitiveKindName(value: PrimitiveValue): ValueKindName {
  return value.type;
}

export function valueKindName(value: ValueData): ValueKindName {
  return value.kind === 'primitive' ? primitiveKindName(value.value) : value.kind;
}

function languageEquals(a: TextLanguage, b: TextLanguage): boolean {
  if (a.kind === 'tagged' && b.kind === 'tagged') return a.tag === b.tag;
  return a.kind === b.kind;
}

export function primitiveEquals(a: PrimitiveValue, b: PrimitiveValue): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'boolean':
      return b.type === 'boolean' && a.value === b.value;
    case 'integer':
      return b.type === 'integer' && a.value === b.value;
    case 'float':
      return b.type === 'float' && Object.is(a.value, b.value);
    case 'text':
      return b.type === 'text' && a.value === b.value && languageEquals(a.language, b.language);
  }
}

export interface ValueEqualsOptions {
  /** Compare extension tables too. @default false */
  extensions?: boolean;
}

/**
 * Structural equality of two values. Map entries are compared by key, not by
 * order. Extensions are ignored unless `options.extensions` is set.
 */
export function valueEquals(a: Value, b: Value, options: ValueEqualsOptions = {}): boolean {
  if (options.extensions && !extensionsEqual(a, b, options)) return false;
  switch (a.kind) {
    case 'hole':
      return b.kind === 'hole' && a.label === b.label;
    case 'primitive':
      return b.kind === 'primitive' && primitiveEquals(a.value, b.value);
    case 'array':
      return b.kind === 'array' && itemsEqual(a.items, b.items, options);
    case 'tuple':
      return b.kind === 'tuple' && itemsEqual(a.items, b.items, options);
    case 'map': {
      if (b.kind !== 'map' || a.entries.length !== b.entries.length) return false;
      const others = b.entries;
      return a.entries.every(([key, value]) => {
        const other = others.find(([k]) => keyEquals(k, key));
        return other !== undefined && valueEquals(value, other[1], options);
      });
    }
  }
}

function itemsEqual(
  a: readonly Value[],
  b: readonly Value[],
  options: ValueEqualsOptions,
): boolean {
  return a.length === b.length && a.every((item, i) => valueEquals(item, b[i], options));
}

function extensionsEqual(a: Value, b: Value, options: ValueEqualsOptions): boolean {
  const left = Object.entries(a.extensions ?? {});
  const right = new Map(Object.entries(b.extensions ?? {}));
  if (left.length !== right.size) return false;
  return left.every(([name, value]) => {
    const other = right.get(name);
    return other !== undefined && valueEquals(value, other, options);
  });
}
