import { formatKey, isIdentifier } from './key.js';
import type { KeyValue } from './key.js';

export type PathSegment =
  | { readonly kind: 'ident'; readonly name: string }
  | { readonly kind: 'extension'; readonly name: string }
  | { readonly kind: 'value'; readonly key: KeyValue }
  | { readonly kind: 'tuple-index'; readonly index: number }
  | { readonly kind: 'array-index'; readonly index?: number };

/** Ordered segments from a start node (usually the root) to a target node. */
export type EurePath = readonly PathSegment[];

export const MAX_TUPLE_INDEX = 255;

/**
 * Segment constructors.
 *
 * @example
 * ```typescript
 * const path = [seg.ident('items'), seg.index(0), seg.ext('type')];
 * formatPath(path); // 'items[0].$type'
 * ```
 */
export const seg = {
  ident: (name: string): PathSegment => ({ kind: 'ident', name }),
  ext: (name: string): PathSegment => ({ kind: 'extension', name }),
  key: (key: KeyValue): PathSegment => ({ kind: 'value', key }),
  tuple: (index: number): PathSegment => {
    if (!Number.isInteger(index) || index < 0 || index > MAX_TUPLE_INDEX) {
      throw new RangeError(`Tuple index must be an integer in 0..${MAX_TUPLE_INDEX}, got ${index}`);
    }
    return { kind: 'tuple-index', index };
  },
  index: (index?: number): PathSegment =>
    index === undefined ? { kind: 'array-index' } : { kind: 'array-index', index },
} as const;

/**
 * Segment addressing a map entry: an identifier when the key is spelled like
 * one, a literal key segment otherwise.
 */
export function segmentForKey(key: KeyValue): PathSegment {
  const plain = typeof key === 'string' && isIdentifier(key) && key !== 'true' && key !== 'false';
  return plain ? seg.ident(key) : seg.key(key);
}

function formatSegment(segment: PathSegment): string {
  switch (segment.kind) {
    case 'ident':
      return segment.name;
    case 'extension':
      return `$${segment.name}`;
    case 'value':
      return formatKey(segment.key);
    case 'tuple-index':
      return `#${segment.index}`;
    case 'array-index':
      return segment.index === undefined ? '[]' : `[${segment.index}]`;
  }
}

/**
 * Renders a path in dot/bracket syntax, e.g. `config.$types.items[0]."key with space"`.
 * The empty path renders as `(root)`.
 */
export function formatPath(path: EurePath): string {
  if (path.length === 0) return '(root)';
  let out = '';
  path.forEach((segment, i) => {
    if (i > 0 && segment.kind !== 'array-index') out += '.';
    out += formatSegment(segment);
  });
  return out;
}

export function segmentEquals(a: PathSegment, b: PathSegment): boolean {
  return formatSegment(a) === formatSegment(b) && a.kind === b.kind;
}

export function pathEquals(a: EurePath, b: EurePath): boolean {
  return a.length === b.length && a.every((s, i) => segmentEquals(s, b[i]));
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const IDENT_CHAR_RE = /[\p{L}\p{N}_-]/u;

class PathReader {
  pos = 0;

  constructor(private readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text[this.pos] ?? '';
  }

  fail(message: string): never {
    throw new SyntaxError(`Invalid path "${this.text}" at offset ${this.pos}: ${message}`);
  }

  expect(ch: string): void {
    if (this.peek() !== ch) this.fail(`expected "${ch}"`);
    this.pos++;
  }

  readWhile(re: RegExp): string {
    const start = this.pos;
    while (!this.done && re.test(this.peek())) this.pos++;
    return this.text.slice(start, this.pos);
  }

  readIdent(): string {
    const name = this.readWhile(IDENT_CHAR_RE);
    if (!isIdentifier(name)) this.fail('expected an identifier');
    return name;
  }

  readQuoted(): string {
    this.expect('"');
    let out = '';
    for (;;) {
      if (this.done) this.fail('unterminated quoted key');
      const ch = this.peek();
      this.pos++;
      if (ch === '"') return out;
      if (ch === '\\') {
        if (this.done) this.fail('unterminated escape');
        out += this.peek();
        this.pos++;
      } else {
        out += ch;
      }
    }
  }

  readSegment(): PathSegment {
    const ch = this.peek();
    if (ch === '$') {
      this.pos++;
      return seg.ext(this.readIdent());
    }
    if (ch === '#') {
      this.pos++;
      const digits = this.readWhile(/[0-9]/);
      if (digits === '') this.fail('expected a tuple index');
      const index = Number(digits);
      if (index > MAX_TUPLE_INDEX) this.fail(`tuple index ${index} exceeds ${MAX_TUPLE_INDEX}`);
      return seg.tuple(index);
    }
    if (ch === '"') return seg.key(this.readQuoted());
    if (ch === '-' || /[0-9]/.test(ch)) {
      const sign = ch === '-' ? '-' : '';
      if (sign) this.pos++;
      const digits = this.readWhile(/[0-9]/);
      if (digits === '') this.fail('expected digits');
      return seg.key(BigInt(`${sign}${digits}`));
    }
    const name = this.readIdent();
    if (name === 'true' || name === 'false') return seg.key(name === 'true');
    return seg.ident(name);
  }

  readIndex(): PathSegment {
    this.expect('[');
    const digits = this.readWhile(/[0-9]/);
    this.expect(']');
    return digits === '' ? seg.index() : seg.index(Number(digits));
  }
}

/**
 * Parses the syntax produced by {@link formatPath}. `(root)` and the empty
 * string both yield the empty path. Throws `SyntaxError` on malformed input.
 */
export function parsePath(text: string): EurePath {
  if (text === '' || text === '(root)') return [];
  const reader = new PathReader(text);
  const path: PathSegment[] = [];
  if (reader.peek() === '[') reader.fail('a path cannot start with an array index');
  path.push(reader.readSegment());
  while (!reader.done) {
    const ch = reader.peek();
    if (ch === '.') {
      reader.pos++;
      path.push(reader.readSegment());
    } else if (ch === '[') {
      path.push(reader.readIndex());
    } else {
      reader.fail(`unexpected "${ch}"`);
    }
  }
  return path;
}
