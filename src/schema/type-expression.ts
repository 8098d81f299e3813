/**
 * Parsed form of a type expression such as `text.rust`, `.integer` or
 * `$types.Address`.
 */
export type TypeExpression =
  | { readonly kind: 'text'; readonly language?: string }
  | {
      readonly kind:
        | 'integer'
        | 'float'
        | 'boolean'
        | 'null'
        | 'any'
        | 'array'
        | 'map'
        | 'tuple'
        | 'record'
        | 'literal'
        | 'union';
    }
  | { readonly kind: 'reference'; readonly name: string };

const KEYWORD_LIST = [
  'integer',
  'float',
  'boolean',
  'null',
  'any',
  'array',
  'map',
  'tuple',
  'record',
  'literal',
  'union',
] as const;

type Keyword = (typeof KEYWORD_LIST)[number];

const KEYWORDS: ReadonlySet<string> = new Set(KEYWORD_LIST);

function isKeyword(text: string): text is Keyword {
  return KEYWORDS.has(text);
}

const NAME_RE = /^[\p{L}_][\p{L}\p{N}_-]*$/u;
const TYPE_NAME_RE = /^\p{Lu}[\p{L}\p{N}_-]*$/u;

/**
 * Parses a type expression, with or without a leading `.`.
 * Returns `undefined` when the text is not a type expression.
 */
export function parseTypeExpression(text: string): TypeExpression | undefined {
  const body = text.startsWith('.') ? text.slice(1) : text;
  if (body === 'text') return { kind: 'text' };
  if (body.startsWith('text.')) {
    const language = body.slice('text.'.length);
    return NAME_RE.test(language) ? { kind: 'text', language } : undefined;
  }
  if (isKeyword(body)) return { kind: body };
  if (body.startsWith('$types.')) {
    const name = body.slice('$types.'.length);
    return NAME_RE.test(name) ? { kind: 'reference', name } : undefined;
  }
  if (TYPE_NAME_RE.test(body)) return { kind: 'reference', name: body };
  return undefined;
}

/**
 * True for a text leaf written as a type path literal (`".text"`,
 * `".$types.User"`). The leading dot is required here.
 */
export function isTypePathLiteral(text: string): boolean {
  return text.startsWith('.') && parseTypeExpression(text) !== undefined;
}
