import { describe, expect, it } from 'vitest';
import { Document } from '../src/document/document.js';
import { formatPath } from '../src/document/path.js';
import { prim } from '../src/document/value.js';
import type { PrimitiveValue, Value } from '../src/document/value.js';
import { documentFromJson } from '../src/json.js';
import type { ValidateOptions } from '../src/options.js';
import { extractSchema } from '../src/schema/extractor.js';
import { SchemaBuilder, SchemaDocument } from '../src/schema/schema-document.js';
import { asSchemaNodeId } from '../src/schema/types.js';
import type { JsonValue } from '../src/types.js';
import type { ValidationResult } from '../src/validation/diagnostics.js';
import { ValidatorError } from '../src/validation/errors.js';
import { validate } from '../src/validation/validator.js';

function schemaOf(json: JsonValue): SchemaDocument {
  return extractSchema(documentFromJson(json)).schema;
}

function run(schema: JsonValue | SchemaDocument, data: JsonValue | Document, options?: ValidateOptions): ValidationResult {
  const doc = data instanceof Document ? data : documentFromJson(data);
  return validate(doc, schema instanceof SchemaDocument ? schema : schemaOf(schema), options);
}

const kinds = (result: ValidationResult): string[] => result.errors.map((e) => e.kind);
const paths = (result: ValidationResult): string[] => result.errors.map((e) => formatPath(e.path));

function catchValidatorError(fn: () => unknown): ValidatorError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidatorError) return err;
    throw err;
  }
  throw new Error('Expected a ValidatorError');
}

const primitive = (value: PrimitiveValue): Value => ({ kind: 'primitive', value });

/** A one-field map document `{ name: value }`. */
const single = (name: string, value: Value): Document =>
  Document.fromValue({ kind: 'map', entries: [[name, value]] });

// ---------------------------------------------------------------------------
// Integers and floats
// ---------------------------------------------------------------------------

describe('validate: numbers', () => {
  const ranged = { n: { $type: 'integer', $min: 0, $max: 10, '$multiple-of': 5 } };

  it('checks integer range and multiple independently', () => {
    const over = run(ranged, { n: 15 });
    expect(kinds(over)).toEqual(['out-of-range']);
    expect(over.errors[0].title).toBe('15 is not in range [0, 10].');
    expect(paths(over)).toEqual(['n']);

    const seven = run(ranged, { n: 7 });
    expect(kinds(seven)).toEqual(['not-multiple-of']);
    expect(seven.errors[0].title).toBe('7 is not a multiple of 5.');

    expect(run(ranged, { n: 10 }).errors).toEqual([]);
    expect(kinds(run(ranged, { n: -5 }))).toEqual(['out-of-range']);
  });

  it('rejects other kinds where an integer is expected', () => {
    const result = run(ranged, { n: 'ten' });
    expect(kinds(result)).toEqual(['type-mismatch']);
    expect(result.errors[0].title).toBe('Expected integer, found text.');
    expect(kinds(run(ranged, { n: 2.5 }))).toEqual(['type-mismatch']);
  });

  it('checks float multiples exactly', () => {
    const schema = { x: { $type: 'float', $min: 0, $max: 1, '$multiple-of': 0.1 } };
    expect(run(schema, { x: 0.3 }).errors).toEqual([]);
    expect(run(schema, { x: 1 }).errors).toEqual([]);

    const off = run(schema, { x: 1.05 });
    expect(kinds(off)).toEqual(['out-of-range', 'not-multiple-of']);
    expect(off.errors[0].title).toBe('1.05 is not in range [0, 1].');
    expect(off.errors[1].title).toBe('1.05 is not a multiple of 0.1.');
  });

  it('fails NaN on every bound and infinities on one side only', () => {
    const bounded = { x: { $type: 'float', $min: 0, '$multiple-of': 0.5 } };
    const nan = run(bounded, single('x', primitive(prim.float(Number.NaN))));
    expect(kinds(nan)).toEqual(['out-of-range', 'not-multiple-of']);
    expect(nan.errors[0].title).toBe('NaN is not in range [0, ∞).');

    const lowerOnly = { x: { $type: 'float', $min: 0 } };
    expect(run(lowerOnly, single('x', primitive(prim.float(Number.POSITIVE_INFINITY)))).errors).toEqual([]);
    expect(kinds(run(lowerOnly, single('x', primitive(prim.float(Number.NEGATIVE_INFINITY)))))).toEqual([
      'out-of-range',
    ]);
  });

  it('honours exclusive bounds', () => {
    const schema = { x: { $type: 'float', '$exclusive-min': 0, '$exclusive-max': 1 } };
    const zero = run(schema, { x: 0 });
    expect(kinds(zero)).toEqual(['out-of-range']);
    expect(zero.errors[0].title).toBe('0 is not in range (0, 1).');
    expect(run(schema, { x: 0.5 }).errors).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

describe('validate: text', () => {
  const code = { code: { $type: 'text', '$min-length': 2, '$max-length': 4, $pattern: '^[a-z]+$' } };

  it('checks length in code points and the pattern', () => {
    expect(run(code, { code: 'abc' }).errors).toEqual([]);

    const short = run(code, { code: 'a' });
    expect(kinds(short)).toEqual(['length-out-of-bounds']);
    expect(short.errors[0].title).toBe('Text length 1 is outside 2..4.');

    expect(kinds(run(code, { code: 'ABCDE' }))).toEqual(['length-out-of-bounds', 'pattern-mismatch']);
    expect(kinds(run({ s: { $type: 'text', '$max-length': 2 } }, { s: '😀😀' }))).toEqual([]);
  });

  it('matches the pattern anywhere unless anchored', () => {
    expect(run({ s: { $type: 'text', $pattern: '[0-9]' } }, { s: 'abc1' }).errors).toEqual([]);
  });

  it('checks the text language', () => {
    const sql = { snippet: '.text.sql' };
    const tagged = (tag: string): Document =>
      single('snippet', primitive(prim.text('select 1', { kind: 'tagged', tag })));

    const plain = run(sql, { snippet: 'select 1' });
    expect(kinds(plain)).toEqual(['language-mismatch']);
    expect(plain.errors[0].title).toBe('Expected text in language "sql", found "plaintext".');

    expect(run(sql, tagged('sql')).errors).toEqual([]);
    expect(run(sql, single('snippet', primitive(prim.text('select 1', { kind: 'implicit' })))).errors).toEqual([]);
    expect(kinds(run(sql, tagged('rust')))).toEqual(['language-mismatch']);
  });
});

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

describe('validate: records', () => {
  const person = { name: '.text', age: { $type: 'integer', $optional: true } };

  it('accepts a record with optional fields left out', () => {
    const result = run(person, { name: 'Ada' });
    expect(result.errors).toEqual([]);
    expect(result.isValid).toBe(true);
    expect(result.isComplete).toBe(true);
  });

  it('reports a missing required field at the field path', () => {
    const result = run(person, { age: 3 });
    expect(kinds(result)).toEqual(['missing-field']);
    expect(paths(result)).toEqual(['name']);
    expect(result.errors[0].title).toBe('Required field "name" is missing.');
    expect(result.errors[0].pass).toBe('structural');
    expect(result.isComplete).toBe(true);
    expect(result.isValid).toBe(false);
  });

  it('reports unknown fields unless the record allows them', () => {
    const result = run(person, { name: 'Ada', extra: 1 });
    expect(kinds(result)).toEqual(['unknown-field']);
    expect(paths(result)).toEqual(['extra']);
    expect(result.errors[0].title).toBe('Unknown field "extra".');

    expect(run({ ...person, '$unknown-fields': 'allow' }, { name: 'Ada', extra: 1 }).errors).toEqual([]);
  });

  it('reports a non-map value as a type mismatch', () => {
    const result = run({ server: { host: '.text' } }, { server: 'localhost' });
    expect(result.errors[0].title).toBe('Expected record, found text.');
  });

  it('warns about deprecated fields that are present', () => {
    const schema = { old: { $type: 'text', $optional: true, $deprecated: true } };
    const result = run(schema, { old: 'x' });
    expect(result.errors).toEqual([]);
    expect(result.warnings.map((w) => [w.kind, formatPath(w.path)])).toEqual([['deprecated-field', 'old']]);
    expect(run(schema, {}).warnings).toEqual([]);
  });

  it('accepts anything for a field with annotations but no type', () => {
    expect(run({ blob: { $description: 'free-form' } }, { blob: [1, 'two', { three: 3 }] }).errors).toEqual([]);
  });

  it('looks fields up by their literal key', () => {
    const schema = extractSchema(
      Document.fromValue({ kind: 'map', entries: [[1n, primitive(prim.text('.integer'))]] }),
    ).schema;
    expect(run(schema, Document.fromValue({ kind: 'map', entries: [[1n, primitive(prim.int(5))]] })).errors).toEqual([]);

    const result = run(schema, Document.fromValue({ kind: 'map', entries: [['1', primitive(prim.int(5))]] }));
    expect(kinds(result)).toEqual(['missing-field', 'unknown-field']);
    expect(paths(result)).toEqual(['1', '"1"']);
    expect(result.errors[0].title).toBe('Required field 1 is missing.');
  });
});

// ---------------------------------------------------------------------------
// Arrays, maps, tuples, literals
// ---------------------------------------------------------------------------

describe('validate: collections', () => {
  const tags = { tags: { $array: 'text', '$min-length': 1, '$max-length': 2, $unique: true } };

  it('checks array length, items and uniqueness', () => {
    expect(run(tags, { tags: ['a', 'b'] }).errors).toEqual([]);

    const empty = run(tags, { tags: [] });
    expect(kinds(empty)).toEqual(['array-length-out-of-bounds']);
    expect(empty.errors[0].title).toBe('Array has 0 items, expected 1..2.');

    const repeated = run(tags, { tags: ['a', 'a'] });
    expect(kinds(repeated)).toEqual(['array-not-unique']);
    expect(repeated.errors[0].title).toBe('Items 0 and 1 are equal.');

    const mixed = run(tags, { tags: ['a', 1] });
    expect(kinds(mixed)).toEqual(['type-mismatch']);
    expect(paths(mixed)).toEqual(['tags[1]']);

    expect(run(tags, { tags: 'a' }).errors[0].title).toBe('Expected array, found text.');
  });

  it('checks map keys and values at the entry path', () => {
    const limits = { limits: { $key: { $type: 'text', $pattern: '^[a-z]+$' }, $value: '.integer' } };
    const result = run(limits, { limits: { cpu: 2, Mem: 'x' } });
    expect(kinds(result)).toEqual(['pattern-mismatch', 'type-mismatch']);
    expect(paths(result)).toEqual(['limits.Mem', 'limits.Mem']);
  });

  it('reports tuple arity once and still checks the overlap', () => {
    const point = { point: { $elements: ['.integer', '.integer'] } };
    const doc = single('point', {
      kind: 'tuple',
      items: [primitive(prim.int(1)), primitive(prim.text('x')), primitive(prim.int(3))],
    });
    const result = run(point, doc);
    expect(kinds(result)).toEqual(['arity-mismatch', 'type-mismatch']);
    expect(paths(result)).toEqual(['point', 'point.#1']);
    expect(result.errors[0].title).toBe('Expected a tuple of 2, found 3.');

    expect(run(point, { point: [1, 2] }).errors[0].title).toBe('Expected tuple, found array.');
  });

  it('compares literals structurally', () => {
    const version = { version: { $literal: 2 } };
    expect(run(version, { version: 2 }).errors).toEqual([]);
    expect(kinds(run(version, { version: 3 }))).toEqual(['literal-mismatch']);
  });
});

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

describe('validate: references', () => {
  it('validates through named types', () => {
    const schema = { $types: { Port: { $type: 'integer', $min: 1 } }, port: '.$types.Port' };
    const result = run(schema, { port: 0 });
    expect(kinds(result)).toEqual(['out-of-range']);
    expect(paths(result)).toEqual(['port']);
  });

  const linked = {
    $types: { Node: { value: '.integer', next: { $type: 'Node', $optional: true } } },
    $type: 'Node',
  };

  it('follows recursive types', () => {
    const result = run(linked, { value: 1, next: { value: 2, next: { value: 'x' } } });
    expect(kinds(result)).toEqual(['type-mismatch']);
    expect(paths(result)).toEqual(['next.next.value']);
  });

  it('stops at the depth limit', () => {
    const result = run(linked, { value: 1, next: { value: 2, next: { value: 3 } } }, { maxDepth: 2 });
    expect(kinds(result)).toEqual(['recursion-limit']);
    expect(paths(result)).toEqual(['next.next.value']);
  });

  it('reports a dangling reference at every occurrence', () => {
    const b = new SchemaBuilder();
    const first = b.add({ kind: 'reference', name: 'Missing' });
    const second = b.add({ kind: 'reference', name: 'Missing' });
    const root = b.add(
      b.record([
        { key: 'a', schema: first, optional: false },
        { key: 'b', schema: second, optional: false },
      ]),
    );
    const result = run(b.build(root), { a: 1, b: 2 });
    expect(kinds(result)).toEqual(['dangling-reference', 'dangling-reference']);
    expect(paths(result)).toEqual(['a', 'b']);
    expect(result.errors[0].title).toBe('Type "Missing" is not declared.');
  });

  it('reports a dangling reference among the variants it tries', () => {
    const b = new SchemaBuilder();
    const missing = b.add({ kind: 'reference', name: 'Missing' });
    const textId = b.add({ kind: 'text' });
    const root = b.add(
      b.union([
        { name: 'a', schema: missing },
        { name: 'b', schema: textId },
      ]),
    );
    const schema = b.build(root);

    const unmatched = run(schema, 5, { unionTagMode: 'lenient' });
    expect(kinds(unmatched)).toEqual(['dangling-reference', 'no-variant-matched']);
    expect(paths(unmatched)).toEqual(['(root)', '(root)']);
    expect(unmatched.errors[0].title).toBe('Type "Missing" is not declared.');

    expect(kinds(run(schema, 'x', { unionTagMode: 'lenient' }))).toEqual(['dangling-reference']);
  });

  it('validates the root against a named type on request', () => {
    const schema = { $types: { Port: '.integer' } };
    expect(run(schema, 8080, { rootType: 'Port' }).isValid).toBe(true);
    expect(kinds(run(schema, 'http', { rootType: 'Port' }))).toEqual(['type-mismatch']);
  });
});

describe('validate: cascade types', () => {
  it('checks undeclared fields against the cascade type', () => {
    const schema = { '$cascade-type': '.text', name: '.text' };
    expect(run(schema, { name: 'a', extra: 'b' }).errors).toEqual([]);

    const result = run(schema, { name: 'a', extra: 1 });
    expect(kinds(result)).toEqual(['type-mismatch']);
    expect(paths(result)).toEqual(['extra']);
  });

  it('carries the cascade into records nested in fields', () => {
    const schema = { '$cascade-type': '.integer', server: { host: '.text' } };
    expect(run(schema, { server: { host: 'h', port: 8080 } }).errors).toEqual([]);
    expect(paths(run(schema, { server: { host: 'h', port: 'x' } }))).toEqual(['server.port']);
  });

  it('keeps a subtree cascade inside that subtree', () => {
    const schema = { limits: { '$cascade-type': '.integer', cpu: '.integer' }, name: '.text' };
    expect(run(schema, { limits: { cpu: 1, memory: 512 }, name: 'a' }).errors).toEqual([]);

    const result = run(schema, { limits: { cpu: 1 }, name: 'a', extra: 1 });
    expect(kinds(result)).toEqual(['unknown-field']);
    expect(paths(result)).toEqual(['extra']);
  });

  it('leaves records declared in annotations closed', () => {
    const schema = { '$cascade-type': '.text', list: { $array: { a: '.integer' } } };
    const result = run(schema, { list: [{ a: 1, b: 'x' }] });
    expect(kinds(result)).toEqual(['unknown-field']);
    expect(paths(result)).toEqual(['list[0].b']);
  });
});

describe('validate: pair shorthands', () => {
  it('reads $range and $length as inclusive pairs', () => {
    const schema = {
      port: { $type: 'integer', $range: [1, 65535] },
      code: { $type: 'text', $length: [2, null] },
    };
    expect(run(schema, { port: 65535, code: 'abcdef' }).errors).toEqual([]);

    const result = run(schema, { port: 0, code: 'a' });
    expect(kinds(result)).toEqual(['out-of-range', 'length-out-of-bounds']);
    expect(result.errors[0].title).toBe('0 is not in range [1, 65535].');
  });
});

describe('validate: declared examples', () => {
  const { schema } = extractSchema(
    documentFromJson({
      $types: {
        Port: { $type: 'integer', $range: [1, 65535], $examples: [80, 8080] },
        Server: { host: '.text', port: '.$types.Port', $examples: [{ host: 'localhost', port: 80 }] },
      },
    }),
  );

  const examplesOf = (name: string): readonly Value[] => {
    const id = schema.lookupType(name);
    return id === undefined ? [] : (schema.node(id).metadata.examples ?? []);
  };

  it.each(['Port', 'Server'])('accepts every example of %s as its root type', (name) => {
    const examples = examplesOf(name);
    expect(examples.length).toBeGreaterThan(0);
    for (const example of examples) {
      expect(validate(Document.fromValue(example), schema, { rootType: name }).errors).toEqual([]);
    }
  });

  it('still rejects values outside the named type', () => {
    const result = validate(documentFromJson({ host: 'localhost', port: 0 }), schema, { rootType: 'Server' });
    expect(kinds(result)).toEqual(['out-of-range']);
    expect(paths(result)).toEqual(['port']);
  });
});

// ---------------------------------------------------------------------------
// Completeness
// ---------------------------------------------------------------------------

describe('validate: holes', () => {
  const schema = { name: '.text', nick: { $type: 'text', $optional: true } };

  it('reports required holes in the completeness pass only', () => {
    const doc = Document.fromValue({
      kind: 'map',
      entries: [
        ['name', { kind: 'hole', label: 'todo' }],
        ['nick', { kind: 'hole' }],
      ],
    });
    const result = run(schema, doc);

    expect(result.errors.map((e) => [e.kind, e.pass, formatPath(e.path)])).toEqual([
      ['missing-field', 'completeness', 'name'],
    ]);
    expect(result.errors[0].title).toBe('Required value is the unfilled hole !todo.');
    expect(result.isValid).toBe(false);
    expect(result.isComplete).toBe(false);
  });

  it('words unlabelled holes without a label', () => {
    const result = run(schema, single('name', { kind: 'hole' }));
    expect(result.errors[0].title).toBe('Required value is a hole.');
  });

  it('ignores holes the schema never reaches', () => {
    const result = run({ '$unknown-fields': 'allow' }, single('scratch', { kind: 'hole' }));
    expect(result.errors).toEqual([]);
    expect(result.isComplete).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Options and corrupt schemas
// ---------------------------------------------------------------------------

describe('validate: setup errors', () => {
  it('rejects invalid options', () => {
    expect(catchValidatorError(() => run({}, {}, { maxDepth: 0 })).kind).toBe('invalid-options');
    expect(catchValidatorError(() => run({}, {}, { maxDepth: 1.5 })).kind).toBe('invalid-options');
  });

  it('rejects an unknown root type', () => {
    expect(catchValidatorError(() => run({}, {}, { rootType: 'Nope' })).kind).toBe('unknown-root-type');
  });

  it('rejects ids outside the arena', () => {
    const b = new SchemaBuilder();
    const root = b.add(b.record([{ key: 'x', schema: asSchemaNodeId(99), optional: false }]));
    expect(catchValidatorError(() => run(b.build(root), { x: 1 })).kind).toBe('corrupt-schema');
  });

  it('rejects patterns that do not compile', () => {
    const b = new SchemaBuilder();
    const root = b.add({ kind: 'text', pattern: '(' });
    expect(catchValidatorError(() => run(b.build(root), 'x')).kind).toBe('corrupt-schema');
  });

  it('rejects named types that only refer to each other', () => {
    const b = new SchemaBuilder();
    const a = b.add({ kind: 'reference', name: 'B' });
    const other = b.add({ kind: 'reference', name: 'A' });
    b.registerType('A', a);
    b.registerType('B', other);
    const root = b.add({ kind: 'any' });
    expect(catchValidatorError(() => run(b.build(root), {})).kind).toBe('reference-cycle');
  });
});
