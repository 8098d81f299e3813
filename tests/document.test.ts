import { describe, expect, it } from 'vitest';
import { Document, DocumentBuilder } from '../src/document/document.js';
import { asNodeId } from '../src/document/node.js';
import { formatPath, parsePath, seg } from '../src/document/path.js';
import { prim, valueEquals } from '../src/document/value.js';
import type { Value } from '../src/document/value.js';
import { DocumentError } from '../src/validation/errors.js';

function catchDocumentError(fn: () => unknown): DocumentError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DocumentError) return err;
    throw err;
  }
  throw new Error('Expected a DocumentError');
}

const text = (value: string): Value => ({ kind: 'primitive', value: prim.text(value) });
const int = (value: number): Value => ({ kind: 'primitive', value: prim.int(value) });

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

describe('DocumentBuilder', () => {
  it('creates intermediate maps while navigating', () => {
    const b = new DocumentBuilder();
    const port = b.navigate([seg.ident('server'), seg.ident('port')]);
    b.bindPrimitive(port, prim.int(8080));
    const doc = b.finish();

    expect(doc.resolve(parsePath('server.port'))).toBe(port);
    expect(doc.node(port).content).toEqual({ kind: 'primitive', value: { type: 'integer', value: 8080n } });
    expect(formatPath(doc.pathOf(port))).toBe('server.port');
    expect(doc.size).toBe(3);
  });

  it('treats an identifier and the text key of the same spelling as one entry', () => {
    const b = new DocumentBuilder();
    const byIdent = b.addMapChild(b.root, 'name');
    expect(b.navigate([seg.key('name')])).toBe(byIdent);
  });

  it('keeps extensions apart from map keys of the same name', () => {
    const b = new DocumentBuilder();
    b.bindPrimitive(b.addExtension(b.root, 'type'), prim.text('ext'));
    b.bindPrimitive(b.addMapChild(b.root, 'type'), prim.text('key'));
    const value = b.finish().toValue();

    expect(value).toEqual({
      kind: 'map',
      entries: [['type', text('key')]],
      extensions: { type: text('ext') },
    });
  });

  it('rejects a second assignment', () => {
    const b = new DocumentBuilder();
    const id = b.addMapChild(b.root, 'x');
    b.bindPrimitive(id, prim.int(1));
    const err = catchDocumentError(() => b.bindPrimitive(id, prim.int(2)));
    expect(err.kind).toBe('already-assigned');
    expect(formatPath(err.path)).toBe('x');
  });

  it('rejects a duplicate map key', () => {
    const b = new DocumentBuilder();
    b.addMapChild(b.root, 'x');
    expect(catchDocumentError(() => b.addMapChild(b.root, 'x')).kind).toBe('already-assigned');
  });

  it('rejects navigating through a primitive', () => {
    const b = new DocumentBuilder();
    const id = b.addMapChild(b.root, 'x');
    b.bindPrimitive(id, prim.int(1));
    const err = catchDocumentError(() => b.child(id, seg.ident('y')));
    expect(err.kind).toBe('expected-map');
    expect(formatPath(err.path)).toBe('x');
  });

  it('appends on an absent array index and checks explicit ones', () => {
    const b = new DocumentBuilder();
    const list = b.addMapChild(b.root, 'list');
    const first = b.navigate([seg.index()], list);
    const second = b.navigate([seg.index()], list);
    expect(first).not.toBe(second);
    expect(formatPath(b.pathOf(second))).toBe('list[1]');
    expect(catchDocumentError(() => b.addArrayElement(list, 5)).kind).toBe('array-index-invalid');
  });

  it('requires tuple elements in order', () => {
    const b = new DocumentBuilder();
    const t = b.addMapChild(b.root, 't');
    b.addTupleElement(t, 0);
    expect(catchDocumentError(() => b.addTupleElement(t, 2)).kind).toBe('tuple-index-invalid');
  });

  it('refuses further use once finished', () => {
    const b = new DocumentBuilder();
    b.finish();
    expect(catchDocumentError(() => b.navigate([seg.ident('late')])).kind).toBe('builder-finished');
  });

  it('leaves unbound nodes as unlabelled holes', () => {
    const b = new DocumentBuilder();
    const open = b.addMapChild(b.root, 'open');
    const todo = b.addMapChild(b.root, 'todo');
    b.bindHole(todo, 'later');
    const doc = b.finish();
    expect(doc.node(open).content).toEqual({ kind: 'hole' });
    expect(doc.node(todo).content).toEqual({ kind: 'hole', label: 'later' });
  });
});

// ---------------------------------------------------------------------------
// Read mode
// ---------------------------------------------------------------------------

describe('Document', () => {
  const doc = Document.fromValue({
    kind: 'map',
    entries: [
      ['server', { kind: 'map', entries: [['host', text('localhost')]] }],
      ['ports', { kind: 'array', items: [int(80), int(443)] }],
    ],
  });

  it('finds nodes by path and returns undefined on a miss', () => {
    const id = doc.find(parsePath('ports[1]'));
    expect(id).toBeDefined();
    expect(id === undefined ? undefined : doc.toValue(id)).toEqual(int(443));
    expect(doc.find(parsePath('server.port'))).toBeUndefined();
  });

  it('reports the resolved prefix when a path does not resolve', () => {
    const err = catchDocumentError(() => doc.resolve(parsePath('server.port.number')));
    expect(err.kind).toBe('path-not-found');
    expect(formatPath(err.path)).toBe('server');
  });

  it('throws unknown-node for ids it did not issue', () => {
    expect(catchDocumentError(() => doc.node(asNodeId(999))).kind).toBe('unknown-node');
  });

  it('projects to a value and rebuilds losslessly', () => {
    const value: Value = {
      kind: 'map',
      entries: [
        ['name', { ...text('demo'), extensions: { lang: text('en') } }],
        [1n, { kind: 'hole', label: 'fill-me' }],
        [{ tuple: [1n, 'a'] }, { kind: 'tuple', items: [int(1), { kind: 'primitive', value: prim.null() }] }],
        [true, { kind: 'array', items: [{ kind: 'hole' }] }],
      ],
      extensions: { schema: text('./schema.json') },
    };
    const rebuilt = Document.fromValue(value).toValue();
    expect(rebuilt).toEqual(value);
    expect(valueEquals(rebuilt, value, { extensions: true })).toBe(true);
  });
});

describe('valueEquals', () => {
  it('ignores map order and, by default, extensions', () => {
    const a: Value = { kind: 'map', entries: [['x', int(1)], ['y', int(2)]] };
    const b: Value = { kind: 'map', entries: [['y', int(2)], ['x', int(1)]], extensions: { note: text('n') } };
    expect(valueEquals(a, b)).toBe(true);
    expect(valueEquals(a, b, { extensions: true })).toBe(false);
  });

  it('distinguishes integers from floats and text languages', () => {
    expect(valueEquals(int(1), { kind: 'primitive', value: prim.float(1) })).toBe(false);
    expect(
      valueEquals(text('x'), { kind: 'primitive', value: prim.text('x', { kind: 'tagged', tag: 'sql' }) }),
    ).toBe(false);
  });
});
