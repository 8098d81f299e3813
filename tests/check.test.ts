import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { checkDocument, checkFile, checkSelfDescribing } from '../src/check.js';
import { formatPath, seg } from '../src/document/path.js';
import { documentFromJson } from '../src/json.js';
import { formatOf, loadDocument } from '../src/loader.js';
import { formatDiagnostic } from '../src/validation/diagnostics.js';
import { DocumentLoadError, DocumentValidationError, SchemaError } from '../src/validation/errors.js';
import { documentFromXml } from '../src/xml/reader.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixturesDir = resolve(__dirname, 'fixtures');

// ---------------------------------------------------------------------------
// checkFile
// ---------------------------------------------------------------------------

describe('checkFile', () => {
  it('follows the $schema reference relative to the instance', async () => {
    const result = await checkFile(resolve(fixturesDir, 'person.json'));
    expect(result.isValid).toBe(true);
    expect(result.schemaSource).toEqual({ kind: 'file', path: resolve(fixturesDir, 'person.schema.json') });
    expect(result.schema.lookupType('Email')).toBeDefined();
  });

  it('returns diagnostics in document order', async () => {
    const result = await checkFile('person-invalid.json', undefined, { baseDir: fixturesDir });
    expect(result.errors.map(formatDiagnostic)).toEqual([
      '[age] -1 is not in range [0, ∞).',
      '[email] Text does not match pattern /^[^@]+@[^@]+$/.',
    ]);
    expect(result.isValid).toBe(false);
  });

  it('throws DocumentValidationError in strict mode', async () => {
    await expect(
      checkFile('person-invalid.json', undefined, { baseDir: fixturesDir, strict: true }),
    ).rejects.toThrow(DocumentValidationError);
    await expect(
      checkFile('person-invalid.json', undefined, { baseDir: fixturesDir, strict: true }),
    ).rejects.toThrow(
      'Document validation failed:\n  [age] -1 is not in range [0, ∞).\n  [email] Text does not match pattern /^[^@]+@[^@]+$/.',
    );
  });

  it('uses an explicit schema path, across formats', async () => {
    const result = await checkFile('config.xml', 'config.schema.json', { baseDir: fixturesDir });
    expect(result.errors).toEqual([]);
    expect(result.schemaSource).toEqual({ kind: 'file', path: resolve(fixturesDir, 'config.schema.json') });
  });

  it('falls back to the instance itself as the schema', async () => {
    const result = await checkFile('self-describing.xml', undefined, { baseDir: fixturesDir });
    expect(result.schemaSource).toEqual({ kind: 'self' });
    expect(result.errors.map((e) => [e.kind, formatPath(e.path)])).toEqual([['pattern-mismatch', 'code']]);
  });

  it('rejects unreadable and unsupported files', async () => {
    await expect(checkFile('missing.json', undefined, { baseDir: fixturesDir })).rejects.toThrow(DocumentLoadError);
    await expect(checkFile('notes.txt', undefined, { baseDir: fixturesDir })).rejects.toThrow(
      /Unsupported document format/,
    );
  });
});

// ---------------------------------------------------------------------------
// In-memory checks
// ---------------------------------------------------------------------------

describe('checkDocument', () => {
  const schemaDoc = documentFromJson({ host: '.text', port: { $type: 'integer', $min: 1, $max: 65535 } });

  it('extracts the schema and validates', () => {
    expect(checkDocument(documentFromJson({ host: 'localhost', port: 8080 }), schemaDoc).isValid).toBe(true);
    const result = checkDocument(documentFromJson({ host: 'localhost', port: 0 }), schemaDoc);
    expect(result.errors.map(formatDiagnostic)).toEqual(['[port] 0 is not in range [1, 65535].']);
  });

  it('passes validator options through', () => {
    const unions = documentFromJson({ v: { $variants: { A: { x: '.integer' } } } });
    const data = documentFromJson({ v: { x: 1 } });
    expect(checkDocument(data, unions).errors.map((e) => e.kind)).toEqual(['missing-variant-tag']);
    expect(checkDocument(data, unions, { unionTagMode: 'lenient' }).errors).toEqual([]);
  });

  it('propagates schema errors', () => {
    expect(() => checkDocument(documentFromJson({}), documentFromJson({ x: { $type: 'nope' } }))).toThrow(
      SchemaError,
    );
  });
});

describe('checkSelfDescribing', () => {
  it('reads type path literals as data that does not satisfy them', () => {
    const doc = documentFromJson({ $types: { Port: '.integer' }, port: '.$types.Port' });
    expect(checkSelfDescribing(doc).isValid).toBe(false);
  });

  it('checks XML leaves typed by their type attribute', () => {
    expect(checkSelfDescribing(documentFromXml('<service><port type="integer">8080</port></service>')).errors).toEqual(
      [],
    );

    const result = checkSelfDescribing(documentFromXml('<service><port type="integer">eighty</port></service>'));
    expect(result.errors.map((e) => e.kind)).toEqual(['type-mismatch']);
    expect(result.errors.map((e) => formatPath(e.path))).toEqual(['port']);
  });
});

describe('loader', () => {
  it('recognizes formats by extension', () => {
    expect(formatOf('a/b.JSON')).toBe('json');
    expect(formatOf('a/b.xml')).toBe('xml');
    expect(formatOf('a/b.toml')).toBeUndefined();
  });

  it('resolves relative paths against baseDir', async () => {
    const doc = await loadDocument('config.xml', fixturesDir);
    expect(doc.toValue(doc.resolve([seg.ident('mode')]))).toEqual({
      kind: 'primitive',
      value: { type: 'text', value: 'fast', language: { kind: 'plaintext' } },
    });
  });
});
