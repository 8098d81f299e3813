import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import type { Document } from './document/document.js';
import { documentFromJson } from './json.js';
import type { JsonValue } from './types.js';
import { BridgeError, DocumentLoadError } from './validation/errors.js';
import { documentFromXml } from './xml/reader.js';
import type { XmlReadOptions } from './xml/reader.js';

export type DocumentFormat = 'json' | 'xml';

/** Format of a document file, from its extension. */
export function formatOf(path: string): DocumentFormat | undefined {
  switch (extname(path).toLowerCase()) {
    case '.json':
      return 'json';
    case '.xml':
      return 'xml';
    default:
      return undefined;
  }
}

/**
 * Parses document text in the given format.
 * Throws {@link DocumentLoadError} when the text is not well-formed.
 */
export function parseDocument(text: string, format: DocumentFormat, xml: XmlReadOptions = {}): Document {
  if (format === 'xml') {
    try {
      return documentFromXml(text, xml);
    } catch (err) {
      if (err instanceof BridgeError) throw err;
      throw new DocumentLoadError('Failed to parse XML content', err);
    }
  }
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DocumentLoadError('Failed to parse JSON content', err);
  }
  return documentFromJson(parsed);
}

/**
 * Reads a `.json` or `.xml` file into a document.
 *
 * @param path    - Path to the file (absolute or relative to `baseDir`).
 * @param baseDir - Directory relative paths are resolved against. Defaults to `process.cwd()`.
 *
 * @throws `DocumentLoadError` if the file cannot be read, has an unknown
 *         extension, or cannot be parsed.
 */
export async function loadDocument(path: string, baseDir?: string, xml: XmlReadOptions = {}): Promise<Document> {
  const resolvedPath = baseDir ? resolve(baseDir, path) : resolve(path);
  const format = formatOf(resolvedPath);
  if (format === undefined) {
    throw new DocumentLoadError(`Unsupported document format: ${resolvedPath}`);
  }

  let text: string;
  try {
    text = await readFile(resolvedPath, 'utf-8');
  } catch (err) {
    throw new DocumentLoadError(`Cannot read document file: ${resolvedPath}`, err);
  }

  try {
    return parseDocument(text, format, xml);
  } catch (err) {
    if (err instanceof DocumentLoadError) {
      throw new DocumentLoadError(`${err.message} from: ${resolvedPath}`, err.cause);
    }
    throw err;
  }
}
