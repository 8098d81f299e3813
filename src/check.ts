import { dirname, resolve } from 'node:path';
import type { Document } from './document/document.js';
import { loadDocument } from './loader.js';
import type { CheckOptions, ValidateOptions } from './options.js';
import { extractSchema } from './schema/extractor.js';
import type { SchemaDocument } from './schema/schema-document.js';
import type { ValidationResult } from './validation/diagnostics.js';
import { DocumentValidationError } from './validation/errors.js';
import { validate } from './validation/validator.js';

/** Where the schema of a checked file came from. */
export type SchemaSource =
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'self' };

export interface CheckResult extends ValidationResult {
  readonly schema: SchemaDocument;
  readonly schemaSource: SchemaSource;
}

function validatorOptions({ unionTagMode, maxDepth, maxVariantTrials, rootType }: CheckOptions): ValidateOptions {
  return { unionTagMode, maxDepth, maxVariantTrials, rootType };
}

/** Text of the root `$schema` extension, if any. */
function schemaReference(doc: Document): string | undefined {
  const refId = doc.node(doc.root).extensions.get('schema');
  if (refId === undefined) return undefined;
  const { content } = doc.node(refId);
  return content.kind === 'primitive' && content.value.type === 'text' ? content.value.value : undefined;
}

function finish(result: ValidationResult, strict: boolean): ValidationResult {
  if (strict && result.errors.length > 0) {
    throw new DocumentValidationError(result.errors);
  }
  return result;
}

/**
 * Validates a document against a schema document, extracting the schema
 * first.
 *
 * @throws `SchemaError`             if the schema document cannot be extracted.
 * @throws `ValidatorError`          if the options are invalid.
 * @throws `DocumentValidationError` if `strict: true` and errors were found.
 */
export function checkDocument(
  doc: Document,
  schemaDoc: Document,
  options: CheckOptions = {},
): ValidationResult {
  const { strict = false } = options;
  const { schema } = extractSchema(schemaDoc);
  return finish(validate(doc, schema, validatorOptions(options)), strict);
}

/**
 * Validates a self-describing document against the schema its own
 * annotations declare.
 */
export function checkSelfDescribing(doc: Document, options: CheckOptions = {}): ValidationResult {
  return checkDocument(doc, doc, options);
}

/**
 * Loads an instance file and validates it.
 *
 * The schema is, in order of preference: `schemaPath`; the instance's root
 * `$schema` reference, resolved relative to the instance file; the instance
 * itself.
 *
 * @param instancePath - Path to a `.json` or `.xml` instance (absolute or relative to `baseDir`).
 * @param schemaPath   - Optional path to a schema document (same resolution).
 * @param options      - Validator options plus `strict` and `baseDir`.
 *
 * @throws `DocumentLoadError`       if a file cannot be read or parsed.
 * @throws `SchemaError`             if the schema cannot be extracted.
 * @throws `DocumentValidationError` if `strict: true` and errors were found.
 *
 * @example
 * ```typescript
 * const result = await checkFile('./config.json', './config.schema.json');
 * if (!result.isValid) result.errors.forEach((e) => console.error(formatDiagnostic(e)));
 * ```
 */
export async function checkFile(
  instancePath: string,
  schemaPath?: string,
  options: CheckOptions = {},
): Promise<CheckResult> {
  const { strict = false, baseDir } = options;
  const resolvedInstance = baseDir ? resolve(baseDir, instancePath) : resolve(instancePath);
  const instance = await loadDocument(resolvedInstance);

  let schemaDoc = instance;
  let schemaSource: SchemaSource = { kind: 'self' };
  if (schemaPath !== undefined) {
    const resolvedSchema = baseDir ? resolve(baseDir, schemaPath) : resolve(schemaPath);
    schemaDoc = await loadDocument(resolvedSchema);
    schemaSource = { kind: 'file', path: resolvedSchema };
  } else {
    const ref = schemaReference(instance);
    if (ref !== undefined) {
      const resolvedSchema = resolve(dirname(resolvedInstance), ref);
      schemaDoc = await loadDocument(resolvedSchema);
      schemaSource = { kind: 'file', path: resolvedSchema };
    }
  }

  const { schema } = extractSchema(schemaDoc);
  const result = finish(validate(instance, schema, validatorOptions(options)), strict);
  return { ...result, schema, schemaSource };
}
