export { Document, DocumentBuilder } from './document/document.js';
export { formatKey, isIdentifier, keyEquals, keyName } from './document/key.js';
export type { KeyValue, ObjectKey, TupleKey } from './document/key.js';
export { asNodeId, isHole, NodeMap } from './document/node.js';
export type { MapEntry, Node, NodeContent, NodeId, ReadonlyNodeMap } from './document/node.js';
export { formatPath, MAX_TUPLE_INDEX, parsePath, pathEquals, seg, segmentForKey } from './document/path.js';
export type { EurePath, PathSegment } from './document/path.js';
export { PLAINTEXT, prim, primitiveEquals, valueEquals, valueKindName } from './document/value.js';
export type {
  PrimitiveValue,
  TextLanguage,
  Value,
  ValueData,
  ValueEqualsOptions,
  ValueKindName,
} from './document/value.js';

export { extractSchema } from './schema/extractor.js';
export type { ExtractedSchema } from './schema/extractor.js';
export { SchemaBuilder, SchemaDocument } from './schema/schema-document.js';
export { fromBigInt, fromNumber, rational } from './schema/rational.js';
export type { Rational } from './schema/rational.js';
export { parseTypeExpression } from './schema/type-expression.js';
export type { TypeExpression } from './schema/type-expression.js';
export { asSchemaNodeId, EMPTY_METADATA, UNBOUNDED } from './schema/types.js';
export type * from './schema/types.js';

export { validate } from './validation/validator.js';
export { formatDiagnostic } from './validation/diagnostics.js';
export type {
  ValidationError,
  ValidationErrorKind,
  ValidationPass,
  ValidationResult,
  ValidationWarning,
  ValidationWarningKind,
} from './validation/diagnostics.js';
export {
  BridgeError,
  DocumentError,
  DocumentLoadError,
  DocumentValidationError,
  SchemaError,
  ValidatorError,
} from './validation/errors.js';
export type {
  DocumentErrorKind,
  SchemaErrorKind,
  ValidatorErrorKind,
} from './validation/errors.js';

export { resolveValidateOptions } from './options.js';
export type { CheckOptions, UnionTagMode, ValidateOptions } from './options.js';
export { applyRenameRule, RENAME_RULES } from './utils.js';
export type { RenameRule } from './utils.js';

export { documentFromJson, documentToJson } from './json.js';
export { documentToXml } from './xml/builder.js';
export type { XmlWriteOptions } from './xml/builder.js';
export { documentFromXml } from './xml/reader.js';
export type { XmlReadOptions } from './xml/reader.js';
export { loadDocument, parseDocument } from './loader.js';
export type { DocumentFormat } from './loader.js';
export { checkDocument, checkFile, checkSelfDescribing } from './check.js';
export type { CheckResult, SchemaSource } from './check.js';
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './types.js';
