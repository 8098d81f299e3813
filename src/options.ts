import { z } from 'zod';
import { ValidatorError } from './validation/errors.js';

export const UnionTagModeSchema = z.enum(['explicit', 'lenient']);

export type UnionTagMode = z.infer<typeof UnionTagModeSchema>;

export const ValidateOptionsSchema = z
  .object({
    unionTagMode: UnionTagModeSchema.default('explicit'),
    maxDepth: z.number().int().positive().default(256),
    maxVariantTrials: z.number().int().positive().default(100_000),
    rootType: z.string().min(1).optional(),
  })
  .strict();

/**
 * Validator options.
 */
export interface ValidateOptions {
  /**
   * How unions without an explicit tag are handled. `explicit` reports
   * `missing-variant-tag`; `lenient` infers the variant from the fields present.
   * @default 'explicit'
   */
  unionTagMode?: UnionTagMode;
  /**
   * Nesting depth at which validation stops with `recursion-limit`.
   * @default 256
   */
  maxDepth?: number;
  /**
   * Trial validations that union inference may run in one call before it
   * stops with `recursion-limit`.
   * @default 100000
   */
  maxVariantTrials?: number;
  /**
   * Validate the document root against this registry entry instead of the
   * schema root.
   */
  rootType?: string;
}

export type ResolvedValidateOptions = z.output<typeof ValidateOptionsSchema>;

/**
 * Checks options and fills in defaults. Throws `ValidatorError(invalid-options)`.
 */
export function resolveValidateOptions(options: ValidateOptions = {}): ResolvedValidateOptions {
  const parsed = ValidateOptionsSchema.safeParse(options);
  if (parsed.success) return parsed.data;
  const detail = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '(options)'}: ${issue.message}`)
    .join('; ');
  throw new ValidatorError('invalid-options', `Invalid validator options: ${detail}`);
}

/**
 * Options of the check facade: validator options plus facade behaviour.
 */
export interface CheckOptions extends ValidateOptions {
  /**
   * Throw {@link DocumentValidationError} when errors are found instead of
   * returning them.
   * @default false
   */
  strict?: boolean;
  /**
   * Directory relative paths are resolved against.
   * @default process.cwd()
   */
  baseDir?: string;
}
