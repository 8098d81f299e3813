import { formatKey, keyId } from '../document/key.js';
import type { NodeId, ReadonlyNodeMap } from '../document/node.js';
import { segmentForKey } from '../document/path.js';
import type { EurePath } from '../document/path.js';
import type { RecordSchema, SchemaNodeId, UnionSchema, UnionVariant } from '../schema/types.js';
import type { TrialOutcome } from './context.js';
import type { SchemaValidator } from './validator.js';

/** Reserved extension naming a union variant on the data side. */
export const VARIANT_EXTENSION = 'variant';

/** A variant name read from the data, with where it was read. */
interface Tag {
  readonly name: string;
  readonly path: EurePath;
}

/** What the representation says about a node. */
interface Dispatch {
  /** Tag carried by the representation itself. */
  readonly tag?: Tag;
  /** Node holding the variant's content. */
  readonly content: NodeId;
  /** Keys of `content` that belong to the representation (internal tag). */
  readonly exclude: ReadonlySet<string>;
}

const NO_KEYS: ReadonlySet<string> = new Set();

/**
 * Selects a variant for `nodeId` and validates the node against it.
 *
 * The `$variant` extension names the variant under every representation and
 * must agree with the representation's own tag when both are present.
 */
export function validateUnion(
  validator: SchemaValidator,
  nodeId: NodeId,
  union: UnionSchema,
  schemaId: SchemaNodeId,
  depth: number,
): void {
  const { ctx, doc } = validator;
  const node = doc.node(nodeId);

  let explicit: Tag | undefined;
  const variantExt = node.extensions.get(VARIANT_EXTENSION);
  if (variantExt !== undefined) {
    const content = doc.node(variantExt).content;
    if (content.kind !== 'primitive' || content.value.type !== 'text') {
      ctx.error('invalid-variant-tag', variantExt, schemaId, '$variant must be text.');
      return;
    }
    explicit = { name: content.value.value, path: doc.pathOf(variantExt) };
  }

  const dispatch = dispatchRepr(validator, nodeId, union, schemaId);
  if (dispatch === undefined) return;

  if (explicit !== undefined && dispatch.tag !== undefined && explicit.name !== dispatch.tag.name) {
    ctx.error(
      'conflicting-variant-tags',
      nodeId,
      schemaId,
      `$variant "${explicit.name}" disagrees with tag "${dispatch.tag.name}".`,
    );
    return;
  }

  const tag = explicit ?? dispatch.tag;
  if (tag !== undefined) {
    const variant = union.variants.find((v) => v.name === tag.name);
    if (variant === undefined) {
      ctx.error('unknown-variant', nodeId, schemaId, `Unknown variant "${tag.name}".`, tag.path);
      return;
    }
    validateVariant(validator, dispatch.content, variant, depth, dispatch.exclude);
    return;
  }

  // Untagged: the first variant in declaration order that validates wins.
  if (union.repr.kind === 'untagged') {
    for (const variant of union.variants) {
      const fit = candidacy(validator, dispatch.content, variant, depth, NO_KEYS, true);
      if (fit.matches) {
        choose(validator, dispatch.content, variant, fit, depth, NO_KEYS);
        return;
      }
    }
    ctx.error('no-variant-matched', nodeId, schemaId, 'No variant matches the value.');
    return;
  }

  if (ctx.options.unionTagMode === 'explicit') {
    ctx.error('missing-variant-tag', nodeId, schemaId, 'Union value does not name a variant.');
    return;
  }

  const candidates = union.variants
    .map((variant) => ({ variant, fit: candidacy(validator, dispatch.content, variant, depth, dispatch.exclude) }))
    .filter((entry) => entry.fit.matches);
  if (candidates.length === 1) {
    const [{ variant, fit }] = candidates;
    choose(validator, dispatch.content, variant, fit, depth, dispatch.exclude);
  } else if (candidates.length === 0) {
    ctx.error('no-variant-matched', nodeId, schemaId, 'No variant matches the value.');
  } else {
    const names = candidates.map((c) => `"${c.variant.name}"`).join(', ');
    ctx.error('ambiguous-variant', nodeId, schemaId, `Value matches several variants: ${names}.`);
  }
}

/**
 * Reads the representation's tag. Returns `undefined` after reporting an
 * error that stops dispatch.
 */
function dispatchRepr(
  validator: SchemaValidator,
  nodeId: NodeId,
  union: UnionSchema,
  schemaId: SchemaNodeId,
): Dispatch | undefined {
  const { ctx, doc } = validator;
  const { content } = doc.node(nodeId);
  const repr = union.repr;
  const path = doc.pathOf(nodeId);
  const itself: Dispatch = { content: nodeId, exclude: NO_KEYS };

  switch (repr.kind) {
    case 'tagged':
    case 'untagged':
      return itself;

    case 'external': {
      if (content.kind !== 'map') return itself;
      const names = new Set(union.variants.map((v) => v.name));
      const keys = [...content.map.entries()].filter(
        (entry): entry is { key: string; id: NodeId } => typeof entry.key === 'string' && names.has(entry.key),
      );
      if (keys.length > 1) {
        const listed = keys.map((k) => `"${k.key}"`).join(', ');
        ctx.error('ambiguous-variant', nodeId, schemaId, `Several variant keys present: ${listed}.`);
        return undefined;
      }
      if (keys.length === 1 && content.map.size === 1) {
        const [{ key, id }] = keys;
        return { tag: { name: key, path: doc.pathOf(id) }, content: id, exclude: NO_KEYS };
      }
      return itself;
    }

    case 'internal': {
      if (content.kind !== 'map') return itself;
      const tagId = content.map.get(repr.tag);
      if (tagId === undefined) return { content: nodeId, exclude: new Set([repr.tag]) };
      const name = readTagText(validator, tagId, schemaId);
      if (name === undefined) return undefined;
      return {
        tag: { name, path: doc.pathOf(tagId) },
        content: nodeId,
        exclude: new Set([repr.tag]),
      };
    }

    case 'adjacent': {
      if (content.kind !== 'map') return itself;
      for (const { key, id } of content.map.entries()) {
        if (key === repr.tag || key === repr.content) continue;
        ctx.error('unknown-field', id, schemaId, `Unknown field ${formatKey(key)} beside an adjacent union tag.`);
      }
      const tagId = content.map.get(repr.tag);
      const contentId = content.map.get(repr.content);
      let tag: Tag | undefined;
      if (tagId !== undefined) {
        const name = readTagText(validator, tagId, schemaId);
        if (name === undefined) return undefined;
        tag = { name, path: doc.pathOf(tagId) };
      }
      if (contentId === undefined) {
        ctx.error(
          'missing-field',
          nodeId,
          schemaId,
          `Required field "${repr.content}" is missing.`,
          [...path, segmentForKey(repr.content)],
        );
        return undefined;
      }
      return { ...(tag !== undefined && { tag }), content: contentId, exclude: NO_KEYS };
    }
  }
}

function readTagText(validator: SchemaValidator, tagId: NodeId, schemaId: SchemaNodeId): string | undefined {
  const { content } = validator.doc.node(tagId);
  if (content.kind === 'primitive' && content.value.type === 'text') return content.value.value;
  validator.ctx.error('invalid-variant-tag', tagId, schemaId, 'Variant tag must be text.');
  return undefined;
}

function validateVariant(
  validator: SchemaValidator,
  contentId: NodeId,
  variant: UnionVariant,
  depth: number,
  exclude: ReadonlySet<string>,
): void {
  const resolved = exclude.size > 0 ? validator.resolveSchema(variant.schema) : undefined;
  const target = resolved === undefined ? undefined : validator.schema.node(resolved).content;
  if (resolved !== undefined && target?.kind === 'record') {
    validator.validateRecord(contentId, target, resolved, depth + 1, exclude);
    return;
  }
  validator.validateNode(contentId, variant.schema, depth + 1);
}

/** Whether a variant fits, and the trial that decided it when one ran. */
interface Candidacy {
  readonly matches: boolean;
  readonly trial?: TrialOutcome;
}

/**
 * Variant inference. A record variant fits a map when all its required
 * fields are present and, if it denies unknown fields, no other field is.
 * Any other variant, and every variant when `full` is set, fits when a trial
 * validation reports no error.
 */
function candidacy(
  validator: SchemaValidator,
  contentId: NodeId,
  variant: UnionVariant,
  depth: number,
  exclude: ReadonlySet<string>,
  full = false,
): Candidacy {
  const { content } = validator.doc.node(contentId);
  const resolved = validator.resolveSchema(variant.schema);
  const schema = resolved === undefined ? undefined : validator.schema.node(resolved).content;
  if (!full && content.kind === 'map' && schema?.kind === 'record') {
    return { matches: recordFits(content.map, schema, exclude) };
  }
  const trial = runTrial(validator, contentId, variant, depth, exclude);
  if (trial === undefined) return { matches: false };
  validator.ctx.adoptDefects(trial);
  return { matches: trial.errors.length === 0, trial };
}

function recordFits(map: ReadonlyNodeMap, record: RecordSchema, exclude: ReadonlySet<string>): boolean {
  if (!record.fields.every((f) => f.optional || map.has(f.key))) return false;
  if (record.unknownFields === 'allow' || record.cascade !== undefined) return true;
  const declared = new Set(record.fields.map((f) => keyId(f.key)));
  return map.keys().every((k) => declared.has(keyId(k)) || (typeof k === 'string' && exclude.has(k)));
}

/**
 * Validates `contentId` against `variant` in a fork. Outcomes are cached per
 * node, schema node, depth and excluded keys for the rest of the run.
 */
function runTrial(
  validator: SchemaValidator,
  contentId: NodeId,
  variant: UnionVariant,
  depth: number,
  exclude: ReadonlySet<string>,
): TrialOutcome | undefined {
  const { ctx } = validator;
  const key = `${contentId}/${variant.schema}/${depth}/${[...exclude].join(',')}`;
  return (
    ctx.cachedTrial(key) ??
    ctx.runTrial(key, contentId, variant.schema, () => {
      const trial = validator.fork();
      validateVariant(trial, contentId, variant, depth, exclude);
      return trial.ctx.outcome();
    })
  );
}

/** Applies the chosen variant, reusing its trial when one ran. */
function choose(
  validator: SchemaValidator,
  contentId: NodeId,
  variant: UnionVariant,
  chosen: Candidacy,
  depth: number,
  exclude: ReadonlySet<string>,
): void {
  if (chosen.trial !== undefined) {
    validator.ctx.adopt(chosen.trial);
    return;
  }
  validateVariant(validator, contentId, variant, depth, exclude);
}
