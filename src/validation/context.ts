import type { Document } from '../document/document.js';
import type { NodeId } from '../document/node.js';
import type { EurePath } from '../document/path.js';
import type { ResolvedValidateOptions } from '../options.js';
import type { SchemaDocument } from '../schema/schema-document.js';
import type { SchemaNodeId } from '../schema/types.js';
import type {
  ValidationError,
  ValidationErrorKind,
  ValidationWarning,
  ValidationWarningKind,
} from './diagnostics.js';

/** Schema a hole was reached with, kept for the completeness pass. */
export interface HoleBinding {
  readonly schemaNodeId: SchemaNodeId;
  readonly optional: boolean;
}

/** What a trial validation found, kept so a winning trial is not run twice. */
export interface TrialOutcome {
  readonly errors: readonly ValidationError[];
  readonly warnings: readonly ValidationWarning[];
  readonly holes: ReadonlyMap<NodeId, HoleBinding>;
}

/** Errors that describe the schema or the run rather than the variant tried. */
const RUN_DEFECTS: ReadonlySet<ValidationErrorKind> = new Set(['dangling-reference', 'recursion-limit']);

/** State shared by a run and every fork of it. */
interface RunState {
  readonly patterns: Map<string, RegExp>;
  readonly trials: Map<string, TrialOutcome>;
  trialsRun: number;
  trialLimitReported: boolean;
}

/**
 * Mutable state of one validation run. Trial validations of union variants
 * run in a {@link fork}, which shares the immutable inputs, the pattern cache
 * and the trial cache but collects its own diagnostics.
 */
export class ValidationContext {
  readonly errors: ValidationError[] = [];
  readonly warnings: ValidationWarning[] = [];
  readonly holes = new Map<NodeId, HoleBinding>();

  constructor(
    readonly doc: Document,
    readonly schema: SchemaDocument,
    readonly options: ResolvedValidateOptions,
    private readonly run: RunState = {
      patterns: new Map(),
      trials: new Map(),
      trialsRun: 0,
      trialLimitReported: false,
    },
  ) {}

  fork(): ValidationContext {
    return new ValidationContext(this.doc, this.schema, this.options, this.run);
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }

  error(
    kind: ValidationErrorKind,
    nodeId: NodeId,
    schemaNodeId: SchemaNodeId,
    title: string,
    path: EurePath = this.doc.pathOf(nodeId),
  ): void {
    this.errors.push({ kind, path, title, nodeId, schemaNodeId, pass: 'structural' });
  }

  warn(kind: ValidationWarningKind, nodeId: NodeId, schemaNodeId: SchemaNodeId, title: string): void {
    this.warnings.push({ kind, path: this.doc.pathOf(nodeId), title, nodeId, schemaNodeId });
  }

  bindHole(nodeId: NodeId, binding: HoleBinding): void {
    this.holes.set(nodeId, binding);
  }

  /** Compiled form of a schema pattern, compiled once per run. */
  pattern(source: string): RegExp {
    let re = this.run.patterns.get(source);
    if (re === undefined) {
      re = new RegExp(source, 'u');
      this.run.patterns.set(source, re);
    }
    return re;
  }

  // -------------------------------------------------------------------------
  // Trials
  // -------------------------------------------------------------------------

  outcome(): TrialOutcome {
    return { errors: [...this.errors], warnings: [...this.warnings], holes: new Map(this.holes) };
  }

  cachedTrial(key: string): TrialOutcome | undefined {
    return this.run.trials.get(key);
  }

  /**
   * Counts one trial against `maxVariantTrials` and caches its outcome under
   * `key`. Returns `undefined` once the budget is spent; the first refusal
   * reports `recursion-limit` at `nodeId`.
   */
  runTrial(
    key: string,
    nodeId: NodeId,
    schemaNodeId: SchemaNodeId,
    body: () => TrialOutcome,
  ): TrialOutcome | undefined {
    const limit = this.options.maxVariantTrials;
    if (this.run.trialsRun >= limit) {
      if (!this.run.trialLimitReported) {
        this.run.trialLimitReported = true;
        this.error(
          'recursion-limit',
          nodeId,
          schemaNodeId,
          `Variant inference exceeds the limit of ${limit} trial validations.`,
        );
      }
      return undefined;
    }
    this.run.trialsRun++;
    const outcome = body();
    this.run.trials.set(key, outcome);
    return outcome;
  }

  /** Takes over the diagnostics and holes of a trial that was chosen. */
  adopt(outcome: TrialOutcome): void {
    this.errors.push(...outcome.errors);
    this.warnings.push(...outcome.warnings);
    for (const [id, binding] of outcome.holes) this.holes.set(id, binding);
  }

  /**
   * Keeps the dangling references and limit hits of a discarded trial, once
   * per node and schema node.
   */
  adoptDefects(outcome: TrialOutcome): void {
    for (const error of outcome.errors) {
      if (!RUN_DEFECTS.has(error.kind)) continue;
      const seen = this.errors.some(
        (e) => e.kind === error.kind && e.nodeId === error.nodeId && e.schemaNodeId === error.schemaNodeId,
      );
      if (!seen) this.errors.push(error);
    }
  }
}
