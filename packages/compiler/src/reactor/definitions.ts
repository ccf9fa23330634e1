// Statement Definitions: the pluggable semantics of each keyword
//
// The reactor knows nothing about concrete statements. Each keyword is backed
// by a definition that parses its argument, constrains its substatements,
// hooks into phases (publishing into namespaces, registering actions) and
// builds its effective form.

import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { EffectiveStatement } from "../model/effective.js";
import type { SourceLocation } from "../model/source.js";
import { buildDiagnostic, ReactorErrorCode } from "../shared/diagnostics.js";
import { SourceError } from "../shared/errors.js";
import type { StatementContext } from "./statement-context.js";

// ============================================================================
// Definition
// ============================================================================

/** Phase-entry hooks; each runs once per context when its phase starts. */
export interface PhaseHooks<A> {
  "pre-linkage"?(ctx: StatementContext<A>): void;
  linkage?(ctx: StatementContext<A>): void;
  "statement-definition"?(ctx: StatementContext<A>): void;
  "full-declaration"?(ctx: StatementContext<A>): void;
  "effective-model"?(ctx: StatementContext<A>): void;
}

export interface StatementDefinition<A = unknown> {
  readonly keyword: string;
  /**
   * Turn the raw argument text into the statement's argument value.
   * Throw a {@link SourceError} (see {@link invalidArgument}) to reject it.
   */
  parseArgument(raw: string | null, location: SourceLocation): A;
  readonly validator?: SubstatementValidator;
  readonly onPhaseEntry?: PhaseHooks<A>;
  /**
   * Build the immutable form from already built substatements. Without it
   * the statement materializes as keyword, argument, location and children.
   */
  createEffective?(ctx: StatementContext<A>, substatements: readonly EffectiveStatement[]): EffectiveStatement;
}

/** Identity helper so object literals infer their argument type. */
export function defineStatement<A>(definition: StatementDefinition<A>): StatementDefinition<A> {
  return definition;
}

export function invalidArgument(location: SourceLocation, message: string): SourceError {
  return new SourceError(location, message, ReactorErrorCode.InvalidArgument);
}

/* =============================================================================
 * Argument parsers shared by most keywords
 * ============================================================================= */

export function noArgument(raw: string | null, location: SourceLocation): null {
  if (raw !== null) throw invalidArgument(location, `Unexpected argument '${raw}'`);
  return null;
}

export function stringArgument(raw: string | null, location: SourceLocation): string {
  if (raw === null || raw.length === 0) throw invalidArgument(location, "Missing argument");
  return raw;
}

// ============================================================================
// Registry
// ============================================================================

export class StatementRegistry {
  readonly #definitions = new Map<string, StatementDefinition>();

  constructor(definitions: Iterable<StatementDefinition> = []) {
    for (const definition of definitions) this.register(definition);
  }

  register<A>(definition: StatementDefinition<A>): this {
    if (this.#definitions.has(definition.keyword)) {
      throw new Error(`Statement '${definition.keyword}' is already registered`);
    }
    this.#definitions.set(definition.keyword, definition);
    return this;
  }

  get(keyword: string): StatementDefinition | undefined {
    return this.#definitions.get(keyword);
  }

  has(keyword: string): boolean {
    return this.#definitions.has(keyword);
  }

  get keywords(): readonly string[] {
    return [...this.#definitions.keys()];
  }
}

// ============================================================================
// Substatement cardinality
// ============================================================================

export interface Cardinality {
  readonly min: number;
  readonly max: number;
}

export class SubstatementValidator {
  private constructor(
    readonly keyword: string,
    readonly rules: ReadonlyMap<string, Cardinality>,
  ) {}

  static builder(keyword: string): SubstatementValidatorBuilder {
    return new SubstatementValidatorBuilder(keyword, (rules) => new SubstatementValidator(keyword, rules));
  }

  /** Check a context's direct children; every violation becomes one diagnostic. */
  validate(ctx: StatementContext): CompilerDiagnostic[] {
    const diagnostics: CompilerDiagnostic[] = [];
    const seen = new Map<string, StatementContext[]>();

    for (const child of ctx.children) {
      if (!this.rules.has(child.keyword)) {
        diagnostics.push(
          violation(child.location, `'${child.keyword}' is not a valid substatement of '${this.keyword}'`, {
            parent: this.keyword,
            keyword: child.keyword,
          }),
        );
        continue;
      }
      const list = seen.get(child.keyword) ?? [];
      list.push(child);
      seen.set(child.keyword, list);
    }

    for (const [keyword, { min, max }] of this.rules) {
      const found = seen.get(keyword) ?? [];
      if (found.length < min) {
        diagnostics.push(
          violation(ctx.location, `Missing '${keyword}' substatement in '${this.keyword}'`, {
            parent: this.keyword,
            keyword,
            min,
            found: found.length,
          }),
        );
      }
      const extra = found[max];
      if (extra) {
        diagnostics.push(
          violation(extra.location, `'${keyword}' may appear at most ${max} time(s) in '${this.keyword}'`, {
            parent: this.keyword,
            keyword,
            max,
            found: found.length,
          }),
        );
      }
    }
    return diagnostics;
  }
}

export class SubstatementValidatorBuilder {
  readonly #rules = new Map<string, Cardinality>();

  constructor(
    readonly keyword: string,
    private readonly finish: (rules: ReadonlyMap<string, Cardinality>) => SubstatementValidator,
  ) {}

  /** Exactly once. */
  addMandatory(keyword: string): this {
    return this.add(keyword, 1, 1);
  }

  /** At most once. */
  addOptional(keyword: string): this {
    return this.add(keyword, 0, 1);
  }

  /** Any number of times. */
  addAny(keyword: string): this {
    return this.add(keyword, 0, Number.POSITIVE_INFINITY);
  }

  addAtLeastOne(keyword: string): this {
    return this.add(keyword, 1, Number.POSITIVE_INFINITY);
  }

  build(): SubstatementValidator {
    return this.finish(new Map(this.#rules));
  }

  private add(keyword: string, min: number, max: number): this {
    if (this.#rules.has(keyword)) {
      throw new Error(`Substatement '${keyword}' of '${this.keyword}' declared twice`);
    }
    this.#rules.set(keyword, { min, max });
    return this;
  }
}

function violation(location: SourceLocation, message: string, data: Record<string, unknown>): CompilerDiagnostic {
  return buildDiagnostic({
    code: ReactorErrorCode.SubstatementValidation,
    message,
    stage: "build",
    location,
    data,
  });
}
