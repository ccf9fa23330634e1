/* =======================================================================================
 * MODULE SOURCES
 * ---------------------------------------------------------------------------------------
 * What the reactor receives: already-parsed statement trees plus the linkage
 * facts (identity, namespace, imports) the sorter needs before any statement
 * definition runs.
 * ======================================================================================= */

import type { ModuleIdentity, Revision } from "./identity.js";
import type { EffectiveStatement } from "./effective.js";

/** Where a statement was declared. Lines and columns are 1-based. */
export interface SourceLocation {
  readonly source: string;
  readonly line: number;
  readonly column: number;
}

/** One declared statement as produced by the (external) parser. */
export interface StatementSource {
  readonly keyword: string;
  /** Raw argument text; `null` for statements that take none. */
  readonly argument: string | null;
  readonly location: SourceLocation;
  readonly substatements: readonly StatementSource[];
}

export type LinkageKind = "import" | "include";

export interface ImportDescriptor {
  readonly kind: LinkageKind;
  /** Target module (or submodule) name. */
  readonly module: string;
  /** Omitted revision resolves against whatever revisions are registered. */
  readonly revision?: Revision;
  readonly location?: SourceLocation;
}

/**
 * Capability set shared by everything the sorter and the reactor order:
 * freshly declared sources and modules of an already compiled schema.
 */
export interface ModuleDescriptor {
  readonly identity: ModuleIdentity;
  /** Namespace URI; submodules have none. */
  readonly namespace?: string;
  readonly imports: readonly ImportDescriptor[];
}

/** In-progress module: a declared statement tree awaiting compilation. */
export interface ModuleSource extends ModuleDescriptor {
  readonly kind: "source";
  readonly submodule: boolean;
  /** For submodules: the name of the owning module. */
  readonly belongsTo?: string;
  readonly root: StatementSource;
}

/** Module taken from a previously built schema context. */
export interface EffectiveModule extends ModuleDescriptor {
  readonly kind: "compiled";
  readonly submodule: boolean;
  readonly statement: EffectiveStatement;
}

export type ModuleLike = ModuleSource | EffectiveModule;

export function formatLocation(location: SourceLocation | null | undefined): string {
  if (!location) return "<unknown>";
  return `${location.source}:${location.line}:${location.column}`;
}
