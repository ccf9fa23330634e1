// Module Dependency Graph: (name, revision) nodes wired by import/include edges
//
// Construction runs in two passes so that every failure is reported at the
// right moment:
// 1. register every module; a duplicate (name, revision) fails before any
//    edge is looked at
// 2. resolve each import/include to a registered node and add the edge;
//    unknown targets and conflicting revisions fail here, namespace
//    collisions and ambiguous revisions only warn

import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { ImportDescriptor, ModuleDescriptor } from "../model/source.js";
import {
  formatIdentity,
  identityKey,
  isUnspecified,
  UNSPECIFIED_REVISION,
  type IdentityKey,
  type ModuleIdentity,
  type Revision,
} from "../model/identity.js";
import { buildDiagnostic, ReactorErrorCode } from "../shared/diagnostics.js";
import { ModuleSortError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";

// ============================================================================
// Node
// ============================================================================

export interface ModuleNode<T extends ModuleDescriptor = ModuleDescriptor> {
  readonly identity: ModuleIdentity;
  readonly key: IdentityKey;
  /** The object this node was registered for. */
  readonly module: T;
  /** Position in registration order; ties in the sort follow it. */
  readonly ordinal: number;
  /** Outgoing edges (modules this one imports or includes), insertion-ordered, no duplicates. */
  readonly edges: readonly ModuleNode<T>[];
}

class MutableModuleNode<T extends ModuleDescriptor> implements ModuleNode<T> {
  readonly key: IdentityKey;
  readonly #edges: ModuleNode<T>[] = [];
  readonly #edgeKeys = new Set<IdentityKey>();

  constructor(
    readonly identity: ModuleIdentity,
    readonly module: T,
    readonly ordinal: number,
  ) {
    this.key = identityKey(identity);
  }

  get edges(): readonly ModuleNode<T>[] {
    return this.#edges;
  }

  addEdge(to: MutableModuleNode<T>): void {
    if (this.#edgeKeys.has(to.key)) return;
    this.#edgeKeys.add(to.key);
    this.#edges.push(to);
  }

  toString(): string {
    return formatIdentity(this.identity);
  }
}

// ============================================================================
// Graph
// ============================================================================

export interface ImportResolution<T extends ModuleDescriptor = ModuleDescriptor> {
  readonly node: ModuleNode<T>;
  /** Set when the import named no revision and several were available. */
  readonly ambiguous: boolean;
}

export interface ModuleGraph<T extends ModuleDescriptor = ModuleDescriptor> {
  /** name → revision → node, both levels in registration order. */
  readonly byName: ReadonlyMap<string, ReadonlyMap<Revision, ModuleNode<T>>>;
  /** Every node in registration order. */
  readonly nodes: readonly ModuleNode<T>[];
  /** Non-fatal findings: namespace collisions, ambiguous import revisions. */
  readonly warnings: readonly CompilerDiagnostic[];

  get(identity: ModuleIdentity): ModuleNode<T> | undefined;

  /**
   * Resolve a linkage descriptor as the edge wiring did. Throws
   * `UnresolvedImport` when nothing matches.
   */
  resolve(from: ModuleIdentity, descriptor: Pick<ImportDescriptor, "module" | "revision" | "location">): ImportResolution<T>;

  /** The identities `module` was wired to, in declaration order. */
  resolvedImports(module: ModuleIdentity): ReadonlyMap<string, ModuleIdentity>;
}

/**
 * Build the dependency graph for a set of modules.
 *
 * @throws ModuleSortError for duplicate identities, unknown imports and
 *   conflicting import revisions
 */
export function createModuleGraph<T extends ModuleDescriptor>(modules: readonly T[]): ModuleGraph<T> {
  const byName = new Map<string, Map<Revision, MutableModuleNode<T>>>();
  const nodes: MutableModuleNode<T>[] = [];
  const warnings: CompilerDiagnostic[] = [];
  const resolved = new Map<IdentityKey, Map<string, ModuleIdentity>>();

  // Pass 1: nodes
  for (const module of modules) {
    const identity = module.identity;
    let revisions = byName.get(identity.name);
    if (!revisions) {
      revisions = new Map();
      byName.set(identity.name, revisions);
    }
    if (revisions.has(identity.revision)) {
      throw new ModuleSortError(
        ReactorErrorCode.DuplicateIdentity,
        `Module ${formatIdentity(identity)} declared twice`,
        { module: identity.name, revision: identity.revision },
      );
    }
    const node = new MutableModuleNode(identity, module, nodes.length);
    revisions.set(identity.revision, node);
    nodes.push(node);
  }
  debug.sort("graph.nodes", { count: nodes.length });

  function lookup(
    from: ModuleIdentity,
    descriptor: Pick<ImportDescriptor, "module" | "revision" | "location">,
  ): { node: MutableModuleNode<T>; ambiguous: boolean } {
    const revision = descriptor.revision ?? UNSPECIFIED_REVISION;
    const candidates = byName.get(descriptor.module);
    const exact = candidates?.get(revision);
    if (exact) return { node: exact, ambiguous: false };

    if (candidates && candidates.size > 0 && isUnspecified(revision)) {
      // Implementation-defined: the first registered revision wins.
      const first = candidates.values().next();
      if (!first.done) {
        return { node: first.value, ambiguous: candidates.size > 1 };
      }
    }

    const available = candidates ? [...candidates.keys()].join(", ") : "none";
    throw new ModuleSortError(
      ReactorErrorCode.UnresolvedImport,
      `Not existing module imported: ${descriptor.module}@${revision} by ${formatIdentity(from)} (available revisions: ${available})`,
      { from: formatIdentity(from), module: descriptor.module, revision },
      descriptor.location,
    );
  }

  // Pass 2: edges
  const namespaces = new Map<string, ModuleIdentity>();
  for (const from of nodes) {
    const { identity, module } = from;

    const ns = module.namespace;
    if (ns !== undefined) {
      const owner = namespaces.get(ns);
      if (!owner) {
        namespaces.set(ns, identity);
      } else if (owner.name !== identity.name) {
        warnings.push(
          buildDiagnostic({
            code: ReactorErrorCode.NamespaceCollision,
            severity: "warning",
            stage: "sort",
            message: `Module ${formatIdentity(identity)} uses namespace '${ns}' already declared by ${formatIdentity(owner)}`,
            data: { namespace: ns, module: formatIdentity(identity), owner: formatIdentity(owner) },
          }),
        );
      }
    }

    const imported = new Map<string, Revision>();
    const wired = new Map<string, ModuleIdentity>();
    for (const descriptor of module.imports) {
      const revision = descriptor.revision ?? UNSPECIFIED_REVISION;
      const { node: to, ambiguous } = lookup(identity, descriptor);

      const previous = imported.get(descriptor.module);
      if (
        previous !== undefined &&
        previous !== revision &&
        !isUnspecified(previous) &&
        !isUnspecified(revision)
      ) {
        throw new ModuleSortError(
          ReactorErrorCode.ImportRevisionConflict,
          `Module ${descriptor.module} imported twice by ${formatIdentity(identity)} with different revisions: ${previous}, ${revision}`,
          { from: formatIdentity(identity), module: descriptor.module, revisions: [previous, revision] },
          descriptor.location,
        );
      }
      imported.set(descriptor.module, revision);

      if (ambiguous) {
        warnings.push(
          buildDiagnostic({
            code: ReactorErrorCode.AmbiguousImportRevision,
            severity: "warning",
            stage: "sort",
            location: descriptor.location,
            message: `${descriptor.kind} of ${descriptor.module} by ${formatIdentity(identity)} names no revision; using ${formatIdentity(to.identity)}`,
            data: { from: formatIdentity(identity), module: descriptor.module, chosen: to.identity.revision },
          }),
        );
      }

      // A specified revision takes precedence over an earlier unspecified one.
      if (!wired.has(descriptor.module) || !isUnspecified(revision)) {
        wired.set(descriptor.module, to.identity);
      }
      from.addEdge(to);
      debug.sort("graph.edge", { from: from.toString(), to: to.toString(), kind: descriptor.kind });
    }
    resolved.set(from.key, wired);
  }

  return {
    byName,
    nodes,
    warnings,
    get(identity) {
      return byName.get(identity.name)?.get(identity.revision);
    },
    resolve: lookup,
    resolvedImports(module) {
      return resolved.get(identityKey(module)) ?? new Map();
    },
  };
}
