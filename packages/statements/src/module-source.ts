import {
  compareRevisions,
  latestRevision,
  moduleIdentity,
  parseRevision,
  SourceError,
  ReactorErrorCode,
  type ImportDescriptor,
  type ModuleSource,
  type RevisionComparator,
  type RevisionDate,
  type StatementSource,
} from "@schema-reactor/compiler";

export interface ModuleSourceOptions {
  /** Picks the module's own revision among its `revision` statements. */
  revisionOrder?: RevisionComparator;
}

function firstArgument(statement: StatementSource, keyword: string): string | undefined {
  return statement.substatements.find((sub) => sub.keyword === keyword)?.argument ?? undefined;
}

/**
 * Derive the linkage facts the sorter needs (identity, namespace, imports,
 * owning module) from a declared `module` or `submodule` tree. Revisions are
 * checked here since they make up the identity; other arguments are left to
 * the statement definitions.
 *
 * @throws SourceError when the root is neither `module` nor `submodule`, has no
 * name, or declares a revision that is not a date
 */
export function moduleSourceFromStatements(root: StatementSource, options: ModuleSourceOptions = {}): ModuleSource {
  if (root.keyword !== "module" && root.keyword !== "submodule") {
    throw new SourceError(
      root.location,
      `Expected 'module' or 'submodule', found '${root.keyword}'`,
      ReactorErrorCode.UnknownStatement,
    );
  }
  if (!root.argument) {
    throw new SourceError(root.location, `'${root.keyword}' needs a name`, ReactorErrorCode.InvalidArgument);
  }

  const revisions: RevisionDate[] = [];
  for (const sub of root.substatements) {
    if (sub.keyword !== "revision") continue;
    const revision = parseRevision(sub.argument);
    if (!revision) {
      throw new SourceError(
        sub.location,
        `'${sub.argument ?? ""}' is not a YYYY-MM-DD revision date`,
        ReactorErrorCode.InvalidArgument,
      );
    }
    revisions.push(revision);
  }
  const identity = moduleIdentity(
    root.argument,
    revisions.length > 0 ? latestRevision(revisions, options.revisionOrder ?? compareRevisions) : null,
  );

  const imports: ImportDescriptor[] = [];
  for (const sub of root.substatements) {
    const kind = sub.keyword === "import" || sub.keyword === "include" ? sub.keyword : null;
    if (kind === null || !sub.argument) continue;
    const revision = parseRevision(firstArgument(sub, "revision-date"));
    imports.push({
      kind,
      module: sub.argument,
      ...(revision ? { revision } : {}),
      location: sub.location,
    });
  }

  const submodule = root.keyword === "submodule";
  const namespace = submodule ? undefined : firstArgument(root, "namespace");
  const belongsTo = submodule ? firstArgument(root, "belongs-to") : undefined;
  return {
    kind: "source",
    identity,
    ...(namespace !== undefined ? { namespace } : {}),
    imports,
    submodule,
    ...(belongsTo !== undefined ? { belongsTo } : {}),
    root,
  };
}
