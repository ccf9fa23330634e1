/* =======================================================================================
 * MODULE IDENTITY
 * ---------------------------------------------------------------------------------------
 * (name, revision) keys for modules. A revision is either an ISO date or the
 * "unspecified" sentinel used by modules and imports that carry no revision.
 * ======================================================================================= */

/** Branded ISO `YYYY-MM-DD` date string. */
export type RevisionDate = string & { readonly __brand: "RevisionDate" };

export const UNSPECIFIED_REVISION = "unspecified" as const;
export type UnspecifiedRevision = typeof UNSPECIFIED_REVISION;

export type Revision = RevisionDate | UnspecifiedRevision;

/** Branded `name@revision` string used as a map key. */
export type IdentityKey = string & { readonly __brand: "IdentityKey" };

export interface ModuleIdentity {
  readonly name: string;
  readonly revision: Revision;
}

/**
 * Total order over revisions. Supplied by the caller when module ordering
 * follows something other than calendar dates.
 */
export type RevisionComparator = (a: Revision, b: Revision) => number;

const REVISION_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isRevisionDate(value: string): value is RevisionDate {
  return REVISION_PATTERN.test(value);
}

/** Parse a raw revision argument; `null` when it is not a `YYYY-MM-DD` date. */
export function parseRevision(value: string | null | undefined): RevisionDate | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return isRevisionDate(trimmed) ? trimmed : null;
}

export function isUnspecified(revision: Revision): revision is UnspecifiedRevision {
  return revision === UNSPECIFIED_REVISION;
}

export function moduleIdentity(name: string, revision?: Revision | null): ModuleIdentity {
  return { name, revision: revision ?? UNSPECIFIED_REVISION };
}

export function identityKey(id: ModuleIdentity): IdentityKey {
  return `${id.name}@${id.revision}` as IdentityKey;
}

export function sameIdentity(a: ModuleIdentity, b: ModuleIdentity): boolean {
  return a.name === b.name && a.revision === b.revision;
}

export function formatIdentity(id: ModuleIdentity): string {
  return `${id.name}@${id.revision}`;
}

/** Calendar order; the sentinel sorts before every date. */
export const compareRevisions: RevisionComparator = (a, b) => {
  if (a === b) return 0;
  if (isUnspecified(a)) return -1;
  if (isUnspecified(b)) return 1;
  return a < b ? -1 : 1;
};

/** Latest of a list of revisions under `order`; the sentinel for an empty list. */
export function latestRevision(
  revisions: readonly Revision[],
  order: RevisionComparator = compareRevisions,
): Revision {
  let latest: Revision = UNSPECIFIED_REVISION;
  for (const revision of revisions) {
    if (order(revision, latest) > 0) latest = revision;
  }
  return latest;
}
