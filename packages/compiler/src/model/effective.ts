import type { SourceLocation } from "./source.js";

/**
 * Immutable, fully resolved form of a statement. Definitions may return
 * richer shapes as long as they keep these fields; `data` carries resolved
 * cross references in plain, serializable form.
 */
export interface EffectiveStatement<TArg = unknown> {
  readonly keyword: string;
  readonly argument: TArg;
  readonly location: SourceLocation;
  readonly substatements: readonly EffectiveStatement[];
  readonly data?: Readonly<Record<string, unknown>>;
}

/** Recursively freeze an object graph. Already-frozen nodes are skipped. */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }
  return value;
}
