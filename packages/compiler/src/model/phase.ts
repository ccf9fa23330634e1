/**
 * Processing phases, in execution order. A phase starts for any statement
 * only after the previous one settled across the whole forest.
 */
export const PHASES = [
  "pre-linkage",
  "linkage",
  "statement-definition",
  "full-declaration",
  "effective-model",
] as const;

export type Phase = (typeof PHASES)[number];

export function phaseIndex(phase: Phase): number {
  return PHASES.indexOf(phase);
}

/** True when `phase` is `reference` or comes after it. */
export function phaseReached(phase: Phase | null, reference: Phase): boolean {
  return phase !== null && phaseIndex(phase) >= phaseIndex(reference);
}

export function previousPhase(phase: Phase): Phase | null {
  const index = phaseIndex(phase);
  return index > 0 ? (PHASES[index - 1] ?? null) : null;
}
