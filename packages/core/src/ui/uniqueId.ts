/**
 * packages/core/src/ui/uniqueId.ts: Generated ids for UI objects.
 *
 * Each kind has its own counter, so ids are unique per kind for the process
 * lifetime: `button1`, `button2`, `flydown1`. Two kinds whose names differ
 * only by a trailing number could still collide; kinds are plain words.
 */

const counters = new Map<string, number>();

export function nextUniqueId(kind: string): string {
  const next = (counters.get(kind) ?? 0) + 1;
  counters.set(kind, next);
  return `${kind}${String(next)}`;
}
