/**
 * Tracked Mastodon server generations.
 *
 * A generation is one release line of the server API. The list is ordered
 * oldest first; everything else in the capability model is keyed on the
 * position of a generation in this tuple.
 */

export const GENERATIONS = [
  '1.5.0',
  '2.1.0',
  '2.1.2',
  '2.2.0',
  '2.4.0',
  '2.9.1',
  '3.0.0',
  '3.1.0',
  '3.3.0',
] as const;

/**
 * One tracked server release line.
 */
export type Generation = (typeof GENERATIONS)[number];

/** Oldest generation the client can target. */
export const OLDEST_GENERATION: Generation = GENERATIONS[0];

/** Newest generation the client can target. */
export const NEWEST_GENERATION: Generation = GENERATIONS[GENERATIONS.length - 1];

/**
 * All generations at or after `G`, as a union.
 *
 * `G` is compared with `extends`, so it is left as `string` here to let
 * callers pass the result of other type-level lookups without re-proving
 * the constraint.
 */
export type GenerationsFrom<
  G extends string,
  T extends readonly Generation[] = typeof GENERATIONS,
> = T extends readonly [infer Head, ...infer Rest extends readonly Generation[]]
  ? Head extends G
    ? T[number]
    : GenerationsFrom<G, Rest>
  : never;

/**
 * Checks whether a string names a tracked generation.
 */
export function isGeneration(value: unknown): value is Generation {
  return typeof value === 'string' && GENERATIONS.some((generation) => generation === value);
}

/**
 * Position of a generation in the ordered chain.
 */
export function generationIndex(generation: Generation): number {
  return GENERATIONS.indexOf(generation);
}

/**
 * Orders two generations. Negative when `a` is older than `b`.
 */
export function compareGenerations(a: Generation, b: Generation): number {
  return generationIndex(a) - generationIndex(b);
}

/**
 * Generations from the oldest up to and including `target`.
 */
export function generationsUpTo(target: Generation): Generation[] {
  return GENERATIONS.slice(0, generationIndex(target) + 1);
}
