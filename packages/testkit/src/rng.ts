/**
 * Seeded pseudo-random numbers for property tests (LCG, 32-bit state).
 * Equal seeds replay equal sequences.
 */

export type Rng = Readonly<{
  /** Float in [0, 1). */
  next: () => number;
  /** Integer in [min, max], both inclusive. */
  int: (min: number, max: number) => number;
  pick: <T>(items: readonly T[]) => T;
  bool: () => boolean;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const next = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
  const int = (min: number, max: number): number => min + Math.floor(next() * (max - min + 1));
  return Object.freeze({
    next,
    int,
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) throw new Error("createRng.pick: empty list");
      const item = items[int(0, items.length - 1)];
      if (item === undefined) throw new Error("createRng.pick: index out of range");
      return item;
    },
    bool: (): boolean => next() < 0.5,
  });
}

/** Run `fn` with a seeded rng, tagging any failure with the seed. */
export function withSeed<T>(label: string, seed: number, fn: (rng: Rng) => T): T {
  try {
    return fn(createRng(seed));
  } catch (error) {
    const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    throw new Error(`[${label}] seed=${String(seed)} failed: ${detail}`);
  }
}
