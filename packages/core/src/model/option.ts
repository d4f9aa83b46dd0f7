/**
 * Explicit "no opinion" result for layout policy overrides.
 *
 * A policy method returning `none` declines; the caller falls back to the
 * per-sender configuration default.
 */
export type Option<T> = Readonly<{ some: true; value: T }> | Readonly<{ some: false }>;

export const none: Option<never> = Object.freeze({ some: false });

export function some<T>(value: T): Option<T> {
  return Object.freeze({ some: true, value });
}

/** Resolve an optional override against a fallback. */
export function orDefault<T>(opt: Option<T> | undefined, fallback: T): T {
  if (opt === undefined || !opt.some) return fallback;
  return opt.value;
}
