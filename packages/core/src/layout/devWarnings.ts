/**
 * packages/core/src/layout/devWarnings.ts — Deduplicated dev-mode warnings.
 */

export type WarnSink = (message: string) => void;

export type DevWarningArea = "layout" | "thread";

export type DevWarnings = Readonly<{
  enabled: boolean;
  /** Emit `detail` once per `key` (only in dev mode). */
  warnOnce(area: DevWarningArea, key: string, detail: string): void;
  /** Forget emitted keys so they may warn again. */
  reset(): void;
}>;

function defaultWarn(message: string): void {
  console.warn(message);
}

export function createDevWarnings(devMode: boolean, warn: WarnSink = defaultWarn): DevWarnings {
  const warnedKeys = new Set<string>();
  return Object.freeze({
    enabled: devMode,
    warnOnce(area: DevWarningArea, key: string, detail: string): void {
      if (!devMode) return;
      const scoped = `${area}:${key}`;
      if (warnedKeys.has(scoped)) return;
      warnedKeys.add(scoped);
      warn(`[chatlayout][${area}] ${detail}`);
    },
    reset(): void {
      warnedKeys.clear();
    },
  });
}
