/**
 * packages/node/src/env.ts — Engine tunables from the process environment.
 *
 *   CHATLAYOUT_CACHE_CAPACITY  positive integer
 *   CHATLAYOUT_DEV             1/true/yes enables dev warnings, 0/false/no disables
 *
 * Values are validated like the programmatic options: anything else throws
 * ChatLayoutError("CHATLAYOUT_INVALID_CONFIG").
 */

import { ChatLayoutError, resolveEngineOptions } from "@chatlayout/core";

type ProcessEnv = Readonly<Record<string, string | undefined>>;

export type EngineEnv = Readonly<{ cacheCapacity?: number; devMode?: boolean }>;

const TRUE_VALUES = new Set(["1", "true", "yes"]);
const FALSE_VALUES = new Set(["0", "false", "no"]);

function readTrimmed(env: ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function parseFlag(name: string, raw: string): boolean {
  const lowered = raw.toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  throw new ChatLayoutError(
    "CHATLAYOUT_INVALID_CONFIG",
    `${name} must be one of 1, true, yes, 0, false, no (got "${raw}")`,
  );
}

export function readEngineEnv(env: ProcessEnv = process.env): EngineEnv {
  const rawCapacity = readTrimmed(env, "CHATLAYOUT_CACHE_CAPACITY");
  const rawDev = readTrimmed(env, "CHATLAYOUT_DEV");

  const cacheCapacity =
    rawCapacity === undefined
      ? undefined
      : resolveEngineOptions({ cacheCapacity: Number(rawCapacity) }).cacheCapacity;
  const devMode = rawDev === undefined ? undefined : parseFlag("CHATLAYOUT_DEV", rawDev);

  return Object.freeze({
    ...(cacheCapacity !== undefined ? { cacheCapacity } : {}),
    ...(devMode !== undefined ? { devMode } : {}),
  });
}
