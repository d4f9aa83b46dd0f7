import { type Thread, type ThreadOptions, createThread } from "@chatlayout/core";
import { readEngineEnv } from "./env.js";
import {
  type MemoryPressureWatcher,
  type MemoryPressureWatcherOptions,
  createMemoryPressureWatcher,
} from "./memoryPressure.js";

export { type EngineEnv, readEngineEnv } from "./env.js";
export {
  type InvalidationTarget,
  type MemoryPressureLogEvent,
  type MemoryPressureWatcher,
  type MemoryPressureWatcherOptions,
  createMemoryPressureWatcher,
} from "./memoryPressure.js";

type ProcessEnv = Readonly<Record<string, string | undefined>>;

export type CreateNodeThreadOptions = ThreadOptions &
  Readonly<{
    /** Environment read for engine tunables; explicit options win. Defaults to process.env. */
    env?: ProcessEnv;
    /**
     * Flush the layout cache under memory pressure. `false` disables the
     * watcher; an object tunes it.
     */
    memoryPressure?: false | Omit<MemoryPressureWatcherOptions, "target">;
  }>;

export type NodeThread = Thread &
  Readonly<{
    /** `null` when `memoryPressure: false`. */
    memoryPressure: MemoryPressureWatcher | null;
    dispose: () => void;
  }>;

/**
 * Create a thread with Node.js defaults: engine tunables from the
 * environment and a started memory-pressure watcher.
 */
export function createNodeThread(opts: CreateNodeThreadOptions): NodeThread {
  const envTuning = readEngineEnv(opts.env ?? process.env);
  const cacheCapacity = opts.cacheCapacity ?? envTuning.cacheCapacity;
  const devMode = opts.devMode ?? envTuning.devMode;
  const thread = createThread({
    ...opts,
    ...(cacheCapacity !== undefined ? { cacheCapacity } : {}),
    ...(devMode !== undefined ? { devMode } : {}),
  });

  const watcher =
    opts.memoryPressure === false
      ? null
      : createMemoryPressureWatcher({ ...(opts.memoryPressure ?? {}), target: thread.layout });
  watcher?.start();

  return Object.freeze({
    get entries() {
      return thread.entries;
    },
    get layout() {
      return thread.layout;
    },
    get isTypingIndicatorVisible() {
      return thread.isTypingIndicatorVisible;
    },
    update: thread.update,
    setTypingIndicatorVisible: thread.setTypingIndicatorVisible,
    attributesAt: thread.attributesAt,
    cellSizeAt: thread.cellSizeAt,
    memoryPressure: watcher,
    dispose(): void {
      watcher?.stop();
    },
  });
}
