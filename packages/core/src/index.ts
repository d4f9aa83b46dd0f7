/**
 * packages/core/src/index.ts — Public API surface for @chatlayout/core.
 *
 * Runtime-agnostic: no Node.js imports. Host adapters live in @chatlayout/node.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  ChatLayoutError,
  type ChatLayoutErrorCode,
  type ChatLayoutFatal,
  type ChatLayoutResult,
  unwrapResult,
} from "./errors.js";

// =============================================================================
// Model
// =============================================================================

export { type Option, none, orDefault, some } from "./model/option.js";
export {
  type AudioItem,
  type ContactItem,
  type CustomData,
  type LinkItem,
  type LocationItem,
  MESSAGE_KIND_TYPES,
  type MediaItem,
  type Message,
  type MessageKind,
  type MessageKindType,
  type Sender,
  type StyledText,
  type TextSpan,
  styledText,
  styledTextLength,
} from "./model/message.js";
export { canonicalize, contentFingerprint } from "./model/fingerprint.js";
export {
  type Entry,
  type EntrySnapshot,
  type MessageEntry,
  type Position,
  TYPING_INDICATOR_ID,
  type TypingIndicatorEntry,
  entryFingerprint,
  messageEntry,
  position,
  typingIndicatorEntry,
} from "./model/entry.js";

// =============================================================================
// Source
// =============================================================================

export {
  type MessageListLayout,
  type MessageListSource,
  type MessageListSourceOptions,
  type MessageSource,
  createMessageListSource,
} from "./source.js";

// =============================================================================
// Layout
// =============================================================================

export {
  type AccessoryPosition,
  type AvatarHorizontalAnchor,
  type AvatarPosition,
  type AvatarVerticalAnchor,
  type EdgeInsets,
  type Font,
  type HorizontalInsets,
  type LabelAlignment,
  type LayoutAttributes,
  type LinkPreviewFonts,
  type ResolvedAvatarPosition,
  type Size,
  type TextAlignment,
  ZERO_INSETS,
  ZERO_SIZE,
  insets,
} from "./layout/types.js";
export {
  DEFAULT_BODY_FONT,
  DEFAULT_EMOJI_FONT,
  DEFAULT_SIZING_CONFIG,
  type SenderSizing,
  type SizingConfigOverrides,
  type SizingConfiguration,
  resolveSizingConfig,
} from "./layout/config.js";
export { type LabelHeights, type LayoutPolicy, defaultLayoutPolicy } from "./layout/policy.js";
export {
  type TextMeasurer,
  clearTextMeasureCache,
  createTextMeasurer,
  getTextMeasureCacheSize,
  measureTextCells,
} from "./layout/textMeasure.js";
export type { SizeCalculator } from "./layout/sizing/types.js";
export { type CellHeightParts, cellContentHeight } from "./layout/sizing/messageSizing.js";
export {
  type AttributeCache,
  type AttributeCacheStats,
  type CachedLayout,
  DEFAULT_ATTRIBUTE_CACHE_CAPACITY,
  createAttributeCache,
} from "./layout/engine/attributeCache.js";
export {
  type EngineTuning,
  type LayoutEngine,
  type LayoutEngineOptions,
  createLayoutEngine,
  resolveEngineOptions,
} from "./layout/engine/layoutEngine.js";
export type { WarnSink } from "./layout/devWarnings.js";

// =============================================================================
// Reconciliation & thread
// =============================================================================

export { type CollectOptions, collectEntries } from "./runtime/entries.js";
export {
  type IndexedId,
  type NonePlan,
  type ReconcileResult,
  type RefreshPlan,
  type StructuralPlan,
  type UpdatePlan,
  planUpdate,
} from "./runtime/reconcile.js";
export {
  type Thread,
  type ThreadOptions,
  type ThreadPresenter,
  createThread,
} from "./app/createThread.js";

// =============================================================================
// Perf
// =============================================================================

export {
  PERF_ENABLED,
  type PerfCounter,
  type PerfRecorder,
  type PerfSnapshot,
  type PhaseTotals,
  createPerfRecorder,
  perfReset,
  perfSnapshot,
} from "./perf/perf.js";
