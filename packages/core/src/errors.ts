/**
 * packages/core/src/errors.ts — Deterministic error codes.
 *
 * Configuration errors (missing collaborators, unsupported message kinds,
 * invalid configuration) are fatal and surface as ChatLayoutError. Degenerate
 * geometry never throws; it produces zero or minimum sizes instead.
 */

/** Codes for every fatal precondition violation. */
export type ChatLayoutErrorCode =
  | "CHATLAYOUT_MISSING_COLLABORATOR"
  | "CHATLAYOUT_UNSUPPORTED_KIND"
  | "CHATLAYOUT_INVALID_CONFIG"
  | "CHATLAYOUT_INVALID_POSITION"
  | "CHATLAYOUT_REENTRANT_CALL"
  | "CHATLAYOUT_DUPLICATE_ID";

/**
 * Error class for all precondition failures.
 * The `code` property identifies the specific violation.
 */
export class ChatLayoutError extends Error {
  override readonly name = "ChatLayoutError";
  readonly code: ChatLayoutErrorCode;

  constructor(code: ChatLayoutErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChatLayoutError);
    }
  }
}

/** Structured fatal value used by pure functions that report instead of throwing. */
export type ChatLayoutFatal = Readonly<{ code: ChatLayoutErrorCode; detail: string }>;

export type ChatLayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: ChatLayoutFatal }>;

export function ok<T>(value: T): ChatLayoutResult<T> {
  return { ok: true, value };
}

export function fatal(code: ChatLayoutErrorCode, detail: string): ChatLayoutResult<never> {
  return { ok: false, fatal: { code, detail } };
}

export function throwCode(code: ChatLayoutErrorCode, detail: string): never {
  throw new ChatLayoutError(code, detail);
}

/** Unwrap a result, converting a fatal into a thrown ChatLayoutError. */
export function unwrapResult<T>(result: ChatLayoutResult<T>): T {
  if (!result.ok) throwCode(result.fatal.code, result.fatal.detail);
  return result.value;
}
