/**
 * packages/core/src/layout/textMeasure.ts — Deterministic text measurement.
 *
 * Why: Computes the size of styled message text within a maximum width. Column
 * widths come from string-width (East Asian Width, emoji and control handling);
 * grapheme boundaries for hard breaks come from Intl.Segmenter. Columns are
 * converted into layout units through each span's font metrics.
 *
 * Width rules (per grapheme, in columns):
 *   - ASCII printable: 1
 *   - Controls and combining marks: 0
 *   - CJK, wide characters and emoji sequences: 2
 *
 * Wrapping rules:
 *   - `\n` always ends a line
 *   - Greedy token wrapping; whitespace runs are preserved, not collapsed,
 *     except a run that overflows the line, which the break consumes
 *   - Words crossing span boundaries wrap as one token
 *   - Overlong words hard-break at grapheme boundaries
 */

import stringWidth from "string-width";
import type { StyledText, TextSpan } from "../model/message.js";
import { type Font, type Size, ZERO_SIZE } from "./types.js";

/* ========== Column Width Cache ========== */

/** Maximum number of cached widths before eviction. */
const TEXT_CACHE_MAX_SIZE = 10000;
/**
 * Maximum string length (UTF-16 code units) eligible for caching.
 * Long tokens rarely repeat and would only churn the cache.
 */
const TEXT_CACHE_MAX_KEY_LENGTH = 96;

const textWidthCache = new Map<string, number>();

function evictOldestTextWidthCacheEntry(): void {
  const oldest = textWidthCache.keys().next();
  if (oldest.done === true) return;
  textWidthCache.delete(oldest.value);
}

/** Clear the column width cache. */
export function clearTextMeasureCache(): void {
  textWidthCache.clear();
}

export function getTextMeasureCacheSize(): number {
  return textWidthCache.size;
}

function measureTextCellsAsciiOnly(text: string): number | null {
  let total = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0x80) return null;
    if (code < 0x20 || code === 0x7f) continue;
    total++;
  }
  return total;
}

/** Display width of `text` in terminal-cell columns. */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;

  const cacheable = text.length <= TEXT_CACHE_MAX_KEY_LENGTH;
  if (cacheable) {
    const cached = textWidthCache.get(text);
    if (cached !== undefined) return cached;
  }

  const width = measureTextCellsAsciiOnly(text) ?? stringWidth(text);

  if (cacheable) {
    if (textWidthCache.size >= TEXT_CACHE_MAX_SIZE) {
      evictOldestTextWidthCacheEntry();
    }
    textWidthCache.set(text, width);
  }

  return width;
}

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function forEachGrapheme(text: string, visit: (cluster: string) => void): void {
  for (const item of graphemeSegmenter.segment(text)) {
    if (item.segment.length > 0) visit(item.segment);
  }
}

/* ========== Styled Text Shaping ========== */

type PieceKind = "word" | "space" | "newline";

/** Tokens: one newline, a run of non-space, or a run of non-newline whitespace. */
const PIECE_RE = /\n|[^\s]+|[^\S\n]+/g;

function pieceKind(token: string): PieceKind {
  if (token === "\n") return "newline";
  return /^\s/.test(token) ? "space" : "word";
}

function unitsOf(text: string, font: Font): number {
  return measureTextCells(text) * font.advance;
}

/** Receives each finished line: its text and size in (unrounded) units. */
export type LineSink = (text: string, width: number, height: number) => void;

/**
 * Reusable shaping context. Holds per-line state and scratch buffers so that
 * repeated measurements do not reallocate.
 */
class ShapingContext {
  private maxWidth = 0;
  private sink: LineSink | null = null;
  private lineText = "";
  private lineWidth = 0;
  private lineHeight = 0;
  private lineHasContent = false;
  /** Width of the whitespace at the end of the current line. */
  private trailingSpace = 0;
  private fallbackHeight = 0;

  private widest = 0;
  private totalHeight = 0;

  /** Pending word pieces (a word may span several fonts). */
  private readonly wordTexts: string[] = [];
  private readonly wordFonts: Font[] = [];
  private wordWidth = 0;

  shape(text: StyledText, maxWidth: number, sink: LineSink | null): Size {
    if (!(maxWidth > 0) || text.length === 0) return ZERO_SIZE;

    this.maxWidth = maxWidth;
    this.sink = sink;
    this.lineText = "";
    this.lineWidth = 0;
    this.lineHeight = 0;
    this.lineHasContent = false;
    this.trailingSpace = 0;
    this.fallbackHeight = text[0]?.font.lineHeight ?? 0;
    this.widest = 0;
    this.totalHeight = 0;
    this.wordTexts.length = 0;
    this.wordFonts.length = 0;
    this.wordWidth = 0;

    for (let s = 0; s < text.length; s++) {
      const span = text[s];
      if (span === undefined || span.text.length === 0) continue;
      this.shapeSpan(span);
    }
    this.flushWord();
    this.pushLine();

    this.sink = null;
    return Object.freeze({
      w: Math.ceil(Math.min(this.maxWidth, this.widest)),
      h: Math.ceil(this.totalHeight),
    });
  }

  private shapeSpan(span: TextSpan): void {
    const tokens = span.text.match(PIECE_RE);
    if (!tokens) return;
    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i] ?? "";
      const kind = pieceKind(token);
      if (kind === "word") {
        this.wordTexts.push(token);
        this.wordFonts.push(span.font);
        this.wordWidth += unitsOf(token, span.font);
        continue;
      }
      this.flushWord();
      if (kind === "newline") {
        this.fallbackHeight = span.font.lineHeight;
        this.pushLine();
        continue;
      }
      this.placeSpace(token, unitsOf(token, span.font), span.font);
    }
  }

  /** Whitespace that does not fit is consumed by the line break. */
  private placeSpace(token: string, width: number, font: Font): void {
    if (this.lineWidth + width <= this.maxWidth) {
      this.append(token, width, font);
      this.trailingSpace += width;
      return;
    }
    if (this.lineHasContent) this.pushLine(true);
  }

  private flushWord(): void {
    const n = this.wordTexts.length;
    if (n === 0) return;

    if (this.lineWidth + this.wordWidth <= this.maxWidth || this.wordWidth <= this.maxWidth) {
      if (this.lineWidth + this.wordWidth > this.maxWidth && this.lineHasContent) this.pushLine(true);
      for (let i = 0; i < n; i++) {
        const font = this.wordFonts[i];
        const piece = this.wordTexts[i];
        if (font === undefined || piece === undefined) continue;
        this.append(piece, unitsOf(piece, font), font);
      }
    } else {
      if (this.lineHasContent) this.pushLine(true);
      for (let i = 0; i < n; i++) {
        const font = this.wordFonts[i];
        const piece = this.wordTexts[i];
        if (font === undefined || piece === undefined) continue;
        forEachGrapheme(piece, (cluster) => {
          const w = unitsOf(cluster, font);
          // A single grapheme wider than the line still makes progress.
          if (this.lineWidth + w > this.maxWidth && this.lineHasContent) this.pushLine(true);
          this.append(cluster, w, font);
        });
      }
    }

    this.wordTexts.length = 0;
    this.wordFonts.length = 0;
    this.wordWidth = 0;
  }

  private append(text: string, width: number, font: Font): void {
    this.lineText += text;
    this.lineWidth += width;
    if (font.lineHeight > this.lineHeight) this.lineHeight = font.lineHeight;
    this.fallbackHeight = font.lineHeight;
    this.lineHasContent = true;
    this.trailingSpace = 0;
  }

  /** A line ended by wrapping does not count its trailing whitespace as width. */
  private pushLine(wrapped = false): void {
    const h = this.lineHasContent ? this.lineHeight : this.fallbackHeight;
    const width = wrapped ? this.lineWidth - this.trailingSpace : this.lineWidth;
    if (width > this.widest) this.widest = width;
    this.totalHeight += h;
    this.sink?.(this.lineText, width, h);
    this.lineText = "";
    this.lineWidth = 0;
    this.lineHeight = 0;
    this.lineHasContent = false;
    this.trailingSpace = 0;
  }
}

export type TextMeasurer = Readonly<{
  /**
   * Size of `text` wrapped within `maxWidth` units, rounded up to whole units.
   *
   * - Zero-length text measures as one empty line of its first font.
   * - `maxWidth <= 0` (or non-finite) measures as zero: never throws.
   */
  measure: (text: StyledText, maxWidth: number) => Size;
  /** Same shaping as measure(), returning each wrapped line's text. */
  wrap: (text: StyledText, maxWidth: number) => readonly string[];
}>;

/** Create a measurer with its own persistent shaping context. */
export function createTextMeasurer(): TextMeasurer {
  const ctx = new ShapingContext();
  return Object.freeze({
    measure: (text: StyledText, maxWidth: number): Size => ctx.shape(text, maxWidth, null),
    wrap: (text: StyledText, maxWidth: number): readonly string[] => {
      const lines: string[] = [];
      ctx.shape(text, maxWidth, (line) => {
        lines.push(line);
      });
      return Object.freeze(lines);
    },
  });
}

/**
 * Unconstrained single-run size (used for timestamp labels): widest line and
 * total height of the text with only explicit line breaks.
 */
export function measureUnconstrained(measurer: TextMeasurer, text: StyledText): Size {
  return measurer.measure(text, Number.MAX_SAFE_INTEGER);
}
