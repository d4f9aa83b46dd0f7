/**
 * packages/core/src/model/fingerprint.ts — Content fingerprints.
 *
 * A fingerprint is derived from the full message value through a canonical
 * serialization (object keys sorted, undefined and function members skipped),
 * so two structurally equal messages always share a fingerprint regardless of
 * property insertion order. Maps and sets encode their members sorted by
 * canonical form, so insertion order does not matter there either.
 */

import type { Message } from "./message.js";

const FNV_OFFSET_A = 0x811c9dc5;
const FNV_OFFSET_B = 0x050c5d1f;
const FNV_PRIME = 0x01000193;

const encoder = new TextEncoder();

function hashFnv1a32(bytes: Uint8Array, seed: number): number {
  let h = seed;
  for (let i = 0; i < bytes.byteLength; i++) {
    h ^= bytes[i] ?? 0;
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

function toHex32(n: number): string {
  return n.toString(16).padStart(8, "0");
}

function canonicalNumber(n: number): string {
  if (Number.isNaN(n)) return '"NaN"';
  if (n === Number.POSITIVE_INFINITY) return '"+Inf"';
  if (n === Number.NEGATIVE_INFINITY) return '"-Inf"';
  if (Object.is(n, -0)) return "0";
  return String(n);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function canonicalPart(value: unknown, seen: Set<object>): string {
  const out: string[] = [];
  writeCanonical(value, seen, out);
  return out.join("");
}

function writeCanonical(value: unknown, seen: Set<object>, out: string[]): void {
  switch (typeof value) {
    case "string":
      out.push(JSON.stringify(value));
      return;
    case "number":
      out.push(canonicalNumber(value));
      return;
    case "boolean":
      out.push(value ? "true" : "false");
      return;
    case "bigint":
      out.push(`"${value.toString()}n"`);
      return;
    case "undefined":
    case "function":
    case "symbol":
      out.push("null");
      return;
    default:
      break;
  }

  if (value === null || typeof value !== "object") {
    out.push("null");
    return;
  }

  const obj = value;
  if (seen.has(obj)) {
    out.push('"[circular]"');
    return;
  }
  seen.add(obj);

  if (Array.isArray(obj)) {
    out.push("[");
    for (let i = 0; i < obj.length; i++) {
      if (i > 0) out.push(",");
      writeCanonical(obj[i], seen, out);
    }
    out.push("]");
  } else if (obj instanceof Date) {
    out.push(canonicalNumber(obj.getTime()));
  } else if (obj instanceof Map) {
    const pairs: [string, string][] = [];
    for (const [k, v] of obj) pairs.push([canonicalPart(k, seen), canonicalPart(v, seen)]);
    pairs.sort((a, b) => compareStrings(a[0], b[0]) || compareStrings(a[1], b[1]));
    out.push('{"$map":[');
    for (let i = 0; i < pairs.length; i++) {
      const pair = pairs[i];
      if (pair === undefined) continue;
      if (i > 0) out.push(",");
      out.push("[", pair[0], ",", pair[1], "]");
    }
    out.push("]}");
  } else if (obj instanceof Set) {
    const members: string[] = [];
    for (const v of obj) members.push(canonicalPart(v, seen));
    members.sort(compareStrings);
    out.push('{"$set":[', members.join(","), "]}");
  } else {
    const members: [string, unknown][] = Object.entries(obj);
    members.sort((a, b) => compareStrings(a[0], b[0]));
    out.push("{");
    let first = true;
    for (const [key, v] of members) {
      if (v === undefined || typeof v === "function" || typeof v === "symbol") continue;
      if (!first) out.push(",");
      first = false;
      out.push(JSON.stringify(key), ":");
      writeCanonical(v, seen, out);
    }
    out.push("}");
  }

  seen.delete(obj);
}

/** Canonical serialization used for fingerprinting. */
export function canonicalize(value: unknown): string {
  const out: string[] = [];
  writeCanonical(value, new Set<object>(), out);
  return out.join("");
}

/**
 * Fingerprint of a message's full content (16 hex characters).
 * Equal content yields equal fingerprints; identity is part of the content.
 */
export function contentFingerprint(message: Message): string {
  const bytes = encoder.encode(canonicalize(message));
  return `${toHex32(hashFnv1a32(bytes, FNV_OFFSET_A))}${toHex32(hashFnv1a32(bytes, FNV_OFFSET_B))}`;
}
