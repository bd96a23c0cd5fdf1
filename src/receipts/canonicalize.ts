// src/receipts/canonicalize.ts
// Canonical byte form of a fact set.
//
// Format v1:
//   byte 0      format version (0x01)
//   bytes 1..n  UTF-8 JSON array of entries, sorted by the UTF-8 bytes of the key:
//                 [key, tag, value]  or  [key, tag, value, [start, end]]
//               tag: "s" string | "n" number | "b" boolean | "z" null
//
// Numbers use the ECMAScript shortest round-trip form (as in RFC 8785), so 1, 1.0
// and 1e0 all encode as 1, and -0 encodes as 0. Null values are kept so that an
// explicit absence hashes differently from an omitted key.

import { CanonicalFormatError, DuplicateKeyError, InvalidFactError } from "./errors.js";
import type { EvidenceSpan, Fact, FactSet, FactValue } from "./types.js";

export const CANONICAL_FORMAT_VERSION = 1;

type ValueTag = "s" | "n" | "b" | "z";

type CanonicalEntry =
  | [key: string, tag: ValueTag, value: FactValue]
  | [key: string, tag: ValueTag, value: FactValue, span: [number, number]];

/* ---------- Validation ---------- */

function tagOf(value: unknown, index: number): ValueTag {
  if (value === null) return "z";
  switch (typeof value) {
    case "string":
      return "s";
    case "boolean":
      return "b";
    case "number":
      if (!Number.isFinite(value)) {
        throw new InvalidFactError(index, "numbers must be finite");
      }
      return "n";
    default:
      throw new InvalidFactError(index, `unsupported value type ${typeof value}`);
  }
}

function isValidSpan(span: EvidenceSpan): boolean {
  const [start, end] = span;
  return (
    Number.isSafeInteger(start) &&
    Number.isSafeInteger(end) &&
    start >= 0 &&
    end >= start
  );
}

/**
 * Byte-wise (UTF-8) key ordering. Differs from String#localeCompare and from UTF-16 order.
 * Lone surrogates all encode as U+FFFD, so keys that tie on bytes fall back to code-unit order.
 */
export function compareKeys(a: string, b: string): number {
  const byBytes = Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
  if (byBytes !== 0 || a === b) return byBytes;
  return a < b ? -1 : 1;
}

/**
 * Validate a fact set and return its entries sorted by key.
 * Throws DuplicateKeyError or InvalidFactError.
 */
export function normalizeFactSet(facts: FactSet): Fact[] {
  const seen = new Set<string>();

  facts.forEach((fact, index) => {
    if (typeof fact.key !== "string" || fact.key.length === 0) {
      throw new InvalidFactError(index, "key must be a non-empty string");
    }
    if (seen.has(fact.key)) {
      throw new DuplicateKeyError(fact.key);
    }
    seen.add(fact.key);

    tagOf(fact.value, index);
    if (fact.evidenceSpan !== undefined && !isValidSpan(fact.evidenceSpan)) {
      throw new InvalidFactError(index, "evidence span must be [start, end] with 0 <= start <= end");
    }
  });

  return [...facts].sort((a, b) => compareKeys(a.key, b.key));
}

/* ---------- Encoding ---------- */

function toEntry(fact: Fact, index: number): CanonicalEntry {
  const tag = tagOf(fact.value, index);
  const value = typeof fact.value === "number" && Object.is(fact.value, -0) ? 0 : fact.value;

  if (fact.evidenceSpan) {
    return [fact.key, tag, value, [fact.evidenceSpan[0], fact.evidenceSpan[1]]];
  }
  return [fact.key, tag, value];
}

/** Canonical JSON text (without the version byte). */
export function canonicalJson(facts: FactSet): string {
  return JSON.stringify(normalizeFactSet(facts).map(toEntry));
}

/** Deterministic byte form of a fact set; independent of input order. */
export function canonicalize(facts: FactSet): Buffer {
  const body = Buffer.from(canonicalJson(facts), "utf8");
  return Buffer.concat([Buffer.from([CANONICAL_FORMAT_VERSION]), body]);
}

/* ---------- Decoding ---------- */

function decodeValue(tag: unknown, value: unknown): FactValue {
  switch (tag) {
    case "s":
      if (typeof value === "string") return value;
      break;
    case "n":
      if (typeof value === "number") return value;
      break;
    case "b":
      if (typeof value === "boolean") return value;
      break;
    case "z":
      if (value === null) return null;
      break;
  }
  throw new CanonicalFormatError(`value does not match tag ${String(tag)}`);
}

function decodeSpan(span: unknown): EvidenceSpan {
  if (
    Array.isArray(span) &&
    span.length === 2 &&
    typeof span[0] === "number" &&
    typeof span[1] === "number"
  ) {
    return [span[0], span[1]];
  }
  throw new CanonicalFormatError("evidence span must be a pair of numbers");
}

function decodeEntry(entry: unknown): Fact {
  if (!Array.isArray(entry) || (entry.length !== 3 && entry.length !== 4)) {
    throw new CanonicalFormatError("entry must be an array of 3 or 4 elements");
  }
  const [key, tag, value, span] = entry;
  if (typeof key !== "string") {
    throw new CanonicalFormatError("entry key must be a string");
  }

  const fact: Fact = { key, value: decodeValue(tag, value) };
  if (entry.length === 4) {
    fact.evidenceSpan = decodeSpan(span);
  }
  return fact;
}

/** Inverse of canonicalize() for the current format version. */
export function decodeCanonical(bytes: Uint8Array): Fact[] {
  if (bytes.length === 0) {
    throw new CanonicalFormatError("empty input");
  }
  if (bytes[0] !== CANONICAL_FORMAT_VERSION) {
    throw new CanonicalFormatError(`unsupported format version ${bytes[0]}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes.subarray(1)).toString("utf8"));
  } catch (err) {
    throw new CanonicalFormatError(err instanceof Error ? err.message : "invalid JSON");
  }
  if (!Array.isArray(parsed)) {
    throw new CanonicalFormatError("body must be a JSON array");
  }

  return parsed.map(decodeEntry);
}

/** The JSON body of canonical bytes, as served to clients. */
export function canonicalBody(bytes: Uint8Array): string {
  return Buffer.from(bytes.subarray(1)).toString("utf8");
}
