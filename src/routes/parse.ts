// src/routes/parse.ts
// Hand-rolled request body validation helpers.

import type { EvidenceSpan, Fact, FactValue } from '../receipts/types.js';

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function isFactValue(value: unknown): value is FactValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function parseSpan(value: unknown): EvidenceSpan | null {
  if (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  ) {
    return [value[0], value[1]];
  }
  return null;
}

/** Parse `{facts: [{key, value, evidence_span?}]}`. Semantic checks happen in canonicalize(). */
export function parseFactsBody(body: unknown): Parsed<Fact[]> {
  if (!isRecord(body) || !Array.isArray(body.facts)) {
    return { ok: false, message: 'facts must be an array' };
  }

  const facts: Fact[] = [];
  for (const [index, item] of body.facts.entries()) {
    if (!isRecord(item) || typeof item.key !== 'string') {
      return { ok: false, message: `facts[${index}].key must be a string` };
    }
    if (!('value' in item) || !isFactValue(item.value)) {
      return { ok: false, message: `facts[${index}].value must be a string, number, boolean or null` };
    }

    const fact: Fact = { key: item.key, value: item.value };
    if (item.evidence_span !== undefined && item.evidence_span !== null) {
      const span = parseSpan(item.evidence_span);
      if (!span) {
        return { ok: false, message: `facts[${index}].evidence_span must be [start, end]` };
      }
      fact.evidenceSpan = span;
    }
    facts.push(fact);
  }
  return { ok: true, value: facts };
}

export function parsePositiveInt(value: unknown): number | null {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const n = parseInt(value, 10);
    return n > 0 ? n : null;
  }
  return null;
}
