// src/receipts/diff.ts
// Field-by-field comparison of two fact sets, keyed by fact key.

import { compareKeys } from "./canonicalize.js";
import type { FactChange, FactSet, FactValue } from "./types.js";

function toMap(facts: FactSet): Map<string, FactValue> {
  return new Map(facts.map(f => [f.key, f.value]));
}

/**
 * Changes needed to go from `before` to `after`, sorted by key.
 * Evidence spans are ignored: moving a fact within the source is not a change.
 */
export function diffFactSets(before: FactSet, after: FactSet): FactChange[] {
  const a = toMap(before);
  const b = toMap(after);
  const keys = [...new Set([...a.keys(), ...b.keys()])].sort(compareKeys);

  const changes: FactChange[] = [];
  for (const key of keys) {
    const inA = a.has(key);
    const inB = b.has(key);
    const oldValue = a.get(key);
    const newValue = b.get(key);

    if (inA && !inB) {
      changes.push({ key, changeType: "removed", oldValue, newValue: undefined });
    } else if (!inA && inB) {
      changes.push({ key, changeType: "added", oldValue: undefined, newValue });
    } else if (oldValue !== newValue) {
      changes.push({ key, changeType: "modified", oldValue, newValue });
    }
  }
  return changes;
}
