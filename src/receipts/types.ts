// src/receipts/types.ts
// Fact sets (supplied by the extraction pipeline) and the receipts derived from them.

export type FactValue = string | number | boolean | null;

/** Character offsets [start, end) into the source text the fact was read from. */
export type EvidenceSpan = readonly [start: number, end: number];

export interface Fact {
  key: string;
  value: FactValue;
  evidenceSpan?: EvidenceSpan;
}

/** Ordered as extracted; order does not affect the canonical form. */
export type FactSet = readonly Fact[];

export interface Receipt {
  receiptId: string;
  docId: string;
  canonicalBytes: Buffer;
  formatVersion: number;
  /** Lowercase hex SHA-256 of canonicalBytes. */
  hash: string;
  createdAt: number; // unix ms
}

export type FactChangeType = "added" | "removed" | "modified";

export interface FactChange {
  key: string;
  changeType: FactChangeType;
  oldValue: FactValue | undefined;
  newValue: FactValue | undefined;
}

export interface IntegrityReport {
  receiptId: string;
  valid: boolean;
  expectedHash: string;
  actualHash: string;
}
