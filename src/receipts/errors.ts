// src/receipts/errors.ts

/** Thrown when a fact set contains the same key twice. */
export class DuplicateKeyError extends Error {
  constructor(readonly key: string) {
    super(`Duplicate fact key: ${JSON.stringify(key)}`);
    this.name = "DuplicateKeyError";
  }
}

/** Thrown for an entry the canonical encoding cannot represent. */
export class InvalidFactError extends Error {
  constructor(readonly index: number, detail: string) {
    super(`Invalid fact at index ${index}: ${detail}`);
    this.name = "InvalidFactError";
  }
}

/** Thrown when stored canonical bytes cannot be decoded. */
export class CanonicalFormatError extends Error {
  constructor(detail: string) {
    super(`Malformed canonical bytes: ${detail}`);
    this.name = "CanonicalFormatError";
  }
}

export class ReceiptNotFoundError extends Error {
  constructor(readonly receiptId: string) {
    super(`Receipt not found: ${receiptId}`);
    this.name = "ReceiptNotFoundError";
  }
}
