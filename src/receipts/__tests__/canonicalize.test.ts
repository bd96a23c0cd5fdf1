import crypto from 'node:crypto';
import { describe, it, expect } from 'vitest';
import {
  CANONICAL_FORMAT_VERSION,
  canonicalBody,
  canonicalJson,
  canonicalize,
  compareKeys,
  decodeCanonical,
} from '../canonicalize.js';
import { CanonicalFormatError, DuplicateKeyError, InvalidFactError } from '../errors.js';
import { hashBytes, hashFactSet, isHexDigest } from '../hash.js';
import type { Fact } from '../types.js';

function sha256(bytes: Uint8Array): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

/* ============= Order independence ============= */

describe('canonicalize: ordering', () => {
  const ba: Fact[] = [
    { key: 'b', value: 1 },
    { key: 'a', value: 2 },
  ];
  const ab: Fact[] = [
    { key: 'a', value: 2 },
    { key: 'b', value: 1 },
  ];

  it('produces identical bytes for permutations of the same facts', () => {
    expect(canonicalize(ba).equals(canonicalize(ab))).toBe(true);
  });

  it('prefixes the format version and sorts entries by key', () => {
    const bytes = canonicalize(ba);
    const expected = Buffer.concat([Buffer.from([0x01]), Buffer.from('[["a","n",2],["b","n",1]]', 'utf8')]);

    expect(bytes[0]).toBe(CANONICAL_FORMAT_VERSION);
    expect(bytes.equals(expected)).toBe(true);
  });

  it('hashes permutations to the same digest', () => {
    const expected = sha256(Buffer.concat([Buffer.from([0x01]), Buffer.from('[["a","n",2],["b","n",1]]', 'utf8')]));

    expect(hashFactSet(ba)).toBe(expected);
    expect(hashFactSet(ab)).toBe(expected);
    expect(hashFactSet(ba)).toBe(hashFactSet(ba));
  });

  it('orders keys by UTF-8 bytes rather than UTF-16 code units', () => {
    // U+FFFF encodes as EF BF BF, U+1F600 as F0 9F 98 80; in UTF-16 the emoji sorts first.
    expect(compareKeys('\uffff', '\u{1F600}')).toBeLessThan(0);
    expect(canonicalJson([
      { key: '\u{1F600}', value: 1 },
      { key: '\uffff', value: 2 },
    ])).toBe('[["\uffff","n",2],["\u{1F600}","n",1]]');
  });

  it('orders lone-surrogate keys deterministically', () => {
    const facts: Fact[] = [
      { key: '\ufffd', value: 3 },
      { key: '\ud801', value: 2 },
      { key: '\ud800', value: 1 },
    ];
    const expected = '[["\\ud800","n",1],["\\ud801","n",2],["\ufffd","n",3]]';

    expect(compareKeys('\ud800', '\ud801')).toBeLessThan(0);
    expect(compareKeys('\ud801', '\ud800')).toBeGreaterThan(0);
    expect(canonicalJson(facts)).toBe(expected);
    expect(canonicalJson([...facts].reverse())).toBe(expected);
    expect(canonicalize([facts[1], facts[0], facts[2]]).equals(canonicalize(facts))).toBe(true);
  });

  it('does not mutate the input', () => {
    const input: Fact[] = [
      { key: 'z', value: 'last' },
      { key: 'a', value: 'first' },
    ];
    canonicalize(input);
    expect(input.map((f) => f.key)).toEqual(['z', 'a']);
  });
});

/* ============= Value encoding ============= */

describe('canonicalize: values', () => {
  it('tags every value type', () => {
    expect(canonicalJson([
      { key: 's', value: 'text' },
      { key: 'n', value: 12.5 },
      { key: 'b', value: false },
      { key: 'z', value: null },
    ])).toBe('[["b","b",false],["n","n",12.5],["s","s","text"],["z","z",null]]');
  });

  it('keeps null values, so explicit absence differs from omission', () => {
    const withNull = canonicalize([{ key: 'x', value: null }]);
    const without = canonicalize([]);
    expect(hashBytes(withNull)).not.toBe(hashBytes(without));
    expect(canonicalBody(without)).toBe('[]');
  });

  it('writes numbers in shortest form and folds -0 into 0', () => {
    expect(canonicalJson([{ key: 'n', value: 1.0 }])).toBe('[["n","n",1]]');
    expect(canonicalJson([{ key: 'n', value: -0 }])).toBe('[["n","n",0]]');
    expect(canonicalJson([{ key: 'n', value: 1e21 }])).toBe('[["n","n",1e+21]]');
  });

  it('distinguishes a string from the number it spells', () => {
    expect(hashFactSet([{ key: 'k', value: '1' }])).not.toBe(hashFactSet([{ key: 'k', value: 1 }]));
  });

  it('appends evidence spans to the entry', () => {
    expect(canonicalJson([{ key: 'k', value: 'v', evidenceSpan: [3, 7] }])).toBe('[["k","s","v",[3,7]]]');
  });
});

/* ============= Validation ============= */

describe('canonicalize: validation', () => {
  it('rejects duplicate keys', () => {
    const facts: Fact[] = [
      { key: 'a', value: 1 },
      { key: 'a', value: 2 },
    ];
    expect(() => canonicalize(facts)).toThrow(DuplicateKeyError);
  });

  it('rejects non-finite numbers', () => {
    expect(() => canonicalize([{ key: 'a', value: Number.NaN }])).toThrow(InvalidFactError);
    expect(() => canonicalize([{ key: 'a', value: Number.POSITIVE_INFINITY }])).toThrow(InvalidFactError);
  });

  it('rejects empty keys', () => {
    expect(() => canonicalize([{ key: '', value: 1 }])).toThrow(InvalidFactError);
  });

  it('rejects malformed evidence spans', () => {
    expect(() => canonicalize([{ key: 'a', value: 1, evidenceSpan: [5, 2] }])).toThrow(InvalidFactError);
    expect(() => canonicalize([{ key: 'a', value: 1, evidenceSpan: [-1, 2] }])).toThrow(InvalidFactError);
    expect(() => canonicalize([{ key: 'a', value: 1, evidenceSpan: [0.5, 2] }])).toThrow(InvalidFactError);
  });

  it('reports the offending index', () => {
    try {
      canonicalize([{ key: 'ok', value: 1 }, { key: 'bad', value: Number.NaN }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidFactError);
      if (err instanceof InvalidFactError) {
        expect(err.index).toBe(1);
      }
    }
  });
});

/* ============= Decoding ============= */

describe('decodeCanonical', () => {
  it('returns the sorted facts, spans included', () => {
    const bytes = canonicalize([
      { key: 'b', value: true, evidenceSpan: [10, 20] },
      { key: 'a', value: null },
    ]);
    expect(decodeCanonical(bytes)).toEqual([
      { key: 'a', value: null },
      { key: 'b', value: true, evidenceSpan: [10, 20] },
    ]);
  });

  it('rejects an unknown format version', () => {
    const bytes = Buffer.concat([Buffer.from([0x02]), Buffer.from('[]', 'utf8')]);
    expect(() => decodeCanonical(bytes)).toThrow(CanonicalFormatError);
  });

  it('rejects empty input and malformed bodies', () => {
    expect(() => decodeCanonical(Buffer.alloc(0))).toThrow(CanonicalFormatError);
    expect(() => decodeCanonical(Buffer.concat([Buffer.from([0x01]), Buffer.from('{', 'utf8')]))).toThrow(CanonicalFormatError);
    expect(() => decodeCanonical(Buffer.concat([Buffer.from([0x01]), Buffer.from('[["a","n","1"]]', 'utf8')]))).toThrow(CanonicalFormatError);
  });
});

describe('hash', () => {
  it('is lowercase hex SHA-256', () => {
    const digest = hashBytes(Buffer.from('abc', 'utf8'));
    expect(digest).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(isHexDigest(digest)).toBe(true);
    expect(isHexDigest(digest.toUpperCase())).toBe(false);
  });
});
