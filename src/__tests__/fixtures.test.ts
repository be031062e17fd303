/**
 * Fixture documents
 *
 * The committed documents in fixtures/ cover both endpoints and the first
 * values past them, in YAML and JSON.
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import {
  DocumentErrorCode,
  DoubleIntSchema,
  parseDocument,
  safeParseDocument,
  serializeDocument,
  type DocumentFormat,
} from '../index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES_DIR = resolve(__dirname, '../../fixtures');

function loadFixture(name: string): string {
  return readFileSync(resolve(FIXTURES_DIR, name), 'utf-8');
}

const LimitsSchema = z.object({
  name: z.string(),
  count: DoubleIntSchema,
  offset: DoubleIntSchema,
  max_items: DoubleIntSchema,
  min_items: DoubleIntSchema,
});

const VALID: [string, DocumentFormat][] = [
  ['limits.yaml', 'yaml'],
  ['limits.json', 'json'],
];

describe('Fixture documents', () => {
  for (const [name, format] of VALID) {
    it(`${name} parses with exact values`, () => {
      const limits = parseDocument(loadFixture(name), LimitsSchema, { format });
      expect(limits.name).toBe('limits');
      expect(limits.count.value()).toBe(42n);
      expect(limits.offset.value()).toBe(-42n);
      expect(limits.max_items.value()).toBe(9007199254740992n);
      expect(limits.min_items.value()).toBe(-9007199254740992n);
    });
  }

  it('limits.yaml serializes back to plain integers', () => {
    const limits = parseDocument(loadFixture('limits.yaml'), LimitsSchema);
    expect(serializeDocument(limits)).toBe(
      [
        'name: limits',
        'count: 42',
        'offset: -42',
        'max_items: 9007199254740992',
        'min_items: -9007199254740992',
        '',
      ].join('\n')
    );
  });

  it('overflow.yaml is rejected at count', () => {
    const result = safeParseDocument(loadFixture('overflow.yaml'), LimitsSchema);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(DocumentErrorCode.VALIDATION_ERROR);
      expect(result.error.details.map((d) => d.path)).toEqual([['count']]);
    }
  });

  it('off-by-one.json is rejected at both bounds', () => {
    const result = safeParseDocument(loadFixture('off-by-one.json'), LimitsSchema, {
      format: 'json',
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.details.map((d) => d.path)).toEqual([['max_items'], ['min_items']]);
    }
  });
});
