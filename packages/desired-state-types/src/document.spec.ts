/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Tests for document.ts - document schema and construction
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DesiredStateDocumentSchema, toDocument } from './document.js';

describe('document', () => {
  describe('DesiredStateDocumentSchema', () => {
    it('applies defaults to an empty object', () => {
      const parsed = DesiredStateDocumentSchema.parse({});
      assert.deepStrictEqual(parsed, { version: '0.1.0', services: [] });
    });

    it('accepts a full document', () => {
      const parsed = DesiredStateDocumentSchema.parse({
        version: '0.2.0',
        services: [{ name: 'api', version: '^1.2.3' }],
      });
      assert.deepStrictEqual(parsed, {
        version: '0.2.0',
        services: [{ name: 'api', version: '^1.2.3' }],
      });
    });

    it('rejects a service without a version', () => {
      const result = DesiredStateDocumentSchema.safeParse({ services: [{ name: 'api' }] });
      assert.strictEqual(result.success, false);
    });

    it('rejects a non-string schema version', () => {
      const result = DesiredStateDocumentSchema.safeParse({ version: 1 });
      assert.strictEqual(result.success, false);
    });
  });

  describe('toDocument', () => {
    it('writes services in name order', () => {
      const doc = toDocument('0.1.0', [
        { name: 'web', versionReq: '*' },
        { name: 'api', versionReq: '>2.0.0' },
      ]);
      assert.deepStrictEqual(doc, {
        version: '0.1.0',
        services: [
          { name: 'api', version: '>2.0.0' },
          { name: 'web', version: '*' },
        ],
      });
    });
  });
});
