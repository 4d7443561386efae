/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Tests for InMemoryCodec.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { IoError } from '../errors.js';
import { InMemoryCodec } from './InMemoryCodec.js';
import { renderTemplate } from './YamlFileCodec.js';

describe('InMemoryCodec', () => {
  it('creates the template when there is no document', async () => {
    const codec = new InMemoryCodec();
    assert.deepStrictEqual(await codec.read(), { type: 'missing' });
    assert.strictEqual(codec.content, renderTemplate());
    assert.deepStrictEqual(await codec.read(), { type: 'empty' });
    assert.strictEqual(codec.writes, 0);
  });

  it('round-trips written state', async () => {
    const codec = new InMemoryCodec();
    await codec.write('0.1.0', [{ name: 'api', versionReq: '^1.2.3' }]);
    assert.strictEqual(codec.writes, 1);

    const result = await codec.read();
    assert.strictEqual(result.type, 'loaded');
    if (result.type !== 'loaded') return;
    assert.deepStrictEqual(result.services.get('api'), { name: 'api', versionReq: '^1.2.3' });
  });

  it('simulates read failures', async () => {
    const codec = new InMemoryCodec('version: 0.1.0\n');
    codec.failReads = true;
    const result = await codec.read();
    assert.strictEqual(result.type, 'unreadable');
  });

  it('simulates write failures without changing content', async () => {
    const codec = new InMemoryCodec('version: 0.1.0\n');
    codec.failWrites = true;
    await assert.rejects(codec.write('0.1.0', []), IoError);
    assert.strictEqual(codec.content, 'version: 0.1.0\n');
    assert.strictEqual(codec.writes, 0);
  });

  it('replaces the document like an external edit', async () => {
    const codec = new InMemoryCodec();
    codec.setDocument('0.2.0', [{ name: 'db', versionReq: '~5.1' }]);
    const result = await codec.read();
    assert.strictEqual(result.type, 'loaded');
    if (result.type !== 'loaded') return;
    assert.strictEqual(result.schemaVersion, '0.2.0');
    assert.strictEqual(codec.writes, 0);
  });
});
