/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Tests for DesiredStateStore.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Service } from '@desired-state/types';
import { InMemoryCodec } from './codec/InMemoryCodec.js';
import { TEMPLATE_HEADER, YamlFileCodec } from './codec/YamlFileCodec.js';
import type { DesiredStateCodec, DocumentReadResult } from './codec/interfaces.js';
import { DesiredStateStore } from './DesiredStateStore.js';
import { ConcurrencyError, IoError, ValidationError } from './errors.js';
import { EventHub } from './eventHub.js';
import { captureLogger, createTempDir, removeTempDir, WARN_LEVEL } from './test-helpers.js';

function loadedCodec(...services: Service[]): InMemoryCodec {
  const codec = new InMemoryCodec();
  codec.setDocument('0.1.0', services);
  return codec;
}

describe('DesiredStateStore', () => {
  describe('open', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(testDir);
    });

    it('creates a template and starts empty when the file is missing', async () => {
      const file = join(testDir, 'desired_state.yml');
      const store = await DesiredStateStore.open(new YamlFileCodec(file));

      assert.ok(existsSync(file));
      assert.ok(readFileSync(file, 'utf-8').startsWith(`${TEMPLATE_HEADER}\n`));
      assert.deepStrictEqual(store.list(), []);
      assert.strictEqual(store.schemaVersion, '0.1.0');
      assert.strictEqual(store.path, file);
    });

    it('loads existing services', async () => {
      const store = await DesiredStateStore.open(
        loadedCodec({ name: 'web', versionReq: '>2.0.0' }, { name: 'api', versionReq: '^1.2.3' })
      );
      assert.deepStrictEqual(store.list(), [
        { name: 'api', versionReq: '^1.2.3' },
        { name: 'web', versionReq: '>2.0.0' },
      ]);
    });

    it('starts empty on malformed content', async () => {
      const store = await DesiredStateStore.open(new InMemoryCodec('services: nope\n'));
      assert.deepStrictEqual(store.list(), []);
    });

    it('starts empty on unreadable content', async () => {
      const codec = new InMemoryCodec('version: 0.1.0\n');
      codec.failReads = true;
      const store = await DesiredStateStore.open(codec);
      assert.deepStrictEqual(store.list(), []);
    });
  });

  describe('list and get', () => {
    it('returns frozen snapshots detached from the store', async () => {
      const store = await DesiredStateStore.open(new InMemoryCodec());
      await store.set('api', '^1.2.3');

      const before = store.list();
      assert.ok(Object.isFrozen(before));
      await store.set('api', '^2.0.0');
      assert.deepStrictEqual(before, [{ name: 'api', versionReq: '^1.2.3' }]);
    });

    it('looks up a single service', async () => {
      const store = await DesiredStateStore.open(loadedCodec({ name: 'api', versionReq: '^1.2.3' }));
      assert.deepStrictEqual(store.get('api'), { name: 'api', versionReq: '^1.2.3' });
      assert.strictEqual(store.get('web'), undefined);
    });

    it('returns a snapshot of the whole state', async () => {
      const store = await DesiredStateStore.open(loadedCodec({ name: 'api', versionReq: '^1.2.3' }));
      const snapshot = store.snapshot();
      assert.strictEqual(snapshot.schemaVersion, '0.1.0');
      assert.deepStrictEqual([...snapshot.services.keys()], ['api']);
    });
  });

  describe('set', () => {
    it('overwrites an existing requirement', async () => {
      const store = await DesiredStateStore.open(new InMemoryCodec());
      await store.set('api', '^1.2.3');
      const stored = await store.set('api', '>2.0.0');

      assert.deepStrictEqual(stored, { name: 'api', versionReq: '>2.0.0' });
      assert.deepStrictEqual(store.list(), [{ name: 'api', versionReq: '>2.0.0' }]);
    });

    it('persists before returning', async () => {
      const codec = new InMemoryCodec();
      const store = await DesiredStateStore.open(codec);
      await store.set('api', '^1.2.3');

      assert.strictEqual(codec.writes, 1);
      const reread = await codec.read();
      assert.strictEqual(reread.type, 'loaded');
      if (reread.type !== 'loaded') return;
      assert.deepStrictEqual(reread.services.get('api'), { name: 'api', versionReq: '^1.2.3' });
    });

    it('normalizes whitespace in the requirement', async () => {
      const store = await DesiredStateStore.open(new InMemoryCodec());
      await store.set('api', ' >=1.0.0   <2.0.0 ');
      assert.deepStrictEqual(store.get('api'), { name: 'api', versionReq: '>=1.0.0 <2.0.0' });
    });

    it('delivers one identical event to every subscriber', async () => {
      const store = await DesiredStateStore.open(new InMemoryCodec());
      const first = store.subscribe();
      const second = store.subscribe();

      await store.set('api', '^1.2.3');

      const a = first.drain();
      const b = second.drain();
      assert.strictEqual(a.length, 1);
      assert.strictEqual(b.length, 1);
      assert.deepStrictEqual(a[0], b[0]);
      assert.deepStrictEqual(a[0], {
        type: 'state_updated',
        schemaVersion: '0.1.0',
        services: [{ name: 'api', versionReq: '^1.2.3' }],
      });
    });

    it('emits even when the requirement is unchanged', async () => {
      const store = await DesiredStateStore.open(new InMemoryCodec());
      const events = store.subscribe();
      await store.set('api', '^1.2.3');
      await store.set('api', '^1.2.3');
      assert.strictEqual(events.drain().length, 2);
    });

    it('rejects invalid requirements without persisting or emitting', async () => {
      const codec = new InMemoryCodec();
      const store = await DesiredStateStore.open(codec);
      const events = store.subscribe();

      await assert.rejects(store.set('api', 'not-a-range'), ValidationError);
      await assert.rejects(store.set('', '^1.0.0'), ValidationError);

      assert.strictEqual(codec.writes, 0);
      assert.strictEqual(events.pending, 0);
      assert.deepStrictEqual(store.list(), []);
    });

    it('leaves the state unchanged when persisting fails', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const store = await DesiredStateStore.open(codec);
      const events = store.subscribe();
      codec.failWrites = true;

      await assert.rejects(store.set('api', '>2.0.0'), IoError);
      assert.deepStrictEqual(store.list(), [{ name: 'api', versionReq: '^1.2.3' }]);
      assert.strictEqual(events.pending, 0);
      assert.strictEqual(store.poisoned, false);

      codec.failWrites = false;
      await store.set('api', '>2.0.0');
      assert.deepStrictEqual(store.list(), [{ name: 'api', versionReq: '>2.0.0' }]);
    });

    it('serializes concurrent calls', async () => {
      const codec = new InMemoryCodec();
      const store = await DesiredStateStore.open(codec);
      const names = ['e', 'b', 'd', 'a', 'c'];

      await Promise.all(names.map((name) => store.set(name, '*')));

      assert.deepStrictEqual(store.list().map((s) => s.name), ['a', 'b', 'c', 'd', 'e']);
      assert.strictEqual(codec.writes, 5);
      const reread = await codec.read();
      assert.strictEqual(reread.type, 'loaded');
      if (reread.type !== 'loaded') return;
      assert.strictEqual(reread.services.size, 5);
    });
  });

  describe('remove', () => {
    it('removes a present service', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' }, { name: 'web', versionReq: '*' });
      const store = await DesiredStateStore.open(codec);
      const events = store.subscribe();

      assert.strictEqual(await store.remove('api'), true);
      assert.deepStrictEqual(store.list(), [{ name: 'web', versionReq: '*' }]);
      assert.strictEqual(codec.writes, 1);

      const emitted = events.drain();
      assert.strictEqual(emitted.length, 1);
      assert.deepStrictEqual(emitted[0]?.services, [{ name: 'web', versionReq: '*' }]);
    });

    it('does nothing for an absent service', async () => {
      const codec = loadedCodec({ name: 'web', versionReq: '*' });
      const store = await DesiredStateStore.open(codec);
      const events = store.subscribe();

      assert.strictEqual(await store.remove('api'), false);
      assert.strictEqual(codec.writes, 0);
      assert.strictEqual(events.pending, 0);
    });

    it('keeps the service when persisting fails', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const store = await DesiredStateStore.open(codec);
      codec.failWrites = true;

      await assert.rejects(store.remove('api'), IoError);
      assert.deepStrictEqual(store.list(), [{ name: 'api', versionReq: '^1.2.3' }]);
    });
  });

  describe('reloadFromDisk', () => {
    it('adopts external changes and emits once', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const store = await DesiredStateStore.open(codec);
      const events = store.subscribe();

      codec.setDocument('0.1.0', [{ name: 'web', versionReq: '~3.1' }]);
      assert.strictEqual(await store.reloadFromDisk(), true);
      assert.deepStrictEqual(store.list(), [{ name: 'web', versionReq: '~3.1' }]);
      assert.strictEqual(events.drain().length, 1);
    });

    it('does not emit when nothing changed', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const store = await DesiredStateStore.open(codec);
      const events = store.subscribe();

      assert.strictEqual(await store.reloadFromDisk(), false);
      assert.strictEqual(events.pending, 0);
    });

    it('detects a schema version change alone', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const store = await DesiredStateStore.open(codec);
      codec.setDocument('0.2.0', [{ name: 'api', versionReq: '^1.2.3' }]);

      assert.strictEqual(await store.reloadFromDisk(), true);
      assert.strictEqual(store.schemaVersion, '0.2.0');
    });

    it('keeps the last good state on malformed content', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const { logger, records } = captureLogger();
      const store = await DesiredStateStore.open(codec, { logger });
      const events = store.subscribe();

      codec.content = 'services: [unclosed\n';
      assert.strictEqual(await store.reloadFromDisk(), false);
      assert.deepStrictEqual(store.list(), [{ name: 'api', versionReq: '^1.2.3' }]);
      assert.strictEqual(events.pending, 0);

      const warning = records.find((r) => r.level === WARN_LEVEL);
      assert.ok(warning);
      assert.strictEqual(warning.msg, 'keeping last good desired state');
      assert.strictEqual(warning.component, 'store');
      assert.strictEqual(warning.result, 'malformed');
    });

    it('keeps the last good state when the file cannot be read', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const store = await DesiredStateStore.open(codec);
      codec.failReads = true;

      assert.strictEqual(await store.reloadFromDisk(), false);
      assert.deepStrictEqual(store.list(), [{ name: 'api', versionReq: '^1.2.3' }]);
    });

    it('treats a deleted document as empty', async () => {
      const codec = loadedCodec({ name: 'api', versionReq: '^1.2.3' });
      const store = await DesiredStateStore.open(codec);
      const events = store.subscribe();

      codec.content = null;
      assert.strictEqual(await store.reloadFromDisk(), true);
      assert.deepStrictEqual(store.list(), []);
      assert.deepStrictEqual(events.drain()[0]?.services, []);
    });
  });

  describe('events', () => {
    it('emits the current state on request', async () => {
      const store = await DesiredStateStore.open(loadedCodec({ name: 'api', versionReq: '^1.2.3' }));
      const events = store.subscribe();
      await store.emitCurrentState();

      assert.deepStrictEqual(events.drain()[0]?.services, [{ name: 'api', versionReq: '^1.2.3' }]);
    });

    it('publishes on a shared hub', async () => {
      const hub = new EventHub();
      const external = hub.subscribe();
      const store = await DesiredStateStore.open(new InMemoryCodec(), { hub });

      await store.set('api', '*');
      assert.strictEqual(external.pending, 1);
    });
  });

  describe('lock poisoning', () => {
    class BrokenCodec implements DesiredStateCodec {
      readonly path = 'memory://broken.yml';

      async read(): Promise<DocumentReadResult> {
        return { type: 'empty' };
      }

      async write(): Promise<void> {
        throw new TypeError('codec bug');
      }
    }

    it('refuses further operations after an unexpected failure', async () => {
      const store = await DesiredStateStore.open(new BrokenCodec());

      await assert.rejects(store.set('api', '*'), TypeError);
      assert.strictEqual(store.poisoned, true);

      await assert.rejects(store.set('api', '*'), ConcurrencyError);
      await assert.rejects(store.remove('api'), ConcurrencyError);
      await assert.rejects(store.reloadFromDisk(), ConcurrencyError);
    });
  });
});
