/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * In-memory implementation of DesiredStateCodec.
 *
 * Holds the document text in memory and parses it exactly like the file
 * codec does. Useful for testing and for embedding the store where no file
 * is wanted. Contents are lost when the process exits.
 */

import { stringify } from 'yaml';
import { toDocument, type Service } from '@desired-state/types';
import { IoError } from '../errors.js';
import type { DesiredStateCodec, DocumentReadResult } from './interfaces.js';
import { parseDocument, renderTemplate } from './YamlFileCodec.js';

/**
 * In-memory codec with switches for simulating I/O failures.
 *
 * @remarks
 * - `content === null` means the document does not exist
 * - `failReads` / `failWrites` make the next operations fail with IoError
 * - `writes` counts successful writes (template creation excluded)
 */
export class InMemoryCodec implements DesiredStateCodec {
  /** Document text, or null if the document does not exist */
  content: string | null;
  /** Make reads report the document as unreadable */
  failReads = false;
  /** Make writes throw IoError */
  failWrites = false;
  /** Number of successful writes */
  writes = 0;

  constructor(
    content: string | null = null,
    public readonly path: string = 'memory://desired_state.yml'
  ) {
    this.content = content;
  }

  async read(): Promise<DocumentReadResult> {
    if (this.failReads) {
      return { type: 'unreadable', error: new IoError('read', this.path, new Error('simulated read failure')) };
    }
    if (this.content === null) {
      this.content = renderTemplate();
      return { type: 'missing' };
    }
    return parseDocument(this.content, this.path);
  }

  async write(schemaVersion: string, services: Iterable<Service>): Promise<void> {
    if (this.failWrites) {
      throw new IoError('write', this.path, new Error('simulated write failure'));
    }
    this.content = stringify(toDocument(schemaVersion, services));
    this.writes++;
  }

  /**
   * Replace the document as an external editor would, without going
   * through the store.
   */
  setDocument(schemaVersion: string, services: Service[]): void {
    this.content = stringify(toDocument(schemaVersion, services));
  }
}
