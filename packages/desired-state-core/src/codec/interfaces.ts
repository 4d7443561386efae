/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Codec interface for the durable desired state document.
 *
 * Abstracts reading and writing the backing document, enabling:
 * - YamlFileCodec: The YAML file on local disk
 * - InMemoryCodec: For testing and embedding
 *
 * Reads never throw for bad content. Each way a read can come up short is a
 * distinct result so the store can decide whether it means "empty" (on
 * startup) or "keep the last good state" (during reconciliation).
 */

import type { Service } from '@desired-state/types';
import type { IoError, ParseError } from '../errors.js';

/**
 * Outcome of reading the backing document.
 */
export type DocumentReadResult =
  /** The document parsed successfully */
  | { type: 'loaded'; schemaVersion: string; services: Map<string, Service> }
  /** The document did not exist; a template was created in its place */
  | { type: 'missing' }
  /** The document exists but holds no data (blank or only comments) */
  | { type: 'empty' }
  /** The document exists but could not be read */
  | { type: 'unreadable'; error: IoError }
  /** The document was read but is not a valid desired state document */
  | { type: 'malformed'; error: ParseError };

/**
 * Reads and writes the durable copy of the desired state.
 */
export interface DesiredStateCodec {
  /** Location of the document (the file path for file codecs) */
  readonly path: string;

  /**
   * Read the document.
   *
   * @throws {IoError} Only if creating the template for a missing document fails
   */
  read(): Promise<DocumentReadResult>;

  /**
   * Replace the document with the given state. Services are written sorted
   * by name.
   *
   * @throws {IoError} If the document cannot be written
   */
  write(schemaVersion: string, services: Iterable<Service>): Promise<void>;
}
