/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * YAML file implementation of DesiredStateCodec.
 *
 * File handling:
 * - Missing: a commented-out template is written and `missing` is returned
 * - Unreadable: logged, `unreadable` returned, file left untouched
 * - Blank or comment-only: `empty`
 * - Invalid YAML or document: logged, `malformed` returned, file left untouched
 * - Writes go to a temp file in the same directory, then rename over the target
 */

import { promises as fs } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { parse, stringify } from 'yaml';
import {
  CURRENT_SCHEMA_VERSION,
  DesiredStateDocumentSchema,
  toDocument,
  type Service,
} from '@desired-state/types';
import {
  IoError,
  ParseError,
  ValidationError,
  formatError,
  isNotFoundError,
  toError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { isValidVersion, parseVersionReq } from '../versionReq.js';
import type { DesiredStateCodec, DocumentReadResult } from './interfaces.js';

/** First line of a generated template */
export const TEMPLATE_HEADER = '# This is an automatically generated desired state template';

const TEMPLATE_EXAMPLES: Service[] = [
  { name: 'example-service', versionReq: '^1.2.3' },
  { name: 'second-example-service', versionReq: '>0.1.0' },
];

/**
 * Render the template written in place of a missing file: an example
 * document with every line commented out, so it parses as empty.
 */
export function renderTemplate(): string {
  const example = stringify(toDocument(CURRENT_SCHEMA_VERSION, TEMPLATE_EXAMPLES));
  const lines = example.trimEnd().split('\n').map((line) => `# ${line}`);
  return [TEMPLATE_HEADER, ...lines].join('\n') + '\n';
}

/**
 * Parse document text.
 *
 * @param raw - File content
 * @param path - File path, for error messages
 * @returns `empty`, `loaded` or `malformed`
 */
export function parseDocument(
  raw: string,
  path: string
): Extract<DocumentReadResult, { type: 'loaded' | 'empty' | 'malformed' }> {
  if (raw.trim() === '') {
    return { type: 'empty' };
  }

  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    return { type: 'malformed', error: new ParseError(path, formatError(err)) };
  }

  // A file of only comments parses to null
  if (data === null || data === undefined) {
    return { type: 'empty' };
  }

  const result = DesiredStateDocumentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { type: 'malformed', error: new ParseError(path, issues) };
  }

  const document = result.data;
  if (!isValidVersion(document.version)) {
    return {
      type: 'malformed',
      error: new ParseError(path, `version: '${document.version}' is not a valid semver version`),
    };
  }

  // Later entries win for duplicate names
  const services = new Map<string, Service>();
  for (const [index, entry] of document.services.entries()) {
    if (entry.name.trim() === '') {
      return {
        type: 'malformed',
        error: new ParseError(path, `services.${index}.name: service name is empty`),
      };
    }
    try {
      services.set(entry.name, { name: entry.name, versionReq: parseVersionReq(entry.version) });
    } catch (err) {
      if (err instanceof ValidationError) {
        return {
          type: 'malformed',
          error: new ParseError(path, `services.${index}.version: ${err.message}`),
        };
      }
      throw err;
    }
  }

  return { type: 'loaded', schemaVersion: document.version, services };
}

/**
 * Options for a YAML file codec.
 */
export interface YamlFileCodecOptions {
  /** Logger (default: silent) */
  logger?: Logger;
}

/**
 * Desired state codec backed by a YAML file.
 *
 * @example
 * ```typescript
 * const codec = new YamlFileCodec('/etc/desired_state.yml', { logger });
 * const result = await codec.read();
 * if (result.type === 'loaded') {
 *   console.log(result.services.size);
 * }
 * ```
 */
export class YamlFileCodec implements DesiredStateCodec {
  private readonly logger: Logger;

  /**
   * @param path - Path to the YAML document
   */
  constructor(
    public readonly path: string,
    options: YamlFileCodecOptions = {}
  ) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'codec' });
  }

  async read(): Promise<DocumentReadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFoundError(err)) {
        this.logger.debug({ path: this.path }, 'desired state file does not exist; creating template');
        await this.createTemplate();
        return { type: 'missing' };
      }
      const error = new IoError('read', this.path, toError(err));
      this.logger.warn({ path: this.path, err: error }, 'failed to read desired state file');
      return { type: 'unreadable', error };
    }

    const result = parseDocument(raw, this.path);
    switch (result.type) {
      case 'empty':
        this.logger.debug({ path: this.path }, 'desired state file is empty');
        break;
      case 'malformed':
        this.logger.warn(
          { path: this.path, reason: result.error.reason },
          'failed to parse desired state file; ignoring its content'
        );
        break;
      case 'loaded':
        this.logger.debug(
          { path: this.path, schemaVersion: result.schemaVersion, services: result.services.size },
          'loaded desired state file'
        );
        break;
    }
    return result;
  }

  async write(schemaVersion: string, services: Iterable<Service>): Promise<void> {
    const document = toDocument(schemaVersion, services);
    await this.atomicWriteText(stringify(document));
    this.logger.info(
      { path: this.path, services: document.services.length },
      'persisted desired state'
    );
  }

  /**
   * Write the commented-out template in place of a missing file.
   */
  private async createTemplate(): Promise<void> {
    await this.atomicWriteText(renderTemplate());
    this.logger.info({ path: this.path }, 'created desired state template');
  }

  /**
   * Write a text file atomically using temp file + rename.
   */
  private async atomicWriteText(content: string): Promise<void> {
    const dir = dirname(this.path);
    const tmpPath = join(
      dir,
      `.${basename(this.path)}.tmp-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );

    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      throw new IoError('mkdir', dir, toError(err));
    }

    try {
      await fs.writeFile(tmpPath, content, 'utf-8');
    } catch (err) {
      await this.removeTemp(tmpPath);
      throw new IoError('write', this.path, toError(err));
    }

    try {
      await fs.rename(tmpPath, this.path);
    } catch (err) {
      await this.removeTemp(tmpPath);
      throw new IoError('rename', this.path, toError(err));
    }
  }

  private async removeTemp(tmpPath: string): Promise<void> {
    try {
      await fs.unlink(tmpPath);
    } catch (err) {
      if (!isNotFoundError(err)) {
        this.logger.warn({ path: tmpPath, err }, 'failed to remove temporary file');
      }
    }
  }
}
