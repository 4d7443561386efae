/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Version requirement parsing.
 *
 * Requirements use npm semver range syntax (`^1.2.3`, `~1.2`, `>=1.0.0 <2.0.0`,
 * `1.x || 2.x`, `*`). The stored form keeps the operator's notation and only
 * normalizes whitespace, so `set api ^1.2.3` lists back as `^1.2.3`.
 */

import semver from 'semver';
import { ValidationError } from './errors.js';

/**
 * Parse and normalize a version requirement expression.
 *
 * @param expr - Range expression as typed by the operator
 * @returns The expression with surrounding whitespace trimmed and inner runs collapsed
 * @throws {ValidationError} If the expression or one of its alternatives is empty,
 *   or it is not a valid range
 *
 * @example
 * ```typescript
 * parseVersionReq('  >=1.0.0   <2.0.0 ');  // '>=1.0.0 <2.0.0'
 * parseVersionReq('one point two');        // throws ValidationError
 * parseVersionReq('^1.2.3 ||');            // throws ValidationError
 * ```
 */
export function parseVersionReq(expr: string): string {
  const normalized = expr.trim().split(/\s+/).join(' ');
  if (normalized === '') {
    throw new ValidationError('version requirement', expr, 'expression is empty');
  }
  // semver reads an empty alternative as "*"
  if (normalized.split('||').some((alternative) => alternative.trim() === '')) {
    throw new ValidationError('version requirement', expr, 'empty alternative');
  }
  if (semver.validRange(normalized) === null) {
    throw new ValidationError('version requirement', expr, 'not a valid semver range');
  }
  return normalized;
}

/**
 * Check whether a string is a valid semver version (used for schema versions).
 */
export function isValidVersion(version: string): boolean {
  return semver.valid(version) !== null;
}
