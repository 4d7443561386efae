/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

export type { DesiredStateCodec, DocumentReadResult } from './interfaces.js';
export { YamlFileCodec, TEMPLATE_HEADER, renderTemplate, parseDocument } from './YamlFileCodec.js';
export { InMemoryCodec } from './InMemoryCodec.js';
