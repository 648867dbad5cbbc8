/**
 * Rendering of command results on stdout
 */

import type { OutputFormat } from '../types/index.js';
import { errors } from '../utils/errors.js';
import { isOutputFormat } from '../core/services/config-manager.js';

export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw errors.unknownFormat(value);
  }
  return value;
}

/**
 * Space-joined on one line, or a pretty-printed JSON array
 */
export function renderIdentifiers(identifiers: string[], format: OutputFormat): string {
  switch (format) {
    case 'json': return JSON.stringify(identifiers, null, 2);
    case 'space': return identifiers.join(' ');
  }
}
