/**
 * @fileoverview Logger that discards every record
 */

import { TrellisLogger } from '../../src/logging/logger.js';

export function silentLogger(): TrellisLogger {
  return new TrellisLogger({ level: 'silent' });
}
