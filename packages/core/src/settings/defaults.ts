/**
 * @fileoverview Default Settings
 *
 * Fallback values when no settings file or override says otherwise.
 */

import type { TrellisSettings } from './types.js';

export const DEFAULT_SETTINGS: TrellisSettings = {
  logging: {
    level: 'warn',
    pretty: false,
  },
  usage: {
    optionalOpen: '[',
    optionalClose: ']',
    requiredOpen: '(',
    requiredClose: ')',
    or: '|',
    redirectToRoot: '...',
    redirectPrefix: '-> ',
  },
  suggestions: {
    timeoutMs: null,
  },
};
