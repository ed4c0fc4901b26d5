/**
 * @fileoverview Settings Types
 */

import type { LogLevel } from '../logging/logger.js';

export interface LoggingSettings {
  level: LogLevel;
  pretty: boolean;
}

/**
 * Tokens used when rendering usage strings
 */
export interface UsageSettings {
  optionalOpen: string;
  optionalClose: string;
  requiredOpen: string;
  requiredClose: string;
  or: string;
  /** Rendered in place of a redirect that points back to the root */
  redirectToRoot: string;
  redirectPrefix: string;
}

export interface SuggestionSettings {
  /** Default deadline for a completion request; null waits indefinitely */
  timeoutMs: number | null;
}

export interface TrellisSettings {
  logging: LoggingSettings;
  usage: UsageSettings;
  suggestions: SuggestionSettings;
}

export interface UserSettings {
  logging?: Partial<LoggingSettings>;
  usage?: Partial<UsageSettings>;
  suggestions?: Partial<SuggestionSettings>;
}
