/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.trellis/settings.json (or the file named by
 * TRELLIS_SETTINGS), validates them and merges them over the defaults.
 * Settings are cached after the first load.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, createLogger, isLogLevel } from '../logging/logger.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import type { TrellisSettings, UserSettings } from './types.js';

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.trellis';
const SETTINGS_FILE = 'settings.json';

function logger() {
  return createLogger('settings');
}

// =============================================================================
// Schema
// =============================================================================

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const UserSettingsSchema = z
  .object({
    logging: z
      .object({
        level: logLevelSchema,
        pretty: z.boolean(),
      })
      .partial(),
    usage: z
      .object({
        optionalOpen: z.string(),
        optionalClose: z.string(),
        requiredOpen: z.string(),
        requiredClose: z.string(),
        or: z.string(),
        redirectToRoot: z.string(),
        redirectPrefix: z.string(),
      })
      .partial(),
    suggestions: z
      .object({
        timeoutMs: z.number().int().positive().nullable(),
      })
      .partial(),
  })
  .partial();

// =============================================================================
// Merge
// =============================================================================

/**
 * Overlay user settings on a complete settings object, one section at a time
 */
export function mergeSettings(base: TrellisSettings, user: UserSettings): TrellisSettings {
  return {
    logging: { ...base.logging, ...user.logging },
    usage: { ...base.usage, ...user.usage },
    suggestions: { ...base.suggestions, ...user.suggestions },
  };
}

// =============================================================================
// Settings Loading
// =============================================================================

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  const override = process.env.TRELLIS_SETTINGS;
  if (override && homeDir === undefined) {
    return override;
  }
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR, SETTINGS_FILE);
}

/**
 * Load user settings from file
 * @returns User settings, or null if the file is missing or invalid
 */
export function loadUserSettings(settingsPath?: string): UserSettings | null {
  const filePath = settingsPath ?? getSettingsPath();

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    logger().warn('Failed to read settings, using defaults', { path: filePath, err: error });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger().warn('Settings file is not valid JSON, using defaults', { path: filePath, err: error });
    return null;
  }

  const result = UserSettingsSchema.safeParse(raw);
  if (!result.success) {
    logger().warn('Settings file failed validation, using defaults', {
      path: filePath,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return null;
  }
  return result.data;
}

/**
 * Load and merge settings with defaults, then apply environment overrides
 */
export function loadSettings(settingsPath?: string): TrellisSettings {
  const userSettings = loadUserSettings(settingsPath);
  const merged = userSettings ? mergeSettings(DEFAULT_SETTINGS, userSettings) : DEFAULT_SETTINGS;
  return applyEnvOverrides(merged);
}

// =============================================================================
// Environment Variable Overrides
// =============================================================================

/**
 * Environment variables take precedence over file settings. Unusable values
 * are ignored with a warning.
 */
export function applyEnvOverrides(settings: TrellisSettings): TrellisSettings {
  const result = { ...settings };

  const level = process.env.TRELLIS_LOG_LEVEL;
  if (level) {
    if (isLogLevel(level)) {
      result.logging = { ...result.logging, level };
    } else {
      logger().warn('Ignoring TRELLIS_LOG_LEVEL', { value: level, expected: LOG_LEVELS });
    }
  }

  const timeout = process.env.TRELLIS_SUGGESTION_TIMEOUT_MS;
  if (timeout) {
    const timeoutMs = parseInt(timeout, 10);
    if (Number.isInteger(timeoutMs) && timeoutMs > 0) {
      result.suggestions = { ...result.suggestions, timeoutMs };
    } else {
      logger().warn('Ignoring TRELLIS_SUGGESTION_TIMEOUT_MS', { value: timeout });
    }
  }

  return result;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

let cachedSettings: TrellisSettings | null = null;

/** Custom settings path (for testing) */
let customSettingsPath: string | undefined;

/**
 * Get the current settings (loads and caches on first call)
 */
export function getSettings(): TrellisSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings(customSettingsPath);
  }
  return cachedSettings;
}

/**
 * Reload settings from disk
 */
export function reloadSettings(): TrellisSettings {
  cachedSettings = loadSettings(customSettingsPath);
  return cachedSettings;
}

/**
 * Set a custom settings path (mainly for testing). Also clears the cache.
 */
export function setSettingsPath(settingsPath: string | undefined): void {
  customSettingsPath = settingsPath;
  cachedSettings = null;
}

/**
 * Clear the settings cache (forces reload on next access)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}
