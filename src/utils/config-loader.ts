/**
 * Configuration File Loader
 *
 * Loads configuration from a .fieldauditrc or .fieldauditrc.json file.
 * Configuration precedence: Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory
 *
 * @example
 * // .fieldauditrc in project root
 * {
 *   "log": { "level": "debug" },
 *   "audit": { "excludedFields": ["moderation_state"] },
 *   "storage": { "sqlitePath": "./var/audit.db" }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  auditConfigSchema,
  logConfigSchema,
  storageConfigSchema,
  type AuditConfig,
  type LogConfig,
  type StorageConfig,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    prettyPrint: z.boolean().optional(),
  }).optional(),

  audit: z.object({
    excludedFields: z.array(z.string().min(1)).optional(),
    nestedExcludedFields: z.array(z.string().min(1)).optional(),
  }).optional(),

  storage: z.object({
    sqlitePath: z.string().optional(),
    tableName: z.string().optional(),
    walMode: z.boolean().optional(),
  }).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

const CONFIG_FILE_NAMES = ['.fieldauditrc', '.fieldauditrc.json'];

function getSearchPaths(): string[] {
  const paths = [process.cwd()];

  try {
    const home = homedir();
    if (home && !paths.includes(home)) {
      paths.push(home);
    }
  } catch (error) {
    log.debug('Home directory unavailable', { error: String(error) });
  }

  return paths;
}

function findConfigFile(): string | null {
  const searchPaths = getSearchPaths();

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Load and validate a config file. Unreadable or invalid files are logged
 * and yield an empty config.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  try {
    const content = readFileSync(filePath, 'utf-8');

    // Allow // and /* */ comments
    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    const parsed: unknown = JSON.parse(stripped);
    const result = configFileSchema.safeParse(parsed);

    if (!result.success) {
      log.warn('Config file validation failed', {
        code: 'CONFIG_INVALID',
        path: filePath,
        errors: result.error.issues.map(i => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      });
      return {};
    }

    log.info('Loaded config file', {
      path: filePath,
      sections: Object.keys(result.data),
    });

    return result.data;
  } catch (error) {
    log.warn(error instanceof SyntaxError ? 'Config file has invalid JSON' : 'Failed to read config file', {
      code: 'CONFIG_INVALID',
      path: filePath,
      error: String(error),
    });
    return {};
  }
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;
let cachedConfigFilePath: string | null = null;

/**
 * Get the loaded config file (cached after first load).
 */
export function getConfigFile(): ConfigFile {
  if (cachedConfigFile === null) {
    cachedConfigFilePath = findConfigFile();
    cachedConfigFile = cachedConfigFilePath ? loadConfigFile(cachedConfigFilePath) : {};
  }
  return cachedConfigFile;
}

/**
 * Forget the cached config file so the next read searches again.
 */
export function clearConfigFileCache(): void {
  cachedConfigFile = null;
  cachedConfigFilePath = null;
}

export function getConfigFilePath(): string | null {
  getConfigFile();
  return cachedConfigFilePath;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function arrayToEnvString(value: string[] | undefined): string | undefined {
  if (value === undefined || value.length === 0) return undefined;
  return value.join(',');
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

export function getMergedLogConfig(): LogConfig {
  const file = getConfigFile().log ?? {};

  return logConfigSchema.parse({
    level: process.env.LOG_LEVEL ?? file.level,
    prettyPrint: process.env.LOG_PRETTY ?? boolToEnvString(file.prettyPrint),
  });
}

export function getMergedAuditConfig(): AuditConfig {
  const file = getConfigFile().audit ?? {};

  return auditConfigSchema.parse({
    excludedFields: process.env.FIELD_AUDIT_EXCLUDED_FIELDS ?? arrayToEnvString(file.excludedFields),
    nestedExcludedFields:
      process.env.FIELD_AUDIT_NESTED_EXCLUDED_FIELDS ?? arrayToEnvString(file.nestedExcludedFields),
  });
}

export function getMergedStorageConfig(): StorageConfig {
  const file = getConfigFile().storage ?? {};

  return storageConfigSchema.parse({
    sqlitePath: process.env.FIELD_AUDIT_SQLITE_PATH ?? file.sqlitePath,
    tableName: process.env.FIELD_AUDIT_TABLE ?? file.tableName,
    walMode: process.env.FIELD_AUDIT_WAL ?? boolToEnvString(file.walMode),
  });
}

/**
 * Sample .fieldauditrc with every option.
 */
export function generateSampleConfig(): string {
  const sample = {
    log: {
      level: 'info',
      prettyPrint: false,
    },
    audit: {
      excludedFields: ['moderation_state'],
      nestedExcludedFields: ['behavior_settings'],
    },
    storage: {
      sqlitePath: './data/field-audit.db',
      tableName: 'field_change_audit_log',
      walMode: true,
    },
  };

  return JSON.stringify(sample, null, 2);
}
