/**
 * Filesystem configuration
 *
 * YAML documents validated against a JSON schema with ajv; missing keys
 * are filled from the schema defaults. Environment variables override
 * whatever the file says.
 *
 * @module config
 */

import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import * as fs from 'fs/promises';
import * as yaml from 'js-yaml';
import { isLogLevel, LOG_LEVELS } from '../logger';
import { FilesystemConfigError } from './config.errors';
import type { FilesystemConfig } from './config.types';

export const DEFAULT_FILESYSTEM_CONFIG: Readonly<FilesystemConfig> = Object.freeze({
  hiddenPrefix: '.',
  maxLinkDepth: 40,
});

export const FILESYSTEM_CONFIG_SCHEMA = {
  $id: 'treefs/filesystem-config',
  type: 'object',
  additionalProperties: false,
  properties: {
    hiddenPrefix: { type: 'string', minLength: 1, default: DEFAULT_FILESYSTEM_CONFIG.hiddenPrefix },
    maxLinkDepth: { type: 'integer', minimum: 1, maximum: 1024, default: DEFAULT_FILESYSTEM_CONFIG.maxLinkDepth },
    logLevel: { type: 'string', enum: [...LOG_LEVELS] },
  },
};

let cachedValidator: ValidateFunction<FilesystemConfig> | null = null;

function getValidator(): ValidateFunction<FilesystemConfig> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true, useDefaults: true });
    cachedValidator = ajv.compile<FilesystemConfig>(FILESYSTEM_CONFIG_SCHEMA);
  }
  return cachedValidator;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Validates a parsed document and fills in defaults. The input is not
 * modified.
 * @throws FilesystemConfigError listing every schema violation
 */
export function validateFilesystemConfig(data: unknown, source?: string): FilesystemConfig {
  const candidate: unknown = data === undefined || data === null ? {} : structuredClone(data);
  const validate = getValidator();
  if (!validate(candidate)) {
    const details = (validate.errors ?? []).map(
      error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
    );
    throw new FilesystemConfigError('Invalid filesystem configuration', details, source);
  }
  return candidate;
}

/**
 * Parses a YAML configuration document.
 */
export function parseFilesystemConfig(text: string, source?: string): FilesystemConfig {
  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (error) {
    throw new FilesystemConfigError(
      'Cannot parse filesystem configuration',
      [error instanceof Error ? error.message : String(error)],
      source
    );
  }
  return validateFilesystemConfig(data, source);
}

/**
 * Applies TREEFS_HIDDEN_PREFIX and TREEFS_LOG_LEVEL overrides.
 */
export function applyEnvironment(
  config: FilesystemConfig,
  env: Record<string, string | undefined> = process.env
): FilesystemConfig {
  const result: FilesystemConfig = { ...config };

  const hiddenPrefix = env['TREEFS_HIDDEN_PREFIX'];
  if (hiddenPrefix) {
    result.hiddenPrefix = hiddenPrefix;
  }

  const logLevel = env['TREEFS_LOG_LEVEL'];
  if (logLevel !== undefined && logLevel !== '') {
    if (!isLogLevel(logLevel)) {
      throw new FilesystemConfigError('Invalid TREEFS_LOG_LEVEL', [
        `expected one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`,
      ]);
    }
    result.logLevel = logLevel;
  }

  return result;
}

/**
 * Loads a YAML configuration file. A missing file yields the defaults;
 * environment overrides apply either way.
 */
export async function loadFilesystemConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env
): Promise<FilesystemConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return applyEnvironment({ ...DEFAULT_FILESYSTEM_CONFIG }, env);
    }
    throw new FilesystemConfigError(
      'Cannot read filesystem configuration',
      [error instanceof Error ? error.message : String(error)],
      filePath
    );
  }
  return applyEnvironment(parseFilesystemConfig(text, filePath), env);
}
