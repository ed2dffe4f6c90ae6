/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname, resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';

export type Environment = 'production' | 'development' | 'test';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects (arrays and scalars from source replace target)
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Path of the runtime.yaml shipped with the package
 */
export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: Environment): Environment {
  if (environment) {
    return environment;
  }
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Load, merge and validate configuration from a YAML file
 */
export function loadConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  const finalPath = configPath ?? process.env.SLOTSWAP_CONFIG ?? defaultConfigPath();

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Configuration file not found: ${finalPath}`, { cause: error });
    }
    throw new Error(`Failed to read configuration: ${String(error)}`, { cause: error });
  }

  const document = yaml.load(fileContents);
  if (!isPlainObject(document)) {
    throw new Error(`Configuration file ${finalPath} must contain a YAML mapping`);
  }

  const { environments, ...base } = document;
  let merged: PlainObject = base;

  if (isPlainObject(environments)) {
    const overrides = environments[resolveEnvironment(environment)];
    if (isPlainObject(overrides)) {
      merged = deepMerge(base, overrides);
    }
  }

  const config = validateConfig(merged);

  // Relative artifact roots resolve against the working directory
  config.artifacts.root_dir = resolvePath(config.artifacts.root_dir);

  return config;
}
