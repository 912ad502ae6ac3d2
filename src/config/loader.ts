// Config loader: reads a session configuration from a YAML file.
// Keys are the same as SessionConfigInput. Relative gisbase/gisdbase/log/history
// paths are resolved against the directory holding the file, so a project can
// keep its config next to its data. Overrides win over file values.
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import type { SessionConfigInput } from '../types/config.js';
import { GrassError, GrassErrorCode } from '../shared/errors.js';
import { logger } from '../logger.js';
import { parseSessionConfig } from './schema.js';

const PATH_KEYS = ['gisbase', 'gisdbase', 'log', 'history'] as const;

export function loadSessionConfig(
  configPath: string,
  overrides: Partial<SessionConfigInput> = {},
): SessionConfigInput {
  if (!existsSync(configPath)) {
    throw new GrassError(GrassErrorCode.CONFIG_NOT_FOUND, `Config file not found: ${configPath}`, { configPath });
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new GrassError(
      GrassErrorCode.CONFIG_INVALID,
      `Could not parse config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      { configPath },
      { cause: err },
    );
  }

  // An empty file parses to null
  const fileValues = raw ?? {};
  if (!isRecord(fileValues)) {
    throw new GrassError(GrassErrorCode.CONFIG_INVALID, `Config file ${configPath} must contain a mapping`, { configPath });
  }

  const baseDir = path.dirname(path.resolve(configPath));
  const resolved: Record<string, unknown> = { ...fileValues };
  for (const key of PATH_KEYS) {
    const value = resolved[key];
    if (typeof value === 'string' && value !== '' && !path.isAbsolute(value)) {
      resolved[key] = path.resolve(baseDir, value);
    }
  }

  const config = parseSessionConfig({ ...resolved, ...overrides });
  logger.debug({ configPath, location: config.location }, 'Session configuration loaded');
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
