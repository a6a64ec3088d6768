import { access, readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { ConfigError } from '../core/errors.js';
import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { DEFAULT_CONFIG_FILES, ENV_OVERRIDES } from './defaults.js';
import type { EnvOverride } from './defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  configPath?: string | undefined;
  /** Directory searched for a default config file. */
  cwd?: string | undefined;
  env?: Readonly<Record<string, string | undefined>> | undefined;
}

type RawSection = Record<string, unknown>;
type RawConfig = { browser: RawSection; test: RawSection } & Record<string, unknown>;

// ── Helpers ──────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

/** Coerce an environment string to the type its config key expects. */
function coerceEnvValue(kind: EnvOverride['kind'], value: string): unknown {
  const trimmed = value.trim();
  switch (kind) {
    case 'boolean': {
      const lowered = trimmed.toLowerCase();
      if (TRUE_VALUES.includes(lowered)) return true;
      if (FALSE_VALUES.includes(lowered)) return false;
      return trimmed;
    }
    case 'number':
      return Number(trimmed);
    case 'string':
      return trimmed;
  }
}

// ── File parsing ─────────────────────────────────────────────

/**
 * Read a `.plainstep.yaml` (or JSON) config file without validating it.
 * An empty file counts as an empty config.
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Config file not readable: ${configPath} (${errorMessage(err)})`);
  }

  try {
    const parsed: unknown = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
    return parsed ?? {};
  } catch (err) {
    throw new ConfigError(`Config file is not valid: ${configPath} (${errorMessage(err)})`);
  }
}

async function findDefaultConfig(cwd: string): Promise<unknown> {
  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    const exists = await access(candidate).then(() => true, () => false);
    if (exists) return readConfigFile(candidate);
  }
  return {};
}

// ── Merging ──────────────────────────────────────────────────

/** Overlay environment overrides onto a raw config document. */
export function applyEnvOverrides(
  raw: unknown,
  env: Readonly<Record<string, string | undefined>>,
): RawConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Config file must contain a mapping at the top level');
  }

  const merged: RawConfig = {
    ...raw,
    browser: isRecord(raw['browser']) ? { ...raw['browser'] } : {},
    test: isRecord(raw['test']) ? { ...raw['test'] } : {},
  };

  for (const { name, section, key, kind } of ENV_OVERRIDES) {
    const value = env[name];
    if (value === undefined || value.trim() === '') continue;
    merged[section][key] = coerceEnvValue(kind, value);
  }

  return merged;
}

export function validateConfig(raw: unknown, source = 'config'): FileConfig {
  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

// ── Public API ───────────────────────────────────────────────

/**
 * Resolve the effective configuration: defaults, then the config file,
 * then environment overrides. A missing default file is not an error;
 * a missing or invalid explicit one is.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<FileConfig> {
  const raw = options.configPath !== undefined
    ? await readConfigFile(options.configPath)
    : await findDefaultConfig(options.cwd ?? process.cwd());

  const merged = applyEnvOverrides(raw, options.env ?? process.env);
  return validateConfig(merged, options.configPath ?? 'configuration');
}
