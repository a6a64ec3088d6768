import { readFile, readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import type { ParseWarning, Scenario, ScenarioSpec, Step } from '../schema/index.js';
import { scenarioFileSchema } from '../schema/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { ScenarioLoadError } from './errors.js';
import { parseStep } from './parser.js';
import type { ParseOptions } from './parser.js';

// ── Public types ─────────────────────────────────────────────

export interface CompileOptions extends ParseOptions {
  logger?: Logger | undefined;
  /** File the document came from, recorded on each scenario. */
  source?: string | undefined;
}

const SCENARIO_EXTENSIONS = new Set(['.yaml', '.yml']);

// ── Compilation ──────────────────────────────────────────────

/**
 * Compile one scenario spec. Unrecognized steps are omitted from
 * `steps` and reported in `warnings`, each tagged with its position.
 */
export function compileScenario(spec: ScenarioSpec, options: CompileOptions = {}): Scenario {
  const logger = options.logger ?? silentLogger;
  const steps: Step[] = [];
  const warnings: ParseWarning[] = [];

  spec.steps.forEach((raw, index) => {
    const result = parseStep(raw, options);
    if (result.ok) {
      steps.push(result.step);
      return;
    }

    const warning: ParseWarning = { ...result.warning, scenario: spec.name, index };
    warnings.push(warning);
    logger.warn(
      `[${spec.name}] step ${String(index + 1)} skipped (${warning.reason}): "${warning.rawText}"`,
    );
  });

  return {
    name: spec.name,
    description: spec.description,
    tags: spec.tags,
    steps,
    warnings,
    ...(spec.url !== undefined ? { url: spec.url } : {}),
    ...(options.source !== undefined ? { source: options.source } : {}),
  };
}

/** Validate a parsed document and compile every scenario in it. */
export function compileScenarioDocument(document: unknown, options: CompileOptions = {}): Scenario[] {
  const result = scenarioFileSchema.safeParse(document);
  if (!result.success) {
    const where = options.source ?? 'scenario document';
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ScenarioLoadError(`Invalid scenario file ${where}: ${issues}`);
  }

  return result.data.scenarios.map((spec) => compileScenario(spec, options));
}

// ── Loading ──────────────────────────────────────────────────

export async function loadScenarioFile(filePath: string, options: CompileOptions = {}): Promise<Scenario[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ScenarioLoadError(`Scenario file not readable: ${filePath} (${message})`);
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ScenarioLoadError(`Scenario file is not valid YAML: ${filePath} (${message})`);
  }

  return compileScenarioDocument(document, { ...options, source: filePath });
}

/**
 * Load a single scenario file, or every `.yaml` / `.yml` file
 * directly inside a directory (sorted by name for a stable order).
 */
export async function loadScenarios(target: string, options: CompileOptions = {}): Promise<Scenario[]> {
  const info = await stat(target).catch(() => null);
  if (!info) {
    throw new ScenarioLoadError(`Test scenario path not found: ${target}`);
  }

  if (info.isFile()) return loadScenarioFile(target, options);

  const entries = await readdir(target, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && SCENARIO_EXTENSIONS.has(path.extname(e.name).toLowerCase()))
    .map((e) => path.join(target, e.name))
    .sort();

  const scenarios: Scenario[] = [];
  for (const file of files) {
    scenarios.push(...(await loadScenarioFile(file, options)));
  }
  return scenarios;
}
