import type { Command } from 'commander';

import { loadScenarios } from '../core/index.js';
import { serializeJSON } from '../report/index.js';
import type { Scenario, Step } from '../schema/index.js';
import { createLogger } from '../utils/logger.js';

interface CompileCommandOptions {
  tests: string;
  strict?: true;
  json?: true;
}

// ── Formatting ───────────────────────────────────────────────

function describeStep(step: Step): string {
  const value = step.value !== undefined ? ` = "${step.value}"` : '';
  const timeout = step.action === 'wait' ? ` (${String(step.timeoutSeconds)}s)` : '';
  return `${step.action} → ${step.target}${value}${timeout}`;
}

/** Plain-text listing of compiled steps and skipped lines. */
export function formatCompiled(scenarios: readonly Scenario[]): string {
  const lines: string[] = [];
  for (const scenario of scenarios) {
    lines.push(`${scenario.name}${scenario.url !== undefined ? ` <${scenario.url}>` : ''}`);
    scenario.steps.forEach((step, i) => {
      lines.push(`  ${String(i + 1)}. ${describeStep(step)}`);
      if (step.humanInstruction !== undefined) lines.push(`     ↳ ${step.humanInstruction}`);
    });
    for (const warning of scenario.warnings) {
      const at = warning.index !== undefined ? `#${String(warning.index + 1)} ` : '';
      lines.push(`  ! ${at}${warning.reason}: "${warning.rawText}"`);
    }
  }
  return lines.join('\n') + '\n';
}

export function compiledToJSON(scenarios: readonly Scenario[]): unknown {
  return {
    scenarios: scenarios.map((s) => ({
      name: s.name,
      steps: s.steps,
      warnings: s.warnings,
      ...(s.url !== undefined ? { url: s.url } : {}),
    })),
  };
}

// ── Command registration ─────────────────────────────────────

export function registerCompileCommand(program: Command): void {
  program
    .command('compile')
    .description('Compile scenarios without a browser and list the resulting steps')
    .requiredOption('--tests <path>', 'Scenario file or directory of .yaml files')
    .option('--strict', 'Exit 1 when any step was skipped')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: CompileCommandOptions) => {
      try {
        const scenarios = await loadScenarios(opts.tests, { logger: createLogger() });

        process.stdout.write(
          opts.json ? serializeJSON(compiledToJSON(scenarios)) + '\n' : formatCompiled(scenarios),
        );

        const warnings = scenarios.reduce((n, s) => n + s.warnings.length, 0);
        process.exitCode = opts.strict && warnings > 0 ? 1 : 0;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = 1;
      }
    });
}
