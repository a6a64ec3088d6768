import path from 'node:path';

import type { Command } from 'commander';

import { PageStructureAnalyzer, launchSession } from '../browser/index.js';
import { loadConfig } from '../config/index.js';
import { ConfigError, ScenarioExecutor, loadScenarios } from '../core/index.js';
import { formatSummary, generateJSON, serializeJSON, writeJSONReport } from '../report/index.js';
import type { FileConfig, Scenario, ScenarioResult } from '../schema/index.js';
import { browserNameSchema, computeExitCode } from '../schema/index.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

// ── Options ──────────────────────────────────────────────────

interface RunCommandOptions {
  tests: string;
  config?: string;
  url?: string;
  browser?: string;
  headless?: true;
  json?: true;
  reportPath?: string;
  verbose?: true;
}

/** Apply CLI flags on top of the file + environment configuration. */
export function applyCliOverrides(config: FileConfig, opts: Omit<RunCommandOptions, 'tests'>): FileConfig {
  let name = config.browser.name;
  if (opts.browser !== undefined) {
    const parsed = browserNameSchema.safeParse(opts.browser);
    if (!parsed.success) {
      throw new ConfigError(`Unsupported browser "${opts.browser}" (expected chromium, firefox or webkit)`);
    }
    name = parsed.data;
  }

  return {
    browser: {
      ...config.browser,
      name,
      headless: opts.headless ?? config.browser.headless,
    },
    test: {
      ...config.test,
      ...(opts.url !== undefined ? { base_url: opts.url } : {}),
    },
  };
}

/**
 * URL a scenario runs against: its own `url`, resolved against the
 * base URL when relative, or the base URL itself.
 */
export function scenarioUrl(scenario: Scenario, baseUrl: string | undefined): string | undefined {
  if (scenario.url === undefined) return baseUrl;
  if (baseUrl === undefined) return scenario.url;
  return new URL(scenario.url, baseUrl).toString();
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run plain-English test scenarios in a real browser')
    .requiredOption('--tests <path>', 'Scenario file or directory of .yaml files')
    .option('--config <path>', 'Path to config file (default: .plainstep.yaml if present)')
    .option('--url <url>', 'Base URL for scenarios without their own url')
    .option('--browser <name>', 'chromium, firefox or webkit')
    .option('--headless', 'Run browser headless')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Also write results.json to this directory')
    .option('--verbose', 'Log every selector lookup')
    .action(async (opts: RunCommandOptions) => {
      const logger = createLogger({ verbose: opts.verbose === true });

      try {
        // 1. Config: defaults ← file ← environment ← flags
        const config = applyCliOverrides(await loadConfig({ configPath: opts.config }), opts);

        // 2. Compile scenarios
        const scenarios = await loadScenarios(opts.tests, {
          logger,
          defaultTimeoutSeconds: config.test.wait_timeout,
        });
        if (scenarios.length === 0) {
          throw new ConfigError(`No scenarios found in ${opts.tests}`);
        }

        const targets = scenarios.map((scenario) => {
          const url = scenarioUrl(scenario, config.test.base_url);
          if (url === undefined) {
            throw new ConfigError(`Scenario "${scenario.name}" has no url and no base URL is configured`);
          }
          return { scenario, url };
        });

        // 3. Execute sequentially in one browser session
        const results = await executeAll(targets, config, logger);

        // 4. Output (an interrupted batch never passes)
        const exitCode = results.length < targets.length ? 1 : computeExitCode(results);
        const output = generateJSON(results, exitCode);

        if (opts.reportPath !== undefined) {
          const written = await writeJSONReport(path.resolve(opts.reportPath), output);
          logger.info(`Results written to ${written}`);
        }
        if (opts.json) {
          process.stdout.write(serializeJSON(output) + '\n');
        }

        process.stderr.write(formatSummary(results));
        process.exitCode = exitCode;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = 1;
      }
    });
}

// ── Execution ────────────────────────────────────────────────

async function executeAll(
  targets: readonly { scenario: Scenario; url: string }[],
  config: FileConfig,
  logger: Logger,
): Promise<ScenarioResult[]> {
  const [width, height] = config.browser.window_size;
  const session = await launchSession({
    browser: config.browser.name,
    headless: config.browser.headless,
    viewport: { width, height },
    screenshotDir: config.test.screenshot_dir,
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupted; stopping after the current step');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const executor = new ScenarioExecutor(session.driver, {
      logger,
      settleDelayMs: config.test.settle_delay_ms,
      pageLoadTimeoutMs: config.browser.page_load_timeout * 1000,
      screenshotDir: config.test.screenshot_dir,
      screenshotOnSuccess: config.test.screenshot_on_success,
      ...(config.test.analyze_structure
        ? { hintProvider: new PageStructureAnalyzer(session.page) }
        : {}),
    });

    const results: ScenarioResult[] = [];
    for (const { scenario, url } of targets) {
      if (controller.signal.aborted) break;
      results.push(await executor.run(scenario, url, { signal: controller.signal }));
    }
    return results;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await session.close();
  }
}
