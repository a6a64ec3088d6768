import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import type { BrowserDriver, ElementHandle } from '../browser/driver.js';
import type {
  PageMetrics,
  ScenarioFailure,
  Scenario,
  ScenarioResult,
  StepResult,
  StructureAnalysis,
  StructureHint,
  StructureHintProvider,
} from '../schema/index.js';
import { hintsFromAnalysis } from '../schema/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { slugify } from '../utils/text.js';
import { dispatchStep, readScrollHeight } from './dispatch.js';
import type { PageState } from './dispatch.js';
import { NavigationError, toScenarioError } from './errors.js';
import type { ScenarioError } from './errors.js';
import { readPageMetrics } from './metrics.js';
import { ElementResolver } from './resolver.js';

// ── State machine ────────────────────────────────────────────

export type ExecutorState =
  | { status: 'idle' }
  | { status: 'navigating'; url: string }
  | { status: 'running'; index: number }
  | { status: 'completed' }
  | { status: 'aborted'; index?: number };

type Status = ExecutorState['status'];

const TRANSITIONS: Readonly<Record<Status, readonly Status[]>> = {
  idle: ['navigating'],
  navigating: ['running', 'completed', 'aborted'],
  running: ['running', 'completed', 'aborted'],
  completed: ['idle'],
  aborted: ['idle'],
};

export class InvalidTransitionError extends Error {
  constructor(from: Status, to: Status) {
    super(`Invalid executor transition: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

// ── Public types ─────────────────────────────────────────────

export const DEFAULT_SETTLE_DELAY_MS = 1000;
export const DEFAULT_PAGE_LOAD_TIMEOUT_MS = 30_000;
export const DEFAULT_SCREENSHOT_DIR = path.join('test_output', 'screenshots');

export interface ExecutorOptions {
  logger?: Logger | undefined;
  /** Hints known before any page analysis. */
  hints?: readonly StructureHint[] | undefined;
  /** Analyses each page after navigation; failures only produce a warning. */
  hintProvider?: StructureHintProvider | undefined;
  settleDelayMs?: number | undefined;
  pageLoadTimeoutMs?: number | undefined;
  screenshotDir?: string | undefined;
  screenshotOnSuccess?: boolean | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  now?: (() => number) | undefined;
  clock?: (() => Date) | undefined;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
}

// ── Executor ─────────────────────────────────────────────────

/**
 * Runs one compiled scenario against a browser driver, one step at a
 * time. Stops at the first failing step; cancellation is honoured
 * between steps only.
 */
export class ScenarioExecutor<H extends ElementHandle = ElementHandle> {
  private current: ExecutorState = { status: 'idle' };

  private readonly logger: Logger;
  private readonly resolver: ElementResolver<H>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly clock: () => Date;

  constructor(
    private readonly driver: BrowserDriver<H>,
    private readonly options: ExecutorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.resolver = new ElementResolver(driver, { logger: this.logger, now: this.now });
  }

  get state(): ExecutorState {
    return this.current;
  }

  private transition(next: ExecutorState): void {
    if (!TRANSITIONS[this.current.status].includes(next.status)) {
      throw new InvalidTransitionError(this.current.status, next.status);
    }
    this.current = next;
  }

  async run(scenario: Scenario, url: string, options: RunOptions = {}): Promise<ScenarioResult> {
    if (this.current.status === 'completed' || this.current.status === 'aborted') {
      this.transition({ status: 'idle' });
    }
    this.transition({ status: 'navigating', url });

    const startedAt = this.clock();
    const started = this.now();
    const results: StepResult[] = [];
    let metrics: PageMetrics | undefined;

    const finish = (extra: {
      aborted: boolean;
      cancelled?: boolean;
      abortedAtIndex?: number;
      failure?: ScenarioFailure;
    }): ScenarioResult => ({
      name: scenario.name,
      url,
      results,
      aborted: extra.aborted,
      cancelled: extra.cancelled ?? false,
      warnings: [...scenario.warnings],
      startedAt: startedAt.toISOString(),
      finishedAt: this.clock().toISOString(),
      durationMs: Math.max(0, Math.round(this.now() - started)),
      ...(extra.abortedAtIndex !== undefined ? { abortedAtIndex: extra.abortedAtIndex } : {}),
      ...(extra.failure !== undefined ? { failure: extra.failure } : {}),
      ...(metrics !== undefined ? { metrics } : {}),
    });

    this.logger.section(scenario.name);

    // ── Navigate ──
    try {
      await this.driver.navigate(url, this.options.pageLoadTimeoutMs ?? DEFAULT_PAGE_LOAD_TIMEOUT_MS);
      this.logger.debug(`document.readyState = ${await this.driver.readyState()}`);
      const landed = this.driver.currentUrl();
      this.logger.detail(landed === url ? `Opened ${landed}` : `Opened ${landed} (redirected from ${url})`);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const failure = new NavigationError(url, reason, { cause: err });
      this.logger.error(failure.message);
      this.transition({ status: 'aborted' });
      return finish({ aborted: true, failure: { errorKind: failure.kind, diagnostic: failure.message } });
    }

    metrics = await this.collectMetrics();
    const analysis = await this.analyze(url);
    const hints = [...(this.options.hints ?? []), ...(analysis ? hintsFromAnalysis(analysis) : [])];
    const page: PageState = { lastScrollHeight: await this.initialScrollHeight() };

    const total = scenario.steps.length;
    if (total === 0) {
      this.transition({ status: 'completed' });
      return finish({ aborted: false });
    }

    // ── Steps ──
    for (const [index, step] of scenario.steps.entries()) {
      this.transition({ status: 'running', index });

      if (options.signal?.aborted === true) {
        this.logger.warn(`Cancelled before step ${String(index + 1)}/${String(total)}`);
        this.transition({ status: 'aborted', index });
        return finish({ aborted: true, cancelled: true, abortedAtIndex: index });
      }

      this.logger.step(index, total, step.rawText);
      const stepStarted = this.now();

      try {
        await dispatchStep({
          step,
          driver: this.driver,
          resolver: this.resolver,
          hints,
          dynamicContent: analysis?.dynamicContent,
          page,
          logger: this.logger,
          sleep: this.sleep,
        });
      } catch (err) {
        const error = toScenarioError(err);
        const screenshotPath = await this.capture(scenario, index, 'failure');

        results.push({
          index,
          step,
          succeeded: false,
          errorKind: error.kind,
          diagnostic: error.message,
          elapsedMs: this.elapsedSince(stepStarted),
          ...(screenshotPath !== undefined ? { screenshotPath } : {}),
        });
        this.logger.stepResult(index, total, false, step.rawText);
        this.logger.detail(diagnosticLine(error));

        this.transition({ status: 'aborted', index });
        return finish({
          aborted: true,
          abortedAtIndex: index,
          failure: { errorKind: error.kind, diagnostic: error.message, stepIndex: index },
        });
      }

      const screenshotPath = this.options.screenshotOnSuccess === true
        ? await this.capture(scenario, index, 'pass')
        : undefined;

      results.push({
        index,
        step,
        succeeded: true,
        elapsedMs: this.elapsedSince(stepStarted),
        ...(screenshotPath !== undefined ? { screenshotPath } : {}),
      });
      this.logger.stepResult(index, total, true, step.rawText);

      const settle = this.options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
      if (index < total - 1 && settle > 0) {
        await this.sleep(settle);
      }
    }

    this.transition({ status: 'completed' });
    return finish({ aborted: false });
  }

  // ── Helpers ────────────────────────────────────────────────

  private elapsedSince(start: number): number {
    return Math.max(0, Math.round(this.now() - start));
  }

  private async analyze(url: string): Promise<StructureAnalysis | undefined> {
    const provider = this.options.hintProvider;
    if (!provider) return undefined;

    try {
      const analysis = await provider.analyze(url);
      this.logger.detail(
        `Structure: ${String(analysis.forms.length)} form(s), ${String(Object.keys(analysis.suggestedSelectors).length)} suggested selector(s)`,
      );
      return analysis;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Structure analysis failed, continuing without hints: ${message}`);
      return undefined;
    }
  }

  private async collectMetrics(): Promise<PageMetrics | undefined> {
    try {
      const metrics = await readPageMetrics(this.driver);
      if (metrics) {
        this.logger.detail(
          `Page load ${String(metrics.pageLoadMs)}ms, DOMContentLoaded ${String(metrics.domContentLoadedMs)}ms, first contentful paint ${String(metrics.firstContentfulPaintMs)}ms`,
        );
      }
      return metrics;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not read page metrics: ${message}`);
      return undefined;
    }
  }

  private async initialScrollHeight(): Promise<number> {
    try {
      return await readScrollHeight(this.driver);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Could not read page height: ${message}`);
      return 0;
    }
  }

  /** Screenshot the page; a failed capture is logged and never replaces the step outcome. */
  private async capture(scenario: Scenario, index: number, label: string): Promise<string | undefined> {
    const dir = this.options.screenshotDir ?? DEFAULT_SCREENSHOT_DIR;
    const filePath = path.join(dir, `${slugify(scenario.name)}-step-${String(index + 1)}-${label}.png`);
    try {
      await this.driver.screenshot(filePath);
      this.logger.detail(`Screenshot saved: ${filePath}`);
      return filePath;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Screenshot failed: ${message}`);
      return undefined;
    }
  }
}

function diagnosticLine(error: ScenarioError): string {
  return `${error.kind}: ${error.message}`;
}
