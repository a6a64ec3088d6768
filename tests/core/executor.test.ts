import path from 'node:path';

import { describe, it, expect, vi } from 'vitest';

import { compileScenario } from '../../src/core/compiler.js';
import { InvalidTransitionError, ScenarioExecutor } from '../../src/core/executor.js';
import { PAGE_METRICS_SCRIPT } from '../../src/core/metrics.js';
import type { ExecutorOptions } from '../../src/core/executor.js';
import type {
  Scenario,
  StepSpec,
  StructureAnalysis,
  StructureHintProvider,
} from '../../src/schema/index.js';
import { EMPTY_ANALYSIS, scenarioStatus } from '../../src/schema/index.js';
import { createLogger } from '../../src/utils/logger.js';
import { FakeDriver } from '../helpers/fakeDriver.js';
import type { FakeElement, FakeHandle } from '../helpers/fakeDriver.js';

const PAGE_URL = 'https://shop.test/login';

function scenario(name: string, steps: StepSpec[]): Scenario {
  return compileScenario({ name, description: '', tags: [], steps });
}

function executorFor(driver: FakeDriver, options: ExecutorOptions = {}): ScenarioExecutor<FakeHandle> {
  return new ScenarioExecutor(driver, {
    now: driver.now,
    sleep: driver.sleep,
    clock: () => new Date('2026-01-01T00:00:00.000Z'),
    ...options,
  });
}

function loginPage(): FakeElement[] {
  return [
    { tag: 'input', id: 'email' },
    {
      tag: 'button',
      id: 'submit',
      text: 'Submit',
      onClick: (d) => d.add({ id: 'success-message', text: 'Thanks for signing in' }),
    },
  ];
}

describe('ScenarioExecutor: end to end', () => {
  it('types, clicks and verifies against an in-process page', async () => {
    const driver = new FakeDriver(loginPage());
    const executor = executorFor(driver);

    const result = await executor.run(
      scenario('Sign in', [
        'type "hello@x.com" into email field',
        'click on the submit button',
        'verify that success message appears',
      ]),
      PAGE_URL,
    );

    expect(result.results.map((r) => r.succeeded)).toEqual([true, true, true]);
    expect(result.aborted).toBe(false);
    expect(result.cancelled).toBe(false);
    expect(result.failure).toBeUndefined();
    expect(scenarioStatus(result)).toBe('passed');
    expect(driver.url).toBe(PAGE_URL);
    expect(driver.elements[0]?.value).toBe('hello@x.com');
    expect(executor.state).toEqual({ status: 'completed' });
    expect(result.startedAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('waits the settle delay only between steps', async () => {
    const driver = new FakeDriver(loginPage());
    await executorFor(driver, { settleDelayMs: 500 }).run(
      scenario('Settle', ['type "a" into email field', 'click submit button']),
      PAGE_URL,
    );
    expect(driver.sleeps).toEqual([500]);
  });

  it('can run again once finished', async () => {
    const driver = new FakeDriver(loginPage());
    const executor = executorFor(driver, { settleDelayMs: 0 });
    const login = scenario('Again', ['click submit button']);

    await executor.run(login, PAGE_URL);
    const second = await executor.run(login, PAGE_URL);
    expect(second.results).toHaveLength(1);
  });
});

describe('ScenarioExecutor: failures', () => {
  it('stops at the first failing step', async () => {
    const driver = new FakeDriver([{ id: 'login' }]);
    const result = await executorFor(driver).run(
      scenario('Fail fast', ['click login', 'click missing thing', 'click login', 'click login']),
      PAGE_URL,
    );

    expect(result.results).toHaveLength(2);
    expect(result.results[1]).toMatchObject({ index: 1, succeeded: false, errorKind: 'ElementNotFound' });
    expect(result.aborted).toBe(true);
    expect(result.abortedAtIndex).toBe(1);
    expect(result.failure).toMatchObject({ errorKind: 'ElementNotFound', stepIndex: 1 });
    expect(result.failure?.diagnostic).toMatch(/^Could not find element: missing thing/);
    expect(driver.screenshots).toEqual([
      path.join('test_output', 'screenshots', 'fail-fast-step-2-failure.png'),
    ]);
    expect(result.results[1]?.screenshotPath).toBe(driver.screenshots[0]);
    expect(driver.actions).toHaveLength(1);
  });

  it('reports navigation failure without running steps', async () => {
    const driver = new FakeDriver(loginPage(), {
      navigateError: new Error('net::ERR_NAME_NOT_RESOLVED'),
    });
    const executor = executorFor(driver);
    const result = await executor.run(scenario('Offline', ['click submit button']), 'https://nowhere.test');

    expect(result.results).toEqual([]);
    expect(result.aborted).toBe(true);
    expect(result.abortedAtIndex).toBeUndefined();
    expect(result.failure).toEqual({
      errorKind: 'NavigationError',
      diagnostic: 'Could not open https://nowhere.test: net::ERR_NAME_NOT_RESOLVED',
    });
    expect(executor.state).toEqual({ status: 'aborted' });
  });

  it('reports a disabled element as an ActionError', async () => {
    const driver = new FakeDriver([{ id: 'save', enabled: false }]);
    const result = await executorFor(driver).run(scenario('Disabled', ['click save']), PAGE_URL);

    expect(result.failure).toEqual({
      errorKind: 'ActionError',
      diagnostic: 'Element is not interactable: save ([id="save" i])',
      stepIndex: 0,
    });
  });

  it('reports driver faults as ActionError', async () => {
    const driver = new FakeDriver([{ tag: 'select', id: 'planet', options: ['Earth'] }]);
    const result = await executorFor(driver).run(
      scenario('Select', ['select "Mars" from planet dropdown']),
      PAGE_URL,
    );
    expect(result.failure).toMatchObject({ errorKind: 'ActionError', diagnostic: 'option "Mars" not found' });
  });

  it('reports a text mismatch as a ValidationError', async () => {
    const driver = new FakeDriver([{ tag: 'header', text: 'Hello' }]);
    const result = await executorFor(driver).run(
      scenario('Greeting', ['verify that the header contains "Welcome"']),
      PAGE_URL,
    );
    expect(result.failure).toMatchObject({
      errorKind: 'ValidationError',
      diagnostic: 'Expected header to contain "Welcome" but found "Hello"',
    });
  });

  it('never lets a failed screenshot mask the step failure', async () => {
    const lines: string[] = [];
    const driver = new FakeDriver([], { screenshotError: new Error('disk full') });
    const result = await executorFor(driver, {
      logger: createLogger({ write: (l) => lines.push(l) }),
    }).run(scenario('No disk', ['click anything']), PAGE_URL);

    expect(result.failure?.errorKind).toBe('ElementNotFound');
    expect(result.results[0]?.screenshotPath).toBeUndefined();
    expect(lines).toContain('⚠️  Screenshot failed: disk full');
  });

  it('rejects a second run while one is in progress', async () => {
    const driver = new FakeDriver(loginPage());
    const executor = executorFor(driver);
    const login = scenario('Busy', ['click submit button']);

    const first = executor.run(login, PAGE_URL);
    await expect(executor.run(login, PAGE_URL)).rejects.toBeInstanceOf(InvalidTransitionError);
    await first;
  });
});

describe('ScenarioExecutor: cancellation', () => {
  it('runs nothing when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const driver = new FakeDriver(loginPage());

    const result = await executorFor(driver).run(scenario('Cancelled', ['click submit button']), PAGE_URL, {
      signal: controller.signal,
    });

    expect(result.results).toEqual([]);
    expect(result.cancelled).toBe(true);
    expect(result.abortedAtIndex).toBe(0);
    expect(scenarioStatus(result)).toBe('cancelled');
  });

  it('stops at the next step boundary', async () => {
    const controller = new AbortController();
    const driver = new FakeDriver([{ id: 'stop', onClick: () => controller.abort() }, { id: 'next' }]);

    const result = await executorFor(driver).run(
      scenario('Stop', ['click stop', 'click next']),
      PAGE_URL,
      { signal: controller.signal },
    );

    expect(result.results).toHaveLength(1);
    expect(result.results[0]?.succeeded).toBe(true);
    expect(result.abortedAtIndex).toBe(1);
    expect(result.cancelled).toBe(true);
    expect(result.failure).toBeUndefined();
  });
});

describe('ScenarioExecutor: actions', () => {
  it('sleeps for a page wait', async () => {
    const driver = new FakeDriver([]);
    const result = await executorFor(driver).run(scenario('Pause', ['wait for 3 seconds']), PAGE_URL);
    expect(result.results[0]?.succeeded).toBe(true);
    expect(driver.sleeps).toEqual([3000]);
  });

  it('detects new content after scrolling', async () => {
    const driver = new FakeDriver([], { scrollHeight: 1000, scrollGrowth: 500 });
    const result = await executorFor(driver, { settleDelayMs: 0 }).run(
      scenario('Feed', ['scroll down till end', 'verify that new content appears']),
      PAGE_URL,
    );
    expect(result.results.map((r) => r.succeeded)).toEqual([true, true]);
    expect(driver.scripts).toContain('window.scrollTo(0, document.body.scrollHeight)');
  });

  it('fails the new content check when the page did not grow', async () => {
    const driver = new FakeDriver([], { scrollHeight: 1000 });
    const result = await executorFor(driver, { settleDelayMs: 0 }).run(
      scenario('Static', ['scroll down till end', 'verify that new content appears']),
      PAGE_URL,
    );
    expect(result.failure).toEqual({
      errorKind: 'ValidationError',
      diagnostic: 'No new content loaded (scroll height 1000, previously 1000)',
      stepIndex: 1,
    });
  });

  it('runs automation assertions after the action', async () => {
    const driver = new FakeDriver([
      { id: 'load', text: 'Load' },
      { classes: ['item'] },
      { classes: ['item'] },
    ]);
    const result = await executorFor(driver).run(
      scenario('Items', [
        {
          action: 'click',
          target: 'load',
          automation: { assertions: [{ type: 'minimum_elements', selector: '.item', count: 3 }] },
        },
      ]),
      PAGE_URL,
    );

    expect(driver.actions).toHaveLength(1);
    expect(result.failure).toMatchObject({
      errorKind: 'ValidationError',
      diagnostic: 'Assertion failed: expected at least 3 .item, found 2',
    });
  });

  it('tries the automation selector first', async () => {
    const driver = new FakeDriver([{ id: 'go' }]);
    await executorFor(driver).run(
      scenario('Explicit', [{ action: 'click', target: 'next page', automation: { selector: '#go' } }]),
      PAGE_URL,
    );
    expect(driver.lookups).toHaveLength(1);
    expect(driver.lookups[0]?.query).toEqual({ kind: 'css', selector: '#go' });
  });
});

describe('ScenarioExecutor: structure hints', () => {
  const analysis: StructureAnalysis = {
    forms: [{ selector: '#login-form', inputs: { username: '#user-id' } }],
    dynamicContent: { infiniteScroll: true, loadMore: false, scrollContainer: '#feed' },
    suggestedSelectors: {},
  };

  it('resolves through hints from the analysed page', async () => {
    const driver = new FakeDriver([{ tag: 'input', css: ['#user-id'] }]);
    const provider: StructureHintProvider = { analyze: vi.fn().mockResolvedValue(analysis) };

    const result = await executorFor(driver, { hintProvider: provider }).run(
      scenario('Hints', ['type "bob" into username field']),
      PAGE_URL,
    );

    expect(provider.analyze).toHaveBeenCalledWith(PAGE_URL);
    expect(result.results[0]?.succeeded).toBe(true);
    expect(driver.lookups[0]?.query).toEqual({ kind: 'css', selector: '#user-id' });
  });

  it('scrolls the analysed container', async () => {
    const driver = new FakeDriver([]);
    const provider: StructureHintProvider = { analyze: vi.fn().mockResolvedValue(analysis) };

    await executorFor(driver, { hintProvider: provider }).run(scenario('Feed', ['scroll to the bottom']), PAGE_URL);

    expect(driver.scripts).toContain(
      'document.querySelector("#feed")?.scrollTo(0, document.querySelector("#feed")?.scrollHeight ?? 0)',
    );
  });

  it('continues without hints when analysis fails', async () => {
    const lines: string[] = [];
    const driver = new FakeDriver(loginPage());
    const provider: StructureHintProvider = {
      analyze: vi.fn().mockRejectedValue(new Error('boom')),
    };

    const result = await executorFor(driver, {
      hintProvider: provider,
      logger: createLogger({ write: (l) => lines.push(l) }),
    }).run(scenario('Degraded', ['click submit button']), PAGE_URL);

    expect(result.results[0]?.succeeded).toBe(true);
    expect(lines).toContain('⚠️  Structure analysis failed, continuing without hints: boom');
  });

  it('accepts an empty analysis', async () => {
    const driver = new FakeDriver(loginPage());
    const provider: StructureHintProvider = { analyze: vi.fn().mockResolvedValue(EMPTY_ANALYSIS) };
    const result = await executorFor(driver, { hintProvider: provider }).run(
      scenario('Empty', ['click submit button']),
      PAGE_URL,
    );
    expect(scenarioStatus(result)).toBe('passed');
  });
});

describe('ScenarioExecutor: page load', () => {
  const timings = { pageLoadMs: 812, domContentLoadedMs: 430, firstPaintMs: 120, firstContentfulPaintMs: 150 };

  it('records page timings after navigation', async () => {
    const lines: string[] = [];
    const driver = new FakeDriver(loginPage(), { metrics: timings });
    const result = await executorFor(driver, {
      logger: createLogger({ write: (l) => lines.push(l) }),
    }).run(scenario('Timed', ['click submit button']), PAGE_URL);

    expect(result.metrics).toEqual(timings);
    expect(driver.scripts[0]).toBe(PAGE_METRICS_SCRIPT);
    expect(lines).toContain('   Page load 812ms, DOMContentLoaded 430ms, first contentful paint 150ms');
  });

  it('leaves timings out when navigation fails', async () => {
    const driver = new FakeDriver([], { metrics: timings, navigateError: new Error('net::ERR_FAILED') });
    const result = await executorFor(driver).run(scenario('Offline', ['click submit button']), PAGE_URL);
    expect(result.metrics).toBeUndefined();
    expect(driver.scripts).toEqual([]);
  });

  it('leaves timings out when the page reports none', async () => {
    const driver = new FakeDriver(loginPage(), { metrics: { pageLoadMs: 'slow' } });
    const result = await executorFor(driver).run(scenario('No timing', ['click submit button']), PAGE_URL);
    expect(result.metrics).toBeUndefined();
    expect(scenarioStatus(result)).toBe('passed');
  });

  it('warns and carries on when the timing script throws', async () => {
    const lines: string[] = [];
    const driver = new FakeDriver(loginPage(), { metrics: timings });
    vi.spyOn(driver, 'evaluateScript').mockRejectedValueOnce(new Error('context destroyed'));
    const result = await executorFor(driver, {
      logger: createLogger({ write: (l) => lines.push(l) }),
    }).run(scenario('Flaky timing', ['click submit button']), PAGE_URL);

    expect(result.metrics).toBeUndefined();
    expect(scenarioStatus(result)).toBe('passed');
    expect(lines).toContain('⚠️  Could not read page metrics: context destroyed');
  });

  it('logs the address the page opened at', async () => {
    const lines: string[] = [];
    const driver = new FakeDriver(loginPage());
    await executorFor(driver, { logger: createLogger({ write: (l) => lines.push(l) }) }).run(
      scenario('Direct', ['click submit button']),
      PAGE_URL,
    );
    expect(lines).toContain(`   Opened ${PAGE_URL}`);
  });

  it('notes a redirect in the navigation log', async () => {
    const lines: string[] = [];
    const driver = new FakeDriver(loginPage(), { redirectTo: 'https://shop.test/sso' });
    await executorFor(driver, { logger: createLogger({ write: (l) => lines.push(l) }) }).run(
      scenario('Redirected', ['click submit button']),
      PAGE_URL,
    );
    expect(lines).toContain(`   Opened https://shop.test/sso (redirected from ${PAGE_URL})`);
  });
});
