import type { BrowserDriver, DriverAction, ElementHandle } from '../browser/driver.js';
import type {
  ActionKind,
  AutomationAssertion,
  DynamicContent,
  Step,
  StructureHint,
} from '../schema/index.js';
import type { Logger } from '../utils/logger.js';
import { ActionError, ValidationError } from './errors.js';
import type { ElementResolver } from './resolver.js';

// ── Context ──────────────────────────────────────────────────

/** Mutable page facts carried from step to step within one run. */
export interface PageState {
  /** Document scroll height at the last "new content" check (or at load). */
  lastScrollHeight: number;
}

export interface StepContext<H extends ElementHandle> {
  step: Step;
  driver: BrowserDriver<H>;
  resolver: ElementResolver<H>;
  hints: readonly StructureHint[];
  dynamicContent: DynamicContent | undefined;
  page: PageState;
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
}

export type StepHandler = <H extends ElementHandle>(ctx: StepContext<H>) => Promise<void>;

// ── Shared helpers ───────────────────────────────────────────

function stepTimeoutMs(step: Step): number {
  return (step.automation?.timeoutSeconds ?? step.timeoutSeconds) * 1000;
}

function requireValue(step: Step): string {
  if (step.value === undefined) {
    throw new ActionError(`${step.action} step has no value: ${step.rawText}`);
  }
  return step.value;
}

/** Resolve the step's target, honouring the automation block's selector and wait condition. */
async function resolveTarget<H extends ElementHandle>(
  ctx: StepContext<H>,
  totalTimeoutMs = stepTimeoutMs(ctx.step),
): Promise<H> {
  const { step, driver } = ctx;
  const handle = await ctx.resolver.resolve(step.target, {
    hints: ctx.hints,
    totalTimeoutMs,
    explicitSelector: step.automation?.selector,
  });

  const waitFor = step.automation?.waitFor;
  if (waitFor === 'element_visible' || waitFor === 'element_clickable') {
    if (!(await driver.waitVisible(handle, totalTimeoutMs))) {
      throw new ValidationError(`Element did not become visible: ${step.target}`);
    }
  }
  if (waitFor === 'element_clickable' && !(await driver.isInteractable(handle))) {
    throw new ActionError(`Element is not clickable: ${step.target}`);
  }
  return handle;
}

async function requireInteractable<H extends ElementHandle>(ctx: StepContext<H>, handle: H): Promise<void> {
  const { driver, step } = ctx;
  const visible = await driver.waitVisible(handle, stepTimeoutMs(step));
  if (!visible || !(await driver.isInteractable(handle))) {
    throw new ActionError(`Element is not interactable: ${step.target} (${handle.description})`);
  }
}

async function interact<H extends ElementHandle>(ctx: StepContext<H>, action: DriverAction): Promise<void> {
  const handle = await resolveTarget(ctx);
  await requireInteractable(ctx, handle);
  await ctx.driver.act(handle, action, stepTimeoutMs(ctx.step));
}

async function expectText<H extends ElementHandle>(ctx: StepContext<H>, expected: string): Promise<void> {
  const handle = await resolveTarget(ctx);
  const text = await ctx.driver.textContent(handle);
  if (!text.includes(expected)) {
    throw new ValidationError(
      `Expected ${ctx.step.target} to contain "${expected}" but found "${text.trim()}"`,
    );
  }
}

// ── Page scripts ─────────────────────────────────────────────

export const SCROLL_HEIGHT_SCRIPT = 'document.body.scrollHeight';

export async function readScrollHeight<H extends ElementHandle>(driver: BrowserDriver<H>): Promise<number> {
  const value = await driver.evaluateScript(SCROLL_HEIGHT_SCRIPT);
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

const SCROLL_DIRECTIONS = ['up', 'down', 'left', 'right'] as const;
type ScrollDirection = (typeof SCROLL_DIRECTIONS)[number];

function isScrollDirection(target: string): target is ScrollDirection {
  return SCROLL_DIRECTIONS.some((d) => d === target);
}

/**
 * Script that scrolls the window, or `container` when given, for a
 * page-level scroll target. Returns null when `target` names an element.
 */
export function scrollScript(target: string, value: string | undefined, container?: string): string | null {
  const el = container !== undefined
    ? `document.querySelector(${JSON.stringify(container)})`
    : null;
  const scrollTo = (x: string, y: string): string =>
    el !== null ? `${el}?.scrollTo(${x}, ${y})` : `window.scrollTo(${x}, ${y})`;
  const scrollBy = (x: number, y: number): string =>
    el !== null
      ? `${el}?.scrollBy(${String(x)}, ${String(y)})`
      : `window.scrollBy(${String(x)}, ${String(y)})`;
  const height = el !== null ? `${el}?.scrollHeight ?? 0` : 'document.body.scrollHeight';
  const width = el !== null ? `${el}?.scrollWidth ?? 0` : 'document.body.scrollWidth';

  if (target === 'down till end') return scrollTo('0', height);
  if (target === 'up till top') return scrollTo('0', '0');
  if (!isScrollDirection(target)) return null;

  const pixels = value !== undefined ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(pixels)) {
    switch (target) {
      case 'down':
        return scrollTo('0', height);
      case 'up':
        return scrollTo('0', '0');
      case 'right':
        return scrollTo(width, '0');
      case 'left':
        return scrollTo('0', '0');
    }
  }

  switch (target) {
    case 'down':
      return scrollBy(0, pixels);
    case 'up':
      return scrollBy(0, -pixels);
    case 'right':
      return scrollBy(pixels, 0);
    case 'left':
      return scrollBy(-pixels, 0);
  }
}

// ── Handlers ─────────────────────────────────────────────────

const click: StepHandler = (ctx) => interact(ctx, { kind: 'click' });

const hover: StepHandler = (ctx) => interact(ctx, { kind: 'hover' });

const type: StepHandler = async (ctx) => interact(ctx, { kind: 'fill', text: requireValue(ctx.step) });

const select: StepHandler = async (ctx) => interact(ctx, { kind: 'select', label: requireValue(ctx.step) });

const verify: StepHandler = async (ctx) => {
  const { step, driver } = ctx;

  if (step.target.includes('new content')) {
    const height = await readScrollHeight(driver);
    const previous = ctx.page.lastScrollHeight;
    if (height <= previous) {
      throw new ValidationError(
        `No new content loaded (scroll height ${String(height)}, previously ${String(previous)})`,
      );
    }
    ctx.page.lastScrollHeight = height;
    return;
  }

  if (step.value !== undefined) {
    await expectText(ctx, step.value);
    return;
  }

  const handle = await resolveTarget(ctx);
  if (!(await driver.waitVisible(handle, stepTimeoutMs(step)))) {
    throw new ValidationError(`Element is not visible: ${step.target}`);
  }
};

const assert: StepHandler = async (ctx) => expectText(ctx, requireValue(ctx.step));

const wait: StepHandler = async (ctx) => {
  const { step, driver } = ctx;
  const timeoutMs = step.timeoutSeconds * 1000;

  if (step.target === 'page') {
    await ctx.sleep(timeoutMs);
    return;
  }

  const handle = await resolveTarget(ctx, timeoutMs);
  if (!(await driver.waitVisible(handle, timeoutMs))) {
    throw new ValidationError(
      `${step.target} did not become visible within ${String(step.timeoutSeconds)}s`,
    );
  }
};

const scroll: StepHandler = async (ctx) => {
  const { step, driver } = ctx;
  const script = scrollScript(step.target, step.value, ctx.dynamicContent?.scrollContainer);

  if (script !== null) {
    ctx.logger.debug(`scroll: ${script}`);
    await driver.evaluateScript(script);
    return;
  }

  const handle = await resolveTarget(ctx);
  await driver.act(handle, { kind: 'scroll-into-view' }, stepTimeoutMs(step));
};

/** Exhaustive action table: adding an ActionKind without a handler fails to compile. */
export const STEP_HANDLERS = {
  click,
  type,
  select,
  verify,
  wait,
  scroll,
  hover,
  assert,
} satisfies Record<ActionKind, StepHandler>;

// ── Automation assertions ────────────────────────────────────

async function checkAssertion<H extends ElementHandle>(
  ctx: StepContext<H>,
  assertion: AutomationAssertion,
): Promise<void> {
  const { driver } = ctx;
  const timeoutMs = stepTimeoutMs(ctx.step);
  const query = { kind: 'css', selector: assertion.selector } as const;

  switch (assertion.type) {
    case 'element_visible': {
      const handle = await driver.locate(query, timeoutMs);
      if (handle === null || !(await driver.waitVisible(handle, timeoutMs))) {
        throw new ValidationError(`Assertion failed: ${assertion.selector} is not visible`);
      }
      return;
    }
    case 'text_present': {
      const handle = await driver.locate(query, timeoutMs);
      const text = handle !== null ? await driver.textContent(handle) : '';
      if (handle === null || !text.includes(assertion.text)) {
        throw new ValidationError(
          `Assertion failed: ${assertion.selector} does not contain "${assertion.text}"`,
        );
      }
      return;
    }
    case 'minimum_elements': {
      const found = await driver.count(query);
      if (found < assertion.count) {
        throw new ValidationError(
          `Assertion failed: expected at least ${String(assertion.count)} ${assertion.selector}, found ${String(found)}`,
        );
      }
      return;
    }
  }
}

// ── Entry point ──────────────────────────────────────────────

/** Run one step through its handler, then its automation assertions. */
export async function dispatchStep<H extends ElementHandle>(ctx: StepContext<H>): Promise<void> {
  const handler: StepHandler = STEP_HANDLERS[ctx.step.action];
  await handler(ctx);

  for (const assertion of ctx.step.automation?.assertions ?? []) {
    await checkAssertion(ctx, assertion);
  }
}
