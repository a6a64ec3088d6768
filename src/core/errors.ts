import type { ErrorKind } from '../schema/index.js';

// ── Step-level faults ────────────────────────────────────────

/** Base class for every fault that fails a step or a run. */
export abstract class ScenarioError extends Error {
  abstract readonly kind: ErrorKind;
}

export class ElementNotFoundError extends ScenarioError {
  readonly kind = 'ElementNotFound' as const;
  readonly target: string;
  readonly attempts: number;
  readonly suggestion: string | undefined;

  constructor(target: string, attempts: number, suggestion?: string) {
    const hint = suggestion !== undefined ? ` Suggested selector: ${suggestion}` : '';
    super(`Could not find element: ${target} (${String(attempts)} candidates tried).${hint}`);
    this.name = 'ElementNotFoundError';
    this.target = target;
    this.attempts = attempts;
    this.suggestion = suggestion;
  }
}

/** The element was found but could not be acted on, or the driver failed. */
export class ActionError extends ScenarioError {
  readonly kind = 'ActionError' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ActionError';
  }
}

export class NavigationError extends ScenarioError {
  readonly kind = 'NavigationError' as const;
  readonly url: string;

  constructor(url: string, reason: string, options?: ErrorOptions) {
    super(`Could not open ${url}: ${reason}`, options);
    this.name = 'NavigationError';
    this.url = url;
  }
}

/** A visibility, text-containment or assertion check did not hold. */
export class ValidationError extends ScenarioError {
  readonly kind = 'ValidationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ── Boundary errors (CLI) ────────────────────────────────────

export class ScenarioLoadError extends Error {
  readonly exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = 'ScenarioLoadError';
  }
}

export class ConfigError extends Error {
  readonly exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Classification ───────────────────────────────────────────

/** Map any thrown value onto the step error taxonomy. */
export function toScenarioError(err: unknown): ScenarioError {
  if (err instanceof ScenarioError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ActionError(message, { cause: err });
}
