/**
 * Core module.
 * Step compilation, element resolution and scenario execution.
 * Talks to the browser only through the BrowserDriver port.
 */

export { parseStep } from './parser.js';
export type { ParseOptions } from './parser.js';
export {
  compileScenario,
  compileScenarioDocument,
  loadScenarioFile,
  loadScenarios,
} from './compiler.js';
export type { CompileOptions } from './compiler.js';
export {
  candidateChain,
  explicitCandidates,
  genericCandidates,
  hintCandidates,
  hintMatches,
  semanticCandidates,
  suggestSelector,
  targetVariants,
} from './strategies.js';
export type { CandidateSources, CandidateTier, SelectorCandidate } from './strategies.js';
export { ElementResolver } from './resolver.js';
export type { Resolution, ResolveOptions, ResolverOptions } from './resolver.js';
export { PAGE_METRICS_SCRIPT, readPageMetrics } from './metrics.js';
export { STEP_HANDLERS, dispatchStep, readScrollHeight, scrollScript } from './dispatch.js';
export type { PageState, StepContext, StepHandler } from './dispatch.js';
export {
  DEFAULT_PAGE_LOAD_TIMEOUT_MS,
  DEFAULT_SCREENSHOT_DIR,
  DEFAULT_SETTLE_DELAY_MS,
  InvalidTransitionError,
  ScenarioExecutor,
} from './executor.js';
export type { ExecutorOptions, ExecutorState, RunOptions } from './executor.js';
export {
  ActionError,
  ConfigError,
  ElementNotFoundError,
  NavigationError,
  ScenarioError,
  ScenarioLoadError,
  ValidationError,
  toScenarioError,
} from './errors.js';
