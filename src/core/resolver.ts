import type { BrowserDriver, ElementHandle, SelectorQuery } from '../browser/driver.js';
import { MalformedSelectorError, describeQuery } from '../browser/driver.js';
import type { StructureHint } from '../schema/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { ElementNotFoundError } from './errors.js';
import { candidateChain, suggestSelector } from './strategies.js';
import type { SelectorCandidate } from './strategies.js';

// ── Public types ─────────────────────────────────────────────

export interface ResolveOptions {
  hints?: readonly StructureHint[] | undefined;
  totalTimeoutMs: number;
  explicitSelector?: string | undefined;
}

export interface Resolution<H extends ElementHandle> {
  handle: H;
  candidate: SelectorCandidate;
  /** 1-based position of the winning candidate in the chain. */
  attempts: number;
}

export interface ResolverOptions {
  logger?: Logger | undefined;
  /** Monotonic millisecond clock. */
  now?: (() => number) | undefined;
}

// ── Resolver ─────────────────────────────────────────────────

/**
 * Turns a human-named target into a live element handle by probing
 * candidate selectors tier by tier inside one overall time budget.
 * Every candidate is checked at least once before ElementNotFound.
 */
export class ElementResolver<H extends ElementHandle = ElementHandle> {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly driver: BrowserDriver<H>,
    options: ResolverOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
  }

  async resolve(target: string, options: ResolveOptions): Promise<H> {
    return (await this.resolveDetailed(target, options)).handle;
  }

  async resolveDetailed(target: string, options: ResolveOptions): Promise<Resolution<H>> {
    const hints = options.hints ?? [];
    const candidates = [
      ...candidateChain(target, { hints, explicitSelector: options.explicitSelector }),
    ];
    const deadline = this.now() + options.totalTimeoutMs;
    const skipped = new Set<number>();

    // Presence pass: every tier is checked once, in order, without waiting.
    for (const [i, candidate] of candidates.entries()) {
      const found = await this.attempt(candidate, (query) => this.driver.count(query));
      if (found === 'malformed') {
        skipped.add(i);
        continue;
      }
      if (found === 0) continue;

      const handle = await this.driver.locate(candidate.query, Math.max(1, Math.floor(deadline - this.now())));
      if (handle !== null) return this.found(target, handle, candidate, i + 1);
    }

    // Waiting pass: the remaining budget is split evenly across what is left.
    for (const [i, candidate] of candidates.entries()) {
      if (skipped.has(i)) continue;
      const remaining = Math.floor(deadline - this.now());
      if (remaining <= 0) break;

      const timeoutMs = Math.max(1, Math.floor(remaining / (candidates.length - i)));
      const handle = await this.attempt(candidate, (query) => this.driver.locate(query, timeoutMs));
      if (handle !== null && handle !== 'malformed') {
        return this.found(target, handle, candidate, i + 1);
      }
      this.logger.debug(`miss ${describeQuery(candidate.query)} (${candidate.tier}, ${String(timeoutMs)}ms)`);
    }

    throw new ElementNotFoundError(target, candidates.length, suggestSelector(target, hints));
  }

  /** Run one driver query; a malformed raw-selector guess is reported, not thrown. */
  private async attempt<T>(
    candidate: SelectorCandidate,
    query: (q: SelectorQuery) => Promise<T>,
  ): Promise<T | 'malformed'> {
    try {
      return await query(candidate.query);
    } catch (err) {
      if (candidate.speculative === true && err instanceof MalformedSelectorError) {
        this.logger.debug(`skip ${describeQuery(candidate.query)}: not a valid selector`);
        return 'malformed';
      }
      throw err;
    }
  }

  private found(target: string, handle: H, candidate: SelectorCandidate, position: number): Resolution<H> {
    this.logger.debug(
      `"${target}" → ${describeQuery(candidate.query)} (${candidate.tier}, candidate ${String(position)})`,
    );
    return { handle, candidate, attempts: position };
  }
}
