import type {
  ActionKind,
  ParseResult,
  ParseWarning,
  Step,
  StepAutomation,
  StepSpecMap,
} from '../schema/index.js';
import { DEFAULT_STEP_TIMEOUT_SECONDS } from '../schema/index.js';
import { normalizeTarget, stripQuotes } from '../utils/text.js';

// ── Public types ─────────────────────────────────────────────

export interface ParseOptions {
  /** Timeout for steps that name none. */
  defaultTimeoutSeconds?: number | undefined;
}

/** What a grammar rule recognized, before normalization. */
interface Draft {
  action: ActionKind;
  target: string;
  value?: string | undefined;
  timeoutSeconds?: number | undefined;
}

type Rule = (text: string) => Draft | null;

// ── Patterns ─────────────────────────────────────────────────
// Matched case-insensitively against the trimmed raw text so that
// captured values keep the author's casing.

const QUOTED_OR_BARE = String.raw`(?:"([^"]*)"|'([^']*)'|(.+?))`;

const SCROLL_END =
  /^scroll\s+(?:down\s+)?(?:(?:to|till|until)\s+)?(?:the\s+)?(?:bottom|end)\b/i;
const SCROLL_TOP =
  /^scroll\s+(?:up\s+)?(?:(?:to|till|until)\s+)?(?:the\s+)?top\b/i;
const SCROLL_DIRECTION =
  /^scroll\s+(up|down|left|right)(?:\s+(?:by\s+)?(\d+)(?:\s*(?:px|pixels?))?)?\s*$/i;
const SCROLL_ELEMENT =
  /^scroll\s+(?:(?:up|down)\s+)?(?:to|into\s+view(?:\s+of)?)\s+(.+)$/i;

const CLICK = /^click(?:\s+on)?\s+(.+)$/i;
const TYPE = new RegExp(String.raw`^(?:type|enter)\s+${QUOTED_OR_BARE}\s+into\s+(.+)$`, 'i');
const SELECT = new RegExp(String.raw`^select\s+${QUOTED_OR_BARE}\s+from\s+(.+)$`, 'i');

const VERIFY_PREFIX = /^(?:verify|check)(?:\s+that)?\s+(.+)$/i;
const VERIFY_VISIBLE = /^(.+?)\s+(?:appears?|is\s+visible|is\s+displayed)\b/i;
const VERIFY_CONTAINS = /^(.+?)\s+(?:contains|shows)\s+(.+)$/i;

const WAIT = /^wait\b/i;
const WAIT_SECONDS = /(?:for\s+)?(\d+)\s*(?:seconds?|secs?)\b/i;

const HOVER = /^(?:hover(?:\s+over)?|move\s+to)\s+(.+)$/i;
const ASSERT = /^(?:assert|expect)(?:\s+that)?\s+(.+?)\s+contains\s+(.+)$/i;

// ── Rules (priority order) ───────────────────────────────────
// Order matters: some recognizers are textual substrings of others.

function quotedValue(match: RegExpExecArray): string {
  return match[1] ?? match[2] ?? match[3] ?? '';
}

const parseScroll: Rule = (text) => {
  if (SCROLL_END.test(text)) return { action: 'scroll', target: 'down till end' };
  if (SCROLL_TOP.test(text)) return { action: 'scroll', target: 'up till top' };

  const direction = SCROLL_DIRECTION.exec(text);
  if (direction?.[1]) {
    return { action: 'scroll', target: direction[1], value: direction[2] };
  }

  const element = SCROLL_ELEMENT.exec(text);
  if (element?.[1]) return { action: 'scroll', target: element[1] };

  return null;
};

const parseClick: Rule = (text) => {
  const match = CLICK.exec(text);
  return match?.[1] ? { action: 'click', target: match[1] } : null;
};

const parseType: Rule = (text) => {
  const match = TYPE.exec(text);
  if (!match?.[4]) return null;
  return { action: 'type', target: match[4], value: stripQuotes(quotedValue(match)) };
};

const parseSelect: Rule = (text) => {
  const match = SELECT.exec(text);
  if (!match?.[4]) return null;
  return { action: 'select', target: match[4], value: stripQuotes(quotedValue(match)) };
};

const parseVerify: Rule = (text) => {
  const body = VERIFY_PREFIX.exec(text)?.[1];
  if (!body) return null;

  const visible = VERIFY_VISIBLE.exec(body);
  if (visible?.[1]) return { action: 'verify', target: visible[1] };

  const contains = VERIFY_CONTAINS.exec(body);
  if (contains?.[1] && contains[2]) {
    return { action: 'verify', target: contains[1], value: stripQuotes(contains[2]) };
  }

  return null;
};

const parseWait: Rule = (text) => {
  if (!WAIT.test(text)) return null;

  const seconds = WAIT_SECONDS.exec(text)?.[1];
  const lowered = text.toLowerCase();

  let target = 'page';
  const marker = lowered.includes(' for the ') ? ' for the ' : lowered.includes(' the ') ? ' the ' : null;
  if (marker) {
    const after = text.slice(lowered.indexOf(marker) + marker.length);
    const cut = after.toLowerCase().indexOf(' for ');
    target = cut === -1 ? after : after.slice(0, cut);
  }
  if (/^page\b/i.test(target.trim())) target = 'page';

  return {
    action: 'wait',
    target,
    timeoutSeconds: seconds !== undefined ? Number(seconds) : undefined,
  };
};

const parseHover: Rule = (text) => {
  const match = HOVER.exec(text);
  return match?.[1] ? { action: 'hover', target: match[1] } : null;
};

const parseAssert: Rule = (text) => {
  const match = ASSERT.exec(text);
  if (!match?.[1] || !match[2]) return null;
  return { action: 'assert', target: match[1], value: stripQuotes(match[2]) };
};

const RULES: readonly Rule[] = [
  parseScroll,
  parseClick,
  parseType,
  parseSelect,
  parseVerify,
  parseWait,
  parseHover,
  parseAssert,
];

// ── Structured map form ──────────────────────────────────────

const ACTION_ALIASES: Readonly<Record<string, ActionKind>> = {
  click: 'click',
  type: 'type',
  enter: 'type',
  select: 'select',
  verify: 'verify',
  check: 'verify',
  wait: 'wait',
  scroll: 'scroll',
  hover: 'hover',
  move: 'hover',
  assert: 'assert',
  expect: 'assert',
};

function parseMap(spec: StepSpecMap, defaultTimeout: number): ParseResult {
  const rawText = spec.description?.trim() || `${spec.action} ${spec.target ?? ''}`.trim();
  const action = ACTION_ALIASES[spec.action.trim().toLowerCase()];
  if (!action) {
    return warning(rawText, `unknown action "${spec.action}"`);
  }

  let target = normalizeTarget(spec.target ?? '');
  if (action === 'verify') target = target.replace(/\s+appears?$/, '');
  if (!target && action === 'wait') target = 'page';
  if (!target) {
    return warning(rawText, `${action} step has no target`);
  }

  const value = spec.value;
  const needsValue = action === 'type' || action === 'select' || action === 'assert';
  if (value === '' || (needsValue && value === undefined)) {
    return warning(rawText, `${action} step has no value`);
  }

  const step: Step = {
    rawText,
    action,
    target,
    timeoutSeconds: spec.timeout ?? defaultTimeout,
    ...(value !== undefined ? { value } : {}),
    ...(spec.human_instruction !== undefined ? { humanInstruction: spec.human_instruction } : {}),
    ...(spec.automation !== undefined ? { automation: toAutomation(spec.automation) } : {}),
  };

  return { ok: true, step: Object.freeze(step) };
}

function toAutomation(spec: NonNullable<StepSpecMap['automation']>): StepAutomation {
  const selector = spec.selector?.trim();
  return {
    assertions: spec.assertions ?? [],
    ...(selector ? { selector } : {}),
    ...(spec.wait_for !== undefined ? { waitFor: spec.wait_for } : {}),
    ...(spec.timeout !== undefined ? { timeoutSeconds: spec.timeout } : {}),
  };
}

// ── Public API ───────────────────────────────────────────────

/**
 * Compile one raw step into a typed Step.
 *
 * Never throws for unrecognized input: the caller receives a
 * ParseWarning instead and decides how to surface it.
 */
export function parseStep(raw: string | StepSpecMap, options: ParseOptions = {}): ParseResult {
  const defaultTimeout = options.defaultTimeoutSeconds ?? DEFAULT_STEP_TIMEOUT_SECONDS;

  if (typeof raw !== 'string') return parseMap(raw, defaultTimeout);

  const text = raw.trim();
  if (!text) return warning(raw, 'empty step');

  for (const rule of RULES) {
    const draft = rule(text);
    if (!draft) continue;

    const target = normalizeTarget(draft.target);
    if (!target || draft.value === '') continue;

    const step: Step = {
      rawText: text,
      action: draft.action,
      target,
      timeoutSeconds: draft.timeoutSeconds ?? defaultTimeout,
      ...(draft.value !== undefined ? { value: draft.value } : {}),
    };
    return { ok: true, step: Object.freeze(step) };
  }

  return warning(text, 'unrecognized step grammar');
}

function warning(rawText: string, reason: string): { ok: false; warning: ParseWarning } {
  return { ok: false, warning: { rawText, reason } };
}
