import { z } from 'zod';

// ── StructureHint ─────────────────────────────────────────────

export const hintCategorySchema = z.enum(['form-field', 'dynamic-control', 'other']);

export type HintCategory = z.infer<typeof hintCategorySchema>;

export const structureHintSchema = z.object({
  keyword: z.string().min(1),
  selector: z.string().min(1),
  category: hintCategorySchema,
});

export type StructureHint = Readonly<z.infer<typeof structureHintSchema>>;

// ── StructureAnalysis ─────────────────────────────────────────

export const analyzedFormSchema = z.object({
  selector: z.string().min(1),
  inputs: z.record(z.string().min(1)),
});

export type AnalyzedForm = z.infer<typeof analyzedFormSchema>;

export const dynamicContentSchema = z.object({
  infiniteScroll: z.boolean(),
  loadMore: z.boolean(),
  scrollContainer: z.string().min(1).optional(),
  loadMoreSelector: z.string().min(1).optional(),
});

export type DynamicContent = z.infer<typeof dynamicContentSchema>;

export const structureAnalysisSchema = z.object({
  forms: z.array(analyzedFormSchema),
  dynamicContent: dynamicContentSchema,
  suggestedSelectors: z.record(z.string().min(1)),
});

export type StructureAnalysis = z.infer<typeof structureAnalysisSchema>;

export const EMPTY_ANALYSIS: StructureAnalysis = {
  forms: [],
  dynamicContent: { infiniteScroll: false, loadMore: false },
  suggestedSelectors: {},
};

// ── Provider port ─────────────────────────────────────────────

/**
 * Supplies page-structure data gathered before a scenario runs.
 * The executor treats it as advisory: a failing provider only
 * means the run proceeds without hints.
 */
export interface StructureHintProvider {
  analyze(url: string): Promise<StructureAnalysis>;
}

// ── Conversion ────────────────────────────────────────────────

/**
 * Flatten an analysis into keyword-addressed hints.
 * Form inputs come first, then dynamic controls, then generic
 * suggestions, so a form field beats a loose suggestion sharing
 * its keyword. Hints are frozen: they are shared across runs.
 */
export function hintsFromAnalysis(analysis: StructureAnalysis): readonly StructureHint[] {
  const hints: StructureHint[] = [];
  const seen = new Set<string>();

  function add(keyword: string, selector: string, category: HintCategory): void {
    const normalized = keyword.trim().toLowerCase().replace(/[_-]+/g, ' ');
    if (normalized.length === 0) return;
    const key = `${normalized}\u0000${selector}`;
    if (seen.has(key)) return;
    seen.add(key);
    hints.push(Object.freeze({ keyword: normalized, selector, category }));
  }

  for (const form of analysis.forms) {
    for (const [name, selector] of Object.entries(form.inputs)) {
      add(name, selector, 'form-field');
    }
  }

  const dynamic = analysis.dynamicContent;
  if (dynamic.loadMoreSelector) {
    add('load more', dynamic.loadMoreSelector, 'dynamic-control');
  }

  for (const [keyword, selector] of Object.entries(analysis.suggestedSelectors)) {
    add(keyword, selector, 'other');
  }

  return Object.freeze(hints);
}
