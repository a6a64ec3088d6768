// ── Target normalization ────────────────────────────────────

/**
 * Canonical form of a human-named target: trimmed, lowercased,
 * inner whitespace collapsed and a leading "the" dropped.
 */
export function normalizeTarget(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/^the /, '');
}

// ── Quoted values ───────────────────────────────────────────

/** Strip one pair of matching surrounding quotes, keeping case. */
export function stripQuotes(raw: string): string {
  const value = raw.trim();
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

// ── Slugs ───────────────────────────────────────────────────

/** File-system friendly slug used for artifact names. */
export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'scenario';
}
