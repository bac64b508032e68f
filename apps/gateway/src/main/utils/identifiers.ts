/**
 * Name shaping shared by the service directory and the tool registry.
 */

/**
 * Exposed tool name segment: `[A-Za-z0-9_-]` kept, everything else becomes `_`,
 * leading/trailing `_` trimmed. Blank input becomes `tool`.
 */
export function sanitizeName(value: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    return 'tool';
  }
  return trimmed.replace(/[^A-Za-z0-9_-]/gu, '_').replace(/^_+|_+$/g, '');
}

/**
 * Lower-case slug for generated service ids: runs of anything other than
 * `[a-z0-9]` collapse to a single `-`.
 */
export function sanitizeIdentifier(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * First non-empty slug among `candidates` (or `fallback`), suffixed `-2`, `-3`… until unused.
 */
export function generateUniqueId(
  used: ReadonlySet<string>,
  candidates: readonly string[],
  fallback: string
): string {
  const base = candidates.map(sanitizeIdentifier).find((slug) => slug !== '') ?? fallback;
  if (!used.has(base)) {
    return base;
  }
  for (let i = 2; ; i++) {
    const next = `${base}-${i}`;
    if (!used.has(next)) {
      return next;
    }
  }
}

/**
 * Map transport spellings onto the canonical kinds. Unknown values are kept
 * (lower-cased) so validation can reject them by name.
 */
export function normalizeTransport(raw: string | undefined): string {
  const normalized = (raw ?? '').trim().toLowerCase();
  switch (normalized) {
    case '':
    case 'http':
    case 'streamablehttp':
    case 'streamable_http':
    case 'streamable-http':
      return 'streamable_http';
    default:
      return normalized;
  }
}
