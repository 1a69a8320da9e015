// ═══════════════════════════════════════════════════════════
// TERMSAGE — Response Sanitizer
// Model output → bare command string
// ═══════════════════════════════════════════════════════════

const FENCE = '```';
const FENCE_OPENING = /^```[\w+-]*[ \t]*(?:\r?\n|$)/;

/** Strip one surrounding code fence, with or without a language tag */
function stripFence(text: string): string {
  if (text.length < FENCE.length * 2) return text;
  if (!text.startsWith(FENCE) || !text.endsWith(FENCE)) return text;

  const opening = FENCE_OPENING.exec(text);
  // ```ls -la``` on one line carries no language tag
  const start = opening ? opening[0].length : text.includes('\n') ? -1 : FENCE.length;
  if (start < 0) return text;

  const inner = text.slice(start, text.length - FENCE.length);
  if (inner.includes(FENCE)) return text;
  return inner;
}

/** Strip one pair of `delimiter` when it wraps the whole text and nothing else */
function stripPair(text: string, delimiter: string): string {
  if (text.length < 2) return text;
  if (!text.startsWith(delimiter) || !text.endsWith(delimiter)) return text;

  const inner = text.slice(1, -1);
  if (inner.includes(delimiter)) return text;
  return inner;
}

function sanitizeOnce(text: string): string {
  let result = text.trim();
  result = stripFence(result).trim();
  result = stripPair(result, '`').trim();
  result = stripPair(result, '"');
  result = stripPair(result, "'");
  return result.trim();
}

/**
 * Recover a bare command from raw model output.
 *
 * Each pass trims, then removes at most one wrapping code fence, one
 * wrapping backtick pair and one wrapping quote pair. Passes repeat until
 * the text stops changing, so `sanitize(sanitize(x)) === sanitize(x)`.
 * Interior content is never touched.
 */
export function sanitize(raw: string): string {
  let current = raw;
  for (;;) {
    const next = sanitizeOnce(current);
    if (next === current) return current;
    current = next;
  }
}
