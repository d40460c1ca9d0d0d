/**
 * Topic validation + wildcard matching.
 *
 * - dot-separated lowercase segments of a-z, 0-9 and '-'
 * - patterns add '*' (exactly one segment) and '**' (zero or more)
 */

const SEGMENT_RE = /^[a-z0-9-]+$/;

export type TopicValidationResult =
  | { ok: true; segments: string[] }
  | { ok: false; reason: string };

function splitSegments(value: string, allowWildcards: boolean): TopicValidationResult {
  if (value.length === 0) return { ok: false, reason: 'empty' };
  if (value.startsWith('.') || value.endsWith('.')) return { ok: false, reason: 'leading_or_trailing_dot' };

  const segments = value.split('.');
  for (const seg of segments) {
    if (seg.length === 0) return { ok: false, reason: 'empty_segment' };
    if (allowWildcards && (seg === '*' || seg === '**')) continue;
    if (!SEGMENT_RE.test(seg)) return { ok: false, reason: `invalid_segment:${seg}` };
  }
  return { ok: true, segments };
}

export function validateTopicName(topic: string): TopicValidationResult {
  return splitSegments(topic, false);
}

export function validateTopicPattern(pattern: string): TopicValidationResult {
  return splitSegments(pattern, true);
}

export function matchTopicPattern(patternSegments: string[], topic: string): boolean {
  const tv = validateTopicName(topic);
  if (!tv.ok) return false;
  return matchSegments(patternSegments, 0, tv.segments, 0);
}

function matchSegments(pat: string[], pi: number, top: string[], ti: number): boolean {
  if (pi === pat.length) return ti === top.length;

  const p = pat[pi];

  if (p === '**') {
    if (pi === pat.length - 1) return true;
    for (let k = ti; k <= top.length; k++) {
      if (matchSegments(pat, pi + 1, top, k)) return true;
    }
    return false;
  }

  if (ti === top.length) return false;
  if (p !== '*' && p !== top[ti]) return false;
  return matchSegments(pat, pi + 1, top, ti + 1);
}
