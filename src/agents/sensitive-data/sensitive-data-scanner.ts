// ============================================================================
// Sensitive Data Scanner - keyword exposure in logged header values and bodies
// ============================================================================

import { round2 } from '../../core/components';
import { KeywordMatchMode, SensitiveDataFinding, TrafficEntry } from '../../types';

type Matcher = (text: string) => boolean;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildMatcher(keyword: string, mode: KeywordMatchMode): Matcher {
  if (mode === 'substring') {
    return (text) => text.includes(keyword);
  }
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword)}($|[^a-z0-9])`);
  return (text) => pattern.test(text);
}

/**
 * Scans every entry for each keyword, case-insensitively, in header values and
 * in the body. An entry counts once per keyword even if the keyword repeats.
 *
 * With zero entries the finding is marked `noData` and the percentage is 0.
 */
export function scanSensitiveData(
  entries: readonly TrafficEntry[],
  keywords: readonly string[],
  mode: KeywordMatchMode = 'substring',
): SensitiveDataFinding {
  const matchers = keywords
    .map((k) => k.trim().toLowerCase())
    .filter((k) => k !== '')
    .map((keyword) => ({ keyword, matches: buildMatcher(keyword, mode), occurrences: 0, inHeaders: 0, inBody: 0 }));

  let matchingEntries = 0;
  let headerMatchEntries = 0;
  let bodyMatchEntries = 0;

  for (const entry of entries) {
    const headerValues = Object.values(entry.headers ?? {})
      .filter((v) => v !== null && v !== undefined)
      .map((v) => String(v).toLowerCase());
    const body = typeof entry.body === 'string' ? entry.body.toLowerCase() : '';

    let entryInHeaders = false;
    let entryInBody = false;

    for (const m of matchers) {
      const inHeaders = headerValues.some((value) => m.matches(value));
      const inBody = body !== '' && m.matches(body);
      if (!inHeaders && !inBody) continue;

      m.occurrences++;
      if (inHeaders) {
        m.inHeaders++;
        entryInHeaders = true;
      }
      if (inBody) {
        m.inBody++;
        entryInBody = true;
      }
    }

    if (entryInHeaders || entryInBody) matchingEntries++;
    if (entryInHeaders) headerMatchEntries++;
    if (entryInBody) bodyMatchEntries++;
  }

  const totalEntries = entries.length;

  return {
    totalEntries,
    matchingEntries,
    matchPercentage: totalEntries === 0 ? 0 : round2((matchingEntries / totalEntries) * 100),
    headerMatchEntries,
    bodyMatchEntries,
    keywords: matchers
      .filter((m) => m.occurrences > 0)
      .map(({ keyword, occurrences, inHeaders, inBody }) => ({ keyword, occurrences, inHeaders, inBody })),
    noData: totalEntries === 0,
  };
}
