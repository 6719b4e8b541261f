/**
 * Writes summarizer output back into a lorebinder under the reserved
 * "summary" attribute.
 */

import type { Lorebinder, SummaryInput } from '../types.js';
import { SUMMARY_KEY } from '../types.js';
import { getOwn } from '../utils/records.js';

export interface SummaryResult {
  binder: Lorebinder;
  applied: number;
  skipped: SummaryInput[];
}

/**
 * Returns a new binder; the input is not modified. Summaries for names the
 * binder does not contain are returned in `skipped`; blank summaries are
 * ignored without being reported.
 */
export function applySummaries(binder: Lorebinder, summaries: readonly SummaryInput[]): SummaryResult {
  const result: Lorebinder = {};
  for (const [category, names] of Object.entries(binder)) {
    result[category] = { ...names };
  }

  let applied = 0;
  const skipped: SummaryInput[] = [];

  for (const item of summaries) {
    const text = item.summary.trim();
    if (!text) continue;

    const names = getOwn(result, item.category);
    const entry = names === undefined ? undefined : getOwn(names, item.name);
    if (!names || !entry) {
      skipped.push(item);
      continue;
    }
    names[item.name] = { ...entry, [SUMMARY_KEY]: text };
    applied++;
  }

  return { binder: result, applied, skipped };
}
