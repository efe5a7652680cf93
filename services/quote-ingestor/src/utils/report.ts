import type { IngestReport } from '../types/domain.js';

const RULE = '='.repeat(50);
const THIN_RULE = '-'.repeat(50);

export function formatSummary(report: IngestReport): string[] {
  const lines = [RULE, 'Stock Update Summary', RULE];
  for (const o of report.outcomes) {
    lines.push(
      o.status === 'ok'
        ? `${o.ticker}: ${o.inserted} inserted, ${o.skipped} skipped`
        : `${o.ticker}: FAILED after ${o.inserted} inserted, ${o.skipped} skipped (${o.error.message})`,
    );
  }
  const { inserted, skipped, failed } = report.totals;
  lines.push(THIN_RULE, `Total: ${inserted} inserted, ${skipped} skipped, ${failed} failed`, RULE);
  return lines;
}
