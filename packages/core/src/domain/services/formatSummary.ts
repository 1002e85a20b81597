import type { BatchSummary } from '../model/Batch.js';

const MAX_LISTED_FAILURES = 5;

function percent(part: number, whole: number): string {
  return whole > 0 ? ((part / whole) * 100).toFixed(1) : '0.0';
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

/** Render a batch summary as the plain-text report shown at the end of a run. */
export function formatSummary(summary: BatchSummary): string {
  const lines: string[] = [
    'BATCH SUMMARY',
    `  Batch: ${summary.batchId}`,
    `  Status: ${summary.status} (${summary.stopReason})`,
    '',
    '[TOTALS]',
    `  Items: ${String(summary.total)}`,
    `  Processed: ${String(summary.processed)}`,
    `  Skipped (unchanged): ${String(summary.skipped)}`,
    '',
    '[RESULTS]',
    `  Success: ${String(summary.succeeded)} (${percent(summary.succeeded, summary.processed)}%)`,
    `  Failed: ${String(summary.failed)} (${percent(summary.failed, summary.processed)}%)`,
    '',
    '[PERFORMANCE]',
    `  Elapsed: ${(summary.elapsedMs / 1000).toFixed(1)}s`,
  ];

  if (summary.processed > 0) {
    lines.push(`  Average per item: ${(summary.elapsedMs / 1000 / summary.processed).toFixed(1)}s`);
  }

  lines.push('', '[COST]', `  Total: ${money(summary.cost.total)}`);
  for (const [kind, entry] of Object.entries(summary.cost.entries)) {
    lines.push(`  ${kind}: ${money(entry.cost)} (${String(entry.count)} calls, ${String(entry.units)} units)`);
  }
  if (summary.cost.budgetLimit !== undefined) {
    lines.push(
      `  Budget: ${money(summary.cost.total)} / ${money(summary.cost.budgetLimit)} ` +
        `(${percent(summary.cost.total, summary.cost.budgetLimit)}%)`,
    );
  }

  if (summary.failures.length > 0) {
    lines.push('', '[FAILED]');
    for (const item of summary.failures.slice(0, MAX_LISTED_FAILURES)) {
      lines.push(`  - ${item.identity}: ${(item.error ?? 'unknown error').slice(0, 60)}`);
    }
    if (summary.failures.length > MAX_LISTED_FAILURES) {
      lines.push(`  ... and ${String(summary.failures.length - MAX_LISTED_FAILURES)} more`);
    }
  }

  if (summary.stopReason === 'budget' || summary.stopReason === 'fatal_error') {
    lines.push('', '[STOPPED]', `  Reason: ${summary.stopReason}`);
    if (summary.error !== undefined) lines.push(`  Condition: ${summary.error}`);
    lines.push(`  Resume from: ${summary.checkpointLocation ?? 'no checkpoint written'}`);
  }

  if (summary.logLocations.length > 0 || summary.checkpointLocation !== undefined) {
    lines.push('', '[LOGS]');
    for (const location of summary.logLocations) lines.push(`  ${location}`);
    if (summary.checkpointLocation !== undefined) lines.push(`  Checkpoint: ${summary.checkpointLocation}`);
  }

  return lines.join('\n');
}
