import type { IngestionSummary } from '@clientledger/ingestion';
import type { RouterStats } from '@clientledger/ledger';

/**
 * Source path does not exist or is not a regular file
 */
export class SourceNotFoundError extends Error {
  constructor(public readonly source: string) {
    super(`Source file not found: ${source}`);
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Human-readable run summary for stderr. Rejection codes are listed
 * alphabetically, one per line.
 */
export function formatRunSummary(summary: IngestionSummary, stats: RouterStats): string {
  const lines = [
    `Processed ${summary.rows} rows: ${summary.accepted} accepted, ${summary.rejected} rejected, ${summary.malformed} malformed`,
  ];

  const codes = Object.entries(stats.rejectedByCode).sort(([a], [b]) => a.localeCompare(b));
  for (const [code, count] of codes) {
    lines.push(`  ${code}: ${count}`);
  }

  return `${lines.join('\n')}\n`;
}
