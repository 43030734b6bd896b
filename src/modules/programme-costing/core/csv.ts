import { Decimal } from 'decimal.js';

import type { CostLedgerEntry } from './types.js';

export const LEDGER_CSV_HEADER = ['year', 'component', 'module', 'cost'] as const;

export const TOTAL_COMPONENT = 'Total';

export interface FormatLedgerOptions {
  /** Digits after the decimal point (default 2) */
  decimals?: number;
  /** Append a Total row after each year's entries */
  summary?: boolean;
}

/**
 * Quotes a field when it contains a comma, a quote or a line break.
 */
export const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;

const formatRow = (fields: readonly string[]): string => fields.map(escapeCsvField).join(',');

/**
 * Renders the ledger as CSV with `\n` line endings and fixed-point costs.
 * Entries are written in the order given.
 */
export const formatLedgerCsv = (
  entries: readonly CostLedgerEntry[],
  options: FormatLedgerOptions = {}
): string => {
  const decimals = options.decimals ?? 2;
  const rows: string[] = [formatRow(LEDGER_CSV_HEADER)];

  let yearTotal = new Decimal(0);
  entries.forEach((entry, index) => {
    rows.push(
      formatRow([String(entry.year), entry.component, entry.module, entry.cost.toFixed(decimals)])
    );

    if (options.summary === true) {
      yearTotal = yearTotal.plus(entry.cost);
      const next = entries[index + 1];
      if (next?.year !== entry.year) {
        rows.push(formatRow([String(entry.year), TOTAL_COMPONENT, '', yearTotal.toFixed(decimals)]));
        yearTotal = new Decimal(0);
      }
    }
  });

  return `${rows.join('\n')}\n`;
};
