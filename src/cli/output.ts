/**
 * @fileoverview Plain-text output helpers for CLI commands (stdout).
 */

export type KeyValueItem = { key: string; value: string | number | boolean | null };

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(h.length, maxRowWidth);
  });

  console.log(headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' | '));
  console.log(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    console.log(row.map((cell, i) => (cell ?? '').padEnd(widths[i] ?? 0)).join(' | '));
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: KeyValueItem[]): void {
  const maxKeyLength = Math.max(0, ...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function printBanner(title: string): void {
  const rule = '='.repeat(60);
  console.log(rule);
  console.log(title);
  console.log(rule);
}
