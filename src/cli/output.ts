/**
 * CLI output helpers. Plain text, no colors; everything goes through
 * process.stdout/stderr.write so tests can capture it.
 */

export type TableRow = Record<string, string>

/** Lay out rows under a header and a dashed rule. Columns come from the first row. */
export function formatTable(rows: TableRow[]): string[] {
  if (rows.length === 0) return []
  const columns = Object.keys(rows[0])
  const widths = columns.map((c) => Math.max(c.length, ...rows.map((row) => (row[c] ?? '').length)))
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ')

  return [
    line(columns),
    line(widths.map((w) => '-'.repeat(w))),
    ...rows.map((row) => line(columns.map((c) => row[c] ?? ''))),
  ]
}

export const output = {
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Prefixed with "OK:" */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** To stderr, prefixed with "Error:" */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** To stderr, prefixed with "Warning:" */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  table(rows: TableRow[]): void {
    for (const line of formatTable(rows)) {
      process.stdout.write(line + '\n')
    }
  },
}
