/**
 * CLI output helpers.
 *
 * Results go to stdout, diagnostics to stderr, always through
 * process.stdout/stderr.write so tests can capture them. Plain text only.
 */
export const output = {
  /** Write a line to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a diagnostic line to stderr, unprefixed. */
  log(message: string): void {
    process.stderr.write(message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a warning message to stderr, prefixed with "Warning:". */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /** Write a value to stdout as indented JSON. */
  json(value: unknown): void {
    process.stdout.write(JSON.stringify(value, null, 2) + '\n')
  },

  /** Write rows as aligned columns, keyed by the first row's fields. */
  table(rows: Record<string, string>[]): void {
    const first = rows[0]
    if (!first) return
    const columns = Object.keys(first)
    const widths = columns.map((column) =>
      Math.max(column.length, ...rows.map((row) => (row[column] ?? '').length)),
    )
    const line = (cells: string[]) =>
      cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd() + '\n'

    process.stdout.write(line(columns))
    process.stdout.write(line(widths.map((w) => '-'.repeat(w))))
    for (const row of rows) {
      process.stdout.write(line(columns.map((column) => row[column] ?? '')))
    }
  },
}
