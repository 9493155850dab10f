import type { ScreenView, ViewTable } from '../screens/screen-view';

export const MAX_CELL_WIDTH = 60;
export const MAX_TABLE_ROWS = 50;
export const MAX_LOG_LINES = 20;

export function truncateCell(text: string, width = MAX_CELL_WIDTH): string {
  const singleLine = text.replace(/\s*\r?\n\s*/g, ' ');
  return singleLine.length > width ? `${singleLine.slice(0, width - 1)}…` : singleLine;
}

export function formatTable(table: ViewTable, maxRows = MAX_TABLE_ROWS): string[] {
  const lines = [`-- ${table.title} (${table.rows.length}) --`];
  if (table.rows.length === 0) return [...lines, '(none)'];

  const shownRows = table.rows.slice(0, maxRows).map((row) => row.map((cell) => truncateCell(cell)));
  const widths = table.columns.map((column, index) =>
    Math.max(column.length, ...shownRows.map((row) => (row[index] ?? '').length)),
  );
  const formatRow = (cells: string[]) =>
    widths
      .map((width, index) => (cells[index] ?? '').padEnd(width))
      .join('  ')
      .trimEnd();

  lines.push(formatRow(table.columns), widths.map((width) => '-'.repeat(width)).join('  '));
  lines.push(...shownRows.map(formatRow));
  if (table.rows.length > maxRows) {
    lines.push(`... ${table.rows.length - maxRows} more rows, narrow them with site or search`);
  }
  return lines;
}

export function formatProgress({ percent, message }: { percent: number; message: string }): string {
  return `[${String(percent).padStart(3)}%] ${message}`;
}

export function formatScreenView(view: ScreenView): string {
  const lines = [view.title, '='.repeat(view.title.length), ...view.details];

  for (const table of view.tables) {
    lines.push('', ...formatTable(table));
  }

  if (view.log !== undefined) {
    const logLines = view.log.split('\n');
    const tail = logLines.slice(-MAX_LOG_LINES);
    lines.push('', `-- Log${logLines.length > tail.length ? ` (last ${tail.length} lines)` : ''} --`);
    lines.push(...tail);
  }

  if (view.progress) lines.push('', formatProgress(view.progress));

  const commands = view.actions.map(({ command, label, enabled }) =>
    enabled ? `${command} (${label})` : `[${command}]`,
  );
  lines.push('', `Commands: ${[...commands, 'help', 'quit'].join(', ')}`);
  return lines.join('\n');
}
