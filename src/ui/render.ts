import type { Cell, OutputBlock } from './types.js';

const MAX_COLUMN_WIDTH = 60;

function padRight(text: string, width: number): string {
  if (text.length >= width) return text;
  return text + ' '.repeat(width - text.length);
}

export function formatCell(value: Cell): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  if (typeof value === 'number') return Number.isInteger(value) ? String(value) : value.toFixed(4);
  return value;
}

export function renderBlocks(blocks: OutputBlock[]): string {
  const lines: string[] = [];

  for (const block of blocks) {
    if (block.kind === 'error') {
      lines.push(`Error: ${block.message}`);
      continue;
    }

    if (block.title) lines.push(block.title);

    if (block.kind === 'text') {
      lines.push(block.text);
      continue;
    }

    if (block.kind === 'fields') {
      const width = Math.max(0, ...block.fields.map(([label]) => label.length));
      for (const [label, value] of block.fields) {
        lines.push(`  ${padRight(label + ':', width + 1)} ${formatCell(value)}`);
      }
      continue;
    }

    const rows = block.rows.map((row) => row.map(formatCell));
    const widths = block.columns.map((column, index) => {
      const maxCell = Math.max(column.length, ...rows.map((row) => (row[index] ?? '').length));
      return Math.min(maxCell, MAX_COLUMN_WIDTH);
    });

    lines.push(block.columns.map((column, i) => padRight(column, widths[i])).join('  ').trimEnd());
    lines.push(widths.map((w) => '-'.repeat(w)).join('  '));
    for (const row of rows) {
      lines.push(row.map((cell, i) => padRight(cell.slice(0, widths[i]), widths[i])).join('  ').trimEnd());
    }
  }

  return lines.join('\n');
}
