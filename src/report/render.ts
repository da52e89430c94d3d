import type { ComparisonReport, Delta, Unit } from '../compare/types.js';

/** Section order and the column label used for each unit */
const SECTIONS: ReadonlyArray<{ unit: Unit; label: string }> = [
  { unit: 'ns/op', label: 'ns/op' },
  { unit: 'MB/s', label: 'MB/s' },
  { unit: 'allocs/op', label: 'allocs' },
  { unit: 'B/op', label: 'bytes' },
];

const COLUMN_GAP = 5;

export function formatDelta(delta: Delta): string {
  if (!delta.defined) return 'n/a';
  const sign = delta.percent >= 0 ? '+' : '';
  return `${sign}${delta.percent.toFixed(2)}%`;
}

export function formatValue(unit: Unit, value: number): string {
  switch (unit) {
    case 'ns/op': {
      const precision = value < 10 ? 2 : value < 100 ? 1 : 0;
      return value.toFixed(precision);
    }
    case 'MB/s':
      return value.toFixed(2);
    case 'allocs/op':
    case 'B/op':
      return String(Math.round(value));
  }
}

function alignColumns(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] + COLUMN_GAP)))
      .join('')
  );
}

/**
 * Plain-text comparison table: one section per unit, sections separated by a blank line.
 */
export function renderPlain(report: ComparisonReport): string {
  const sections: string[] = [];

  for (const { unit, label } of SECTIONS) {
    const rows: string[][] = [];
    for (const metric of report.metrics) {
      const comparison = metric.comparisons.find((c) => c.unit === unit);
      if (!comparison) continue;
      rows.push([
        metric.name,
        formatValue(unit, comparison.old),
        formatValue(unit, comparison.new),
        formatDelta(comparison.delta),
      ]);
    }
    if (rows.length === 0) continue;

    const header = ['benchmark', `old ${label}`, `new ${label}`, 'delta'];
    sections.push(alignColumns([header, ...rows]).join('\n'));
  }

  return sections.join('\n\n') + '\n';
}

/**
 * One line per excluded benchmark; empty when nothing was excluded
 */
export function renderExcluded(report: ComparisonReport): string[] {
  return report.excluded.map((entry) => {
    const where = entry.side === 'old' ? 'target' : 'current';
    return `${entry.name} (${where}): ${entry.reason}`;
  });
}

