const SEPARATOR = '|-|-|-|-|';

/** Header markers emitted by renderPlain, mapped to their column label */
const HEADER_MARKERS: ReadonlyArray<{ marker: string; label: string }> = [
  { marker: 'old ns/op', label: 'ns/op' },
  { marker: 'old MB/s', label: 'MB/s' },
  { marker: 'old allocs', label: 'allocs' },
  { marker: 'old bytes', label: 'bytes' },
];

/**
 * Turn a plain comparison table into a markdown table for PR comments.
 *
 * Header lines become a markdown header plus separator row; every other
 * non-empty line has its whitespace runs replaced by "|". Blank lines are
 * kept so each section stays its own table.
 */
export function toMarkdownTable(plain: string): string {
  const output: string[] = [];

  for (const line of plain.split('\n')) {
    if (line.trim() === '') {
      output.push(line);
      continue;
    }

    const fields = line.trim().split(/\s+/);
    // Result rows start with the benchmark name, whatever else they contain.
    const header = fields[0].startsWith('Benchmark')
      ? undefined
      : HEADER_MARKERS.find(({ marker }) => line.includes(marker));
    if (header) {
      output.push(`| Benchmark | Old ${header.label} | New ${header.label} | Delta |`);
      output.push(SEPARATOR);
      continue;
    }

    output.push(fields.join('|'));
  }

  return output.join('\n');
}
