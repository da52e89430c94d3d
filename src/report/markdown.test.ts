import { describe, it } from 'node:test';
import assert from 'node:assert';
import { toMarkdownTable } from './markdown.js';
import { renderPlain } from './render.js';
import type { ComparisonReport } from '../compare/types.js';

describe('toMarkdownTable', () => {
  it('should turn each section into its own table', () => {
    const report: ComparisonReport = {
      label: 'main',
      mode: 'cross-revision',
      metrics: [
        {
          name: 'BenchmarkA-8',
          comparisons: [
            { unit: 'ns/op', old: 1234, new: 1100, delta: { defined: true, percent: -10.858995 } },
            { unit: 'allocs/op', old: 3, new: 2, delta: { defined: true, percent: -33.333333 } },
          ],
        },
        {
          name: 'BenchmarkB-8',
          comparisons: [{ unit: 'ns/op', old: 5.5, new: 55.2, delta: { defined: false } }],
        },
      ],
      excluded: [],
    };

    assert.strictEqual(
      toMarkdownTable(renderPlain(report)),
      [
        '| Benchmark | Old ns/op | New ns/op | Delta |',
        '|-|-|-|-|',
        'BenchmarkA-8|1234|1100|-10.86%',
        'BenchmarkB-8|5.50|55.2|n/a',
        '',
        '| Benchmark | Old allocs | New allocs | Delta |',
        '|-|-|-|-|',
        'BenchmarkA-8|3|2|-33.33%',
        '',
      ].join('\n')
    );
  });

  it('should label the throughput column Delta', () => {
    const plain = 'benchmark     old MB/s     new MB/s     delta\nBenchmarkX    10.00        12.00        +20.00%\n';

    assert.strictEqual(
      toMarkdownTable(plain),
      '| Benchmark | Old MB/s | New MB/s | Delta |\n|-|-|-|-|\nBenchmarkX|10.00|12.00|+20.00%\n'
    );
  });

  it('should replace whitespace runs in data rows with pipes', () => {
    assert.strictEqual(toMarkdownTable('  BenchmarkX-8     12.3\t\t11.0     -10.57%  '), 'BenchmarkX-8|12.3|11.0|-10.57%');
  });

  it('should not mistake a result row mentioning a header marker for a header', () => {
    const plain = 'benchmark  old ns/op  new ns/op  delta\nBenchmarkX-8  1000  12.3 old ns/op  11.0 new ns/op  -10.5%';

    assert.strictEqual(
      toMarkdownTable(plain),
      '| Benchmark | Old ns/op | New ns/op | Delta |\n|-|-|-|-|\nBenchmarkX-8|1000|12.3|old|ns/op|11.0|new|ns/op|-10.5%'
    );
  });

  it('should keep blank lines unchanged', () => {
    assert.strictEqual(toMarkdownTable('\n   \n'), '\n   \n');
  });
});
