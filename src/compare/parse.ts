import { isUnit, type BenchmarkSample, type BenchmarkSet, type Unit } from './types.js';

/**
 * Parse a single result line such as
 * `BenchmarkDecode-8   2000   612345 ns/op   85.3 MB/s   4096 B/op   12 allocs/op`.
 * Returns undefined for anything that is not a result line.
 */
export function parseBenchmarkLine(line: string): BenchmarkSample | undefined {
  const fields = line.trim().split(/\s+/);
  if (fields.length < 2 || !fields[0].startsWith('Benchmark')) {
    return undefined;
  }
  if (!/^\d+$/.test(fields[1])) {
    return undefined;
  }

  const measurements: Partial<Record<Unit, number>> = {};
  for (let i = 2; i + 1 < fields.length; i += 2) {
    const value = Number(fields[i]);
    const unit = fields[i + 1];
    if (Number.isNaN(value)) break;
    if (isUnit(unit)) {
      measurements[unit] = value;
    }
  }

  return { name: fields[0], iterations: Number(fields[1]), measurements };
}

/**
 * Collect every result line of a benchmark run. Build output, logs and
 * PASS/ok lines are skipped.
 */
export function parseBenchmarkOutput(text: string): BenchmarkSet {
  const set: BenchmarkSet = new Map();
  for (const line of text.split(/\r?\n/)) {
    const sample = parseBenchmarkLine(line);
    if (!sample) continue;
    const samples = set.get(sample.name);
    if (samples) {
      samples.push(sample);
    } else {
      set.set(sample.name, [sample]);
    }
  }
  return set;
}

/**
 * Number of samples across all names
 */
export function sampleCount(set: BenchmarkSet): number {
  let count = 0;
  for (const samples of set.values()) count += samples.length;
  return count;
}
