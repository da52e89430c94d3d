/**
 * Measurement units recognised in benchmark output, in report order.
 */
export type Unit = 'ns/op' | 'MB/s' | 'allocs/op' | 'B/op';

export const UNITS: readonly Unit[] = ['ns/op', 'MB/s', 'allocs/op', 'B/op'];

export function isUnit(value: string): value is Unit {
  return UNITS.some((unit) => unit === value);
}

/**
 * One result line of a benchmark run
 */
export interface BenchmarkSample {
  name: string;
  iterations: number;
  measurements: Partial<Record<Unit, number>>;
}

/**
 * Samples keyed by benchmark name, in order of first appearance. A name
 * that ran several times (e.g. -count) keeps every sample.
 */
export type BenchmarkSet = Map<string, BenchmarkSample[]>;

/**
 * Relative change from old to new. Undefined when the old value is zero.
 */
export type Delta = { defined: true; percent: number } | { defined: false };

export interface MetricComparison {
  unit: Unit;
  old: number;
  new: number;
  delta: Delta;
}

export interface BenchmarkMetric {
  name: string;
  /** Sibling that supplied the "old" values when comparing sub-benchmarks */
  baseline?: string;
  comparisons: MetricComparison[];
}

/**
 * A benchmark left out of the comparison. `side` is the run it was found in.
 */
export interface ExcludedBenchmark {
  name: string;
  side: 'old' | 'new';
  reason: string;
}

export type ComparisonMode = 'self-compare' | 'cross-revision';

export interface ComparisonReport {
  label: string;
  mode: ComparisonMode;
  metrics: BenchmarkMetric[];
  excluded: ExcludedBenchmark[];
}
