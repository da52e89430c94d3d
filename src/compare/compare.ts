import { NoComparableBenchmarksError, NoSubBenchmarksError } from '../utils/errors.js';
import {
  UNITS,
  type BenchmarkMetric,
  type BenchmarkSample,
  type BenchmarkSet,
  type ComparisonReport,
  type Delta,
  type ExcludedBenchmark,
  type MetricComparison,
  type Unit,
} from './types.js';

type Averages = Partial<Record<Unit, number>>;

/**
 * Mean of each unit over the samples that report it
 */
export function averageSamples(samples: BenchmarkSample[]): Averages {
  const averages: Averages = {};
  for (const unit of UNITS) {
    const values = samples
      .map((sample) => sample.measurements[unit])
      .filter((value): value is number => value !== undefined);
    if (values.length > 0) {
      averages[unit] = values.reduce((sum, value) => sum + value, 0) / values.length;
    }
  }
  return averages;
}

export function computeDelta(oldValue: number, newValue: number): Delta {
  if (oldValue === 0) {
    return { defined: false };
  }
  return { defined: true, percent: ((newValue - oldValue) / oldValue) * 100 };
}

function compareAverages(oldValues: Averages, newValues: Averages): MetricComparison[] {
  const comparisons: MetricComparison[] = [];
  for (const unit of UNITS) {
    const oldValue = oldValues[unit];
    const newValue = newValues[unit];
    if (oldValue === undefined || newValue === undefined) continue;
    comparisons.push({ unit, old: oldValue, new: newValue, delta: computeDelta(oldValue, newValue) });
  }
  return comparisons;
}

/**
 * Compare the target run (`oldSet`) with the current run (`newSet`).
 *
 * Names are matched exactly. A name present in only one run, or sharing no
 * unit with its counterpart, is excluded rather than compared against a
 * default. Metrics follow the order of the current run.
 */
export function compareBenchmarks(oldSet: BenchmarkSet, newSet: BenchmarkSet, label: string): ComparisonReport {
  const metrics: BenchmarkMetric[] = [];
  const excluded: ExcludedBenchmark[] = [];

  for (const [name, newSamples] of newSet) {
    const oldSamples = oldSet.get(name);
    if (!oldSamples) {
      excluded.push({ name, side: 'new', reason: 'not present in the target run' });
      continue;
    }
    const comparisons = compareAverages(averageSamples(oldSamples), averageSamples(newSamples));
    if (comparisons.length === 0) {
      excluded.push({ name, side: 'new', reason: 'no unit reported by both runs' });
      continue;
    }
    metrics.push({ name, comparisons });
  }

  for (const name of oldSet.keys()) {
    if (!newSet.has(name)) {
      excluded.push({ name, side: 'old', reason: 'not present in the current run' });
    }
  }

  if (metrics.length === 0) {
    throw new NoComparableBenchmarksError(oldSet.size, newSet.size);
  }

  return { label, mode: 'cross-revision', metrics, excluded };
}

/**
 * Group name of a benchmark: the part before the first "/", without the
 * GOMAXPROCS suffix. `BenchmarkQuery/series=100-8` belongs to `BenchmarkQuery`.
 */
export function parentName(name: string): string {
  const slash = name.indexOf('/');
  const top = slash === -1 ? name : name.slice(0, slash);
  return top.replace(/-\d+$/, '');
}

/**
 * Compare sub-benchmarks of a single run against each other.
 *
 * Within a group the first sub-benchmark is the baseline for its siblings.
 * A group with one name but several samples compares each repeat with the
 * first one, reported as `name#2`, `name#3`, ...
 */
export function compareSubBenchmarks(set: BenchmarkSet, label: string): ComparisonReport {
  const groups = new Map<string, string[]>();
  for (const name of set.keys()) {
    const parent = parentName(name);
    const members = groups.get(parent);
    if (members) {
      members.push(name);
    } else {
      groups.set(parent, [name]);
    }
  }

  const metrics: BenchmarkMetric[] = [];
  const excluded: ExcludedBenchmark[] = [];

  for (const members of groups.values()) {
    const [baseline, ...siblings] = members;
    const baselineSamples = set.get(baseline) ?? [];

    if (siblings.length > 0) {
      const baselineAverages = averageSamples(baselineSamples);
      for (const sibling of siblings) {
        const comparisons = compareAverages(baselineAverages, averageSamples(set.get(sibling) ?? []));
        if (comparisons.length === 0) {
          excluded.push({ name: sibling, side: 'new', reason: `no unit shared with ${baseline}` });
          continue;
        }
        metrics.push({ name: sibling, baseline, comparisons });
      }
      continue;
    }

    if (baselineSamples.length > 1) {
      const [first, ...repeats] = baselineSamples;
      const firstAverages = averageSamples([first]);
      repeats.forEach((sample, index) => {
        const name = `${baseline}#${index + 2}`;
        const comparisons = compareAverages(firstAverages, averageSamples([sample]));
        if (comparisons.length === 0) {
          excluded.push({ name, side: 'new', reason: `no unit shared with ${baseline}` });
          return;
        }
        metrics.push({ name, baseline, comparisons });
      });
      continue;
    }

    excluded.push({ name: baseline, side: 'new', reason: 'no sibling sub-benchmark or repeated sample' });
  }

  if (metrics.length === 0) {
    throw new NoSubBenchmarksError(set.size);
  }

  return { label, mode: 'self-compare', metrics, excluded };
}
