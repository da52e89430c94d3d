export {
  ProcessRunner,
  type ExecutionResult,
  type RunOptions,
  type ProcessRunnerOptions,
} from './process.js';
export { BenchmarkExecutor, buildBenchmarkArgs, type BenchmarkSettings } from './benchmark.js';
