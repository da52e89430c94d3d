export * from './types.js';
export { parseBenchmarkLine, parseBenchmarkOutput, sampleCount } from './parse.js';
export {
  averageSamples,
  computeDelta,
  compareBenchmarks,
  compareSubBenchmarks,
  parentName,
} from './compare.js';
