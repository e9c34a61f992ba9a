// Scanner module exports
export { validate, validateThreads, validateTimeout, type ValidationResult } from './validator.js';
export {
  SCAN_PROFILES,
  DEFAULT_PROFILE,
  resolveProfile,
  isValidProfile,
  getAvailableProfiles,
} from './scan-profiles.js';
export { TargetGenerator, parsePortSpec, portSetSize, iteratePorts } from './target-generator.js';
export { ProbeExecutor, type ProbeExecutorOptions } from './probe-executor.js';
export { ReachabilityChecker, buildPingArgs, type CommandRunner } from './reachability.js';
export { TcpScanner, type ScanPortOptions } from './tcp-scanner.js';
export { ServiceDetector, bannerSnippet } from './service-detector.js';
export { WorkerPool, type WorkerPoolOptions, type PoolOutcome } from './worker-pool.js';
export { ResultAggregator, type AggregatorOptions, type ResultListener } from './aggregator.js';
export { ScanSession, startScan, type StartScanOptions } from './session.js';
