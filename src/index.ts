// Public API of the sweep engine
export {
  validate,
  startScan,
  ScanSession,
  resolveProfile,
  getAvailableProfiles,
  SCAN_PROFILES,
  parsePortSpec,
  TargetGenerator,
  ProbeExecutor,
  WorkerPool,
  ResultAggregator,
  type ValidationResult,
  type StartScanOptions,
  type AggregatorOptions,
  type ResultListener,
} from './scanner/index.js';
export { ValidationError, ScanFailedError, ConfigError } from './errors.js';
export { toJson, toCsv, toExportRow, exportSession, type ExportFormat } from './export/exporter.js';
export { loadScanEnv, type ScanCliOptions } from './config.js';
export { ScanEnvSchema, ExportRowSchema, ExportDocumentSchema, type ExportRow, type ExportDocument } from './schemas/index.js';
export type {
  DeviceType,
  ScanProfile,
  ScanState,
  ValidationErrorKind,
  ProbeErrorKind,
  PortSpec,
  ScanConfig,
  ScanFlags,
  PortSet,
  ValidatedConfig,
  Target,
  ProbeResult,
  ScanProgress,
  Prober,
  ResultSink,
} from './types/index.js';
