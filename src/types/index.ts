// Scanner types
export type {
  PortState,
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
  ProfileSettings,
  Target,
  ProbeResult,
  ScanProgress,
  PortProbeOutcome,
  TcpScannerOptions,
  ServiceSignature,
  DetectedService,
  Prober,
  ResultSink,
} from './scanner.js';
