// Sweep scanner types

export type PortState = 'open' | 'closed' | 'filtered' | 'timeout';

export type DeviceType = 'ADB' | 'SSH' | 'Telnet' | 'Unknown' | 'Unreachable';

export type ScanProfile = 'lightning' | 'quick' | 'balanced' | 'deep' | 'paranoid';

export type ScanState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export type ValidationErrorKind =
  | 'InvalidIP'
  | 'InvalidRange'
  | 'InvalidPort'
  | 'InvalidPortSpec'
  | 'InvalidThreadCount'
  | 'InvalidTimeout'
  | 'UnknownProfile'
  | 'InvalidTargetLimit'
  | 'TargetLimitExceeded';

export type ProbeErrorKind =
  | 'ConnectionRefused'
  | 'ConnectionTimeout'
  | 'HandshakeTimeout'
  | 'UnreachableHost'
  | 'ProbeFault';

export type PortSpec = number | string | readonly number[];

export interface ScanConfig {
  startIp: string;
  endIp: string;
  ports?: PortSpec | undefined;
  threads?: number | undefined;
  /** Seconds */
  timeout?: number | undefined;
  scanAdb?: boolean | undefined;
  scanSsh?: boolean | undefined;
  scanTelnet?: boolean | undefined;
  skipPing?: boolean | undefined;
  profile?: string | undefined;
  maxTargets?: number | undefined;
}

export interface ScanFlags {
  readonly scanAdb: boolean;
  readonly scanSsh: boolean;
  readonly scanTelnet: boolean;
  readonly skipPing: boolean;
}

export type PortSet =
  | { readonly kind: 'range'; readonly start: number; readonly end: number }
  | { readonly kind: 'list'; readonly ports: readonly number[] };

export interface ValidatedConfig {
  readonly startIp: string;
  readonly endIp: string;
  readonly start: number;
  readonly end: number;
  readonly ports: PortSet;
  readonly threads: number;
  readonly timeout: number;
  readonly timeoutMs: number;
  readonly flags: ScanFlags;
  readonly profile: ScanProfile | null;
  readonly maxTargets: number | null;
  readonly targetCount: number;
  readonly warnings: readonly string[];
}

export interface ProfileSettings {
  readonly label: string;
  readonly threads: number;
  /** Seconds */
  readonly timeout: number;
}

export interface Target {
  readonly ip: string;
  readonly port: number;
}

export interface ProbeResult {
  readonly target: Target;
  /** null when the reachability check was skipped or could not run */
  readonly reachable: boolean | null;
  readonly open: boolean;
  readonly deviceType: DeviceType;
  readonly elapsedMs: number;
  readonly banner: string | null;
  readonly error: ProbeErrorKind | null;
}

export interface ScanProgress {
  readonly scanned: number;
  readonly total: number;
  readonly open: number;
  readonly elapsedMs: number;
  readonly found: Readonly<Record<'ADB' | 'SSH' | 'Telnet' | 'Unknown', number>>;
}

export interface PortProbeOutcome {
  state: PortState;
  connectTimeMs: number;
  banner: Buffer | null;
  handshakeTimedOut: boolean;
  error: string | null;
}

export interface TcpScannerOptions {
  timeout?: number | undefined;
  bannerTimeout?: number | undefined;
  maxBannerBytes?: number | undefined;
}

export interface ServiceSignature {
  deviceType: 'ADB' | 'SSH' | 'Telnet';
  patterns: RegExp[];
  /** Replaces `patterns` for binary protocols */
  matchReply?: (reply: Buffer, port: number) => boolean;
  ports: number[];
  versionExtractor?: RegExp;
}

export interface DetectedService {
  port: number;
  deviceType: 'ADB' | 'SSH' | 'Telnet';
  serviceVersion: string | null;
  confidence: number;
}

export interface Prober {
  probe(target: Target, timeoutMs: number, flags: ScanFlags): Promise<ProbeResult>;
}

export interface ResultSink {
  record(result: ProbeResult): void;
}
