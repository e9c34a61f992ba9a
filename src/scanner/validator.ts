import { ValidationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { parseIpv4 } from '../utils/ip.js';
import { DEFAULT_PROFILE, SCAN_PROFILES, resolveProfile } from './scan-profiles.js';
import { parsePortSpec, portSetSize } from './target-generator.js';
import type { PortSet, ScanConfig, ScanFlags, ScanProfile, ValidatedConfig } from '../types/scanner.js';

export const MIN_THREADS = 1;
export const MAX_THREADS = 200;
export const MIN_TIMEOUT = 0.1;
export const MAX_TIMEOUT = 10.0;

// Ranges wider than a /16 are scanned but flagged
export const LARGE_RANGE_WARNING = 65536;

export const DEFAULT_SERVICE_PORTS = {
  adb: 5555,
  ssh: 22,
  telnet: 23,
} as const;

export type ValidationResult =
  | { success: true; config: ValidatedConfig }
  | { success: false; error: ValidationError };

const logger = createLogger({ name: 'validator' });

function parseIp(value: string, label: string): number {
  const parsed = parseIpv4(value);
  if (parsed === null) {
    throw new ValidationError('InvalidIP', `Invalid ${label} IP address: ${String(value)}`);
  }
  return parsed;
}

export function validateThreads(threads: number): { threads: number; warning: string | null } {
  if (!Number.isInteger(threads) || threads < MIN_THREADS) {
    throw new ValidationError(
      'InvalidThreadCount',
      `Invalid thread count ${threads} (expected an integer of at least ${MIN_THREADS})`
    );
  }
  if (threads > MAX_THREADS) {
    return {
      threads: MAX_THREADS,
      warning: `Thread count ${threads} capped at ${MAX_THREADS}`,
    };
  }
  return { threads, warning: null };
}

export function validateTimeout(timeout: number): number {
  if (!Number.isFinite(timeout) || timeout < MIN_TIMEOUT || timeout > MAX_TIMEOUT) {
    throw new ValidationError(
      'InvalidTimeout',
      `Invalid timeout ${timeout}s (expected ${MIN_TIMEOUT}-${MAX_TIMEOUT})`
    );
  }
  return timeout;
}

function resolveFlags(config: ScanConfig): ScanFlags {
  return {
    scanAdb: config.scanAdb ?? true,
    scanSsh: config.scanSsh ?? true,
    scanTelnet: config.scanTelnet ?? true,
    skipPing: config.skipPing ?? false,
  };
}

function resolvePorts(config: ScanConfig, flags: ScanFlags): PortSet {
  if (config.ports !== undefined) {
    return parsePortSpec(config.ports);
  }

  const ports: number[] = [];
  if (flags.scanAdb) ports.push(DEFAULT_SERVICE_PORTS.adb);
  if (flags.scanSsh) ports.push(DEFAULT_SERVICE_PORTS.ssh);
  if (flags.scanTelnet) ports.push(DEFAULT_SERVICE_PORTS.telnet);

  if (ports.length === 0) {
    throw new ValidationError('InvalidPortSpec', 'No ports given and every service scan is disabled');
  }
  return { kind: 'list', ports };
}

function resolveTargetLimit(maxTargets: number | undefined, targetCount: number): number | null {
  if (maxTargets === undefined) return null;

  if (!Number.isInteger(maxTargets) || maxTargets < 1) {
    throw new ValidationError('InvalidTargetLimit', `Invalid target limit ${maxTargets}`);
  }
  if (targetCount > maxTargets) {
    throw new ValidationError(
      'TargetLimitExceeded',
      `Scan covers ${targetCount} targets, above the limit of ${maxTargets}`
    );
  }
  return maxTargets;
}

function buildValidatedConfig(config: ScanConfig): ValidatedConfig {
  const warnings: string[] = [];

  const start = parseIp(config.startIp, 'start');
  const end = parseIp(config.endIp, 'end');
  if (start > end) {
    throw new ValidationError(
      'InvalidRange',
      `Start IP ${config.startIp} is greater than end IP ${config.endIp}`
    );
  }

  const addressCount = end - start + 1;
  if (addressCount > LARGE_RANGE_WARNING) {
    warnings.push(`Range ${config.startIp}-${config.endIp} covers ${addressCount} addresses`);
  }

  const flags = resolveFlags(config);
  const ports = resolvePorts(config, flags);

  // A profile only fills values left out; both still face the bounds below
  let profile: ScanProfile | null = null;
  let rawThreads = config.threads;
  let rawTimeout = config.timeout;
  if (config.profile !== undefined) {
    const resolved = resolveProfile(config.profile);
    profile = resolved.profile;
    rawThreads = config.threads ?? resolved.threads;
    rawTimeout = config.timeout ?? resolved.timeout;
  }

  const threadCheck = validateThreads(rawThreads ?? SCAN_PROFILES[DEFAULT_PROFILE].threads);
  if (threadCheck.warning) {
    warnings.push(threadCheck.warning);
  }
  const timeout = validateTimeout(rawTimeout ?? SCAN_PROFILES[DEFAULT_PROFILE].timeout);

  const targetCount = addressCount * portSetSize(ports);
  const maxTargets = resolveTargetLimit(config.maxTargets, targetCount);

  for (const warning of warnings) {
    logger.warn(warning);
  }

  return Object.freeze({
    startIp: config.startIp.trim(),
    endIp: config.endIp.trim(),
    start,
    end,
    ports,
    threads: threadCheck.threads,
    timeout,
    timeoutMs: Math.round(timeout * 1000),
    flags: Object.freeze(flags),
    profile,
    maxTargets,
    targetCount,
    warnings: Object.freeze(warnings),
  });
}

/**
 * Check a raw scan configuration before any work is scheduled.
 *
 * Never throws for bad input: every rejection comes back as a
 * `ValidationError` carrying its `kind`. The only side effect is the
 * warning logged when the thread count is capped or the range is very wide.
 */
export function validate(config: ScanConfig): ValidationResult {
  try {
    return { success: true, config: buildValidatedConfig(config) };
  } catch (error) {
    if (error instanceof ValidationError) {
      return { success: false, error };
    }
    throw error;
  }
}
