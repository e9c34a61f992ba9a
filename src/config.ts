import { ConfigError } from './errors.js';
import { ScanEnvSchema, type LogLevel } from './schemas/config.js';
import type { ScanConfig } from './types/scanner.js';

export interface ScanCliOptions {
  scan: ScanConfig;
  exportJson: string | null;
  exportCsv: string | null;
  /** Export every probed target instead of open ports only */
  exportAll: boolean;
  progressIntervalMs: number;
  logLevel: LogLevel;
  logDir: string | null;
}

/**
 * Build the command-line options from the environment. Positional
 * arguments `<start-ip> [end-ip]` take precedence over SCAN_START_IP and
 * SCAN_END_IP; a missing end IP scans the start address alone.
 */
export function loadScanEnv(env: NodeJS.ProcessEnv = process.env, args: string[] = []): ScanCliOptions {
  const [startArg, endArg] = args;
  const parsed = ScanEnvSchema.safeParse({
    ...env,
    ...(startArg !== undefined ? { SCAN_START_IP: startArg } : {}),
    ...(endArg !== undefined ? { SCAN_END_IP: endArg } : {}),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid scan configuration: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  return {
    scan: {
      startIp: data.SCAN_START_IP,
      endIp: data.SCAN_END_IP ?? data.SCAN_START_IP,
      ports: data.SCAN_PORTS,
      threads: data.SCAN_THREADS,
      timeout: data.SCAN_TIMEOUT,
      profile: data.SCAN_PROFILE,
      scanAdb: data.SCAN_ADB,
      scanSsh: data.SCAN_SSH,
      scanTelnet: data.SCAN_TELNET,
      skipPing: data.SCAN_SKIP_PING,
      maxTargets: data.SCAN_MAX_TARGETS,
    },
    exportJson: data.SCAN_EXPORT_JSON ?? null,
    exportCsv: data.SCAN_EXPORT_CSV ?? null,
    exportAll: data.SCAN_EXPORT_ALL,
    progressIntervalMs: data.SCAN_PROGRESS_INTERVAL,
    logLevel: data.LOG_LEVEL,
    logDir: data.SCAN_LOG_DIR ?? null,
  };
}
