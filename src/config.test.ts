import { describe, expect, it } from 'vitest';
import { loadScanEnv } from './config.js';
import { ConfigError } from './errors.js';

function configIssues(env: NodeJS.ProcessEnv): string[] {
  try {
    loadScanEnv(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadScanEnv', () => {
  it('applies defaults around a single start address', () => {
    expect(loadScanEnv({ SCAN_START_IP: '10.0.0.1' })).toEqual({
      scan: {
        startIp: '10.0.0.1',
        endIp: '10.0.0.1',
        ports: undefined,
        threads: undefined,
        timeout: undefined,
        profile: undefined,
        scanAdb: undefined,
        scanSsh: undefined,
        scanTelnet: undefined,
        skipPing: undefined,
        maxTargets: undefined,
      },
      exportJson: null,
      exportCsv: null,
      exportAll: false,
      progressIntervalMs: 2000,
      logLevel: 'info',
      logDir: null,
    });
  });

  it('reads every setting', () => {
    const options = loadScanEnv({
      SCAN_START_IP: '192.168.0.1',
      SCAN_END_IP: '192.168.0.50',
      SCAN_PORTS: '22,5555-5557',
      SCAN_THREADS: '25',
      SCAN_TIMEOUT: '1.5',
      SCAN_PROFILE: 'quick',
      SCAN_ADB: 'no',
      SCAN_SSH: 'true',
      SCAN_TELNET: '0',
      SCAN_SKIP_PING: 'yes',
      SCAN_MAX_TARGETS: '1000',
      SCAN_EXPORT_JSON: 'out/scan.json',
      SCAN_EXPORT_CSV: 'out/scan.csv',
      SCAN_EXPORT_ALL: '1',
      SCAN_PROGRESS_INTERVAL: '500',
      LOG_LEVEL: 'debug',
      SCAN_LOG_DIR: 'logs',
    });

    expect(options).toEqual({
      scan: {
        startIp: '192.168.0.1',
        endIp: '192.168.0.50',
        ports: '22,5555-5557',
        threads: 25,
        timeout: 1.5,
        profile: 'quick',
        scanAdb: false,
        scanSsh: true,
        scanTelnet: false,
        skipPing: true,
        maxTargets: 1000,
      },
      exportJson: 'out/scan.json',
      exportCsv: 'out/scan.csv',
      exportAll: true,
      progressIntervalMs: 500,
      logLevel: 'debug',
      logDir: 'logs',
    });
  });

  it('lets positional arguments override the range', () => {
    const options = loadScanEnv({ SCAN_START_IP: '10.0.0.1', SCAN_END_IP: '10.0.0.9' }, ['192.168.1.1', '192.168.1.20']);
    expect(options.scan.startIp).toBe('192.168.1.1');
    expect(options.scan.endIp).toBe('192.168.1.20');
  });

  it('accepts the start address as the only argument', () => {
    const options = loadScanEnv({}, ['192.168.1.7']);
    expect(options.scan.startIp).toBe('192.168.1.7');
    expect(options.scan.endIp).toBe('192.168.1.7');
  });

  it('requires a start address', () => {
    expect(configIssues({})).toEqual(['SCAN_START_IP: Required']);
  });

  it('rejects unparseable values', () => {
    expect(configIssues({ SCAN_START_IP: '10.0.0.1', SCAN_THREADS: 'many' })).toEqual([
      'SCAN_THREADS: Expected number, received nan',
    ]);
    expect(configIssues({ SCAN_START_IP: '10.0.0.1', SCAN_ADB: 'maybe' })[0]).toMatch(/^SCAN_ADB: /);
    expect(configIssues({ SCAN_START_IP: '10.0.0.1', SCAN_PROGRESS_INTERVAL: '50' })[0]).toMatch(
      /^SCAN_PROGRESS_INTERVAL: /
    );
  });

  it('reports all problems in the error message', () => {
    expect(() => loadScanEnv({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid scan configuration: SCAN_START_IP: Required; LOG_LEVEL: /);
  });
});
