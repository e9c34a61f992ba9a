import { execFile } from 'child_process';
import { promisify } from 'util';
import type { Logger } from 'winston';
import { errorCode } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

/** Runs a program from an argument list; rejects on non-zero exit or timeout. */
export type CommandRunner = (file: string, args: string[], options: { timeout: number }) => Promise<unknown>;

export interface ReachabilityOptions {
  runner?: CommandRunner | undefined;
  platform?: NodeJS.Platform | undefined;
  cacheSize?: number | undefined;
  logger?: Logger | undefined;
}

const defaultRunner: CommandRunner = (file, args, options) =>
  execFileAsync(file, args, { timeout: options.timeout, windowsHide: true });

// One echo request, waiting at most timeoutMs for the reply
export function buildPingArgs(ip: string, timeoutMs: number, platform: NodeJS.Platform): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-w', String(timeoutMs), ip];
  }
  if (platform === 'darwin') {
    return ['-c', '1', '-W', String(timeoutMs), ip];
  }
  // Linux ping takes whole seconds; the process timeout enforces the rest
  return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), ip];
}

export class ReachabilityChecker {
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly cacheSize: number;
  private readonly logger: Logger;
  private readonly cache = new Map<string, Promise<boolean | null>>();
  private pingMissing = false;

  constructor(options: ReachabilityOptions = {}) {
    this.runner = options.runner ?? defaultRunner;
    this.platform = options.platform ?? process.platform;
    this.cacheSize = options.cacheSize ?? 256;
    this.logger = options.logger ?? createLogger({ name: 'reachability' });
  }

  /**
   * true when the host answered, false when it did not, null when no ping
   * program is available. Probes of the same IP share one ping.
   */
  check(ip: string, timeoutMs: number): Promise<boolean | null> {
    const cached = this.cache.get(ip);
    if (cached) return cached;

    const pending = this.ping(ip, timeoutMs);
    this.cache.set(ip, pending);

    // Map keeps insertion order; drop the oldest IPs first
    while (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }

    return pending;
  }

  private async ping(ip: string, timeoutMs: number): Promise<boolean | null> {
    if (this.pingMissing) return null;

    try {
      await this.runner('ping', buildPingArgs(ip, timeoutMs, this.platform), { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        if (!this.pingMissing) {
          this.pingMissing = true;
          this.logger.warn('ping is not available, reachability checks disabled');
        }
        return null;
      }
      this.logger.debug(`No echo reply from ${ip}`);
      return false;
    }
  }
}
