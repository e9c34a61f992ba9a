import type { Logger } from 'winston';
import { ReachabilityChecker } from './reachability.js';
import { ServiceDetector, bannerSnippet } from './service-detector.js';
import { TcpScanner } from './tcp-scanner.js';
import { createLogger } from '../utils/logger.js';
import type {
  DeviceType,
  PortProbeOutcome,
  ProbeErrorKind,
  ProbeResult,
  Prober,
  ScanFlags,
  Target,
} from '../types/scanner.js';

export interface ProbeExecutorOptions {
  scanner?: TcpScanner | undefined;
  detector?: ServiceDetector | undefined;
  reachability?: ReachabilityChecker | undefined;
  logger?: Logger | undefined;
}

interface ProbeFields {
  reachable: boolean | null;
  open: boolean;
  deviceType: DeviceType;
  banner: string | null;
  error: ProbeErrorKind | null;
}

function failedConnection(outcome: PortProbeOutcome): { deviceType: DeviceType; error: ProbeErrorKind } {
  switch (outcome.state) {
    case 'timeout':
      return { deviceType: 'Unknown', error: 'ConnectionTimeout' };
    case 'filtered':
      return { deviceType: 'Unreachable', error: 'UnreachableHost' };
    default:
      return { deviceType: 'Unknown', error: 'ConnectionRefused' };
  }
}

/**
 * Probes one (ip, port) target: optional ping, TCP connect, then a short
 * handshake used only to tell ADB, SSH and Telnet apart. Network failures
 * end up in the result; the returned promise does not reject for them.
 */
export class ProbeExecutor implements Prober {
  private readonly scanner: TcpScanner;
  private readonly detector: ServiceDetector;
  private readonly reachability: ReachabilityChecker;
  private readonly logger: Logger;

  constructor(options: ProbeExecutorOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: 'probe' });
    this.scanner = options.scanner ?? new TcpScanner();
    this.detector = options.detector ?? new ServiceDetector();
    this.reachability = options.reachability ?? new ReachabilityChecker({ logger: this.logger });
  }

  async probe(target: Target, timeoutMs: number, flags: ScanFlags): Promise<ProbeResult> {
    const startTime = Date.now();
    const { ip, port } = target;

    let reachable: boolean | null = null;
    if (!flags.skipPing) {
      reachable = await this.reachability.check(ip, timeoutMs);
      if (reachable === false) {
        return this.buildResult(target, startTime, {
          reachable,
          open: false,
          deviceType: 'Unreachable',
          banner: null,
          error: 'UnreachableHost',
        });
      }
    }

    const classify = flags.scanAdb || flags.scanSsh || flags.scanTelnet;
    const outcome = await this.scanner.scanPort(ip, port, {
      timeout: timeoutMs,
      bannerTimeout: timeoutMs,
      readBanner: classify,
      probe: classify ? this.detector.getProbe(port, flags) : null,
      isComplete: (reply) => this.detector.isReplyComplete(reply),
    });

    if (outcome.state !== 'open') {
      const { deviceType, error } = failedConnection(outcome);
      return this.buildResult(target, startTime, { reachable, open: false, deviceType, banner: null, error });
    }

    const detected = this.detector.detect(port, outcome.banner, flags);
    if (detected) {
      this.logger.debug(`${ip}:${port} identified as ${detected.deviceType}`, {
        confidence: detected.confidence,
        version: detected.serviceVersion,
      });
    }

    return this.buildResult(target, startTime, {
      reachable,
      open: true,
      deviceType: detected?.deviceType ?? 'Unknown',
      banner: bannerSnippet(outcome.banner),
      error: outcome.handshakeTimedOut ? 'HandshakeTimeout' : null,
    });
  }

  private buildResult(target: Target, startTime: number, fields: ProbeFields): ProbeResult {
    return {
      target,
      ...fields,
      elapsedMs: Date.now() - startTime,
    };
  }
}
