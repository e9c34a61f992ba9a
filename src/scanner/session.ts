import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import { ResultAggregator, type ResultListener } from './aggregator.js';
import { ProbeExecutor } from './probe-executor.js';
import { TargetGenerator } from './target-generator.js';
import { WorkerPool, type PoolOutcome } from './worker-pool.js';
import { ScanFailedError } from '../errors.js';
import { createSessionLogger } from '../utils/logger.js';
import type { ProbeResult, Prober, ScanProgress, ScanState, ValidatedConfig } from '../types/scanner.js';

export interface StartScanOptions {
  prober?: Prober | undefined;
  logger?: Logger | undefined;
  sessionId?: string | undefined;
  logLevel?: string | undefined;
  /** Adds a per-session log file under this directory */
  logDir?: string | undefined;
  /** Store closed and unreachable results as well as open ones */
  retainClosed?: boolean | undefined;
}

/**
 * One sweep over a validated configuration. Created by `startScan`, live until
 * the targets run out or `cancel()` has drained, and never restarted.
 *
 * After `cancel()`, `isDone()` turns true once the probes already in flight
 * have finished, at worst one probe timeout (ping, connect and handshake
 * steps) later. A logger the session built itself is closed at that point.
 */
export class ScanSession {
  readonly id: string;
  readonly config: ValidatedConfig;
  private readonly aggregator: ResultAggregator;
  private readonly pool: WorkerPool;
  private readonly logger: Logger;
  private readonly completion: Promise<PoolOutcome>;
  private outcome: PoolOutcome | null = null;

  constructor(config: ValidatedConfig, options: StartScanOptions = {}) {
    this.id = options.sessionId ?? randomUUID().slice(0, 8);
    this.config = config;
    const ownsLogger = options.logger === undefined;
    this.logger =
      options.logger ?? createSessionLogger(this.id, { level: options.logLevel, logDir: options.logDir });

    const generator = new TargetGenerator(config);
    this.aggregator = new ResultAggregator(generator.size, {
      logger: this.logger,
      retainClosed: options.retainClosed,
    });
    this.pool = new WorkerPool({
      threads: config.threads,
      timeoutMs: config.timeoutMs,
      flags: config.flags,
      prober: options.prober ?? new ProbeExecutor({ logger: this.logger }),
      logger: this.logger,
    });

    this.aggregator.subscribe((result) => {
      if (result.open) {
        this.logger.info(`Found ${result.deviceType} (${result.elapsedMs}ms)`, {
          target: `${result.target.ip}:${result.target.port}`,
        });
      }
    });

    this.logger.info(
      `Sweep ${config.startIp}-${config.endIp}: ${generator.size} targets, ` +
        `${config.threads} threads, ${config.timeout}s timeout`
    );

    this.aggregator.start();
    this.completion = this.pool.start(generator, this.aggregator, generator.size).then((outcome) => {
      this.aggregator.finish();
      this.outcome = outcome;

      const progress = this.aggregator.snapshot();
      this.logger.info(
        `Sweep ${outcome.state}: ${progress.open} open of ${progress.scanned}/${progress.total} ` +
          `in ${Math.round(progress.elapsedMs / 1000)}s`
      );
      if (ownsLogger) {
        this.logger.close();
      }
      return outcome;
    });
  }

  get state(): ScanState {
    return this.outcome?.state ?? this.pool.getState();
  }

  progress(): ScanProgress {
    return this.aggregator.snapshot();
  }

  get retainsClosed(): boolean {
    return this.aggregator.retainClosed;
  }

  /**
   * Stored results so far, by IP then port; open ports only unless the
   * session was started with `retainClosed`.
   */
  results(): ProbeResult[] {
    return this.aggregator.results();
  }

  openResults(): ProbeResult[] {
    return this.aggregator.openResults();
  }

  onResult(listener: ResultListener): () => void {
    return this.aggregator.subscribe(listener);
  }

  cancel(): void {
    this.pool.cancel();
  }

  isDone(): boolean {
    return this.outcome !== null;
  }

  failure(): ScanFailedError | null {
    return this.outcome?.error ?? null;
  }

  /** Final progress; rejects with ScanFailedError when every worker died. */
  async done(): Promise<ScanProgress> {
    const outcome = await this.completion;
    if (outcome.error) {
      throw outcome.error;
    }
    return this.aggregator.snapshot();
  }
}

export function startScan(config: ValidatedConfig, options: StartScanOptions = {}): ScanSession {
  return new ScanSession(config, options);
}
