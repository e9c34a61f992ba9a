import { performance } from 'perf_hooks';
import type { Logger } from 'winston';
import { createLogger } from '../utils/logger.js';
import { parseIpv4 } from '../utils/ip.js';
import type { ProbeResult, ResultSink, ScanProgress } from '../types/scanner.js';

export type ResultListener = (result: ProbeResult, progress: ScanProgress) => void;

interface RecordedResult {
  sortKey: number;
  result: ProbeResult;
}

type FoundCounts = { ADB: number; SSH: number; Telnet: number; Unknown: number };

export interface AggregatorOptions {
  logger?: Logger | undefined;
  /** Keep closed and unreachable results too; memory then grows with the target count */
  retainClosed?: boolean | undefined;
}

/**
 * Collects probe results for one sweep and keeps the running counters.
 * Every result is counted; only open ones are stored unless `retainClosed`.
 *
 * Every update happens in one synchronous step on the event loop, so a
 * snapshot can never observe a result without its counters (or the reverse)
 * and never waits on a probe.
 */
export class ResultAggregator implements ResultSink {
  private readonly total: number;
  private readonly logger: Logger;
  readonly retainClosed: boolean;
  private readonly recorded: RecordedResult[] = [];
  private readonly listeners = new Set<ResultListener>();
  private readonly found: FoundCounts = { ADB: 0, SSH: 0, Telnet: 0, Unknown: 0 };
  private scannedCount = 0;
  private openCount = 0;
  private startedAt: number | null = null;
  private finishedAt: number | null = null;

  constructor(total: number, options: AggregatorOptions = {}) {
    this.total = total;
    this.logger = options.logger ?? createLogger({ name: 'aggregator' });
    this.retainClosed = options.retainClosed ?? false;
  }

  start(): void {
    if (this.startedAt === null) {
      this.startedAt = performance.now();
    }
  }

  // Freezes elapsed time at the end of the sweep
  finish(): void {
    this.start();
    if (this.finishedAt === null) {
      this.finishedAt = performance.now();
    }
  }

  record(result: ProbeResult): void {
    const frozen: ProbeResult = Object.freeze({ ...result, target: Object.freeze({ ...result.target }) });
    const sortKey = (parseIpv4(frozen.target.ip) ?? 0) * 65536 + frozen.target.port;

    this.scannedCount++;
    if (frozen.open || this.retainClosed) {
      this.recorded.push({ sortKey, result: frozen });
    }
    if (frozen.open) {
      this.openCount++;
      if (frozen.deviceType !== 'Unreachable') {
        this.found[frozen.deviceType]++;
      }
    }

    if (this.listeners.size === 0) return;

    const progress = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(frozen, progress);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error('Result listener failed', { error: errorMessage });
      }
    }
  }

  snapshot(): ScanProgress {
    return {
      scanned: this.scannedCount,
      total: this.total,
      open: this.openCount,
      elapsedMs: this.elapsedMs(),
      found: { ...this.found },
    };
  }

  /** Stored results so far, ordered by IP then port. */
  results(): ProbeResult[] {
    return [...this.recorded]
      .sort((a, b) => a.sortKey - b.sortKey)
      .map((entry) => entry.result);
  }

  openResults(): ProbeResult[] {
    return this.results().filter((result) => result.open);
  }

  subscribe(listener: ResultListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private elapsedMs(): number {
    if (this.startedAt === null) return 0;
    const end = this.finishedAt ?? performance.now();
    return Math.round(end - this.startedAt);
  }
}
