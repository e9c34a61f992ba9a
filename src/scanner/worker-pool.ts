import type { Logger } from 'winston';
import { ScanFailedError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { ProbeResult, Prober, ResultSink, ScanFlags, ScanState, Target } from '../types/scanner.js';

export interface WorkerPoolOptions {
  threads: number;
  timeoutMs: number;
  flags: ScanFlags;
  prober: Prober;
  logger?: Logger | undefined;
  /** Crashed workers replaced before giving up; defaults to `threads` */
  maxRestarts?: number | undefined;
}

export interface PoolOutcome {
  state: Extract<ScanState, 'completed' | 'cancelled' | 'failed'>;
  dispatched: number;
  /** Targets whose result the sink refused, even as a ProbeFault */
  lost: number;
  error: ScanFailedError | null;
}

export interface WorkerPoolStats {
  state: ScanState;
  activeWorkers: number;
  inFlight: number;
  dispatched: number;
  lost: number;
  restarts: number;
}

function faultResult(target: Target, startTime: number): ProbeResult {
  return {
    target,
    reachable: null,
    open: false,
    deviceType: 'Unknown',
    elapsedMs: Date.now() - startTime,
    banner: null,
    error: 'ProbeFault',
  };
}

/**
 * Fixed-size pool of async workers sharing one target iterator.
 *
 * At most `threads` probes are in flight. Cancellation is cooperative: it is
 * checked before each pull, so probes already started run to their own
 * timeout and the pool settles one probe duration after `cancel()` at worst.
 */
export class WorkerPool {
  private readonly threads: number;
  private readonly timeoutMs: number;
  private readonly flags: ScanFlags;
  private readonly prober: Prober;
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private restartsLeft: number;
  private restarts = 0;
  private state: ScanState = 'idle';
  private activeWorkers = 0;
  private inFlight = 0;
  private dispatched = 0;
  private lost = 0;
  private exhausted = false;
  private nextWorkerId = 1;

  constructor(options: WorkerPoolOptions) {
    this.threads = options.threads;
    this.timeoutMs = options.timeoutMs;
    this.flags = options.flags;
    this.prober = options.prober;
    this.logger = options.logger ?? createLogger({ name: 'worker-pool' });
    this.restartsLeft = options.maxRestarts ?? options.threads;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  getState(): ScanState {
    return this.state;
  }

  start(targets: Iterable<Target>, sink: ResultSink, total: number): Promise<PoolOutcome> {
    if (this.state !== 'idle') {
      return Promise.reject(new Error(`Worker pool cannot start from state ${this.state}`));
    }
    this.state = 'running';

    const iterator = targets[Symbol.iterator]();
    const workerCount = Math.max(1, Math.min(this.threads, total));

    this.logger.info(`Starting ${workerCount} workers for ${total} targets`);

    return new Promise((resolve) => {
      const settle = (): void => {
        if (this.activeWorkers > 0) return;

        const outcome = this.buildOutcome(total);
        this.state = outcome.state;
        this.logger.info(`Worker pool ${outcome.state}`, { dispatched: outcome.dispatched, lost: outcome.lost });
        resolve(outcome);
      };

      const spawn = (): void => {
        const workerId = `worker-${this.nextWorkerId++}`;
        this.activeWorkers++;

        this.runWorker(workerId, iterator, sink).then(
          () => {
            this.activeWorkers--;
            settle();
          },
          (error: unknown) => {
            const errorMessage = error instanceof Error ? error.message : 'Unknown error';
            this.logger.error('Worker crashed', { workerId, error: errorMessage });

            if (this.restartsLeft > 0 && !this.exhausted && !this.signal.aborted) {
              this.restartsLeft--;
              this.restarts++;
              spawn();
            }
            this.activeWorkers--;
            settle();
          }
        );
      };

      for (let i = 0; i < workerCount; i++) {
        spawn();
      }
    });
  }

  /** Stops dispatching; idempotent. */
  cancel(): void {
    if (this.signal.aborted) return;
    this.controller.abort();
    if (this.state === 'running') {
      this.logger.info('Cancellation requested, draining in-flight probes', { inFlight: this.inFlight });
    }
  }

  getStats(): WorkerPoolStats {
    return {
      state: this.state,
      activeWorkers: this.activeWorkers,
      inFlight: this.inFlight,
      dispatched: this.dispatched,
      lost: this.lost,
      restarts: this.restarts,
    };
  }

  private async runWorker(workerId: string, iterator: Iterator<Target>, sink: ResultSink): Promise<void> {
    this.logger.debug('Worker started', { workerId });

    while (!this.signal.aborted) {
      const next = iterator.next();
      if (next.done) {
        this.exhausted = true;
        break;
      }

      const startTime = Date.now();
      const result = await this.dispatch(workerId, next.value);
      this.recordOrFault(workerId, sink, result, startTime);
    }

    this.logger.debug('Worker stopped', { workerId });
  }

  // A sink failure still crashes the worker, but the target is marked first
  private recordOrFault(workerId: string, sink: ResultSink, result: ProbeResult, startTime: number): void {
    try {
      sink.record(result);
    } catch (error) {
      try {
        sink.record(faultResult(result.target, startTime));
      } catch (faultError) {
        this.lost++;
        const errorMessage = faultError instanceof Error ? faultError.message : 'Unknown error';
        this.logger.error('Result lost', {
          workerId,
          target: `${result.target.ip}:${result.target.port}`,
          error: errorMessage,
        });
      }
      throw error;
    }
  }

  private async dispatch(workerId: string, target: Target): Promise<ProbeResult> {
    this.dispatched++;
    this.inFlight++;
    const startTime = Date.now();

    try {
      return await this.prober.probe(target, this.timeoutMs, this.flags);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Probe failed unexpectedly', {
        workerId,
        target: `${target.ip}:${target.port}`,
        error: errorMessage,
      });
      return faultResult(target, startTime);
    } finally {
      this.inFlight--;
    }
  }

  private buildOutcome(total: number): PoolOutcome {
    if (this.exhausted) {
      return { state: 'completed', dispatched: this.dispatched, lost: this.lost, error: null };
    }
    if (this.signal.aborted) {
      return { state: 'cancelled', dispatched: this.dispatched, lost: this.lost, error: null };
    }
    return {
      state: 'failed',
      dispatched: this.dispatched,
      lost: this.lost,
      error: new ScanFailedError(
        `All workers stopped after ${this.dispatched} of ${total} targets`,
        this.dispatched,
        total
      ),
    };
  }
}
