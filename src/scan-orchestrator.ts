#!/usr/bin/env node
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { loadScanEnv, type ScanCliOptions } from './config.js';
import { ConfigError, ValidationError } from './errors.js';
import { exportSession } from './export/exporter.js';
import { startScan, type ScanSession } from './scanner/session.js';
import { validate } from './scanner/validator.js';
import { createLogger } from './utils/logger.js';
import type { ScanProgress, ScanState } from './types/scanner.js';

const logger = createLogger({ name: 'scan-orchestrator' });

export class ScanOrchestrator {
  private readonly options: ScanCliOptions;
  private session: ScanSession | null;
  private statsInterval: ReturnType<typeof setInterval> | null;

  constructor(options: ScanCliOptions) {
    this.options = options;
    this.session = null;
    this.statsInterval = null;
  }

  async run(): Promise<{ state: ScanState; progress: ScanProgress }> {
    if (this.session) {
      throw new Error('Scan already started');
    }

    const validation = validate(this.options.scan);
    if (!validation.success) {
      throw validation.error;
    }
    const config = validation.config;

    console.log('\n========================================');
    console.log('   LANSWEEP');
    console.log('========================================');
    console.log(`Range: ${config.startIp} - ${config.endIp}`);
    console.log(`Targets: ${config.targetCount}`);
    console.log(`Threads: ${config.threads} | Timeout: ${config.timeout}s${config.profile ? ` | Profile: ${config.profile}` : ''}`);
    console.log(`Ping: ${config.flags.skipPing ? 'skipped' : 'on'}`);
    for (const warning of config.warnings) {
      console.log(`Warning: ${warning}`);
    }
    console.log('========================================\n');

    const session = startScan(config, {
      logLevel: this.options.logLevel,
      logDir: this.options.logDir ?? undefined,
      retainClosed: this.options.exportAll,
    });
    this.session = session;

    session.onResult((result) => {
      if (result.open) {
        const banner = result.banner ? ` "${result.banner.substring(0, 50)}"` : '';
        console.log(`   ✅ ${result.target.ip}:${result.target.port} ${result.deviceType}${banner}`);
      }
    });

    this.startStatsReporter(session);

    try {
      const progress = await session.done();
      await this.exportResults(session);
      return { state: session.state, progress };
    } finally {
      this.stopStatsReporter();
    }
  }

  // Cancels the sweep; run() resolves once in-flight probes drain
  stop(): void {
    if (!this.session || this.session.isDone()) return;
    logger.info('Cancelling sweep');
    this.session.cancel();
  }

  getStats(): { sessionId: string | null; state: ScanState; progress: ScanProgress | null } {
    return {
      sessionId: this.session?.id ?? null,
      state: this.session?.state ?? 'idle',
      progress: this.session?.progress() ?? null,
    };
  }

  private startStatsReporter(session: ScanSession): void {
    this.statsInterval = setInterval(() => {
      const progress = session.progress();
      const percent = progress.total > 0 ? ((progress.scanned / progress.total) * 100).toFixed(1) : '0.0';
      console.log(
        `   📊 Progress: ${progress.scanned}/${progress.total} (${percent}%) | ` +
          `open: ${progress.open} | ${Math.round(progress.elapsedMs / 1000)}s`
      );
    }, this.options.progressIntervalMs);
  }

  private stopStatsReporter(): void {
    if (this.statsInterval) {
      clearInterval(this.statsInterval);
      this.statsInterval = null;
    }
  }

  private async exportResults(session: ScanSession): Promise<void> {
    const { exportJson, exportCsv, exportAll } = this.options;

    if (exportJson) {
      const count = await exportSession(session, exportJson, 'json', exportAll);
      console.log(`Exported ${count} results to ${exportJson}`);
    }
    if (exportCsv) {
      const count = await exportSession(session, exportCsv, 'csv', exportAll);
      console.log(`Exported ${count} results to ${exportCsv}`);
    }
  }
}

function printSummary(state: ScanState, progress: ScanProgress): void {
  console.log('\n--- Sweep Summary ---');
  console.log(`State: ${state}`);
  console.log(`Scanned: ${progress.scanned}/${progress.total}`);
  console.log(`Open: ${progress.open}`);
  console.log(`ADB: ${progress.found.ADB} | SSH: ${progress.found.SSH} | Telnet: ${progress.found.Telnet} | Other: ${progress.found.Unknown}`);
  console.log(`Duration: ${(progress.elapsedMs / 1000).toFixed(1)}s`);
  console.log('---------------------\n');
}

// CLI entry point
async function main(): Promise<number> {
  const options = loadScanEnv(process.env, process.argv.slice(2));
  const orchestrator = new ScanOrchestrator(options);

  // Handle shutdown signals
  process.once('SIGINT', () => {
    console.log('\nReceived SIGINT, stopping after in-flight probes...');
    orchestrator.stop();
  });

  process.once('SIGTERM', () => {
    console.log('\nReceived SIGTERM, stopping after in-flight probes...');
    orchestrator.stop();
  });

  const { state, progress } = await orchestrator.run();
  printSummary(state, progress);
  return state === 'completed' ? 0 : 130;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      if (error instanceof ValidationError || error instanceof ConfigError) {
        console.error(`❌ ${error.message}`);
        process.exit(2);
      }
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.error('Fatal error:', errorMessage);
      process.exit(1);
    }
  );
}
