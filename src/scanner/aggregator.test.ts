import { performance } from 'perf_hooks';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ResultAggregator } from './aggregator.js';
import type { DeviceType, ProbeResult, ScanProgress } from '../types/scanner.js';

function result(ip: string, port: number, deviceType: DeviceType | null): ProbeResult {
  return {
    target: { ip, port },
    reachable: null,
    open: deviceType !== null,
    deviceType: deviceType ?? 'Unknown',
    elapsedMs: 5,
    banner: null,
    error: deviceType === null ? 'ConnectionRefused' : null,
  };
}

describe('ResultAggregator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('counts results and open ports by device type', () => {
    const aggregator = new ResultAggregator(5);
    aggregator.record(result('10.0.0.2', 22, 'SSH'));
    aggregator.record(result('10.0.0.1', 5555, null));
    aggregator.record(result('10.0.0.1', 22, 'ADB'));
    aggregator.record(result('10.0.0.3', 8080, 'Unknown'));

    const progress = aggregator.snapshot();
    expect(progress.scanned).toBe(4);
    expect(progress.total).toBe(5);
    expect(progress.open).toBe(3);
    expect(progress.found).toEqual({ ADB: 1, SSH: 1, Telnet: 0, Unknown: 1 });
  });

  it('stores only open results by default', () => {
    const aggregator = new ResultAggregator(1000);
    for (let i = 0; i < 1000; i++) {
      aggregator.record(result(`10.0.${Math.floor(i / 256)}.${i % 256}`, 22, i === 500 ? 'SSH' : null));
    }

    expect(aggregator.snapshot()).toMatchObject({ scanned: 1000, total: 1000, open: 1 });
    expect(aggregator.results().map((r) => r.target.ip)).toEqual(['10.0.1.244']);
  });

  it('orders results by IP then port', () => {
    const aggregator = new ResultAggregator(4, { retainClosed: true });
    aggregator.record(result('10.0.0.10', 22, null));
    aggregator.record(result('10.0.0.2', 5555, 'ADB'));
    aggregator.record(result('10.0.0.2', 22, null));
    aggregator.record(result('9.255.255.255', 23, 'Telnet'));

    expect(aggregator.results().map((r) => `${r.target.ip}:${r.target.port}`)).toEqual([
      '9.255.255.255:23',
      '10.0.0.2:22',
      '10.0.0.2:5555',
      '10.0.0.10:22',
    ]);
    expect(aggregator.openResults().map((r) => r.target.ip)).toEqual(['9.255.255.255', '10.0.0.2']);
  });

  it('stores frozen copies', () => {
    const aggregator = new ResultAggregator(1);
    const original = result('10.0.0.1', 22, 'SSH');
    aggregator.record(original);

    const [stored] = aggregator.results();
    expect(stored).toEqual(original);
    expect(stored).not.toBe(original);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.target)).toBe(true);
  });

  it('reports zero elapsed time before the sweep starts', () => {
    expect(new ResultAggregator(3).snapshot().elapsedMs).toBe(0);
  });

  it('freezes elapsed time when the sweep finishes', () => {
    vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1750).mockReturnValue(9000);
    const aggregator = new ResultAggregator(1);

    aggregator.start();
    aggregator.finish();

    expect(aggregator.snapshot().elapsedMs).toBe(750);
    expect(aggregator.snapshot().elapsedMs).toBe(750);
  });

  it('notifies listeners with monotonic progress', () => {
    const aggregator = new ResultAggregator(3);
    const seen: ScanProgress[] = [];
    aggregator.subscribe((_result, progress) => seen.push(progress));

    aggregator.record(result('10.0.0.1', 22, null));
    aggregator.record(result('10.0.0.2', 22, 'SSH'));
    aggregator.record(result('10.0.0.3', 22, null));

    expect(seen.map((p) => [p.scanned, p.open])).toEqual([
      [1, 0],
      [2, 1],
      [3, 1],
    ]);
  });

  it('keeps recording when a listener throws', () => {
    const aggregator = new ResultAggregator(2);
    const calls: string[] = [];
    aggregator.subscribe(() => {
      throw new Error('listener broke');
    });
    const unsubscribe = aggregator.subscribe((r) => calls.push(r.target.ip));

    aggregator.record(result('10.0.0.1', 22, null));
    unsubscribe();
    aggregator.record(result('10.0.0.2', 22, null));

    expect(calls).toEqual(['10.0.0.1']);
    expect(aggregator.snapshot().scanned).toBe(2);
  });
});
