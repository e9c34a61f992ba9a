import { describe, expect, it } from 'vitest';
import { ReachabilityChecker, buildPingArgs, type CommandRunner } from './reachability.js';

function recordingRunner(outcome: (ip: string) => Error | null): { runner: CommandRunner; calls: string[][] } {
  const calls: string[][] = [];
  const runner: CommandRunner = async (file, args) => {
    calls.push([file, ...args]);
    const error = outcome(args[args.length - 1] ?? '');
    if (error) {
      throw error;
    }
    return { stdout: '', stderr: '' };
  };
  return { runner, calls };
}

const missingPing = (): Error => Object.assign(new Error('spawn ping ENOENT'), { code: 'ENOENT' });

describe('buildPingArgs', () => {
  it('sends a single echo request with the platform timeout flag', () => {
    expect(buildPingArgs('10.0.0.1', 1500, 'linux')).toEqual(['-c', '1', '-W', '2', '10.0.0.1']);
    expect(buildPingArgs('10.0.0.1', 200, 'linux')).toEqual(['-c', '1', '-W', '1', '10.0.0.1']);
    expect(buildPingArgs('10.0.0.1', 1500, 'darwin')).toEqual(['-c', '1', '-W', '1500', '10.0.0.1']);
    expect(buildPingArgs('10.0.0.1', 1500, 'win32')).toEqual(['-n', '1', '-w', '1500', '10.0.0.1']);
  });
});

describe('ReachabilityChecker', () => {
  it('reports hosts that answer as reachable', async () => {
    const { runner, calls } = recordingRunner(() => null);
    const checker = new ReachabilityChecker({ runner, platform: 'linux' });

    await expect(checker.check('10.0.0.1', 1000)).resolves.toBe(true);
    expect(calls).toEqual([['ping', '-c', '1', '-W', '1', '10.0.0.1']]);
  });

  it('reports hosts that do not answer as unreachable', async () => {
    const { runner } = recordingRunner(() => new Error('Command failed: ping'));
    const checker = new ReachabilityChecker({ runner, platform: 'linux' });

    await expect(checker.check('10.0.0.2', 1000)).resolves.toBe(false);
  });

  it('pings each address once', async () => {
    const { runner, calls } = recordingRunner(() => null);
    const checker = new ReachabilityChecker({ runner, platform: 'linux' });

    await Promise.all([checker.check('10.0.0.1', 1000), checker.check('10.0.0.1', 1000)]);
    await checker.check('10.0.0.1', 1000);

    expect(calls).toHaveLength(1);
  });

  it('forgets the oldest addresses past the cache size', async () => {
    const { runner, calls } = recordingRunner(() => null);
    const checker = new ReachabilityChecker({ runner, platform: 'linux', cacheSize: 2 });

    for (const ip of ['10.0.0.1', '10.0.0.2', '10.0.0.3', '10.0.0.3', '10.0.0.1']) {
      await checker.check(ip, 1000);
    }

    expect(calls.map((call) => call[call.length - 1])).toEqual(['10.0.0.1', '10.0.0.2', '10.0.0.3', '10.0.0.1']);
  });

  it('returns null and stops pinging when no ping program exists', async () => {
    const { runner, calls } = recordingRunner(missingPing);
    const checker = new ReachabilityChecker({ runner, platform: 'linux' });

    await expect(checker.check('10.0.0.1', 1000)).resolves.toBeNull();
    await expect(checker.check('10.0.0.2', 1000)).resolves.toBeNull();
    expect(calls).toHaveLength(1);
  });
});
