import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import { parseIpv4 } from '../utils/ip.js';
import { TargetGenerator, iteratePorts, parsePortSpec, portSetSize } from './target-generator.js';
import type { PortSet } from '../types/scanner.js';

function generator(startIp: string, endIp: string, ports: PortSet): TargetGenerator {
  const start = parseIpv4(startIp);
  const end = parseIpv4(endIp);
  if (start === null || end === null) {
    throw new Error('bad test address');
  }
  return new TargetGenerator({ start, end, ports });
}

function specKind(spec: string): string | null {
  try {
    parsePortSpec(spec);
    return null;
  } catch (error) {
    return error instanceof ValidationError ? error.kind : 'other';
  }
}

describe('parsePortSpec', () => {
  it('keeps a bare range symbolic', () => {
    expect(parsePortSpec('1-65535')).toEqual({ kind: 'range', start: 1, end: 65535 });
    expect(parsePortSpec('5555 - 5557')).toEqual({ kind: 'range', start: 5555, end: 5557 });
  });

  it('parses single ports from numbers and strings', () => {
    expect(parsePortSpec(5555)).toEqual({ kind: 'list', ports: [5555] });
    expect(parsePortSpec(' 22 ')).toEqual({ kind: 'list', ports: [22] });
  });

  it('expands ranges inside comma lists and drops duplicates in order', () => {
    expect(parsePortSpec('22,23,5555-5557,22')).toEqual({
      kind: 'list',
      ports: [22, 23, 5555, 5556, 5557],
    });
  });

  it('accepts port arrays', () => {
    expect(parsePortSpec([23, 22, 23])).toEqual({ kind: 'list', ports: [23, 22] });
  });

  it('reports bad specifications by kind', () => {
    expect(specKind('0')).toBe('InvalidPort');
    expect(specKind('65536')).toBe('InvalidPort');
    expect(specKind('22,70000')).toBe('InvalidPort');
    expect(specKind('100-10')).toBe('InvalidPortSpec');
    expect(specKind('10-x')).toBe('InvalidPortSpec');
    expect(specKind('22;23')).toBe('InvalidPortSpec');
    expect(specKind('   ')).toBe('InvalidPortSpec');
  });

  it('rejects an empty port array', () => {
    expect(() => parsePortSpec([])).toThrow('Port list is empty');
  });
});

describe('TargetGenerator', () => {
  it('yields the IP-major cross product', () => {
    const targets = generator('192.168.1.1', '192.168.1.3', { kind: 'list', ports: [22, 5555] });

    expect(targets.size).toBe(6);
    expect([...targets]).toEqual([
      { ip: '192.168.1.1', port: 22 },
      { ip: '192.168.1.1', port: 5555 },
      { ip: '192.168.1.2', port: 22 },
      { ip: '192.168.1.2', port: 5555 },
      { ip: '192.168.1.3', port: 22 },
      { ip: '192.168.1.3', port: 5555 },
    ]);
  });

  it('crosses octet boundaries', () => {
    const targets = generator('10.0.0.255', '10.0.1.0', { kind: 'range', start: 80, end: 81 });
    expect([...targets].map((t) => `${t.ip}:${t.port}`)).toEqual([
      '10.0.0.255:80',
      '10.0.0.255:81',
      '10.0.1.0:80',
      '10.0.1.0:81',
    ]);
  });

  it('restarts from the beginning on each iteration', () => {
    const targets = generator('10.0.0.1', '10.0.0.2', { kind: 'list', ports: [23] });
    const first = [...targets];
    const second = [...targets];
    expect(second).toEqual(first);
    expect(first).toHaveLength(2);
  });

  it('is lazy', () => {
    const targets = generator('0.0.0.0', '255.255.255.255', { kind: 'range', start: 1, end: 65535 });
    const iterator = targets[Symbol.iterator]();

    expect(targets.size).toBe(4294967296 * 65535);
    expect(iterator.next().value).toEqual({ ip: '0.0.0.0', port: 1 });
    expect(iterator.next().value).toEqual({ ip: '0.0.0.0', port: 2 });
  });

  it('produces frozen targets', () => {
    const [target] = [...generator('10.0.0.1', '10.0.0.1', { kind: 'list', ports: [22] })];
    expect(Object.isFrozen(target)).toBe(true);
  });
});

describe('port set helpers', () => {
  it('counts and walks ranges and lists', () => {
    const range: PortSet = { kind: 'range', start: 5555, end: 5585 };
    expect(portSetSize(range)).toBe(31);
    expect([...iteratePorts({ kind: 'range', start: 20, end: 23 })]).toEqual([20, 21, 22, 23]);
    expect([...iteratePorts({ kind: 'list', ports: [5555, 22] })]).toEqual([5555, 22]);
  });
});
