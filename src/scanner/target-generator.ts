import { ValidationError } from '../errors.js';
import { ipv4FromNumber } from '../utils/ip.js';
import type { PortSet, PortSpec, Target, ValidatedConfig } from '../types/scanner.js';

const MIN_PORT = 1;
const MAX_PORT = 65535;

const SINGLE_PORT = /^\d+$/;
const PORT_RANGE = /^(\d+)\s*-\s*(\d+)$/;

function checkPort(port: number, spec: string): number {
  if (!Number.isInteger(port)) {
    throw new ValidationError('InvalidPortSpec', `Port specification "${spec}" is not an integer`);
  }
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new ValidationError('InvalidPort', `Port ${port} is outside ${MIN_PORT}-${MAX_PORT}`);
  }
  return port;
}

function parseRange(item: string, spec: string): { start: number; end: number } | null {
  const match = item.match(PORT_RANGE);
  if (!match) return null;

  const start = checkPort(parseInt(match[1] ?? '', 10), spec);
  const end = checkPort(parseInt(match[2] ?? '', 10), spec);
  if (start > end) {
    throw new ValidationError('InvalidPortSpec', `Port range "${item}" starts after it ends`);
  }
  return { start, end };
}

function dedupe(ports: Iterable<number>): PortSet {
  return { kind: 'list', ports: Array.from(new Set(ports)) };
}

/**
 * Resolve a port specification into a port set.
 *
 * Accepts a single port (`5555` or `"5555"`), an inclusive range (`"5555-5585"`),
 * a comma list whose items may themselves be ranges (`"22,23,5555-5557"`), or an
 * array of ports. Lists keep the order given, with duplicates dropped. A bare
 * range is kept symbolic so that `"1-65535"` costs nothing until iterated.
 */
export function parsePortSpec(spec: PortSpec): PortSet {
  if (typeof spec === 'number') {
    return { kind: 'list', ports: [checkPort(spec, String(spec))] };
  }

  if (typeof spec !== 'string') {
    if (spec.length === 0) {
      throw new ValidationError('InvalidPortSpec', 'Port list is empty');
    }
    return dedupe(spec.map((port) => checkPort(port, String(port))));
  }

  const trimmed = spec.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('InvalidPortSpec', 'Port specification is empty');
  }

  if (SINGLE_PORT.test(trimmed)) {
    return { kind: 'list', ports: [checkPort(parseInt(trimmed, 10), spec)] };
  }

  const range = parseRange(trimmed, spec);
  if (range) {
    return { kind: 'range', start: range.start, end: range.end };
  }

  if (!trimmed.includes(',')) {
    throw new ValidationError('InvalidPortSpec', `Cannot parse port specification "${spec}"`);
  }

  const ports: number[] = [];
  for (const rawItem of trimmed.split(',')) {
    const item = rawItem.trim();
    if (SINGLE_PORT.test(item)) {
      ports.push(checkPort(parseInt(item, 10), spec));
      continue;
    }

    const itemRange = parseRange(item, spec);
    if (!itemRange) {
      throw new ValidationError('InvalidPortSpec', `Cannot parse "${item}" in port list "${spec}"`);
    }
    for (let port = itemRange.start; port <= itemRange.end; port++) {
      ports.push(port);
    }
  }

  return dedupe(ports);
}

export function portSetSize(ports: PortSet): number {
  return ports.kind === 'range' ? ports.end - ports.start + 1 : ports.ports.length;
}

export function* iteratePorts(ports: PortSet): Generator<number> {
  if (ports.kind === 'range') {
    for (let port = ports.start; port <= ports.end; port++) {
      yield port;
    }
    return;
  }
  yield* ports.ports;
}

/**
 * Lazy IP-major cross product of the configured address range and port set.
 * Every call to `[Symbol.iterator]()` starts a fresh cursor.
 */
export class TargetGenerator implements Iterable<Target> {
  private readonly start: number;
  private readonly end: number;
  private readonly ports: PortSet;

  readonly size: number;

  constructor(config: Pick<ValidatedConfig, 'start' | 'end' | 'ports'>) {
    this.start = config.start;
    this.end = config.end;
    this.ports = config.ports;
    this.size = (this.end - this.start + 1) * portSetSize(this.ports);
  }

  *[Symbol.iterator](): Generator<Target> {
    for (let address = this.start; address <= this.end; address++) {
      const ip = ipv4FromNumber(address);
      for (const port of iteratePorts(this.ports)) {
        yield Object.freeze({ ip, port });
      }
    }
  }
}
