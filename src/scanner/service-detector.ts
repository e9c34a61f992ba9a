import {
  ADB_HEADER_LENGTH,
  buildConnectMessage,
  buildHostVersionRequest,
  decodeHeader,
  extractConnectBanner,
  isHandshakeReply,
} from './adb-protocol.js';
import type { DetectedService, ScanFlags, ServiceSignature } from '../types/scanner.js';

export const ADB_HOST_PORT = 5037;
export const ADB_TRANSPORT_PORTS = { start: 5555, end: 5585 } as const;
export const MAX_BANNER_LENGTH = 256;

const MIN_CONFIDENCE = 40;

function adbPorts(): number[] {
  const ports = [ADB_HOST_PORT];
  for (let port = ADB_TRANSPORT_PORTS.start; port <= ADB_TRANSPORT_PORTS.end; port++) {
    ports.push(port);
  }
  return ports;
}

// Status plus hex length, as the host server answers host:version
const HOST_SERVER_REPLY = /^(OKAY|FAIL)[0-9a-f]{4}/i;

// A real transport frame, or the host server's status on its own port
export function isAdbReply(reply: Buffer, port: number): boolean {
  if (isHandshakeReply(reply)) return true;
  return port === ADB_HOST_PORT && HOST_SERVER_REPLY.test(reply.toString('latin1', 0, 8));
}

// Text signatures run against the reply decoded as latin1, so raw bytes survive
const SERVICE_SIGNATURES: ServiceSignature[] = [
  // ADB: transport reply to CNXN, or host server reply to a smart-socket request
  {
    deviceType: 'ADB',
    patterns: [],
    matchReply: isAdbReply,
    ports: adbPorts(),
    versionExtractor: /ro\.product\.model=([^;]+)/,
  },
  // SSH
  {
    deviceType: 'SSH',
    patterns: [/^SSH-\d+\.\d+-/],
    ports: [22, 2222],
    versionExtractor: /^SSH-[\d.]+-(\S+)/,
  },
  // Telnet: IAC WILL/WONT/DO/DONT negotiation or a login prompt
  {
    deviceType: 'Telnet',
    patterns: [/^\xff[\xfb-\xfe]/, /login:/i, /username:/i],
    ports: [23, 2323],
  },
];

export function isAdbTransportPort(port: number): boolean {
  return port >= ADB_TRANSPORT_PORTS.start && port <= ADB_TRANSPORT_PORTS.end;
}

function isEnabled(sig: ServiceSignature, flags: ScanFlags): boolean {
  switch (sig.deviceType) {
    case 'ADB':
      return flags.scanAdb;
    case 'SSH':
      return flags.scanSsh;
    case 'Telnet':
      return flags.scanTelnet;
  }
}

/**
 * Printable excerpt of a handshake reply, capped at MAX_BANNER_LENGTH.
 * ADB frames are reduced to their connect banner or command name.
 */
export function bannerSnippet(data: Buffer | null): string | null {
  if (!data || data.length === 0) return null;

  const header = decodeHeader(data);
  const text = header
    ? extractConnectBanner(data) ?? header.command
    : data.toString('latin1');

  const printable = text.replace(/[^\x20-\x7e]+/g, ' ').replace(/\s+/g, ' ').trim();
  return printable.length > 0 ? printable.substring(0, MAX_BANNER_LENGTH) : null;
}

export class ServiceDetector {
  private readonly signatures: ServiceSignature[];

  constructor(customSignatures?: ServiceSignature[]) {
    this.signatures = customSignatures ?? SERVICE_SIGNATURES;
  }

  detect(port: number, reply: Buffer | null, flags: ScanFlags): DetectedService | null {
    if (!reply || reply.length === 0) {
      return null;
    }

    const banner = reply.toString('latin1');
    let bestMatch: DetectedService | null = null;
    let bestConfidence = 0;

    for (const sig of this.signatures) {
      if (!isEnabled(sig, flags)) continue;

      const confidence = this.calculateConfidence(port, reply, banner, sig);
      if (confidence > bestConfidence) {
        bestConfidence = confidence;
        bestMatch = {
          port,
          deviceType: sig.deviceType,
          serviceVersion: this.extractVersion(banner, sig),
          confidence,
        };
      }
    }

    if (bestMatch && bestConfidence >= MIN_CONFIDENCE) {
      return bestMatch;
    }

    return null;
  }

  private calculateConfidence(port: number, reply: Buffer, banner: string, sig: ServiceSignature): number {
    // A port match alone never identifies a service
    const matched = sig.matchReply
      ? sig.matchReply(reply, port)
      : sig.patterns.some((pattern) => pattern.test(banner));
    if (!matched) {
      return 0;
    }

    let confidence = 40;

    if (sig.ports.includes(port)) {
      confidence += 30;
    }

    if (sig.versionExtractor && sig.versionExtractor.test(banner)) {
      confidence += 20;
    }

    return Math.min(confidence, 100);
  }

  private extractVersion(banner: string, sig: ServiceSignature): string | null {
    if (!sig.versionExtractor) {
      return null;
    }

    const match = banner.match(sig.versionExtractor);
    if (match) {
      for (let i = 1; i < match.length; i++) {
        const group = match[i];
        if (group) {
          return group.trim();
        }
      }
    }

    return null;
  }

  /**
   * Bytes to send right after connecting, or null when the service is
   * expected to speak first (SSH, Telnet) or ADB detection is off.
   */
  getProbe(port: number, flags: ScanFlags): Buffer | null {
    if (!flags.scanAdb) {
      return null;
    }

    if (port === ADB_HOST_PORT) {
      return buildHostVersionRequest();
    }

    if (isAdbTransportPort(port)) {
      return buildConnectMessage();
    }

    return null;
  }

  // Whether a reply already holds enough bytes to classify
  isReplyComplete(reply: Buffer): boolean {
    if (reply.length >= ADB_HEADER_LENGTH) {
      return !isHandshakeReply(reply) || this.hasFullPayload(reply);
    }
    if (reply.includes(0x0a)) return true;
    if (reply[0] === 0xff && reply.length >= 3) return true;

    const prefix = reply.toString('latin1', 0, 4);
    return reply.length >= 8 && (prefix === 'OKAY' || prefix === 'FAIL');
  }

  private hasFullPayload(reply: Buffer): boolean {
    const header = decodeHeader(reply);
    if (!header) return true;
    return reply.length >= ADB_HEADER_LENGTH + header.dataLength;
  }
}
