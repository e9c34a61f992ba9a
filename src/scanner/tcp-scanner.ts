import net from 'net';
import { errorCode } from '../errors.js';
import type { PortProbeOutcome, PortState, TcpScannerOptions } from '../types/scanner.js';

export interface ScanPortOptions {
  timeout?: number | undefined;
  bannerTimeout?: number | undefined;
  readBanner?: boolean | undefined;
  /** Sent as soon as the connection is up */
  probe?: Buffer | null | undefined;
  /** Stops the banner read early once the reply is classifiable */
  isComplete?: ((reply: Buffer) => boolean) | undefined;
}

const UNREACHABLE_CODES = ['EHOSTUNREACH', 'ENETUNREACH', 'EHOSTDOWN', 'ENETDOWN'];

export class TcpScanner {
  private readonly timeout: number;
  private readonly bannerTimeout: number;
  private readonly maxBannerBytes: number;

  constructor(options: TcpScannerOptions = {}) {
    this.timeout = options.timeout ?? 2000;
    this.bannerTimeout = options.bannerTimeout ?? this.timeout;
    this.maxBannerBytes = options.maxBannerBytes ?? 4096;
  }

  /**
   * Connect to host:port and optionally exchange a first message.
   *
   * The connect and the banner read each get their own deadline. The socket
   * is destroyed before the promise settles, whatever the outcome, and the
   * promise never rejects.
   */
  scanPort(host: string, port: number, options: ScanPortOptions = {}): Promise<PortProbeOutcome> {
    const connectTimeout = options.timeout ?? this.timeout;
    const bannerTimeout = options.bannerTimeout ?? options.timeout ?? this.bannerTimeout;
    const readBanner = options.readBanner ?? true;
    const startTime = Date.now();

    return new Promise((resolve) => {
      const socket = new net.Socket();
      const chunks: Buffer[] = [];
      let received = 0;
      let connected = false;
      let settled = false;
      let connectTimeMs = 0;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const finish = (state: PortState, handshakeTimedOut: boolean, error: string | null): void => {
        if (settled) return;
        settled = true;
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
        socket.destroy();
        resolve({
          state,
          connectTimeMs,
          banner: chunks.length > 0 ? Buffer.concat(chunks, received) : null,
          handshakeTimedOut,
          error,
        });
      };

      timer = setTimeout(() => finish('timeout', false, 'Connection timed out'), connectTimeout);

      socket.once('connect', () => {
        connected = true;
        connectTimeMs = Date.now() - startTime;
        if (timer) clearTimeout(timer);

        if (!readBanner) {
          finish('open', false, null);
          return;
        }

        timer = setTimeout(() => finish('open', received === 0, null), bannerTimeout);
        if (options.probe) {
          socket.write(options.probe);
        }
      });

      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
        received += chunk.length;

        const reply = Buffer.concat(chunks, received);
        const complete = options.isComplete ? options.isComplete(reply) : true;
        if (complete || received >= this.maxBannerBytes) {
          finish('open', false, null);
        }
      });

      // Peer hung up after accepting: open, with whatever it said
      socket.on('end', () => finish('open', false, null));
      socket.on('close', () => {
        if (connected) {
          finish('open', false, null);
        }
      });

      socket.on('error', (error: Error) => {
        if (connected) {
          finish('open', false, null);
          return;
        }
        finish(this.classifyError(error), false, errorCode(error) ?? error.message);
      });

      socket.connect({ host, port });
    });
  }

  private classifyError(error: Error): PortState {
    const code = errorCode(error);
    if (code === 'ECONNREFUSED' || code === 'ECONNRESET') {
      return 'closed';
    }
    if (code === 'ETIMEDOUT') {
      return 'timeout';
    }
    if (code !== null && UNREACHABLE_CODES.includes(code)) {
      return 'filtered';
    }
    return 'closed';
  }
}
