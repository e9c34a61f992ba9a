// Minimal ADB wire helpers: enough to say hello to a device and read its answer

export const ADB_HEADER_LENGTH = 24;

export const ADB_COMMANDS = {
  SYNC: 0x434e5953,
  CNXN: 0x4e584e43,
  AUTH: 0x48545541,
  OPEN: 0x4e45504f,
  OKAY: 0x59414b4f,
  CLSE: 0x45534c43,
  WRTE: 0x45545257,
  STLS: 0x534c5453,
} as const;

export type AdbCommand = keyof typeof ADB_COMMANDS;

const ADB_VERSION = 0x01000000;
const ADB_MAX_PAYLOAD = 256 * 1024;
const HOST_BANNER = 'host::\0';

// Replies a device sends to CNXN
const HANDSHAKE_REPLIES: readonly AdbCommand[] = ['CNXN', 'AUTH', 'STLS'];

export interface AdbMessageHeader {
  command: AdbCommand;
  arg0: number;
  arg1: number;
  dataLength: number;
  dataChecksum: number;
  magic: number;
}

const COMMAND_NAMES: readonly AdbCommand[] = ['SYNC', 'CNXN', 'AUTH', 'OPEN', 'OKAY', 'CLSE', 'WRTE', 'STLS'];

function commandName(code: number): AdbCommand | null {
  return COMMAND_NAMES.find((name) => ADB_COMMANDS[name] === code) ?? null;
}

function checksum(payload: Buffer): number {
  let sum = 0;
  for (const byte of payload) {
    sum = (sum + byte) >>> 0;
  }
  return sum;
}

export function encodeMessage(command: AdbCommand, arg0: number, arg1: number, payload: Buffer): Buffer {
  const code = ADB_COMMANDS[command];
  const header = Buffer.alloc(ADB_HEADER_LENGTH);
  header.writeUInt32LE(code, 0);
  header.writeUInt32LE(arg0 >>> 0, 4);
  header.writeUInt32LE(arg1 >>> 0, 8);
  header.writeUInt32LE(payload.length, 12);
  header.writeUInt32LE(checksum(payload), 16);
  header.writeUInt32LE((code ^ 0xffffffff) >>> 0, 20);
  return Buffer.concat([header, payload]);
}

export function decodeHeader(data: Buffer): AdbMessageHeader | null {
  if (data.length < ADB_HEADER_LENGTH) return null;

  const code = data.readUInt32LE(0);
  const magic = data.readUInt32LE(20);
  if (((code ^ 0xffffffff) >>> 0) !== magic) return null;

  const command = commandName(code);
  if (!command) return null;

  return {
    command,
    arg0: data.readUInt32LE(4),
    arg1: data.readUInt32LE(8),
    dataLength: data.readUInt32LE(12),
    dataChecksum: data.readUInt32LE(16),
    magic,
  };
}

export function buildConnectMessage(): Buffer {
  return encodeMessage('CNXN', ADB_VERSION, ADB_MAX_PAYLOAD, Buffer.from(HOST_BANNER, 'utf8'));
}

// Smart-socket request understood by the adb host server (port 5037)
export function buildHostVersionRequest(): Buffer {
  const service = 'host:version';
  const length = service.length.toString(16).padStart(4, '0');
  return Buffer.from(`${length}${service}`, 'ascii');
}

export function isHandshakeReply(data: Buffer): boolean {
  const header = decodeHeader(data);
  return header !== null && HANDSHAKE_REPLIES.includes(header.command);
}

// Device banner carried in a CNXN payload, e.g. "device::ro.product.model=Pixel;"
export function extractConnectBanner(data: Buffer): string | null {
  const header = decodeHeader(data);
  if (!header || header.command !== 'CNXN' || header.dataLength === 0) return null;

  const end = Math.min(data.length, ADB_HEADER_LENGTH + header.dataLength);
  const banner = data.subarray(ADB_HEADER_LENGTH, end).toString('utf8').replace(/\0+$/, '');
  return banner.length > 0 ? banner : null;
}
