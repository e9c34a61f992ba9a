const IPV4_REGEX = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

// Unsigned 32-bit value of a dotted quad, or null when malformed
export function parseIpv4(ip: string): number | null {
  if (!ip || typeof ip !== 'string') return null;

  const match = ip.trim().match(IPV4_REGEX);
  if (!match) return null;

  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = parseInt(match[i] ?? '', 10);
    if (Number.isNaN(octet) || octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function ipv4FromNumber(value: number): string {
  return [
    Math.floor(value / 16777216) % 256,
    Math.floor(value / 65536) % 256,
    Math.floor(value / 256) % 256,
    value % 256,
  ].join('.');
}
