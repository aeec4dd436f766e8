// ============================================================================
// IP Matching - exact addresses and IPv4 CIDR blocks for whitelist coverage
// ============================================================================

function ipv4ToInt(address: string): number | null {
  const parts = address.split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    const octet = parseInt(part, 10);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

// "::ffff:10.0.0.1" -> "10.0.0.1"
export function normalizeIp(address: string): string {
  const trimmed = address.trim().toLowerCase();
  return trimmed.startsWith('::ffff:') && trimmed.includes('.') ? trimmed.slice(7) : trimmed;
}

export function matchesWhitelistEntry(ip: string, entry: string): boolean {
  const candidate = normalizeIp(ip);
  const rule = entry.trim().toLowerCase();

  if (!rule.includes('/')) {
    return normalizeIp(rule) === candidate;
  }

  const [base, bitsRaw] = rule.split('/');
  const bits = parseInt(bitsRaw, 10);
  const baseInt = ipv4ToInt(base);
  const ipInt = ipv4ToInt(candidate);
  if (baseInt === null || ipInt === null || !Number.isInteger(bits) || bits < 0 || bits > 32) {
    return false;
  }
  if (bits === 0) return true;

  const blockSize = 2 ** (32 - bits);
  return Math.floor(baseInt / blockSize) === Math.floor(ipInt / blockSize);
}

export function isWhitelisted(ip: string, whitelist: readonly string[]): boolean {
  return whitelist.some((entry) => matchesWhitelistEntry(ip, entry));
}
