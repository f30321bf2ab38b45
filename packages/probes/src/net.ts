import { isIPv4, isIPv6 } from 'node:net';

function ipv4Octets(address: string): number[] {
  return address.split('.').map((part) => Number(part));
}

/**
 * True for addresses that only make sense behind NAT or on the local link:
 * RFC 1918, carrier-grade NAT, link-local, loopback and IPv6 ULA/link-local.
 */
export function isPrivateAddress(address: string): boolean {
  if (isIPv4(address)) {
    const [a = 0, b = 0] = ipv4Octets(address);
    if (a === 10 || a === 127) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    if (a === 192 && b === 168) return true;
    if (a === 169 && b === 254) return true;
    if (a === 100 && b >= 64 && b <= 127) return true;
    return false;
  }

  if (isIPv6(address)) {
    const lower = address.toLowerCase();
    if (lower === '::1') return true;
    // fe80::/10
    if (/^fe[89ab]/.test(lower)) return true;
    if (lower.startsWith('fc') || lower.startsWith('fd')) return true;
    const mapped = lower.match(/^::ffff:(\d+\.\d+\.\d+\.\d+)$/);
    if (mapped?.[1]) return isPrivateAddress(mapped[1]);
    return false;
  }

  return false;
}
