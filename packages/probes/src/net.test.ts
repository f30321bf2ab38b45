import { describe, expect, it } from 'vitest';
import { isPrivateAddress } from './net.js';

describe('isPrivateAddress', () => {
  it('flags RFC 1918, CGNAT, link-local and loopback IPv4', () => {
    for (const address of ['10.1.2.3', '172.16.0.1', '172.31.255.254', '192.168.1.20', '100.64.0.1', '169.254.10.10', '127.0.0.1']) {
      expect(isPrivateAddress(address)).toBe(true);
    }
  });

  it('passes public IPv4', () => {
    for (const address of ['203.0.113.5', '172.32.0.1', '100.128.0.1', '8.8.8.8', '11.0.0.1']) {
      expect(isPrivateAddress(address)).toBe(false);
    }
  });

  it('flags IPv6 ULA, link-local, loopback and mapped private IPv4', () => {
    expect(isPrivateAddress('fd12:3456:789a::1')).toBe(true);
    expect(isPrivateAddress('fe80::1c2d:3e4f')).toBe(true);
    expect(isPrivateAddress('::1')).toBe(true);
    expect(isPrivateAddress('::ffff:192.168.0.1')).toBe(true);
  });

  it('passes public IPv6 and non-addresses', () => {
    expect(isPrivateAddress('2001:db8::1')).toBe(false);
    expect(isPrivateAddress('::ffff:203.0.113.5')).toBe(false);
    expect(isPrivateAddress('not-an-ip')).toBe(false);
  });
});
