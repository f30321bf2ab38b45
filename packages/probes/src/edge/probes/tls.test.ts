import { describe, expect, it, vi } from 'vitest';
import { createTestContext } from '../../testing/context.js';
import type { TlsSessionInfo } from '../../types.js';
import { tls } from './tls.js';

const SESSION: TlsSessionInfo = {
  protocol: 'TLSv1.3',
  cipher: 'TLS_AES_128_GCM_SHA256',
  authorized: true,
  certificate: {
    subjectCN: 'debug.test',
    issuerCN: 'Test Issuing CA',
    issuerO: 'Test Org',
    validTo: 'Jan  1 00:00:00 2030 GMT',
    fingerprint256: 'AA:BB:CC',
  },
};

describe('tls probe', () => {
  it('connects to port 443 with SNI and reports the session', async () => {
    const connectTls = vi.fn().mockResolvedValue(SESSION);
    const ctx = createTestContext({ connectTls });

    const fields = await tls(ctx);

    expect(connectTls).toHaveBeenCalledWith({
      host: 'debug.test',
      port: 443,
      servername: 'debug.test',
      signal: ctx.signal,
    });
    expect(Object.fromEntries(fields.map((f) => [f.name, f.value]))).toEqual({
      protocol: 'TLSv1.3',
      cipher: 'TLS_AES_128_GCM_SHA256',
      authorized: true,
      subject_cn: 'debug.test',
      issuer_cn: 'Test Issuing CA',
      issuer_o: 'Test Org',
      valid_to: 'Jan  1 00:00:00 2030 GMT',
      fingerprint256: 'AA:BB:CC',
    });
  });

  it('reports untrusted certificates instead of failing', async () => {
    const ctx = createTestContext({
      connectTls: async () => ({
        protocol: null,
        cipher: 'ECDHE-RSA-AES128-GCM-SHA256',
        authorized: false,
        authorizationError: 'SELF_SIGNED_CERT_IN_CHAIN',
      }),
    });

    const fields = await tls(ctx);

    expect(fields.map((f) => [f.name, f.value])).toEqual([
      ['protocol', 'unknown'],
      ['cipher', 'ECDHE-RSA-AES128-GCM-SHA256'],
      ['authorized', false],
      ['authorization_error', 'SELF_SIGNED_CERT_IN_CHAIN'],
    ]);
  });

  it('propagates connection errors', async () => {
    await expect(tls(createTestContext())).rejects.toThrow('connect ECONNREFUSED');
  });
});
