import { FieldSet } from '../../fields.js';
import type { ProbeHandler } from '../../types.js';

/**
 * Handshake with the debug host and describe the negotiated session and
 * the served certificate. An untrusted certificate is reported, not fatal.
 */
export const tls: ProbeHandler = async (ctx) => {
  const host = ctx.endpoints.debugHost;
  const session = await ctx.connectTls({
    host,
    port: 443,
    servername: host,
    signal: ctx.signal,
  });

  const fields = new FieldSet()
    .add('protocol', session.protocol ?? 'unknown')
    .add('cipher', session.cipher)
    .add('authorized', session.authorized)
    .addOptional('authorization_error', session.authorizationError);

  const cert = session.certificate;
  if (cert) {
    fields
      .addOptional('subject_cn', cert.subjectCN)
      .addOptional('issuer_cn', cert.issuerCN)
      .addOptional('issuer_o', cert.issuerO)
      .add('valid_to', cert.validTo)
      .add('fingerprint256', cert.fingerprint256);
  }

  return fields.toFields();
};
