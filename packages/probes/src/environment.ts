import crypto from 'node:crypto';
import { getServers, promises as dnsPromises } from 'node:dns';
import os from 'node:os';
import { performance } from 'node:perf_hooks';
import tlsModule from 'node:tls';
import { DEFAULT_ANALYTICS_DOMAIN, DEFAULT_DEBUG_HOST } from '@edge-debug/shared';
import { Agent, fetch as undiciFetch } from 'undici';
import type {
  EdgeEndpoints,
  FetchFn,
  HostInfo,
  LookupFn,
  ProbeEnvironment,
  TlsConnectOptions,
  TlsSessionInfo,
} from './types.js';

export interface NetworkEnvironmentOptions {
  /** Sent as User-Agent on every request */
  userAgent: string;
  endpoints?: Partial<EdgeEndpoints>;
  /** Fixed client id; a random UUID per run otherwise */
  clientId?: string;
  /** TCP connect timeout for HTTP requests */
  connectTimeoutMs?: number;
}

export const systemHostInfo: HostInfo = {
  platform: () => os.platform(),
  release: () => os.release(),
  arch: () => os.arch(),
  networkInterfaces: () => os.networkInterfaces(),
  dnsServers: () => getServers(),
};

export const systemLookup: LookupFn = async (hostname) => {
  const results = await dnsPromises.lookup(hostname, { all: true });
  return results.map((r) => r.address);
};

/**
 * Build a fetch function bound to one undici Agent. Default headers are
 * merged under per-call headers, and the session signal applies unless the
 * caller passes its own.
 */
export function createEdgeFetch(
  agent: Agent,
  defaultHeaders: Readonly<Record<string, string>>,
  signal: AbortSignal,
): FetchFn {
  return (url, init) =>
    undiciFetch(url, {
      method: init?.method ?? 'GET',
      headers: { ...defaultHeaders, ...init?.headers },
      signal: init?.signal ?? signal,
      dispatcher: agent,
    });
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Describe an established TLS socket. */
export function describeTlsSocket(socket: tlsModule.TLSSocket): TlsSessionInfo {
  const cert = socket.getPeerCertificate();
  const hasCert = Object.keys(cert).length > 0;
  const authError = socket.authorizationError;

  return {
    protocol: socket.getProtocol(),
    cipher: socket.getCipher().name,
    authorized: socket.authorized,
    authorizationError:
      authError === undefined || authError === null ? undefined : String(authError),
    certificate: hasCert
      ? {
          subjectCN: firstValue(cert.subject?.CN),
          issuerCN: firstValue(cert.issuer?.CN),
          issuerO: firstValue(cert.issuer?.O),
          validTo: cert.valid_to,
          fingerprint256: cert.fingerprint256,
        }
      : undefined,
  };
}

/**
 * Open a TLS connection, read the session details, and close it. Untrusted
 * certificates do not fail the handshake; they show up as `authorized: false`.
 */
export function connectTls(
  options: TlsConnectOptions,
  extra: tlsModule.ConnectionOptions = {},
): Promise<TlsSessionInfo> {
  return new Promise((resolve, reject) => {
    if (options.signal.aborted) {
      reject(options.signal.reason);
      return;
    }

    const socket = tlsModule.connect({
      host: options.host,
      port: options.port,
      servername: options.servername,
      rejectUnauthorized: false,
      ...extra,
    });

    const onAbort = () => {
      socket.destroy();
      reject(options.signal.reason);
    };
    options.signal.addEventListener('abort', onAbort, { once: true });

    const cleanup = () => {
      options.signal.removeEventListener('abort', onAbort);
    };

    socket.once('secureConnect', () => {
      cleanup();
      const info = describeTlsSocket(socket);
      socket.end();
      socket.destroy();
      resolve(info);
    });

    socket.once('error', (err) => {
      cleanup();
      socket.destroy();
      reject(err);
    });
  });
}

/**
 * Real network environment. Each opened session owns its own undici Agent,
 * destroyed on close so no socket outlives the probe that opened it.
 */
export function createNetworkEnvironment(options: NetworkEnvironmentOptions): ProbeEnvironment {
  const clientId = options.clientId ?? crypto.randomUUID();
  const endpoints: EdgeEndpoints = {
    analyticsDomain: options.endpoints?.analyticsDomain ?? DEFAULT_ANALYTICS_DOMAIN,
    debugHost: options.endpoints?.debugHost ?? DEFAULT_DEBUG_HOST,
  };
  const requestHeaders = Object.freeze({
    'user-agent': options.userAgent,
    'accept-language': 'en-US',
  });

  return {
    open(signal) {
      const agent = new Agent({
        connect: { timeout: options.connectTimeoutMs ?? 5_000 },
      });

      return {
        context: {
          signal,
          fetch: createEdgeFetch(agent, requestHeaders, signal),
          lookup: systemLookup,
          connectTls,
          host: systemHostInfo,
          endpoints,
          clientId,
          requestHeaders,
          clock: () => performance.now(),
        },
        close: () => agent.destroy(),
      };
    },
  };
}
