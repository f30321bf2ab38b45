import type { NetworkInterfaceInfo } from 'node:os';
import type { ProbeField, SuiteManifest } from '@edge-debug/shared';

/** Minimal response surface the probes read; undici and global fetch both satisfy it */
export interface EdgeResponse {
  status: number;
  ok: boolean;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface FetchInit {
  method?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/** Injectable fetch function for testing */
export type FetchFn = (url: string, init?: FetchInit) => Promise<EdgeResponse>;

/** Resolve a hostname to its addresses, in resolver order */
export type LookupFn = (hostname: string) => Promise<string[]>;

export interface TlsConnectOptions {
  host: string;
  port: number;
  servername: string;
  signal: AbortSignal;
}

export interface TlsCertificateInfo {
  subjectCN?: string;
  issuerCN?: string;
  issuerO?: string;
  validTo: string;
  fingerprint256: string;
}

export interface TlsSessionInfo {
  protocol: string | null;
  cipher: string;
  authorized: boolean;
  authorizationError?: string;
  certificate?: TlsCertificateInfo;
}

/** Open a TLS session, describe it, and close it again */
export type TlsConnectFn = (options: TlsConnectOptions) => Promise<TlsSessionInfo>;

/** Read-only view of the local host */
export interface HostInfo {
  platform(): string;
  release(): string;
  arch(): string;
  networkInterfaces(): Record<string, NetworkInterfaceInfo[] | undefined>;
  dnsServers(): string[];
}

export interface EdgeEndpoints {
  /** Wildcard analytics domain; per-run subdomains are prefixed with the client id */
  analyticsDomain: string;
  /** Host serving the debug page, /tcpinfo and /speedtest */
  debugHost: string;
}

/** Everything a probe may touch. One context per probe execution. */
export interface ProbeContext {
  signal: AbortSignal;
  fetch: FetchFn;
  lookup: LookupFn;
  connectTls: TlsConnectFn;
  host: HostInfo;
  endpoints: EdgeEndpoints;
  /** Random per-run id used to defeat DNS and HTTP caches */
  clientId: string;
  /** Headers sent with every request */
  requestHeaders: Readonly<Record<string, string>>;
  /** Monotonic milliseconds */
  clock: () => number;
}

/** A context plus the release hook for the resources it opened */
export interface ProbeSession {
  context: ProbeContext;
  close(): Promise<void>;
}

export interface ProbeEnvironment {
  open(signal: AbortSignal): ProbeSession;
}

/** Probe handler: reads the context, returns fields or throws */
export type ProbeHandler = (ctx: ProbeContext) => Promise<ProbeField[]>;

/** A suite with its manifest and probe handlers */
export interface ProbeSuite {
  manifest: SuiteManifest;
  handlers: Record<string, ProbeHandler>;
}

export interface RegisteredProbe {
  /** `<suite>.<probe>` */
  id: string;
  description: string;
  suite: string;
  timeoutMs?: number;
  handler: ProbeHandler;
}

/** Ordered, frozen list of probes */
export type ProbeRegistry = readonly RegisteredProbe[];
