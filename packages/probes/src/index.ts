import { edgeSuite } from './edge/index.js';
import { hostSuite } from './host/index.js';
import { createProbeRegistry } from './validation.js';

export type {
  EdgeEndpoints,
  EdgeResponse,
  FetchFn,
  FetchInit,
  HostInfo,
  LookupFn,
  ProbeContext,
  ProbeEnvironment,
  ProbeHandler,
  ProbeRegistry,
  ProbeSession,
  ProbeSuite,
  RegisteredProbe,
  TlsConnectFn,
  TlsSessionInfo,
} from './types.js';
export type { NetworkEnvironmentOptions } from './environment.js';
export { FieldSet, toFieldName } from './fields.js';
export { isPrivateAddress } from './net.js';
export { createProbeRegistry, validateSuite } from './validation.js';
export { createNetworkEnvironment, connectTls, systemHostInfo } from './environment.js';
export { edgeSuite } from './edge/index.js';
export { hostSuite } from './host/index.js';

/** Built-in probes in canonical order: host facts first, then the edge */
export const probeRegistry = createProbeRegistry([hostSuite, edgeSuite]);
