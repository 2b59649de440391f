/**
 * Resolver module
 * Exports the caller API, the session state machine and the bundled backends
 */

export type {
  RawRecord,
  AnswerMetadata,
  QueryHandle,
  ResolverBackend,
  SrvAnswer,
  RawAnswer,
  AnswerRecord,
  ResolutionResult,
  ResolutionOutcome,
  ResolutionCallback,
  SessionState,
  CancelResult,
} from './types.js';

export { ResolutionSession } from './session.js';
export type { SessionOptions } from './session.js';
export { DnsResolver, ActiveQuery } from './resolver.js';
export type { ResolverOptions } from './resolver.js';

// Backends
export { SystemResolverBackend } from './system.js';
export type { SystemBackendConfig } from './system.js';
export { StaticResolverBackend, srvFixture, DEFAULT_FIXTURE_TTL } from './static.js';
export type { AnswerFixture, StaticBackendOptions } from './static.js';
