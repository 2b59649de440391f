/**
 * Contracts between resolver backends, resolution sessions and callers.
 */
import type { MessageContext } from '../dns/name.js';
import type { ResolutionError } from '../errors.js';
import type { SrvRecord } from '../srv/record.js';

/** A resource record as delivered by a backend, before validation */
export interface RawRecord {
  rrType: number;
  rrClass: number;
  ttl: number;
  /** RDATA */
  data: Uint8Array;
  /** Enclosing message; required to follow compression pointers */
  context?: MessageContext;
}

/** Final answer details reported once, when the backend is done */
export interface AnswerMetadata {
  rcode: number;
  /** Canonical name after any CNAME chain */
  canonical: string;
  /** Full answer message */
  answer: Uint8Array;
  /** DNSSEC validated */
  secure?: boolean;
  /** DNSSEC validation failed */
  bogus?: boolean;
}

/**
 * The backend's view of one outstanding query.
 * Backends check `cancelled` before each delivery and stop once it is set.
 */
export interface QueryHandle {
  readonly name: string;
  readonly rrType: number;
  readonly rrClass: number;
  readonly cancelled: boolean;
  addRecord(record: RawRecord): void;
  complete(metadata: AnswerMetadata): void;
  fail(error: ResolutionError): void;
}

export interface ResolverBackend {
  readonly name: string;
  /**
   * Start resolving. Results are reported through the handle, from any tick;
   * a rejected promise or a throw fails the query.
   */
  resolve(query: QueryHandle): void | Promise<void>;
  /**
   * Stop an in-flight query.
   * @returns false when the backend cannot cancel it
   */
  cancel(query: QueryHandle): boolean;
}

interface RecordMeta {
  readonly rrType: number;
  readonly rrClass: number;
  readonly ttl: number;
  readonly data: Uint8Array;
}

/** A validated SRV answer */
export interface SrvAnswer extends RecordMeta, SrvRecord {
  readonly kind: 'srv';
}

/** An answer of a type the resolver does not interpret */
export interface RawAnswer extends RecordMeta {
  readonly kind: 'raw';
}

export type AnswerRecord = SrvAnswer | RawAnswer;

export interface ResolutionResult {
  name: string;
  rrType: number;
  rrClass: number;
  canonical: string;
  rcode: number;
  secure: boolean;
  bogus: boolean;
  answer: Uint8Array;
  /** Records in final order: SRV answers sorted, others in arrival order */
  records: readonly AnswerRecord[];
  /** Smallest TTL among `records`, 0 when there are none */
  lowestTtl: number;
  /** Delivered records that were rejected or did not match the question */
  dropped: number;
}

export type ResolutionOutcome =
  | { ok: true; result: ResolutionResult }
  | { ok: false; name: string; error: ResolutionError };

export type ResolutionCallback = (outcome: ResolutionOutcome) => void;

export type SessionState = 'pending' | 'collecting' | 'finalizing' | 'completed' | 'failed';

export type CancelResult = 'cancelled' | 'completed' | 'unsupported';
