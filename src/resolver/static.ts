/**
 * In-process backend answering from fixed records.
 * Builds a real response message and delivers it record by record on a later
 * tick, the way a network backend would.
 */
import { RecordClass, RecordType, Rcode } from '../dns/constants.js';
import { buildResponse, type AnswerInput } from '../dns/message.js';
import { ResolutionError } from '../errors.js';
import { encodeSrvRecord, type SrvField, type SrvRecord } from '../srv/record.js';
import type { QueryHandle, ResolverBackend } from './types.js';

interface AnswerFixtureBase {
  /** Defaults to the question's type */
  rrType?: number;
  /** Defaults to the question's class */
  rrClass?: number;
  ttl?: number;
}

export type AnswerFixture =
  | (AnswerFixtureBase & { srv: SrvRecord; omit?: readonly SrvField[] })
  | (AnswerFixtureBase & { data: Uint8Array });

export interface StaticBackendOptions {
  rcode?: number;
  /** Canonical name reported on completion; defaults to the query name */
  canonical?: string;
  secure?: boolean;
  bogus?: boolean;
  /** Fail every query with this code instead of answering */
  failWith?: string;
  /** Whether cancel() succeeds (default true) */
  cancellable?: boolean;
}

/** TTL used when a fixture does not set one */
export const DEFAULT_FIXTURE_TTL = 12345;

export class StaticResolverBackend implements ResolverBackend {
  readonly name = 'static';
  private readonly answers: readonly AnswerFixture[];
  private readonly options: StaticBackendOptions;
  /** Number of resolve() calls, for tests */
  queries = 0;

  constructor(answers: readonly AnswerFixture[], options: StaticBackendOptions = {}) {
    this.answers = answers;
    this.options = options;
  }

  resolve(query: QueryHandle): Promise<void> {
    this.queries++;
    return new Promise((resolve) => setImmediate(resolve)).then(() => this.answer(query));
  }

  cancel(): boolean {
    return this.options.cancellable ?? true;
  }

  private answer(query: QueryHandle): void {
    if (query.cancelled) return;

    if (this.options.failWith) {
      query.fail(ResolutionError.backendFailure(query.name, this.options.failWith));
      return;
    }

    const inputs: AnswerInput[] = this.answers.map((fixture) => ({
      rrType: fixture.rrType ?? query.rrType,
      rrClass: fixture.rrClass ?? query.rrClass,
      ttl: fixture.ttl ?? DEFAULT_FIXTURE_TTL,
      data: 'srv' in fixture ? encodeSrvRecord(fixture.srv, { omit: fixture.omit }) : fixture.data,
    }));
    const rcode = this.options.rcode ?? Rcode.NOERROR;
    const built = buildResponse(query.name, query.rrType, query.rrClass, inputs, {
      rcode,
      authenticated: this.options.secure,
    });

    for (const answer of built.answers) {
      if (query.cancelled) return;
      query.addRecord({
        rrType: answer.rrType,
        rrClass: answer.rrClass,
        ttl: answer.ttl,
        data: answer.data,
        context: { message: built.message, offset: answer.offset },
      });
    }

    if (query.cancelled) return;
    query.complete({
      rcode,
      canonical: this.options.canonical ?? query.name,
      answer: built.message,
      secure: this.options.secure,
      bogus: this.options.bogus,
    });
  }
}

/** Shorthand for an SRV fixture in the IN class */
export function srvFixture(record: SrvRecord, extra: Omit<AnswerFixtureBase, 'rrType'> & { omit?: readonly SrvField[] } = {}): AnswerFixture {
  return { rrType: RecordType.SRV, rrClass: RecordClass.IN, ...extra, srv: record };
}
