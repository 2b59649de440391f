/**
 * Resolution session: one in-flight query from dispatch to delivery.
 *
 * pending -> collecting -> finalizing -> completed
 *         \-----------------------------> failed
 *
 * Only the backend writes to a session, and the accumulated records are read
 * only after `complete()`, so ordering always sees the full set.
 */
import type { Logger } from '../config/logger.js';
import { RecordType } from '../dns/constants.js';
import { ResolutionError } from '../errors.js';
import { sortSrvRecords } from '../srv/assemble.js';
import { parseSrvRecord } from '../srv/record.js';
import type { RandomSource } from '../srv/select.js';
import type {
  AnswerMetadata,
  AnswerRecord,
  QueryHandle,
  RawAnswer,
  RawRecord,
  ResolutionCallback,
  ResolutionOutcome,
  SessionState,
  SrvAnswer,
} from './types.js';

export interface SessionOptions {
  name: string;
  rrType: number;
  rrClass: number;
  logger: Logger;
  random?: RandomSource;
}

export class ResolutionSession implements QueryHandle {
  readonly name: string;
  readonly rrType: number;
  readonly rrClass: number;
  private readonly logger: Logger;
  private readonly random: RandomSource | undefined;
  private callback: ResolutionCallback | null;
  private current: SessionState = 'pending';
  private cancelRequested = false;
  private srvAnswers: SrvAnswer[] = [];
  private rawAnswers: RawAnswer[] = [];
  private dropped = 0;

  constructor(options: SessionOptions, callback: ResolutionCallback) {
    this.name = options.name;
    this.rrType = options.rrType;
    this.rrClass = options.rrClass;
    this.logger = options.logger;
    this.random = options.random;
    this.callback = callback;
  }

  get state(): SessionState {
    return this.current;
  }

  get cancelled(): boolean {
    return this.cancelRequested;
  }

  get terminated(): boolean {
    return this.current === 'completed' || this.current === 'failed';
  }

  addRecord(record: RawRecord): void {
    if (!this.accepting('addRecord')) return;
    this.current = 'collecting';

    if (record.rrType !== this.rrType || record.rrClass !== this.rrClass) {
      this.drop('question-mismatch', record);
      return;
    }

    const meta = { rrType: record.rrType, rrClass: record.rrClass, ttl: record.ttl, data: record.data };

    if (this.rrType !== RecordType.SRV) {
      const answer: RawAnswer = { kind: 'raw', ...meta };
      this.rawAnswers.push(Object.freeze(answer));
      return;
    }

    const parsed = parseSrvRecord(record.data, record.context);
    if (!parsed.ok) {
      this.drop(parsed.reason, record);
      return;
    }
    const answer: SrvAnswer = { kind: 'srv', ...meta, ...parsed.record };
    this.srvAnswers.push(Object.freeze(answer));
  }

  complete(metadata: AnswerMetadata): void {
    if (!this.accepting('complete')) return;
    this.current = 'finalizing';

    const records: AnswerRecord[] =
      this.rrType === RecordType.SRV ? sortSrvRecords(this.srvAnswers, this.random) : this.rawAnswers;

    this.finish('completed', {
      ok: true,
      result: {
        name: this.name,
        rrType: this.rrType,
        rrClass: this.rrClass,
        canonical: metadata.canonical,
        rcode: metadata.rcode,
        secure: metadata.secure ?? false,
        bogus: metadata.bogus ?? false,
        answer: metadata.answer,
        records,
        lowestTtl: records.reduce((lowest, record) => Math.min(lowest, record.ttl), records[0]?.ttl ?? 0),
        dropped: this.dropped,
      },
    });
  }

  fail(error: ResolutionError): void {
    if (!this.accepting('fail')) return;
    this.finish('failed', { ok: false, name: this.name, error });
  }

  /**
   * Mark the session cancelled and fail it. The caller has already had the
   * backend agree to stop.
   */
  cancel(): void {
    if (this.terminated) return;
    this.cancelRequested = true;
    this.finish('failed', { ok: false, name: this.name, error: ResolutionError.cancelled(this.name) });
  }

  private accepting(operation: string): boolean {
    if (this.terminated) {
      this.logger.debug({ name: this.name, state: this.current, operation }, 'Ignoring backend call on finished query');
      return false;
    }
    return true;
  }

  private drop(reason: string, record: RawRecord): void {
    this.dropped++;
    this.logger.debug(
      { name: this.name, reason, rrType: record.rrType, rrClass: record.rrClass, length: record.data.length },
      'Dropped answer record'
    );
  }

  private finish(state: 'completed' | 'failed', outcome: ResolutionOutcome): void {
    const callback = this.callback;
    this.current = state;
    this.callback = null;
    this.srvAnswers = [];
    this.rawAnswers = [];

    if (outcome.ok) {
      this.logger.debug(
        { name: this.name, records: outcome.result.records.length, dropped: outcome.result.dropped },
        'Resolution completed'
      );
    } else {
      this.logger.debug({ name: this.name, type: outcome.error.type, code: outcome.error.code }, 'Resolution failed');
    }

    if (!callback) return;
    // Caller exceptions never reach the backend
    try {
      callback(outcome);
    } catch (error) {
      this.logger.error({ name: this.name, error }, 'Resolution callback threw');
    }
  }
}
