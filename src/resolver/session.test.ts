/**
 * Resolution session state machine tests
 */
import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ResolutionSession } from './session.js';
import { RecordClass, RecordType, Rcode } from '../dns/constants.js';
import { ResolutionError } from '../errors.js';
import { encodeSrvRecord } from '../srv/record.js';
import type { ResolutionOutcome } from './types.js';
import type { Logger } from '../config/logger.js';
import { createMockLogger } from '../../tests/helpers/logger.js';
import { scriptedRandom } from '../../tests/helpers/random.js';

const answer = Uint8Array.from([0xde, 0xad]);

function srv(priority: number, weight: number, port: number, target: string, ttl = 300) {
  return {
    rrType: RecordType.SRV,
    rrClass: RecordClass.IN,
    ttl,
    data: encodeSrvRecord({ priority, weight, port, target }),
  };
}

describe('ResolutionSession', () => {
  let logger: Logger;
  let callback: Mock<(outcome: ResolutionOutcome) => void>;

  const createSession = (rrType: number = RecordType.SRV, random = scriptedRandom(0, 0, 0, 0)) =>
    new ResolutionSession({ name: '_sip._udp.example.com', rrType, rrClass: RecordClass.IN, logger, random }, callback);

  beforeEach(() => {
    logger = createMockLogger();
    callback = vi.fn<(outcome: ResolutionOutcome) => void>();
  });

  it('starts pending and moves to collecting on the first record', () => {
    const session = createSession();
    expect(session.state).toBe('pending');

    session.addRecord(srv(10, 10, 5060, 'goose.down'));

    expect(session.state).toBe('collecting');
    expect(callback).not.toHaveBeenCalled();
  });

  it('delivers a single record with all fields intact', () => {
    const session = createSession();
    const record = srv(10, 10, 5060, 'goose.down', 12345);

    session.addRecord(record);
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });

    expect(session.state).toBe('completed');
    expect(callback).toHaveBeenCalledOnce();
    expect(callback).toHaveBeenCalledWith({
      ok: true,
      result: {
        name: '_sip._udp.example.com',
        rrType: RecordType.SRV,
        rrClass: RecordClass.IN,
        canonical: 'goose.feathers',
        rcode: Rcode.NOERROR,
        secure: false,
        bogus: false,
        answer,
        records: [
          {
            kind: 'srv',
            rrType: RecordType.SRV,
            rrClass: RecordClass.IN,
            ttl: 12345,
            data: record.data,
            priority: 10,
            weight: 10,
            port: 5060,
            target: 'goose.down',
          },
        ],
        lowestTtl: 12345,
        dropped: 0,
      },
    });
  });

  it('orders records by priority on completion', () => {
    const session = createSession();

    session.addRecord(srv(20, 10, 5060, 'tacos'));
    session.addRecord(srv(10, 10, 5060, 'goose.down'));
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });

    const outcome = callback.mock.calls[0][0];
    if (!outcome.ok) throw new Error('expected success');
    expect(outcome.result.records.map((r) => (r.kind === 'srv' ? r.target : null))).toEqual(['goose.down', 'tacos']);
  });

  it('drops invalid records without failing the resolution', () => {
    const session = createSession();

    session.addRecord({ ...srv(10, 10, 5060, 'tacos.com'), data: Uint8Array.from([0, 10]) });
    session.addRecord({ ...srv(10, 10, 5060, 'tacos.com'), data: Uint8Array.from([0, 10, 0, 10, 0x13, 0xc4]) });
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });

    const outcome = callback.mock.calls[0][0];
    if (!outcome.ok) throw new Error('expected success');
    expect(outcome.result.records).toEqual([]);
    expect(outcome.result.dropped).toBe(2);
    expect(outcome.result.lowestTtl).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith(
      expect.objectContaining({ reason: 'truncated-fixed-fields' }),
      'Dropped answer record'
    );
    expect(logger.debug).toHaveBeenCalledWith(expect.objectContaining({ reason: 'truncated-name' }), 'Dropped answer record');
  });

  it('drops records that do not match the question', () => {
    const session = createSession();

    session.addRecord({ ...srv(1, 1, 1, 'a'), rrType: RecordType.A, data: Uint8Array.from([192, 0, 2, 1]) });
    session.addRecord({ ...srv(1, 1, 1, 'b'), rrClass: RecordClass.CH });
    session.addRecord(srv(1, 1, 1, 'c', 60));
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });

    const outcome = callback.mock.calls[0][0];
    if (!outcome.ok) throw new Error('expected success');
    expect(outcome.result.records).toHaveLength(1);
    expect(outcome.result.dropped).toBe(2);
    expect(outcome.result.lowestTtl).toBe(60);
  });

  it('keeps non-SRV answers raw and in arrival order', () => {
    const session = createSession(RecordType.A);
    const first = Uint8Array.from([192, 0, 2, 2]);
    const second = Uint8Array.from([192, 0, 2, 1]);

    session.addRecord({ rrType: RecordType.A, rrClass: RecordClass.IN, ttl: 30, data: first });
    session.addRecord({ rrType: RecordType.A, rrClass: RecordClass.IN, ttl: 20, data: second });
    session.complete({ rcode: Rcode.NOERROR, canonical: 'example.com', answer, secure: true });

    const outcome = callback.mock.calls[0][0];
    if (!outcome.ok) throw new Error('expected success');
    expect(outcome.result.records).toEqual([
      { kind: 'raw', rrType: RecordType.A, rrClass: RecordClass.IN, ttl: 30, data: first },
      { kind: 'raw', rrType: RecordType.A, rrClass: RecordClass.IN, ttl: 20, data: second },
    ]);
    expect(outcome.result.lowestTtl).toBe(20);
    expect(outcome.result.secure).toBe(true);
  });

  it('completes with an empty list when nothing was delivered', () => {
    const session = createSession();

    session.complete({ rcode: Rcode.NXDOMAIN, canonical: '_sip._udp.example.com', answer });

    const outcome = callback.mock.calls[0][0];
    if (!outcome.ok) throw new Error('expected success');
    expect(outcome.result.records).toEqual([]);
    expect(outcome.result.rcode).toBe(Rcode.NXDOMAIN);
  });

  it('fails with the backend error and no records', () => {
    const session = createSession();
    const error = ResolutionError.backendFailure('_sip._udp.example.com', 'ECONNREFUSED');

    session.addRecord(srv(10, 10, 5060, 'goose.down'));
    session.fail(error);

    expect(session.state).toBe('failed');
    expect(callback).toHaveBeenCalledOnce();
    expect(callback).toHaveBeenCalledWith({ ok: false, name: '_sip._udp.example.com', error });
  });

  it('invokes the callback exactly once and ignores later backend calls', () => {
    const session = createSession();

    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });
    session.addRecord(srv(10, 10, 5060, 'late'));
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });
    session.fail(ResolutionError.backendFailure('x', 'late'));
    session.cancel();

    expect(callback).toHaveBeenCalledOnce();
    expect(session.state).toBe('completed');
    expect(session.cancelled).toBe(false);
    expect(logger.debug).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'addRecord', state: 'completed' }),
      'Ignoring backend call on finished query'
    );
  });

  it('logs a throwing callback instead of passing the exception to the backend', () => {
    const failure = new Error('caller broke');
    callback.mockImplementation(() => {
      throw failure;
    });
    const session = createSession();

    expect(() => session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer })).not.toThrow();

    expect(session.state).toBe('completed');
    expect(callback).toHaveBeenCalledOnce();
    expect(logger.error).toHaveBeenCalledWith(
      { name: '_sip._udp.example.com', error: failure },
      'Resolution callback threw'
    );
  });

  it('fails with a cancellation error and raises the cancelled flag', () => {
    const session = createSession();

    session.addRecord(srv(10, 10, 5060, 'goose.down'));
    session.cancel();
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });

    expect(session.cancelled).toBe(true);
    expect(session.state).toBe('failed');
    expect(callback).toHaveBeenCalledOnce();
    const outcome = callback.mock.calls[0][0];
    if (outcome.ok) throw new Error('expected failure');
    expect(outcome.error.type).toBe('cancelled');
  });

  it('uses the injected random source for weight ordering', () => {
    // total 30: draw 25 lands on the weight-20 record
    const session = createSession(RecordType.SRV, scriptedRandom(25, 0));

    session.addRecord(srv(10, 10, 5060, 'tacos'));
    session.addRecord(srv(10, 20, 5060, 'goose.down'));
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });

    const outcome = callback.mock.calls[0][0];
    if (!outcome.ok) throw new Error('expected success');
    expect(outcome.result.records.map((r) => (r.kind === 'srv' ? r.target : null))).toEqual(['goose.down', 'tacos']);
  });

  it('hands out frozen records', () => {
    const session = createSession();

    session.addRecord(srv(10, 10, 5060, 'goose.down'));
    session.complete({ rcode: Rcode.NOERROR, canonical: 'goose.feathers', answer });

    const outcome = callback.mock.calls[0][0];
    if (!outcome.ok) throw new Error('expected success');
    expect(Object.isFrozen(outcome.result.records[0])).toBe(true);
  });
});
