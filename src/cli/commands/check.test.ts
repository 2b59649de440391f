/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { checkEnvironment, formatResult, runCheck } from './check.js';

describe('checkEnvironment', () => {
  it('lists effective settings when valid', () => {
    expect(checkEnvironment({ SRV_DNS_SERVERS: '192.0.2.53' })).toEqual([
      { name: 'Nameservers', status: 'ok', message: '192.0.2.53' },
      { name: 'Timeout', status: 'ok', message: '3000ms' },
      { name: 'Tries', status: 'ok', message: '2' },
      { name: 'Log Level', status: 'ok', message: 'info' },
    ]);
  });

  it('reports the system default when no servers are set', () => {
    expect(checkEnvironment({})[0]).toEqual({ name: 'Nameservers', status: 'ok', message: 'system default' });
  });

  it('reports each invalid variable', () => {
    const results = checkEnvironment({ SRV_QUERY_TIMEOUT: '-5', LOG_LEVEL: 'loud' });

    expect(results.map((r) => [r.name, r.status])).toEqual([
      ['SRV_QUERY_TIMEOUT', 'error'],
      ['LOG_LEVEL', 'error'],
    ]);
  });
});

describe('formatResult', () => {
  it('prefixes status icons', () => {
    expect(formatResult({ name: 'Timeout', status: 'ok', message: '3000ms' })).toBe('[OK] Timeout: 3000ms');
    expect(formatResult({ name: 'LOG_LEVEL', status: 'error', message: 'bad' })).toBe('[FAIL] LOG_LEVEL: bad');
  });
});

describe('runCheck', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.SRV_DNS_SERVERS;
    delete process.env.SRV_QUERY_TIMEOUT;
    delete process.env.SRV_QUERY_TRIES;
    delete process.env.LOG_LEVEL;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it('returns 0 for a valid environment', () => {
    expect(runCheck()).toBe(0);
    expect(console.log).toHaveBeenLastCalledWith('\nAll checks passed.');
  });

  it('returns 1 for an invalid environment', () => {
    process.env.SRV_DNS_SERVERS = 'not-an-ip';

    expect(runCheck()).toBe(1);
    expect(console.log).toHaveBeenLastCalledWith('\nConfiguration invalid.');
  });
});
