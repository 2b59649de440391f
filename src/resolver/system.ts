/**
 * Backend on the system stub resolver (c-ares through node:dns).
 * node:dns hands back parsed SRV records without TTLs, so they are encoded
 * again and wrapped in a response message before delivery.
 */
import { promises as dns, type SrvRecord } from 'node:dns';
import type { Config } from '../config/schema.js';
import type { Logger } from '../config/logger.js';
import { RecordClass, RecordType, Rcode } from '../dns/constants.js';
import { buildResponse } from '../dns/message.js';
import { ResolutionError } from '../errors.js';
import { encodeSrvRecord } from '../srv/record.js';
import type { QueryHandle, ResolverBackend } from './types.js';

export type SystemBackendConfig = Pick<Config, 'SRV_DNS_SERVERS' | 'SRV_QUERY_TIMEOUT' | 'SRV_QUERY_TRIES'>;


export class SystemResolverBackend implements ResolverBackend {
  readonly name = 'system';
  private readonly config: SystemBackendConfig;
  private readonly logger: Logger | undefined;
  private readonly inflight = new Map<QueryHandle, dns.Resolver>();

  constructor(config: SystemBackendConfig, logger?: Logger) {
    this.config = config;
    this.logger = logger;
  }

  async resolve(query: QueryHandle): Promise<void> {
    if (query.rrType !== RecordType.SRV || query.rrClass !== RecordClass.IN) {
      query.fail(ResolutionError.backendFailure(query.name, 'NOTIMP'));
      return;
    }

    const resolver = new dns.Resolver({ timeout: this.config.SRV_QUERY_TIMEOUT, tries: this.config.SRV_QUERY_TRIES });
    if (this.config.SRV_DNS_SERVERS.length > 0) {
      resolver.setServers(this.config.SRV_DNS_SERVERS);
    }

    this.inflight.set(query, resolver);
    try {
      const records = await resolver.resolveSrv(query.name);
      this.deliver(query, records, Rcode.NOERROR);
    } catch (error) {
      this.handleError(query, error);
    } finally {
      this.inflight.delete(query);
    }
  }

  cancel(query: QueryHandle): boolean {
    const resolver = this.inflight.get(query);
    if (!resolver) {
      return false;
    }
    resolver.cancel();
    return true;
  }

  private deliver(query: QueryHandle, records: SrvRecord[], rcode: number): void {
    if (query.cancelled) return;

    const built = buildResponse(
      query.name,
      RecordType.SRV,
      RecordClass.IN,
      records.map((record) => ({
        rrType: RecordType.SRV,
        ttl: 0, // not exposed by node:dns
        data: encodeSrvRecord({
          priority: record.priority,
          weight: record.weight,
          port: record.port,
          target: record.name,
        }),
      })),
      { rcode }
    );

    for (const answer of built.answers) {
      query.addRecord({
        rrType: answer.rrType,
        rrClass: answer.rrClass,
        ttl: answer.ttl,
        data: answer.data,
        context: { message: built.message, offset: answer.offset },
      });
    }
    query.complete({ rcode, canonical: query.name, answer: built.message });
  }

  private handleError(query: QueryHandle, error: unknown): void {
    const code = errorCode(error);

    // No SRV records at this name, or no such name: both are answers
    if (code === 'ENODATA') {
      this.deliver(query, [], Rcode.NOERROR);
      return;
    }
    if (code === 'ENOTFOUND') {
      this.deliver(query, [], Rcode.NXDOMAIN);
      return;
    }
    if (code === 'ECANCELLED' && query.cancelled) {
      return;
    }

    this.logger?.warn({ name: query.name, code, error }, 'SRV query failed');
    if (code === 'ETIMEOUT') {
      query.fail(ResolutionError.timeout(query.name, this.config.SRV_QUERY_TIMEOUT));
      return;
    }
    query.fail(ResolutionError.backendFailure(query.name, code ?? 'UNKNOWN', error));
  }
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
