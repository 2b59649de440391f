/**
 * Resolve command - print the failover order for a service name.
 */
import { loadConfig } from '../../config/schema.js';
import { createLogger } from '../../config/logger.js';
import { RecordClass, parseRecordType, rcodeName, recordTypeName } from '../../dns/constants.js';
import { formatCliError } from '../../errors.js';
import { DnsResolver } from '../../resolver/resolver.js';
import { SystemResolverBackend } from '../../resolver/system.js';
import type { AnswerRecord, ResolutionResult, ResolverBackend } from '../../resolver/types.js';
import { formatSrvRecord } from '../../srv/record.js';

export interface ResolveCommandOptions {
  type?: string;
  service?: string;
  proto?: string;
  json?: boolean;
}

/**
 * Build the owner name of an SRV query: `_service._proto.name` when both
 * parts are given (leading underscores optional), otherwise `name` as is.
 */
export function serviceName(name: string, service?: string, proto?: string): string {
  if (!service || !proto) {
    return name;
  }
  const label = (part: string) => (part.startsWith('_') ? part : `_${part}`);
  return `${label(service)}.${label(proto)}.${name}`;
}

/**
 * Render one record as a text line.
 */
export function formatRecord(record: AnswerRecord): string {
  if (record.kind === 'srv') {
    return formatSrvRecord(record);
  }
  return `${recordTypeName(record.rrType)} ${Buffer.from(record.data).toString('hex')}`;
}

/**
 * JSON view of a result; RDATA of uninterpreted records is base64.
 */
export function toJson(result: ResolutionResult): Record<string, unknown> {
  return {
    name: result.name,
    canonical: result.canonical,
    type: recordTypeName(result.rrType),
    rcode: rcodeName(result.rcode),
    secure: result.secure,
    bogus: result.bogus,
    lowestTtl: result.lowestTtl,
    dropped: result.dropped,
    records: result.records.map((record) =>
      record.kind === 'srv'
        ? { priority: record.priority, weight: record.weight, port: record.port, target: record.target, ttl: record.ttl }
        : { type: recordTypeName(record.rrType), ttl: record.ttl, data: Buffer.from(record.data).toString('base64') }
    ),
  };
}

/**
 * Run a resolution and print the ordered records.
 * @param backend - Override the system resolver (used by tests)
 * @returns Process exit code
 */
export async function runResolve(
  name: string,
  options: ResolveCommandOptions = {},
  backend?: ResolverBackend
): Promise<number> {
  let config;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(formatCliError(error instanceof Error ? error : new Error(String(error))));
    return 1;
  }

  const rrType = parseRecordType(options.type ?? 'SRV');
  if (rrType === null) {
    console.error(`Unknown record type: ${options.type}`);
    return 1;
  }

  const logger = createLogger(config.LOG_LEVEL);
  const resolver = new DnsResolver(backend ?? new SystemResolverBackend(config, logger), { logger });
  const outcome = await resolver.resolve(serviceName(name, options.service, options.proto), rrType, RecordClass.IN);

  if (!outcome.ok) {
    console.error(formatCliError(outcome.error));
    return 1;
  }

  if (options.json) {
    console.log(JSON.stringify(toJson(outcome.result), null, 2));
    return 0;
  }

  if (outcome.result.records.length === 0) {
    logger.info({ name: outcome.result.name, rcode: rcodeName(outcome.result.rcode) }, 'No records found');
  }
  for (const record of outcome.result.records) {
    console.log(formatRecord(record));
  }
  return 0;
}
