/**
 * SRV resolution library: validation, RFC 2782 ordering and the resolver API.
 */
export * from './srv/index.js';
export * from './resolver/index.js';
export { RecordType, RecordClass, Rcode, recordTypeName, rcodeName, parseRecordType } from './dns/constants.js';
export { decodeName, encodeName } from './dns/name.js';
export type { MessageContext, NameDecodeResult } from './dns/name.js';
export { buildResponse } from './dns/message.js';
export { ResolutionError, formatCliError } from './errors.js';
export type { ResolutionErrorType } from './errors.js';
export { loadConfig } from './config/schema.js';
export type { Config } from './config/schema.js';
export { createLogger } from './config/logger.js';
export type { Logger } from './config/logger.js';
