export type { SrvRecord, SrvParseResult, SrvRejectReason, SrvField, EncodeSrvOptions } from './record.js';
export {
  SRV_FIXED_LENGTH,
  parseSrvRecord,
  createSrvRecord,
  encodeSrvRecord,
  formatSrvRecord,
} from './record.js';
export type { Prioritized, PriorityGroup } from './group.js';
export { groupByPriority } from './group.js';
export type { RandomSource } from './select.js';
export { cryptoRandom, selectByWeight } from './select.js';
export { assemble, sortSrvRecords } from './assemble.js';
