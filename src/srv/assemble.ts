import { groupByPriority, type PriorityGroup, type Prioritized } from './group.js';
import { cryptoRandom, selectByWeight, type RandomSource } from './select.js';

/** Concatenate already-ordered groups, lowest priority value first */
export function assemble<T extends Prioritized>(groups: readonly PriorityGroup<T>[]): T[] {
  return groups.flatMap((group) => group.records);
}

/**
 * Produce the final failover order for a set of SRV records:
 * ascending priority, weighted-random within each priority.
 */
export function sortSrvRecords<T extends Prioritized>(
  records: readonly T[],
  random: RandomSource = cryptoRandom
): T[] {
  const groups = groupByPriority(records).map((group) => ({
    priority: group.priority,
    records: selectByWeight(group.records, random),
  }));
  return assemble(groups);
}
