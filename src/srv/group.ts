/**
 * Anything the SRV ordering can sort: the resolver orders full answer
 * records, not just bare SrvRecords.
 */
export interface Prioritized {
  readonly priority: number;
  readonly weight: number;
}

/** Records sharing one priority, in arrival order */
export interface PriorityGroup<T extends Prioritized> {
  priority: number;
  records: T[];
}

/**
 * Partition records by priority.
 * Groups come back in ascending priority; each group keeps arrival order.
 */
export function groupByPriority<T extends Prioritized>(records: readonly T[]): PriorityGroup<T>[] {
  const groups = new Map<number, T[]>();

  for (const record of records) {
    const group = groups.get(record.priority);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.priority, [record]);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([priority, members]) => ({ priority, records: members }));
}
