/**
 * Weighted selection within one priority (RFC 2782, "Usage rules").
 */
import { randomInt } from 'node:crypto';
import type { Prioritized } from './group.js';

/**
 * Returns a uniformly distributed integer in `[0, maxExclusive)`.
 * `maxExclusive` is at least 1.
 */
export type RandomSource = (maxExclusive: number) => number;

/**
 * Default source backed by crypto.randomInt. Its range is capped at 2^48,
 * well above the largest possible weight sum (65535 * 65535).
 */
export const cryptoRandom: RandomSource = (maxExclusive) => randomInt(maxExclusive);

/**
 * Order one priority group by repeated weighted draws without replacement.
 *
 * Each round draws `r` in `[0, total)` over the remaining weights and takes
 * the first record whose running sum exceeds `r`, so a record is picked with
 * probability weight/total. Zero-weight records therefore only come out once
 * no positive weight is left; at that point the remaining ones are drawn
 * uniformly.
 *
 * @returns A new array holding a permutation of `group`
 */
export function selectByWeight<T extends Prioritized>(
  group: readonly T[],
  random: RandomSource = cryptoRandom
): T[] {
  const remaining = [...group];
  const ordered: T[] = [];
  // Weights are u16 and at most 65535 of them share a priority, so the sum
  // stays far below Number.MAX_SAFE_INTEGER
  let total = remaining.reduce((sum, record) => sum + record.weight, 0);

  while (remaining.length > 0) {
    const index = total === 0 ? random(remaining.length) : pickIndex(remaining, random(total));
    const [chosen] = remaining.splice(index, 1);
    total -= chosen.weight;
    ordered.push(chosen);
  }

  return ordered;
}

function pickIndex(records: readonly Prioritized[], draw: number): number {
  let running = 0;
  for (let i = 0; i < records.length; i++) {
    running += records[i].weight;
    if (running > draw) {
      return i;
    }
  }
  // Unreachable while draw < total
  throw new RangeError(`Random draw ${draw} outside weight total ${running}`);
}
