import type { RandomSource } from '../../src/srv/select.js';

/**
 * Random source replaying fixed draws. Records every requested bound in
 * `bounds` and throws when a draw is out of range or the script runs out.
 */
export function scriptedRandom(...draws: number[]): RandomSource & { bounds: number[] } {
  const bounds: number[] = [];
  const source = (maxExclusive: number): number => {
    bounds.push(maxExclusive);
    const draw = draws.shift();
    if (draw === undefined) {
      throw new Error(`No scripted draw left for bound ${maxExclusive}`);
    }
    if (draw < 0 || draw >= maxExclusive) {
      throw new Error(`Scripted draw ${draw} outside [0, ${maxExclusive})`);
    }
    return draw;
  };
  return Object.assign(source, { bounds });
}
