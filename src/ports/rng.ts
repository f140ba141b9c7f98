/**
 * RNG port interface.
 * All randomness goes through here so tests can pin it down.
 */
export interface RngPort {
  /**
   * Get random float in [0, 1).
   */
  nextFloat(): number;
}

export const mathRng: RngPort = {
  nextFloat: () => Math.random(),
};

/**
 * Replays the given floats in order, wrapping around.
 */
export function fixedRng(values: readonly number[]): RngPort {
  if (values.length === 0) throw new Error("fixedRng needs at least one value");
  let i = 0;
  return {
    nextFloat: () => values[i++ % values.length],
  };
}
