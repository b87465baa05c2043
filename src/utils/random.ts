export interface RandomSource {
  /** Integer drawn from the closed range [min, max]. */
  nextInt(min: number, max: number): number;
}

const SOURCE_RANGE = 2 ** 32;

/**
 * Draws a 32-bit value from Math.random and reduces it modulo the range.
 * The modulo bias is at most range / 2^32, which is negligible for octets
 * and for any realistic registry size. Not suitable for secrets.
 */
export function createDefaultRandomSource(): RandomSource {
  return {
    nextInt(min: number, max: number): number {
      if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
        throw new RangeError(`Invalid random range [${min}, ${max}]`);
      }
      const range = max - min + 1;
      const raw = Math.floor(Math.random() * SOURCE_RANGE);
      return min + (raw % range);
    },
  };
}

export function randomByte(random: RandomSource): number {
  return random.nextInt(0, 255);
}
