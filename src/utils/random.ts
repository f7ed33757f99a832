/**
 * Source of uniform draws in [0, 1). Swapped for a fixed sequence in tests.
 */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next(): number {
    return Math.random();
  },
};
