/**
 * Unpredictable randomness for every seating decision.
 *
 * Shuffles, weighted draws and room codes all come from the OS CSPRNG so
 * that nobody can replay or anticipate a seating. Tests pass their own
 * RandomSource instead of patching globals.
 */
import { randomInt } from "crypto";
import { customAlphabet } from "nanoid";

export interface RandomSource {
  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number;
  /** Uniform float in [0, 1). */
  nextFloat(): number;
}

// randomInt takes a range of at most 2^48 - 1
const FLOAT_RESOLUTION = 2 ** 48 - 1;

export const cryptoRandom: RandomSource = {
  nextInt(maxExclusive: number): number {
    if (maxExclusive <= 1) return 0;
    return randomInt(maxExclusive);
  },
  nextFloat(): number {
    return randomInt(FLOAT_RESOLUTION) / FLOAT_RESOLUTION;
  },
};

/**
 * Fisher-Yates shuffle in place.
 */
export function shuffleInPlace<T>(
  items: T[],
  random: RandomSource = cryptoRandom,
): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    [items[i], items[j]] = [items[j]!, items[i]!];
  }
  return items;
}

export function shuffled<T>(
  items: readonly T[],
  random: RandomSource = cryptoRandom,
): T[] {
  return shuffleInPlace([...items], random);
}

/**
 * Pick one item with probability proportional to its weight. Falls back to
 * the last item if floating point accumulation leaves a gap at the top.
 */
export function weightedPick<T>(
  items: readonly T[],
  weightOf: (item: T) => number,
  random: RandomSource = cryptoRandom,
): T {
  if (items.length === 0) throw new Error("weightedPick: no items");
  if (items.length === 1) return items[0]!;

  const weights = items.map(weightOf);
  const total = weights.reduce((sum, w) => sum + w, 0);
  const target = random.nextFloat() * total;

  let cumulative = 0;
  for (let i = 0; i < items.length; i++) {
    cumulative += weights[i]!;
    if (target < cumulative) return items[i]!;
  }
  return items[items.length - 1]!;
}

// No 0/O, 1/I/L: codes get read aloud across a room.
export const ROOM_CODE_ALPHABET = "ABCDEFGHJKMNPQRSTUVWXYZ23456789";

const roomCode = customAlphabet(ROOM_CODE_ALPHABET, 6);

export function generateRoomCode(length: number): string {
  return roomCode(length);
}
