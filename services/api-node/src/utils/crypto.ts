import crypto from "node:crypto";

/**
 * Deterministic stream of 32-bit words derived from a seed by hashing
 * `seed|counter`. Same seed, same stream.
 */
export function seededWords(seed: string): () => number {
  let counter = 0;
  let buffer = Buffer.alloc(0);
  let offset = 0;
  return () => {
    if (offset + 4 > buffer.length) {
      buffer = crypto.createHash("sha256").update(`${seed}|${counter}`).digest();
      counter += 1;
      offset = 0;
    }
    const word = buffer.readUInt32BE(offset);
    offset += 4;
    return word;
  };
}

/** Fisher-Yates shuffle over a copy, using `seededWords` for randomness. */
export function seededShuffle<T>(items: readonly T[], seed: string): T[] {
  const next = seededWords(seed);
  const shuffled = [...items];
  for (let index = shuffled.length - 1; index > 0; index -= 1) {
    const swap = next() % (index + 1);
    const current = shuffled[index];
    shuffled[index] = shuffled[swap];
    shuffled[swap] = current;
  }
  return shuffled;
}

/** Source of unpredictable seeds for random payout queues. */
export interface RandomSource {
  seed(): string;
}

export const cryptoRandomSource: RandomSource = {
  seed: () => crypto.randomBytes(32).toString("hex"),
};
