import type { World } from "../state";
import { createWorld } from "../world";

/** Deterministic PRNG so generated worlds are the same on every run. */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function rngInt(rng: () => number, min: number, maxInclusive: number): number {
  return Math.floor(rng() * (maxInclusive - min + 1)) + min;
}

/** Two small countries over the fixture vocabulary. */
export function randomWorld(seed: number): World {
  const rng = mulberry32(seed);
  const country = (name: string) => ({
    name,
    population: rngInt(rng, 1, 20),
    resources: {
      Timber: rngInt(rng, 1, 15),
      MetallicElements: rngInt(rng, 0, 4),
      Housing: rngInt(rng, 0, 3)
    }
  });
  return createWorld({ countries: [country("Atlantis"), country("Erewhon")] });
}
