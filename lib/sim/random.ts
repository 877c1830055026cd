/**
 * Seedable pseudo-random number generator (mulberry32).
 * Every stochastic choice in a run draws from one of these, so a run is
 * reproducible from its seed alone.
 */
export class SeededRng {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max]. */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Independent stream for one component. Streams with different labels
   * never share draws, so e.g. adding a server does not shift arrivals.
   */
  fork(label: string): SeededRng {
    let hash = 0x811c9dc5 ^ (this.seed >>> 0);
    for (let i = 0; i < label.length; i += 1) {
      hash ^= label.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193);
    }
    return new SeededRng(hash >>> 0);
  }
}

// keeps log() finite
const openUnit = (rng: SeededRng) => 1 - rng.next();

export const sampleNormal = (rng: SeededRng, mean: number, stddev: number) => {
  if (stddev <= 0) return mean;
  const u1 = openUnit(rng);
  const u2 = rng.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + stddev * z;
};

/** Log-normal whose own mean and stddev are the given values. */
export const sampleLogNormal = (rng: SeededRng, mean: number, stddev: number) => {
  if (stddev <= 0 || mean <= 0) return mean;
  const variance = Math.log(1 + (stddev / mean) ** 2);
  const mu = Math.log(mean) - variance / 2;
  return Math.exp(sampleNormal(rng, mu, Math.sqrt(variance)));
};

export const sampleExponential = (rng: SeededRng, mean: number) => {
  if (mean <= 0) return 0;
  if (!Number.isFinite(mean)) return Infinity;
  return -Math.log(openUnit(rng)) * mean;
};

/** Knuth's inversion; fine for the small means burst sizes use. */
export const samplePoisson = (rng: SeededRng, mean: number) => {
  if (mean <= 0) return 0;
  if (mean > 500) {
    return Math.max(0, Math.round(sampleNormal(rng, mean, Math.sqrt(mean))));
  }
  let count = 0;
  let probability = Math.exp(-mean);
  let cumulative = probability;
  const u = rng.next();
  while (u > cumulative && probability > 0) {
    count += 1;
    probability *= mean / count;
    cumulative += probability;
  }
  return count;
};
