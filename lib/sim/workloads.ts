import { ConfigurationError } from "./errors";
import {
  SeededRng,
  sampleExponential,
  samplePoisson,
} from "./random";
import type { TrafficPattern, TrafficPatternId, TrafficSpike } from "./types";

export type Workload = {
  id: TrafficPatternId;
  name: string;
  description: string;
};

export const workloads: Workload[] = [
  {
    id: "poisson",
    name: "Poisson",
    description: "Memoryless arrivals with exponential inter-arrival gaps.",
  },
  {
    id: "constant",
    name: "Constant",
    description: "Evenly spaced arrivals starting at t=0.",
  },
  {
    id: "periodic",
    name: "Periodic",
    description: "Sinusoidal rate around the base over a fixed period.",
  },
  {
    id: "wave",
    name: "Wave",
    description: "Sine or square wave rate modulation.",
  },
  {
    id: "bursty",
    name: "Bursty",
    description: "Clusters of back-to-back arrivals at a fixed burst interval.",
  },
  {
    id: "exponential-burst",
    name: "Exponential Burst",
    description: "Bursts at random intervals with exponentially sized clusters.",
  },
];

export const getWorkload = (id: TrafficPatternId) => {
  const workload = workloads.find((item) => item.id === id);
  if (!workload) {
    throw new ConfigurationError(`Unknown traffic pattern: ${id}`);
  }
  return workload;
};

export type TrafficGenerator = {
  /** Delay in ms from `nowMs` to the next arrival, `Infinity` once none remain. */
  next: (nowMs: number) => number;
  /** Instantaneous mean arrival rate at `nowMs`, spikes included. */
  rateRps: (nowMs: number) => number;
};

type GeneratorOptions = {
  spikes?: readonly TrafficSpike[];
  /** Arrivals past this point are never produced. */
  horizonMs?: number;
};

/** Product of the multipliers of every spike active at `timeMs`. */
export const spikeFactor = (spikes: readonly TrafficSpike[], timeMs: number) => {
  const timeSec = timeMs / 1000;
  let factor = 1;
  for (const spike of spikes) {
    if (timeSec >= spike.startSec && timeSec < spike.startSec + spike.durationSec) {
      factor *= spike.intensityMultiplier;
    }
  }
  return factor;
};

const maxSpikeFactor = (spikes: readonly TrafficSpike[]) =>
  spikes.reduce((product, spike) => product * Math.max(1, spike.intensityMultiplier), 1);

/**
 * Non-homogeneous Poisson arrivals by thinning: candidates come at the
 * peak rate and are kept with probability rate(t) / peak.
 */
const thinnedPoisson = (
  rng: SeededRng,
  rateAt: (timeMs: number) => number,
  peakRps: number,
  horizonMs: number
): TrafficGenerator["next"] => {
  return (nowMs) => {
    if (peakRps <= 0) return Infinity;
    const meanGapMs = 1000 / peakRps;
    let candidate = nowMs;
    while (candidate <= horizonMs) {
      candidate += sampleExponential(rng, meanGapMs);
      if (rng.next() * peakRps < rateAt(candidate)) {
        return candidate - nowMs;
      }
    }
    return Infinity;
  };
};

const modulated = (
  rateRps: number,
  amplitudeFactor: number,
  wave: (timeSec: number) => number
) => (timeMs: number) =>
  Math.max(0, rateRps * (1 + amplitudeFactor * wave(timeMs / 1000)));

const burstGenerator = (
  firstBurstMs: number,
  nextGapMs: () => number,
  burstSize: (startMs: number) => number,
  intraBurstGapMs: number,
  horizonMs: number
): TrafficGenerator["next"] => {
  let burstStartMs = firstBurstMs;
  let remaining = 0;
  let started = false;

  return (nowMs) => {
    if (remaining > 0) {
      remaining -= 1;
      return intraBurstGapMs;
    }
    if (started) {
      burstStartMs += nextGapMs();
    }
    started = true;
    if (burstStartMs > horizonMs) return Infinity;
    remaining = Math.max(0, burstSize(burstStartMs) - 1);
    return Math.max(0, burstStartMs - nowMs);
  };
};

export const createTrafficGenerator = (
  pattern: TrafficPattern,
  rng: SeededRng,
  options: GeneratorOptions = {}
): TrafficGenerator => {
  const spikes = options.spikes ?? [];
  const horizonMs = options.horizonMs ?? Infinity;
  const peakSpike = maxSpikeFactor(spikes);

  switch (pattern.id) {
    case "poisson": {
      const rateRps = (timeMs: number) =>
        Math.max(0, pattern.rateRps * spikeFactor(spikes, timeMs));
      return {
        rateRps,
        next: thinnedPoisson(rng, rateRps, pattern.rateRps * peakSpike, horizonMs),
      };
    }
    case "constant": {
      const rateRps = (timeMs: number) =>
        Math.max(0, pattern.rateRps * spikeFactor(spikes, timeMs));
      let first = true;
      return {
        rateRps,
        next: (nowMs) => {
          const rate = rateRps(nowMs);
          if (first) {
            first = false;
            return rate > 0 ? 0 : Infinity;
          }
          return rate > 0 ? 1000 / rate : Infinity;
        },
      };
    }
    case "periodic": {
      const base = modulated(pattern.rateRps, pattern.amplitudeFactor, (timeSec) =>
        Math.sin((2 * Math.PI * timeSec) / pattern.periodSec)
      );
      const rateRps = (timeMs: number) => base(timeMs) * spikeFactor(spikes, timeMs);
      const peak = pattern.rateRps * (1 + Math.abs(pattern.amplitudeFactor)) * peakSpike;
      return { rateRps, next: thinnedPoisson(rng, rateRps, peak, horizonMs) };
    }
    case "wave": {
      const base = modulated(pattern.rateRps, pattern.amplitudeFactor, (timeSec) => {
        const phase = Math.sin((2 * Math.PI * timeSec) / pattern.wavePeriodSec);
        if (pattern.waveType === "square") return phase >= 0 ? 1 : -1;
        return phase;
      });
      const rateRps = (timeMs: number) => base(timeMs) * spikeFactor(spikes, timeMs);
      const peak = pattern.rateRps * (1 + Math.abs(pattern.amplitudeFactor)) * peakSpike;
      return { rateRps, next: thinnedPoisson(rng, rateRps, peak, horizonMs) };
    }
    case "bursty": {
      const intervalMs = pattern.burstIntervalSec * 1000;
      return {
        rateRps: (timeMs) =>
          (pattern.burstSizeMean / pattern.burstIntervalSec) * spikeFactor(spikes, timeMs),
        next: burstGenerator(
          0,
          () => intervalMs,
          (startMs) =>
            Math.max(1, samplePoisson(rng, pattern.burstSizeMean * spikeFactor(spikes, startMs))),
          pattern.intraBurstGapMs,
          horizonMs
        ),
      };
    }
    case "exponential-burst": {
      const meanGapMs = pattern.burstRate > 0 ? 1000 / pattern.burstRate : Infinity;
      return {
        rateRps: (timeMs) =>
          pattern.burstRate * pattern.meanBurstSize * spikeFactor(spikes, timeMs),
        next: burstGenerator(
          sampleExponential(rng, meanGapMs),
          () => sampleExponential(rng, meanGapMs),
          (startMs) =>
            Math.max(
              1,
              Math.floor(
                sampleExponential(rng, pattern.meanBurstSize) * spikeFactor(spikes, startMs)
              )
            ),
          pattern.intraBurstGapMs,
          horizonMs
        ),
      };
    }
  }
};
