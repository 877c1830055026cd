import { z } from "zod";
import { algorithms } from "./algorithms";
import { ConfigurationError } from "./errors";
import { hardwareProfiles, languageProfiles } from "./profiles";
import type {
  HardwareProfile,
  LanguageProfile,
  ScenarioParameters,
  TrafficPattern,
  TrafficPatternId,
} from "./types";
import { workloads } from "./workloads";

export const LIMITS = {
  minDurationSec: 0.01,
  maxDurationSec: 86_400,
  minServers: 1,
  maxServers: 1000,
  maxRequestRateRps: 100_000,
  minTimeoutMs: 100,
  maxTimeoutMs: 3_600_000,
} as const;

const levenshtein = (a: string, b: string) => {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
};

/** Closest option within three edits, for "did you mean" hints. */
export const closestMatch = (value: string, options: readonly string[]) => {
  let best: string | undefined;
  let bestDistance = Infinity;
  for (const option of options) {
    const distance = levenshtein(value, option);
    if (distance < bestDistance) {
      best = option;
      bestDistance = distance;
    }
  }
  return bestDistance <= 3 ? best : undefined;
};

// accepts "ROUND_ROBIN", "round robin" and "round-robin" alike
const normalizeName = (value: string) => value.trim().toLowerCase().replace(/[_\s]+/g, "-");

const resolveName = <T extends string>(
  label: string,
  options: readonly T[],
  value: string,
  ctx: z.RefinementCtx
): T => {
  const normalized = normalizeName(value);
  const match = options.find((option) => option === normalized);
  if (match) return match;
  const hint = closestMatch(normalized, options);
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `Unknown ${label} "${value}"${hint ? ` (did you mean "${hint}"?)` : ""}`,
  });
  return z.NEVER;
};

const namedChoice = <T extends string>(label: string, options: readonly T[]) =>
  z.string().transform((value, ctx) => resolveName(label, options, value, ctx));

const customHardwareSchema = z.object({
  name: z.string().default("Custom"),
  cpuSpeedGhz: z.number().positive().default(2.4),
  memoryGb: z.number().positive().default(8),
  ioLatencyMs: z.number().min(0).default(5),
  processingPower: z.number().positive().default(1),
  cores: z.number().int().min(1).default(8),
});

const hardwareSchema = z
  .union([z.string(), customHardwareSchema])
  .transform((value, ctx): HardwareProfile => {
    if (typeof value !== "string") {
      return Object.freeze({ id: "custom", ...value });
    }
    const ids = hardwareProfiles.map((profile) => profile.id);
    const id = resolveName("hardware profile", ids, value, ctx);
    return hardwareProfiles.find((profile) => profile.id === id) ?? z.NEVER;
  });

const customLanguageSchema = z.object({
  name: z.string().default("Custom"),
  efficiencyFactor: z.number().positive(),
  memoryOverheadMb: z.number().min(0).default(0),
  startupTimeMs: z.number().min(0).default(0),
});

const languageSchema = z
  .union([z.string(), customLanguageSchema])
  .transform((value, ctx): LanguageProfile => {
    if (typeof value !== "string") {
      return Object.freeze({ id: "custom", ...value });
    }
    const ids = languageProfiles.map((profile) => profile.id);
    const id = resolveName("language", ids, value, ctx);
    return languageProfiles.find((profile) => profile.id === id) ?? z.NEVER;
  });

const spikeSchema = z.object({
  startSec: z.number().min(0),
  durationSec: z.number().min(0),
  intensityMultiplier: z.number().min(0),
});

const trafficOptionsSchema = z
  .object({
    periodSec: z.number().positive().default(3600),
    amplitudeFactor: z.number().min(0).optional(),
    wavePeriodSec: z.number().positive().default(60),
    waveType: z.enum(["sine", "square"]).default("sine"),
    burstSizeMean: z.number().min(0).default(5),
    burstIntervalSec: z.number().positive().default(2),
    burstRate: z.number().min(0).default(0.5),
    meanBurstSize: z.number().min(0).default(8),
    intraBurstGapMs: z.number().min(0).default(1),
  })
  .default({});

type TrafficOptions = z.output<typeof trafficOptionsSchema>;

export const scenarioSchema = z.object({
  name: z.string().trim().min(1, "Scenario name must be a non-empty string"),
  durationSec: z.number().min(LIMITS.minDurationSec).max(LIMITS.maxDurationSec).default(3600),
  servers: z.number().int().min(LIMITS.minServers).max(LIMITS.maxServers).default(1),
  workerSlots: z.number().int().min(1).optional(),
  hardware: hardwareSchema.default("standard"),
  language: languageSchema.default("python"),
  requestRateRps: z.number().min(0).max(LIMITS.maxRequestRateRps).default(10),
  trafficPattern: namedChoice(
    "traffic pattern",
    workloads.map((workload) => workload.id)
  ).default("poisson"),
  traffic: trafficOptionsSchema,
  spikes: z.array(spikeSchema).default([]),
  balancingStrategy: namedChoice(
    "load balancing strategy",
    algorithms.map((algorithm) => algorithm.id)
  ).default("round-robin"),
  weights: z.array(z.number().positive()).default([]),
  processingTimeMs: z.number().positive().default(250),
  processingTimeStddevMs: z.number().min(0).default(0),
  processingTimeDistribution: z.enum(["normal", "lognormal"]).default("normal"),
  minServiceTimeMs: z.number().min(0).default(0.1),
  networkLatencyMeanMs: z.number().min(0).default(0),
  networkLatencyStddevMs: z.number().min(0).default(0),
  requestTimeoutMs: z
    .number()
    .min(LIMITS.minTimeoutMs)
    .max(LIMITS.maxTimeoutMs)
    .nullable()
    .default(30_000),
  cpuDegradation: z.boolean().default(true),
  degradationThreshold: z.number().min(0).max(1).default(0.5),
  degradationGain: z.number().min(0).default(2),
  utilizationDecay: z.number().min(0).lt(1).default(0),
  seed: z.number().int().default(42),
  drain: z.boolean().default(true),
  timeScale: z.number().positive().default(1),
});

export type ScenarioInput = z.input<typeof scenarioSchema>;

const toTrafficPattern = (
  id: TrafficPatternId,
  rateRps: number,
  options: TrafficOptions
): TrafficPattern => {
  switch (id) {
    case "poisson":
    case "constant":
      return { id, rateRps };
    case "periodic":
      return {
        id,
        rateRps,
        periodSec: options.periodSec,
        amplitudeFactor: options.amplitudeFactor ?? 0.5,
      };
    case "wave":
      return {
        id,
        rateRps,
        wavePeriodSec: options.wavePeriodSec,
        amplitudeFactor: options.amplitudeFactor ?? 0.8,
        waveType: options.waveType,
      };
    case "bursty":
      return {
        id,
        burstSizeMean: options.burstSizeMean,
        burstIntervalSec: options.burstIntervalSec,
        intraBurstGapMs: options.intraBurstGapMs,
      };
    case "exponential-burst":
      return {
        id,
        burstRate: options.burstRate,
        meanBurstSize: options.meanBurstSize,
        intraBurstGapMs: options.intraBurstGapMs,
      };
  }
};

const formatIssue = (issue: z.ZodIssue) =>
  issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message;

/**
 * Validates a raw scenario (as read from JSON) and resolves it into the
 * immutable parameters the engine runs on. Every problem is reported at
 * once in a single `ConfigurationError`.
 */
export const parseScenario = (raw: unknown): ScenarioParameters => {
  const result = scenarioSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(formatIssue));
  }
  const input = result.data;

  return Object.freeze({
    name: input.name,
    durationMs: input.durationSec * 1000,
    serverCount: input.servers,
    workerSlots: input.workerSlots ?? input.hardware.cores,
    hardware: input.hardware,
    language: input.language,
    traffic: Object.freeze(toTrafficPattern(input.trafficPattern, input.requestRateRps, input.traffic)),
    spikes: Object.freeze([...input.spikes].sort((a, b) => a.startSec - b.startSec)),
    algorithmId: input.balancingStrategy,
    weights: Object.freeze([...input.weights]),
    processingTimeMs: input.processingTimeMs,
    processingTimeStddevMs: input.processingTimeStddevMs,
    processingTimeDistribution: input.processingTimeDistribution,
    minServiceTimeMs: input.minServiceTimeMs,
    networkLatencyMeanMs: input.networkLatencyMeanMs,
    networkLatencyStddevMs: input.networkLatencyStddevMs,
    requestTimeoutMs: input.requestTimeoutMs,
    degradation: Object.freeze({
      enabled: input.cpuDegradation,
      threshold: input.degradationThreshold,
      gain: input.degradationGain,
    }),
    utilizationDecay: input.utilizationDecay,
    seed: input.seed,
    drain: input.drain,
    timeScale: input.timeScale,
  });
};
