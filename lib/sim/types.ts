export type AlgorithmId =
  | "round-robin"
  | "weighted-round-robin"
  | "least-connections"
  | "least-response-time"
  | "random"
  | "cpu-aware";

export type TrafficPatternId =
  | "poisson"
  | "constant"
  | "periodic"
  | "wave"
  | "bursty"
  | "exponential-burst";

export type WaveType = "sine" | "square";

export type ProcessingTimeDistribution = "normal" | "lognormal";

export type RequestOutcome = "pending" | "success" | "timed-out" | "error";

export type TerminalOutcome = Exclude<RequestOutcome, "pending">;

export type RequestPhase = "arrived" | "queued" | "active" | "done";

export type EventKind = "arrival" | "timeout" | "service-start" | "service-complete";

export type Request = {
  id: number;
  arrivalTimeMs: number;
  serverId: number | null;
  enqueueTimeMs?: number;
  dispatchTimeMs?: number;
  serviceStartTimeMs?: number;
  serviceTimeMs?: number;
  completionTimeMs?: number;
  networkLatencyMs?: number;
  clamped: boolean;
  recorded: boolean;
  phase: RequestPhase;
  outcome: RequestOutcome;
};

export type SimEvent = {
  readonly timeMs: number;
  readonly kind: EventKind;
  readonly request: Request;
};

export type HardwareProfile = {
  readonly id: string;
  readonly name: string;
  readonly cpuSpeedGhz: number;
  readonly memoryGb: number;
  readonly ioLatencyMs: number;
  readonly processingPower: number;
  readonly cores: number;
};

export type LanguageProfile = {
  readonly id: string;
  readonly name: string;
  readonly efficiencyFactor: number;
  readonly memoryOverheadMb: number;
  readonly startupTimeMs: number;
};

export type TrafficSpike = {
  readonly startSec: number;
  readonly durationSec: number;
  readonly intensityMultiplier: number;
};

export type TrafficPattern =
  | { readonly id: "poisson"; readonly rateRps: number }
  | { readonly id: "constant"; readonly rateRps: number }
  | {
      readonly id: "periodic";
      readonly rateRps: number;
      readonly periodSec: number;
      readonly amplitudeFactor: number;
    }
  | {
      readonly id: "wave";
      readonly rateRps: number;
      readonly wavePeriodSec: number;
      readonly amplitudeFactor: number;
      readonly waveType: WaveType;
    }
  | {
      readonly id: "bursty";
      readonly burstSizeMean: number;
      readonly burstIntervalSec: number;
      readonly intraBurstGapMs: number;
    }
  | {
      readonly id: "exponential-burst";
      readonly burstRate: number;
      readonly meanBurstSize: number;
      readonly intraBurstGapMs: number;
    };

export type DegradationModel = {
  readonly enabled: boolean;
  readonly threshold: number;
  readonly gain: number;
};

export type ScenarioParameters = {
  readonly name: string;
  readonly durationMs: number;
  readonly serverCount: number;
  readonly workerSlots: number;
  readonly hardware: HardwareProfile;
  readonly language: LanguageProfile;
  readonly traffic: TrafficPattern;
  readonly spikes: readonly TrafficSpike[];
  readonly algorithmId: AlgorithmId;
  /** Indexed by server id; missing entries weigh 1. */
  readonly weights: readonly number[];
  readonly processingTimeMs: number;
  readonly processingTimeStddevMs: number;
  readonly processingTimeDistribution: ProcessingTimeDistribution;
  readonly minServiceTimeMs: number;
  readonly networkLatencyMeanMs: number;
  readonly networkLatencyStddevMs: number;
  /** `null` disables timeouts. */
  readonly requestTimeoutMs: number | null;
  readonly degradation: DegradationModel;
  readonly utilizationDecay: number;
  readonly seed: number;
  readonly drain: boolean;
  readonly timeScale: number;
};

export type ServerView = {
  readonly id: number;
  readonly inflight: number;
  readonly queued: number;
  readonly workerSlots: number;
  readonly utilization: number;
  readonly avgResponseTimeMs: number;
  readonly completed: number;
  readonly weight: number;
};

export type LatencyStats = {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  stddevMs: number;
};

export type PercentileStats = {
  p50: number;
  p95: number;
  p99: number;
  p999: number;
};

export type OutcomeCounts = {
  total: number;
  success: number;
  timedOut: number;
  error: number;
};

export type ServerMetrics = {
  serverId: number;
  requests: OutcomeCounts;
  responseTime: LatencyStats;
  queueWait: LatencyStats;
  percentiles: PercentileStats;
  avgUtilization: number;
  maxUtilization: number;
  maxQueueDepth: number;
};

export type MetricsSnapshot = {
  scenario: string;
  durationMs: number;
  requests: OutcomeCounts;
  truncated: number;
  responseTime: LatencyStats;
  queueWait: LatencyStats;
  percentiles: PercentileStats;
  percentilesExact: boolean;
  successfulThroughputRps: number;
  totalThroughputRps: number;
  successRate: number;
  avgUtilization: number;
  maxUtilization: number;
  maxQueueDepth: number;
  servers: ServerMetrics[];
};
