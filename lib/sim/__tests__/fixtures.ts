import { getHardwareProfile, getLanguageProfile } from "../profiles";
import { SeededRng } from "../random";
import type { Request, ScenarioParameters } from "../types";
import { createTrafficGenerator } from "../workloads";

/** Identity hardware and runtime: service time equals `processingTimeMs`. */
export const makeParams = (overrides: Partial<ScenarioParameters> = {}): ScenarioParameters => ({
  name: "test",
  durationMs: 10_000,
  serverCount: 1,
  workerSlots: 1,
  hardware: getHardwareProfile("baseline"),
  language: getLanguageProfile("baseline"),
  traffic: { id: "constant", rateRps: 1 },
  spikes: [],
  algorithmId: "round-robin",
  weights: [],
  processingTimeMs: 500,
  processingTimeStddevMs: 0,
  processingTimeDistribution: "normal",
  minServiceTimeMs: 0.1,
  networkLatencyMeanMs: 0,
  networkLatencyStddevMs: 0,
  requestTimeoutMs: null,
  degradation: { enabled: false, threshold: 0.5, gain: 2 },
  utilizationDecay: 0,
  seed: 7,
  drain: true,
  timeScale: 1,
  ...overrides,
});

export const makeRequest = (id: number, arrivalTimeMs = 0): Request => ({
  id,
  arrivalTimeMs,
  serverId: null,
  clamped: false,
  recorded: false,
  phase: "arrived",
  outcome: "pending",
});

/** Replays the arrival stream the engine would consume for these parameters. */
export const arrivalTimes = (params: ScenarioParameters) => {
  const generator = createTrafficGenerator(
    params.traffic,
    new SeededRng(params.seed).fork("traffic"),
    { spikes: params.spikes, horizonMs: params.durationMs }
  );
  const times: number[] = [];
  let nowMs = 0;
  for (;;) {
    const next = nowMs + generator.next(nowMs);
    if (!Number.isFinite(next) || next >= params.durationMs) break;
    times.push(next);
    nowMs = next;
  }
  return times;
};
