import { parseScenario, type ScenarioInput } from "./config";
import { ConfigurationError } from "./errors";
import type { AlgorithmId, ScenarioParameters } from "./types";

export type Scenario = {
  id: string;
  name: string;
  summary: string;
  setup: string[];
  teaches: string[];
  input: ScenarioInput;
};

export const scenarios: Scenario[] = [
  {
    id: "baseline",
    name: "Baseline",
    summary: "A single standard server under constant load.",
    setup: ["1 server, standard hardware, Python", "Constant 10 RPS", "10 minutes"],
    teaches: ["Reference numbers for every other preset"],
    input: {
      name: "baseline",
      durationSec: 600,
      servers: 1,
      hardware: "standard",
      language: "python",
      requestRateRps: 10,
      trafficPattern: "constant",
      balancingStrategy: "round-robin",
      seed: 42,
    },
  },
  {
    id: "steady-state-poisson",
    name: "Steady state Poisson",
    summary: "Four Node.js servers absorbing memoryless traffic.",
    setup: ["4 servers, standard hardware, Node.js", "Poisson 20 RPS", "30 minutes"],
    teaches: ["Least connections keeps queues short under random arrivals"],
    input: {
      name: "steady-state-poisson",
      durationSec: 1800,
      servers: 4,
      hardware: "standard",
      language: "nodejs",
      requestRateRps: 20,
      trafficPattern: "poisson",
      balancingStrategy: "least-connections",
      seed: 42,
    },
  },
  {
    id: "traffic-spike",
    name: "Traffic spike",
    summary: "A 5x spike for one minute in the middle of the run.",
    setup: [
      "3 servers, high-performance hardware, Go",
      "Poisson 15 RPS, x5 between 300s and 360s",
      "10 minutes",
    ],
    teaches: ["How quickly queues build and drain around a spike"],
    input: {
      name: "traffic-spike",
      durationSec: 600,
      servers: 3,
      hardware: "high-performance",
      language: "go",
      requestRateRps: 15,
      trafficPattern: "poisson",
      balancingStrategy: "least-connections",
      spikes: [{ startSec: 300, durationSec: 60, intensityMultiplier: 5 }],
      seed: 42,
    },
  },
  {
    id: "bursty-traffic",
    name: "Bursty traffic",
    summary: "Clusters of about eight requests every three seconds.",
    setup: ["2 servers, standard hardware, Java", "Bursts of ~8 every 3s", "20 minutes"],
    teaches: ["Tail latency is driven by burst size, not average rate"],
    input: {
      name: "bursty-traffic",
      durationSec: 1200,
      servers: 2,
      hardware: "standard",
      language: "java",
      trafficPattern: "bursty",
      traffic: { burstSizeMean: 8, burstIntervalSec: 3 },
      balancingStrategy: "least-connections",
      seed: 42,
    },
  },
];

export const getScenario = (id: string): Scenario => {
  const scenario = scenarios.find((item) => item.id === id);
  if (!scenario) {
    throw new ConfigurationError(`Unknown scenario preset: ${id}`);
  }
  return scenario;
};

export const buildParameters = (scenario: Scenario): ScenarioParameters =>
  parseScenario(scenario.input);

const sweepBase = (name: string, seed: number): ScenarioInput => ({
  name,
  durationSec: 600,
  servers: 2,
  hardware: "standard",
  language: "nodejs",
  requestRateRps: 20,
  trafficPattern: "poisson",
  balancingStrategy: "least-connections",
  seed,
});

/** Same load on each runtime, one scenario per language. */
export const languageSweep = (
  languages: readonly string[] = ["python", "nodejs", "java", "go", "rust"]
): ScenarioParameters[] =>
  languages.map((language, i) =>
    parseScenario({ ...sweepBase(`language-comparison-${language}`, 42 + i), language })
  );

/** Same load on each hardware tier. */
export const hardwareSweep = (
  profiles: readonly string[] = ["entry-level", "standard", "high-performance", "enterprise"]
): ScenarioParameters[] =>
  profiles.map((hardware, i) =>
    parseScenario({ ...sweepBase(`hardware-comparison-${hardware}`, 42 + i), hardware })
  );

/** Same load behind each balancing strategy. */
export const strategySweep = (
  strategies: readonly AlgorithmId[] = ["round-robin", "least-connections", "least-response-time"]
): ScenarioParameters[] =>
  strategies.map((balancingStrategy, i) =>
    parseScenario({
      ...sweepBase(`balancing-comparison-${balancingStrategy}`, 42 + i),
      servers: 3,
      requestRateRps: 25,
      balancingStrategy,
    })
  );
