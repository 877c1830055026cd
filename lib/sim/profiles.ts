import presets from "./data/profiles.json";
import { ConfigurationError } from "./errors";
import type { HardwareProfile, LanguageProfile } from "./types";

export const hardwareProfiles: readonly HardwareProfile[] = presets.hardware.map(
  (profile) => Object.freeze({ ...profile })
);

export const languageProfiles: readonly LanguageProfile[] = presets.languages.map(
  (profile) => Object.freeze({ ...profile })
);

export const getHardwareProfile = (id: string): HardwareProfile => {
  const profile = hardwareProfiles.find((item) => item.id === id);
  if (!profile) {
    throw new ConfigurationError(`Unknown hardware profile: ${id}`);
  }
  return profile;
};

export const getLanguageProfile = (id: string): LanguageProfile => {
  const profile = languageProfiles.find((item) => item.id === id);
  if (!profile) {
    throw new ConfigurationError(`Unknown language profile: ${id}`);
  }
  return profile;
};

/**
 * Mean service time on the given hardware and runtime before sampling and
 * contention: the work shrinks with runtime efficiency and raw processing
 * power, plus a quarter of the I/O latency.
 */
export const estimateServiceTimeMs = (
  hardware: HardwareProfile,
  language: LanguageProfile,
  baseMs: number
) =>
  baseMs / language.efficiencyFactor / hardware.processingPower +
  hardware.ioLatencyMs * 0.25;
