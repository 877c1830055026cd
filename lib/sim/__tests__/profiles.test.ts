import { describe, it, expect } from "@jest/globals";

import {
  estimateServiceTimeMs,
  getHardwareProfile,
  getLanguageProfile,
  hardwareProfiles,
  languageProfiles,
} from "../profiles";

describe("profiles", () => {
  it("ships the hardware tiers and runtimes", () => {
    expect(hardwareProfiles.map((profile) => profile.id)).toEqual([
      "baseline",
      "entry-level",
      "standard",
      "high-performance",
      "enterprise",
    ]);
    expect(languageProfiles.map((profile) => profile.id)).toEqual([
      "baseline",
      "python",
      "nodejs",
      "java",
      "go",
      "rust",
      "dotnet",
    ]);
  });

  it("freezes presets", () => {
    expect(Object.isFrozen(getHardwareProfile("standard"))).toBe(true);
    expect(Object.isFrozen(getLanguageProfile("go"))).toBe(true);
  });

  it("throws on unknown ids", () => {
    expect(() => getHardwareProfile("quantum")).toThrow("Unknown hardware profile: quantum");
    expect(() => getLanguageProfile("cobol")).toThrow("Unknown language profile: cobol");
  });
});

describe("estimateServiceTimeMs", () => {
  it("is the identity on baseline hardware and runtime", () => {
    expect(estimateServiceTimeMs(getHardwareProfile("baseline"), getLanguageProfile("baseline"), 250)).toBe(250);
  });

  it("divides by efficiency and power and adds a quarter of the I/O latency", () => {
    const standard = getHardwareProfile("standard");
    expect(estimateServiceTimeMs(standard, getLanguageProfile("python"), 250)).toBeCloseTo(25.25);
    expect(
      estimateServiceTimeMs(getHardwareProfile("enterprise"), getLanguageProfile("rust"), 250)
    ).toBeCloseTo(250 / 22 / 30 + 0.05);
  });

  it("gets faster along the runtime ranking", () => {
    const standard = getHardwareProfile("standard");
    const times = ["python", "nodejs", "java", "go", "rust"].map((id) =>
      estimateServiceTimeMs(standard, getLanguageProfile(id), 250)
    );
    const sorted = [...times].sort((a, b) => b - a);
    expect(times).toEqual(sorted);
    expect(new Set(times).size).toBe(times.length);
  });
});
