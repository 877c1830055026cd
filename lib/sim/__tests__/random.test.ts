import { describe, it, expect } from "@jest/globals";

import {
  SeededRng,
  sampleExponential,
  sampleLogNormal,
  sampleNormal,
  samplePoisson,
} from "../random";

const mean = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

const draw = (count: number, sample: () => number) =>
  Array.from({ length: count }, () => sample());

describe("SeededRng", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new SeededRng(1234);
    const b = new SeededRng(1234);
    expect(draw(20, () => a.next())).toEqual(draw(20, () => b.next()));
  });

  it("stays within [0, 1)", () => {
    const rng = new SeededRng(99);
    for (const value of draw(5000, () => rng.next())) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("nextInt covers the inclusive range", () => {
    const rng = new SeededRng(5);
    const seen = new Set(draw(500, () => rng.nextInt(2, 4)));
    expect([...seen].sort()).toEqual([2, 3, 4]);
  });

  it("forks independent but reproducible streams", () => {
    const root = new SeededRng(42);
    const traffic = draw(5, () => root.fork("traffic").next());
    expect(new Set(traffic).size).toBe(1);

    const a = root.fork("server-0");
    const b = root.fork("server-1");
    expect(draw(5, () => a.next())).not.toEqual(draw(5, () => b.next()));
  });
});

describe("samplers", () => {
  it("returns the mean when there is no spread", () => {
    const rng = new SeededRng(1);
    expect(sampleNormal(rng, 500, 0)).toBe(500);
    expect(sampleLogNormal(rng, 500, 0)).toBe(500);
  });

  it("centres the normal sampler on its mean", () => {
    const rng = new SeededRng(11);
    expect(mean(draw(20_000, () => sampleNormal(rng, 100, 10)))).toBeCloseTo(100, 0);
  });

  it("matches the requested log-normal mean and stays positive", () => {
    const rng = new SeededRng(12);
    const values = draw(20_000, () => sampleLogNormal(rng, 200, 50));
    expect(Math.min(...values)).toBeGreaterThan(0);
    expect(Math.abs(mean(values) - 200)).toBeLessThan(5);
  });

  it("produces exponential gaps with the given mean", () => {
    const rng = new SeededRng(13);
    expect(Math.abs(mean(draw(20_000, () => sampleExponential(rng, 50))) - 50)).toBeLessThan(2);
    expect(sampleExponential(rng, Infinity)).toBe(Infinity);
    expect(sampleExponential(rng, 0)).toBe(0);
  });

  it("produces Poisson counts with the given mean", () => {
    const rng = new SeededRng(14);
    const values = draw(20_000, () => samplePoisson(rng, 5));
    expect(values.every(Number.isInteger)).toBe(true);
    expect(Math.abs(mean(values) - 5)).toBeLessThan(0.1);
    expect(samplePoisson(rng, 0)).toBe(0);
  });
});
