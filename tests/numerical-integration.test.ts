import { describe, expect, it } from "vitest";
import * as THREE from "three";
import {
  rungeKuttaStep,
  scalarSpace,
  splitSteps,
  vector3Space,
} from "../src/shared/utils";

describe("rungeKuttaStep", () => {
  it("matches the fourth-order Taylor expansion for exponential growth", () => {
    const h = 0.1;
    const result = rungeKuttaStep(scalarSpace, 1, 0, h, (_t, y) => y);
    expect(result).toBeCloseTo(1 + h + h ** 2 / 2 + h ** 3 / 6 + h ** 4 / 24, 12);
  });

  it("integrates a cubic in time exactly", () => {
    const result = rungeKuttaStep(scalarSpace, 0, 0, 2, (t) => 3 * t * t);
    expect(result).toBeCloseTo(8, 12);
  });

  it("integrates vectors without mutating the initial value", () => {
    const initial = new THREE.Vector3(1, 2, 3);
    const result = rungeKuttaStep(
      vector3Space,
      initial,
      0,
      0.5,
      () => new THREE.Vector3(2, 0, -2),
    );

    expect(result.x).toBeCloseTo(2, 12);
    expect(result.y).toBe(2);
    expect(result.z).toBeCloseTo(2, 12);
    expect(initial.toArray()).toEqual([1, 2, 3]);
  });
});

describe("splitSteps", () => {
  it("splits an exact multiple into whole steps", () => {
    expect(splitSteps(1, 0.25)).toEqual({ fullSteps: 4, remainder: 0 });
  });

  it("returns a partial step for the leftover", () => {
    const { fullSteps, remainder } = splitSteps(1, 0.3);
    expect(fullSteps).toBe(3);
    expect(remainder).toBeCloseTo(0.1, 12);
  });

  it("returns nothing for an empty span", () => {
    expect(splitSteps(0, 1 / 240)).toEqual({ fullSteps: 0, remainder: 0 });
  });

  it("never returns a negative remainder", () => {
    for (const span of [0.3, 0.7, 1, 2.9, 1000 / 3]) {
      const { fullSteps, remainder } = splitSteps(span, 0.1);
      expect(remainder).toBeGreaterThanOrEqual(0);
      expect(remainder).toBeLessThan(0.1 + 1e-12);
      expect(fullSteps * 0.1 + remainder).toBeCloseTo(span, 9);
    }
  });
});
