import { describe, expect, it } from "vitest";
import * as THREE from "three";
import type { PilotInput } from "../src/shared/types";
import PilotController from "../src/physics/pilot-controller";
import { Universe } from "../src/physics/universe";
import { acceleration, eventKindsEqual } from "../src/physics/worldline";

const idle: PilotInput = {
  forward: false,
  backward: false,
  left: false,
  right: false,
  up: false,
  down: false,
};

describe("PilotController", () => {
  it("produces no thrust without input", () => {
    const pilot = new PilotController();
    expect(pilot.getAcceleration().toArray()).toEqual([0, 0, 0]);
  });

  it("thrusts forward along -Z", () => {
    const pilot = new PilotController(0.25);
    pilot.setInput({ ...idle, forward: true });

    const thrust = pilot.getAcceleration();
    expect(thrust.x).toBeCloseTo(0, 12);
    expect(thrust.y).toBeCloseTo(0, 12);
    expect(thrust.z).toBeCloseTo(-0.25, 12);
  });

  it("normalizes diagonal thrust", () => {
    const pilot = new PilotController(1);
    pilot.setInput({ ...idle, forward: true, right: true });

    const thrust = pilot.getAcceleration();
    expect(thrust.length()).toBeCloseTo(1, 12);
    expect(thrust.x).toBeCloseTo(Math.SQRT1_2, 12);
    expect(thrust.z).toBeCloseTo(-Math.SQRT1_2, 12);
  });

  it("cancels opposing keys", () => {
    const pilot = new PilotController();
    pilot.setInput({ ...idle, up: true, down: true });
    expect(pilot.getAcceleration().lengthSq()).toBe(0);
  });

  it("rotates thrust by the pilot's orientation", () => {
    const pilot = new PilotController(0.5);
    const turnedLeft = new THREE.Quaternion().setFromAxisAngle(
      new THREE.Vector3(0, 1, 0),
      Math.PI / 2,
    );
    pilot.setInput({
      ...idle,
      forward: true,
      orientation: { x: turnedLeft.x, y: turnedLeft.y, z: turnedLeft.z, w: turnedLeft.w },
    });

    const thrust = pilot.getAcceleration();
    expect(thrust.x).toBeCloseTo(-0.5, 12);
    expect(thrust.y).toBeCloseTo(0, 12);
    expect(thrust.z).toBeCloseTo(0, 12);
  });

  it("keeps the last orientation when input omits one", () => {
    const pilot = new PilotController(1);
    pilot.setInput({ ...idle, orientation: { x: 0, y: 0, z: 1, w: 0 } });
    pilot.setInput({ ...idle, up: true });

    // Half turn about Z flips up to down
    expect(pilot.getAcceleration().y).toBeCloseTo(-1, 12);
  });

  it("commands the user's worldline only when thrust changes", () => {
    const universe = new Universe({ time: 0 });
    const pilot = new PilotController(0.25);

    pilot.setInput({ ...idle, forward: true });
    expect(pilot.update(universe)).toBe(true);
    expect(pilot.update(universe)).toBe(false);

    const kind = universe.getUserEntity().worldline.kindAtTime(0);
    expect(eventKindsEqual(kind, acceleration(new THREE.Vector3(0, 0, -0.25)))).toBe(
      true,
    );

    pilot.setInput(idle);
    expect(pilot.update(universe)).toBe(true);
    expect(universe.getUserEntity().worldline.kindAtTime(0).type).toBe("inertial");
  });
});
