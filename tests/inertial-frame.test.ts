import { describe, expect, it } from "vitest";
import * as THREE from "three";
import { config } from "../src/shared/config";
import { clampVelocity, InertialFrame } from "../src/physics/inertial-frame";

const TIME_STEP = config.physics.timeStep;

describe("InertialFrame", () => {
  it("defaults to rest at the origin", () => {
    const frame = new InertialFrame();
    expect(frame.position.toArray()).toEqual([0, 0, 0, 0]);
    expect(frame.velocity.toArray()).toEqual([0, 0, 0]);
    expect(frame.time).toBe(0);
  });

  it("clamps velocity below the speed of light", () => {
    const frame = new InertialFrame(undefined, new THREE.Vector3(2, 0, 0));
    expect(frame.velocity.x).toBeCloseTo(config.physics.maxSpeed, 12);
    expect(frame.velocity.length()).toBeLessThan(1);
  });

  it("copies the vectors it is built from", () => {
    const position = new THREE.Vector4(1, 2, 3, 4);
    const velocity = new THREE.Vector3(0.1, 0, 0);
    const frame = new InertialFrame(position, velocity);

    position.set(0, 0, 0, 0);
    velocity.set(0, 0, 0);

    expect(frame.position.toArray()).toEqual([1, 2, 3, 4]);
    expect(frame.velocity.x).toBe(0.1);
  });

  it("converts to and from structured-clone data", () => {
    const data = {
      position: { x: 1, y: -2, z: 3, t: 10 },
      velocity: { x: 0.5, y: 0, z: -0.25 },
    };
    expect(InertialFrame.fromData(data).toData()).toEqual(data);
  });

  it("predicts along its velocity", () => {
    const frame = new InertialFrame(
      new THREE.Vector4(1, 0, 0, 10),
      new THREE.Vector3(0.5, 0, 0),
    );
    const predicted = frame.predict(2);

    expect(predicted.position.toArray()).toEqual([2, 0, 0, 12]);
    expect(predicted.velocity.x).toBe(0.5);
    expect(frame.position.w).toBe(10);
  });

  it("predicts backwards for negative offsets", () => {
    const frame = new InertialFrame(undefined, new THREE.Vector3(0, -0.5, 0));
    expect(frame.predict(-4).position.toArray()).toEqual([0, 2, 0, -4]);
  });

  describe("relativeTo", () => {
    it("sees a stationary frame moving backwards from a moving one", () => {
      const stationary = new InertialFrame();
      const moving = new InertialFrame(undefined, new THREE.Vector3(0.6, 0, 0));

      const relative = stationary.relativeTo(moving);
      expect(relative.velocity.x).toBeCloseTo(-0.6, 12);
      expect(relative.position.lengthSq()).toBe(0);
    });

    it("puts a frame at rest at the origin of itself", () => {
      const frame = new InertialFrame(
        new THREE.Vector4(3, -1, 2, 50),
        new THREE.Vector3(0.2, 0.3, -0.4),
      );
      const relative = frame.relativeTo(frame);

      expect(relative.velocity.length()).toBeCloseTo(0, 12);
      expect(relative.position.length()).toBeCloseTo(0, 12);
    });

    it("dilates the time of a separation", () => {
      const observer = new InertialFrame(undefined, new THREE.Vector3(0.6, 0, 0));
      const later = new InertialFrame(new THREE.Vector4(0.6, 0, 0, 1));

      // One second along the observer's own worldline is 0.8s of its clock
      const relative = later.relativeTo(observer);
      expect(relative.position.x).toBeCloseTo(0, 12);
      expect(relative.position.w).toBeCloseTo(0.8, 12);
    });
  });

  describe("step", () => {
    it("coasts when there is no acceleration", () => {
      const frame = new InertialFrame(undefined, new THREE.Vector3(0.6, 0, 0));
      const properTime = frame.step(0.5, new THREE.Vector3());

      expect(properTime).toBeCloseTo(0.4, 12);
      expect(frame.position.x).toBeCloseTo(0.3, 12);
      expect(frame.position.w).toBe(0.5);
      expect(frame.velocity.x).toBeCloseTo(0.6, 12);
    });

    it("follows hyperbolic motion from rest", () => {
      const frame = new InertialFrame();
      const properAcceleration = new THREE.Vector3(1, 0, 0);

      let properTime = 0;
      for (let i = 0; i < 240; i++) {
        properTime += frame.step(TIME_STEP, properAcceleration);
      }

      // After one coordinate second at 1c/s: v = 1/sqrt(2), x = sqrt(2) - 1
      expect(frame.time).toBeCloseTo(1, 9);
      expect(frame.velocity.x).toBeCloseTo(Math.SQRT1_2, 3);
      expect(frame.position.x).toBeCloseTo(Math.SQRT2 - 1, 3);
      expect(properTime).toBeCloseTo(Math.asinh(1), 3);
      expect(frame.velocity.y).toBeCloseTo(0, 12);
    });

    it("never reaches the speed of light", () => {
      const frame = new InertialFrame(undefined, new THREE.Vector3(0.99999, 0, 0));
      const properAcceleration = new THREE.Vector3(1, 0, 0);

      for (let i = 0; i < 240; i++) {
        frame.step(TIME_STEP, properAcceleration);
      }

      expect(frame.velocity.length()).toBeGreaterThan(0.99999);
      expect(frame.velocity.length()).toBeLessThan(1);
    });
  });
});

describe("clampVelocity", () => {
  it("leaves slow velocities alone", () => {
    const velocity = new THREE.Vector3(0.3, 0.4, 0);
    expect(clampVelocity(velocity).toArray()).toEqual([0.3, 0.4, 0]);
  });

  it("scales fast velocities back in place", () => {
    const velocity = new THREE.Vector3(0, 3, 4);
    const clamped = clampVelocity(velocity);

    expect(clamped).toBe(velocity);
    expect(clamped.length()).toBeCloseTo(config.physics.maxSpeed, 12);
    expect(clamped.y / clamped.z).toBeCloseTo(0.75, 12);
  });
});
