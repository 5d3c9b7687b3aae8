import * as THREE from "three";
import type { PilotInput } from "~/shared/types";
import { config } from "~/shared/config";
import type { Universe } from "./universe";

const IDLE_INPUT: PilotInput = {
  forward: false,
  backward: false,
  left: false,
  right: false,
  up: false,
  down: false,
};

/**
 * PilotController - turns held thrust keys into the user's proper acceleration
 *
 * Thrust directions are in the pilot's body frame (forward is -Z) and rotated
 * by the pilot's orientation. Diagonal input is normalized so every direction
 * gets the same magnitude.
 */
export default class PilotController {
  private input: PilotInput = { ...IDLE_INPUT };
  private readonly orientation = new THREE.Quaternion();
  private readonly magnitude: number;

  constructor(magnitude: number = config.pilot.acceleration) {
    this.magnitude = magnitude;
  }

  setInput(input: PilotInput): void {
    this.input = { ...input };
    if (input.orientation) {
      const { x, y, z, w } = input.orientation;
      this.orientation.set(x, y, z, w).normalize();
    }
  }

  /**
   * Proper acceleration for the current input, zero when nothing is held
   */
  getAcceleration(): THREE.Vector3 {
    const { forward, backward, left, right, up, down } = this.input;
    const thrust = new THREE.Vector3(
      Number(right) - Number(left),
      Number(up) - Number(down),
      Number(backward) - Number(forward),
    );

    if (thrust.lengthSq() === 0) {
      return thrust;
    }

    return thrust
      .normalize()
      .multiplyScalar(this.magnitude)
      .applyQuaternion(this.orientation);
  }

  /**
   * Commands the user's worldline with the current thrust.
   * @returns Whether the user's worldline was edited
   */
  update(universe: Universe): boolean {
    return universe.commandUserAcceleration(this.getAcceleration());
  }
}
