import * as THREE from "three";
import type { FrameData } from "~/shared/types";
import { config } from "~/shared/config";
import { rungeKuttaStep, scalarSpace, vector3Space } from "~/shared/utils";
import {
  lorentzBoost,
  lorentzFactor,
  transform3Velocity,
} from "./lorentz";

const MAX_SPEED = config.physics.maxSpeed;

/**
 * Keeps a velocity strictly below c by scaling it back to MAX_SPEED.
 * Mutates and returns `velocity`.
 */
export function clampVelocity(velocity: THREE.Vector3): THREE.Vector3 {
  if (velocity.lengthSq() > MAX_SPEED * MAX_SPEED) {
    velocity.setLength(MAX_SPEED);
  }
  return velocity;
}

/**
 * InertialFrame - a spacetime position and the coordinate velocity there
 *
 * `position.w` is coordinate time. Velocity never reaches MAX_SPEED; it is
 * clamped on construction and after every integration step.
 */
export class InertialFrame {
  readonly position: THREE.Vector4;
  readonly velocity: THREE.Vector3;

  constructor(
    position: THREE.Vector4 = new THREE.Vector4(0, 0, 0, 0),
    velocity: THREE.Vector3 = new THREE.Vector3(0, 0, 0),
  ) {
    this.position = position.clone();
    this.velocity = clampVelocity(velocity.clone());
  }

  static fromData(data: FrameData): InertialFrame {
    const { position, velocity } = data;
    return new InertialFrame(
      new THREE.Vector4(position.x, position.y, position.z, position.t),
      new THREE.Vector3(velocity.x, velocity.y, velocity.z),
    );
  }

  toData(): FrameData {
    return {
      position: {
        x: this.position.x,
        y: this.position.y,
        z: this.position.z,
        t: this.position.w,
      },
      velocity: { x: this.velocity.x, y: this.velocity.y, z: this.velocity.z },
    };
  }

  clone(): InertialFrame {
    return new InertialFrame(this.position, this.velocity);
  }

  /** Coordinate time of this frame's position */
  get time(): number {
    return this.position.w;
  }

  /**
   * Expresses this frame's position and velocity in `other`'s rest frame.
   */
  relativeTo(other: InertialFrame): InertialFrame {
    const transform = lorentzBoost(other.velocity);

    return new InertialFrame(
      this.position.clone().sub(other.position).applyMatrix4(transform),
      transform3Velocity(transform, this.velocity),
    );
  }

  /**
   * Extrapolates along constant velocity by `deltaTime` coordinate seconds.
   */
  predict(deltaTime: number): InertialFrame {
    const displacement = new THREE.Vector4(
      this.velocity.x,
      this.velocity.y,
      this.velocity.z,
      1,
    ).multiplyScalar(deltaTime);

    return new InertialFrame(
      this.position.clone().add(displacement),
      this.velocity,
    );
  }

  /**
   * Advances this frame by `deltaTime` coordinate seconds under a constant
   * proper acceleration, in place.
   *
   * An arbitrarily oriented proper acceleration on a moving frame has no
   * closed form, so velocity is integrated with fourth-order Runge-Kutta
   * (smaller steps are more precise). Position and proper time are then
   * integrated over that same velocity history rather than jointly.
   *
   * @returns Elapsed proper time over the step
   */
  step(deltaTime: number, properAcceleration: THREE.Vector3): number {
    const initialVelocity = this.velocity.clone();

    // Proper acceleration as seen from the lab at the start of the step
    const accel4 = new THREE.Vector4(
      properAcceleration.x,
      properAcceleration.y,
      properAcceleration.z,
      0,
    ).applyMatrix4(lorentzBoost(initialVelocity.clone().negate()));
    const accel3 = new THREE.Vector3(accel4.x, accel4.y, accel4.z);

    const velocityDerivative = (
      _time: number,
      velocity: THREE.Vector3,
    ): THREE.Vector3 =>
      accel3
        .clone()
        .sub(velocity.clone().multiplyScalar(accel4.w))
        .multiplyScalar(1 - velocity.lengthSq());

    const velocityAt = (time: number): THREE.Vector3 =>
      rungeKuttaStep(vector3Space, initialVelocity, 0, time, velocityDerivative);

    const spatial = new THREE.Vector3(
      this.position.x,
      this.position.y,
      this.position.z,
    );
    const nextSpatial = rungeKuttaStep(vector3Space, spatial, 0, deltaTime, (time) =>
      velocityAt(time),
    );

    const elapsedProperTime = rungeKuttaStep(
      scalarSpace,
      0,
      0,
      deltaTime,
      (time) => 1 / lorentzFactor(clampVelocity(velocityAt(time))),
    );

    this.velocity.copy(clampVelocity(velocityAt(deltaTime)));
    this.position.set(
      nextSpatial.x,
      nextSpatial.y,
      nextSpatial.z,
      this.position.w + deltaTime,
    );

    return elapsedProperTime;
  }
}
