import * as THREE from "three";

/**
 * Lorentz kinematics
 *
 * Pure functions over three.js vectors. 4-vectors keep coordinate time in
 * `w`, velocities are fractions of c. None of these mutate their inputs.
 */

/**
 * Calculates the Lorentz (time dilation / length contraction) factor for a
 * 3-velocity. Callers must keep `|velocity| < 1`.
 *
 * The Lorentz factor of a 4-velocity is its `w` component.
 */
export function lorentzFactor(velocity: THREE.Vector3): number {
  return 1 / Math.sqrt(1 - velocity.lengthSq());
}

/**
 * Transform that boosts into the reference frame moving with `velocity`.
 *
 * A spacetime vector in the stationary basis comes out as the same vector in
 * the moving frame's basis. Negate the velocity for the inverse boost.
 */
export function lorentzBoost(velocity: THREE.Vector3): THREE.Matrix4 {
  const speed2 = velocity.lengthSq();

  // Too slow to divide by
  if (speed2 <= Number.MIN_VALUE) {
    return new THREE.Matrix4();
  }

  const gamma = lorentzFactor(velocity);
  const k = (gamma - 1) / speed2;
  const { x, y, z } = velocity;

  // Row-major: spatial block I + (γ-1)vvᵗ/|v|², time row/column -γv
  return new THREE.Matrix4().set(
    1 + k * x * x, k * x * y, k * x * z, -gamma * x,
    k * y * x, 1 + k * y * y, k * y * z, -gamma * y,
    k * z * x, k * z * y, 1 + k * z * z, -gamma * z,
    -gamma * x, -gamma * y, -gamma * z, gamma,
  );
}

/**
 * Converts a 3-velocity into its 4-velocity.
 */
export function velocity3To4(velocity: THREE.Vector3): THREE.Vector4 {
  const gamma = lorentzFactor(velocity);
  return new THREE.Vector4(velocity.x, velocity.y, velocity.z, 1).multiplyScalar(
    gamma,
  );
}

/**
 * Converts a 4-velocity into its 3-velocity.
 */
export function velocity4To3(velocity: THREE.Vector4): THREE.Vector3 {
  return new THREE.Vector3(velocity.x, velocity.y, velocity.z).divideScalar(
    velocity.w,
  );
}

/**
 * Applies a 4-dimensional transform to a 3-velocity.
 *
 * Shorthand for `velocity4To3(transform * velocity3To4(velocity))`.
 */
export function transform3Velocity(
  transform: THREE.Matrix4,
  velocity: THREE.Vector3,
): THREE.Vector3 {
  return velocity4To3(velocity3To4(velocity).applyMatrix4(transform));
}

/**
 * Relativistic 3-velocity addition: the velocity of something moving at
 * `velocityB` inside a frame that itself moves at `velocityA`. Never reaches c.
 */
export function addVelocities(
  velocityA: THREE.Vector3,
  velocityB: THREE.Vector3,
): THREE.Vector3 {
  return transform3Velocity(lorentzBoost(velocityA.clone().negate()), velocityB);
}

// ============================================
// Proper velocity (displacement per moving-clock second)
// ============================================

export function velocity3ToProper(velocity: THREE.Vector3): THREE.Vector3 {
  return velocity.clone().multiplyScalar(lorentzFactor(velocity));
}

export function velocityProperTo3(properVelocity: THREE.Vector3): THREE.Vector3 {
  const properSpeed2 = properVelocity.lengthSq();
  if (properSpeed2 === 0) {
    return new THREE.Vector3();
  }
  return properVelocity
    .clone()
    .setLength(1 / Math.sqrt(1 + 1 / properSpeed2));
}

export function velocity4ToProper(velocity: THREE.Vector4): THREE.Vector3 {
  return velocity3ToProper(velocity4To3(velocity));
}

export function velocityProperTo4(properVelocity: THREE.Vector3): THREE.Vector4 {
  return velocity3To4(velocityProperTo3(properVelocity));
}

// ============================================
// Hyperbolic motion from rest
// ============================================

/**
 * Proper time elapsed after `restTime` coordinate seconds of constant proper
 * acceleration from rest.
 */
export function constantAccelerationProperTime(
  properAcceleration: number,
  restTime: number,
): number {
  return Math.asinh(properAcceleration * restTime) / properAcceleration;
}

/**
 * Distance covered after `restTime` coordinate seconds of constant proper
 * acceleration from rest.
 */
export function constantAccelerationDisplacement(
  properAcceleration: number,
  restTime: number,
): number {
  const at = properAcceleration * restTime;
  return (Math.sqrt(1 + at * at) - 1) / properAcceleration;
}
