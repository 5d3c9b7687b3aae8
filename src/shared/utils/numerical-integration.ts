import { Vector3 } from "three";

/**
 * The two operations RK4 needs from a value type. Implementations must not
 * mutate their arguments.
 */
export interface VectorSpace<T> {
  add(a: T, b: T): T;
  scale(a: T, factor: number): T;
}

export type Derivative<T> = (time: number, value: T) => T;

export const scalarSpace: VectorSpace<number> = {
  add: (a, b) => a + b,
  scale: (a, factor) => a * factor,
};

export const vector3Space: VectorSpace<Vector3> = {
  add: (a, b) => a.clone().add(b),
  scale: (a, factor) => a.clone().multiplyScalar(factor),
};

/**
 * One step of the classical fourth-order Runge-Kutta method.
 *
 * @see https://en.wikipedia.org/wiki/Runge%E2%80%93Kutta_methods
 */
export function rungeKuttaStep<T>(
  space: VectorSpace<T>,
  initialValue: T,
  initialTime: number,
  timeStep: number,
  derivative: Derivative<T>,
): T {
  const half = timeStep / 2;

  const k1 = derivative(initialTime, initialValue);
  const k2 = derivative(
    initialTime + half,
    space.add(initialValue, space.scale(k1, half)),
  );
  const k3 = derivative(
    initialTime + half,
    space.add(initialValue, space.scale(k2, half)),
  );
  const k4 = derivative(
    initialTime + timeStep,
    space.add(initialValue, space.scale(k3, timeStep)),
  );

  const weighted = space.add(
    space.add(k1, space.scale(k2, 2)),
    space.add(space.scale(k3, 2), k4),
  );
  return space.add(initialValue, space.scale(weighted, timeStep / 6));
}

/**
 * Splits a non-negative span into whole steps of `stepSize` plus a final
 * partial step, so the steps sum to `span` exactly.
 */
export function splitSteps(
  span: number,
  stepSize: number,
): { fullSteps: number; remainder: number } {
  let fullSteps = Math.floor(span / stepSize);
  let remainder = span - fullSteps * stepSize;

  // Division can round up to the next integer
  if (remainder < 0) {
    fullSteps -= 1;
    remainder += stepSize;
  }

  return { fullSteps, remainder };
}

