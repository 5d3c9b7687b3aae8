import * as THREE from "three";

/**
 * Metric tensor helpers
 *
 * A metric generalizes the dot product: component ij is the dot product of
 * basis vectors i and j. Components must be symmetric.
 */

/**
 * Flat Minkowski metric in (x, y, z, t) order, signature (-, -, -, +)
 */
export const MINKOWSKI: Readonly<THREE.Matrix4> = new THREE.Matrix4().makeScale(
  -1,
  -1,
  -1,
);

export type IntervalKind = "timelike" | "lightlike" | "spacelike";

/**
 * Applies the metric to two vectors: `aᵗ · metric · b`.
 */
export function metricDot(
  metric: Readonly<THREE.Matrix4>,
  a: THREE.Vector4,
  b: THREE.Vector4,
): number {
  return a.dot(b.clone().applyMatrix4(metric));
}

/**
 * Squared spacetime interval between two events, `Δt² - |Δx|²`.
 * Positive when one event can causally reach the other.
 */
export function spacetimeInterval(from: THREE.Vector4, to: THREE.Vector4): number {
  const separation = to.clone().sub(from);
  return metricDot(MINKOWSKI, separation, separation);
}

export function classifyInterval(
  from: THREE.Vector4,
  to: THREE.Vector4,
  tolerance = 1e-9,
): IntervalKind {
  const interval = spacetimeInterval(from, to);
  if (Math.abs(interval) <= tolerance) return "lightlike";
  return interval > 0 ? "timelike" : "spacelike";
}
