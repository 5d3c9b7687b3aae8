// ============================================
// Spacetime Data - plain objects that survive structured clone
// ============================================

export interface Vector3Data {
  x: number;
  y: number;
  z: number;
}

/**
 * A point in spacetime: spatial components plus coordinate time `t`
 */
export interface Vector4Data {
  x: number;
  y: number;
  z: number;
  t: number;
}

export interface FrameData {
  position: Vector4Data;
  velocity: Vector3Data;
}

export type WorldlineEventKindData =
  | { type: "inertial" }
  | { type: "acceleration"; properAcceleration: Vector3Data };

export interface WorldlineEventData {
  frame: FrameData;
  properTime: number;
  kind: WorldlineEventKindData;
}

/**
 * Light-delayed appearance of one entity to the user
 */
export interface ApparentStateData {
  /** The emission event whose light reaches the user now */
  event: WorldlineEventData;
  /** Emission event expressed in the user's rest frame */
  relativeFrame: FrameData;
  /** Per-axis length contraction scale */
  contraction: Vector3Data;
  converged: boolean;
  iterations: number;
}

/**
 * The user's "now"
 */
export interface UniverseClock {
  time: number;
  userProperTime: number;
  userFrame: FrameData;
}
