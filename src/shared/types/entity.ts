import type { FrameData, Vector3Data } from "./spacetime";

// ============================================
// Entity System Types
// ============================================

/**
 * EntityId - unique identifier for entities across workers
 * Using branded type for type safety
 */
export type EntityId = number & { readonly __brand: "EntityId" };

let nextEntityId = 1;
export function createEntityId(): EntityId {
  return nextEntityId++ as EntityId;
}

/**
 * RGBA color, components in 0-1
 */
export interface EntityColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Entity definition for spawning into a universe
 *
 * `frame` is the seed event of the entity's worldline. Rendering metadata
 * rides along untouched by the physics core.
 */
export interface EntitySpawnData {
  frame: FrameData;
  model?: string;
  scale?: Vector3Data;
  color?: EntityColor;
}
