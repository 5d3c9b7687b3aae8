import * as THREE from "three";
import type { EntityColor, EntityId } from "~/shared/types";
import { createEntityId } from "~/shared/types";
import { config } from "~/shared/config";
import type { InertialFrame } from "./inertial-frame";
import { lorentzFactor } from "./lorentz";
import {
  acceleration,
  eventKindsEqual,
  INERTIAL,
  Worldline,
  type WorldlineEvent,
  type WorldlineOptions,
} from "./worldline";

const PHYS_TIME_STEP = config.physics.timeStep;

/**
 * Entity - one worldline plus rendering metadata the physics core ignores
 */
export interface Entity {
  worldline: Worldline;
  model: string | null;
  modelMatrix: THREE.Matrix4;
  color: EntityColor;
}

export interface EntityOptions extends WorldlineOptions {
  frame?: InertialFrame;
  model?: string | null;
  modelMatrix?: THREE.Matrix4;
  color?: EntityColor;
}

export function createEntity(options: EntityOptions = {}): Entity {
  const { frame, model, modelMatrix, color, ...worldlineOptions } = options;
  return {
    worldline: new Worldline(frame, worldlineOptions),
    model: model ?? null,
    modelMatrix: modelMatrix?.clone() ?? new THREE.Matrix4(),
    color: color ?? { r: 1, g: 1, b: 1, a: 1 },
  };
}

export interface UniverseOptions {
  /** Coordinate time of the user's "now" */
  time?: number;
  /** Entity the user pilots and observes from */
  user?: Entity;
}

/**
 * Universe - every entity sharing one flat spacetime
 *
 * `time` is the user's "now" in coordinate time and the authoritative
 * simulation clock. Only `step` and the insert/remove/command methods mutate;
 * queries against worldlines must not interleave with a step.
 */
export class Universe {
  readonly entities: Map<EntityId, Entity> = new Map();
  readonly userEntityId: EntityId;
  time: number;

  constructor(options: UniverseOptions = {}) {
    this.time = options.time ?? config.universe.initialTime;
    this.userEntityId = createEntityId();
    this.entities.set(this.userEntityId, options.user ?? createEntity());
  }

  getUserEntity(): Entity {
    const user = this.entities.get(this.userEntityId);
    if (!user) {
      throw new Error(
        `[Universe.getUserEntity] User entity ${this.userEntityId} is missing`,
      );
    }
    return user;
  }

  getEntity(id: EntityId): Entity | undefined {
    return this.entities.get(id);
  }

  insertEntity(entity: Entity): EntityId {
    const id = createEntityId();
    this.entities.set(id, entity);
    return id;
  }

  /**
   * Remove an entity. The user entity cannot be removed.
   * @returns The removed entity, or null if nothing was removed
   */
  removeEntity(id: EntityId): Entity | null {
    if (id === this.userEntityId) {
      console.warn(
        `[Universe.removeEntity] Refusing to remove user entity ${id}.`,
      );
      return null;
    }

    const entity = this.entities.get(id);
    if (!entity) return null;

    this.entities.delete(id);
    return entity;
  }

  userEventNow(): WorldlineEvent {
    return this.getUserEntity().worldline.getEventAtTime(this.time);
  }

  /**
   * Advances the clock by `delta` seconds of the user's own time and bakes
   * every worldline up to the new "now".
   *
   * A fast-moving user sees coordinate time pass faster, so the integration
   * resolution scales with the user's Lorentz factor to keep the number of
   * steps per tick constant.
   */
  step(delta: number): void {
    const userGamma = lorentzFactor(this.userEventNow().frame.velocity);

    this.time += delta * userGamma;

    // Entities share nothing during a step
    for (const entity of this.entities.values()) {
      entity.worldline.timeResolution = PHYS_TIME_STEP * userGamma;
      entity.worldline.bakeEvents(this.time);
    }
  }

  /**
   * Sets the user's proper acceleration from now on. Only edits the worldline
   * when the command differs from the active one, so holding a key does not
   * flood it with events.
   *
   * @returns Whether an event was inserted
   */
  commandUserAcceleration(properAcceleration: THREE.Vector3): boolean {
    // Zero thrust coasts, which needs no baking
    const commanded =
      properAcceleration.lengthSq() === 0
        ? INERTIAL
        : acceleration(properAcceleration);

    const { worldline } = this.getUserEntity();
    if (eventKindsEqual(worldline.kindAtTime(this.time), commanded)) {
      return false;
    }

    worldline.insertEvent(this.time, commanded);
    return true;
  }
}
