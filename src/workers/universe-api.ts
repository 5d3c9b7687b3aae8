import * as THREE from "three";
import type {
  ApparentStateData,
  EntityId,
  EntitySpawnData,
  PilotInput,
  SharedBuffers,
  TickCallback,
  TickEvent,
  UniverseApi,
  UniverseClock,
  UniverseInitOptions,
  Vector3Data,
  WorldlineEventData,
} from "~/shared/types";
import { SharedFrameBuffer } from "~/shared/buffers";
import {
  assertEntityExists,
  assertFiniteNumber,
  assertFiniteVector,
  assertInitialized,
  assertValidEntityId,
} from "~/shared/validation";
import {
  apparentStateToData,
  entityFromSpawnData,
  eventToData,
  observeEntity,
  Universe,
  UniverseSimulation,
} from "~/physics";

function assertValidSpawnData(
  entity: EntitySpawnData,
  context: string,
): void {
  const { position, velocity } = entity.frame;
  assertFiniteVector(position, "frame.position", context);
  assertFiniteNumber(position.t, "frame.position.t", context);
  assertFiniteVector(velocity, "frame.velocity", context);
}

/**
 * Creates the UniverseApi implementation
 *
 * The API wraps a UniverseSimulation and handles:
 * - Lazy initialization (simulation created on init())
 * - SharedArrayBuffer wrapping
 * - Conversion between three.js types and structured-clone data
 * - Input validation at the worker boundary
 */
export function createUniverseApi(): UniverseApi {
  let simulation: UniverseSimulation | null = null;
  let unsubscribeTick: (() => void) | null = null;

  /**
   * Assert that the simulation is initialized
   * @throws Error if simulation is null
   */
  const assertSimulationInitialized = (): UniverseSimulation => {
    assertInitialized(simulation, "UniverseSimulation", "UniverseApi");
    return simulation;
  };

  return {
    async init(
      options: UniverseInitOptions,
      sharedBuffers?: SharedBuffers,
    ): Promise<EntityId> {
      // Warn if already initialized
      if (simulation) {
        console.warn(
          "[UniverseApi.init] Already initialized. Disposing and reinitializing.",
        );
        unsubscribeTick = null;
        simulation.dispose();
      }

      if (options.time !== undefined) {
        assertFiniteNumber(options.time, "time", "UniverseApi.init");
      }
      if (options.user) {
        assertValidSpawnData(options.user, "UniverseApi.init");
      }

      const universe = new Universe({
        time: options.time,
        user: options.user ? entityFromSpawnData(options.user) : undefined,
      });

      simulation = new UniverseSimulation({
        universe,
        frameBuffer: sharedBuffers ? new SharedFrameBuffer(sharedBuffers) : null,
      });

      return universe.userEntityId;
    },

    async spawnEntity(entity: EntitySpawnData): Promise<EntityId> {
      assertValidSpawnData(entity, "UniverseApi.spawnEntity");
      return assertSimulationInitialized().spawnEntity(entity);
    },

    removeEntity(id: EntityId): boolean {
      assertValidEntityId(id, "UniverseApi.removeEntity");
      return assertSimulationInitialized().removeEntity(id);
    },

    // ============================================
    // Pilot Control
    // ============================================

    setUserInput(input: PilotInput): boolean {
      return assertSimulationInitialized().setUserInput(input);
    },

    setUserAcceleration(properAcceleration: Vector3Data): boolean {
      assertFiniteVector(
        properAcceleration,
        "properAcceleration",
        "UniverseApi.setUserAcceleration",
      );
      const { x, y, z } = properAcceleration;
      return assertSimulationInitialized().setUserAcceleration(
        new THREE.Vector3(x, y, z),
      );
    },

    // ============================================
    // Queries
    // ============================================

    step(count = 1): TickEvent {
      if (!Number.isInteger(count) || count < 0) {
        throw new Error(
          `[UniverseApi.step] Tick count must be a non-negative integer, got: ${count}`,
        );
      }
      return assertSimulationInitialized().tick(count);
    },

    getEventAtTime(id: EntityId, time: number): WorldlineEventData {
      assertValidEntityId(id, "UniverseApi.getEventAtTime");
      assertFiniteNumber(time, "time", "UniverseApi.getEventAtTime");

      const entity = assertSimulationInitialized().getUniverse().getEntity(id);
      assertEntityExists(entity, id, "UniverseApi.getEventAtTime");
      return eventToData(entity.worldline.getEventAtTime(time));
    },

    observe(id: EntityId): ApparentStateData {
      assertValidEntityId(id, "UniverseApi.observe");

      const universe = assertSimulationInitialized().getUniverse();
      const entity = universe.getEntity(id);
      assertEntityExists(entity, id, "UniverseApi.observe");

      const observer = universe.userEventNow().frame;
      return apparentStateToData(observeEntity(entity, universe.time, observer));
    },

    getClock(): UniverseClock {
      return assertSimulationInitialized().getClock();
    },

    // ============================================
    // Simulation Control
    // ============================================

    start(): void {
      assertSimulationInitialized().start();
    },

    pause(): void {
      simulation?.pause();
    },

    resume(): void {
      simulation?.resume();
    },

    dispose(): void {
      simulation?.dispose();
      simulation = null;
      unsubscribeTick = null;
    },

    // ============================================
    // Callbacks
    // ============================================

    setTickCallback(callback: TickCallback | null): void {
      const current = assertSimulationInitialized();
      unsubscribeTick?.();
      unsubscribeTick = callback ? current.on("tick", callback) : null;
    },
  };
}
