import type { EntityId, EntitySpawnData } from "./entity";
import type {
  ApparentStateData,
  UniverseClock,
  Vector3Data,
  WorldlineEventData,
} from "./spacetime";

// ============================================
// Universe Worker API - exposed via Comlink
// ============================================

/**
 * Held thrust keys from the main thread
 */
export interface PilotInput {
  forward: boolean;
  backward: boolean;
  left: boolean;
  right: boolean;
  up: boolean;
  down: boolean;
  /** Pilot orientation quaternion; thrust is rotated by it */
  orientation?: { x: number; y: number; z: number; w: number };
}

/**
 * Shared buffer references for zero-copy apparent-state sync
 */
export interface SharedBuffers {
  control: SharedArrayBuffer;
  state: SharedArrayBuffer;
  clock: SharedArrayBuffer;
}

export interface UniverseInitOptions {
  /** Starting coordinate time of the user's "now" */
  time?: number;
  /** Seed state of the user entity */
  user?: EntitySpawnData;
}

/**
 * Emitted after each batch of fixed ticks
 */
export interface TickEvent {
  time: number;
  userProperTime: number;
  ticks: number;
}

export type TickCallback = (event: TickEvent) => void;

export interface UniverseApi {
  init(options: UniverseInitOptions, sharedBuffers?: SharedBuffers): Promise<EntityId>;

  spawnEntity(entity: EntitySpawnData): Promise<EntityId>;
  removeEntity(id: EntityId): boolean;

  setUserInput(input: PilotInput): boolean;
  setUserAcceleration(properAcceleration: Vector3Data): boolean;

  /** Runs `count` fixed ticks immediately */
  step(count?: number): TickEvent;

  getEventAtTime(id: EntityId, time: number): WorldlineEventData;
  observe(id: EntityId): ApparentStateData;
  getClock(): UniverseClock;

  start(): void;
  pause(): void;
  resume(): void;
  dispose(): void;

  setTickCallback(callback: TickCallback | null): void;
}
