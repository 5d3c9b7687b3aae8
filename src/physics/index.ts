/**
 * Physics Module
 *
 * Re-exports the relativistic core.
 * The API factory is in the worker module (universe-api.ts).
 */

export * from "./lorentz";
export * from "./metric";
export { InertialFrame, clampVelocity } from "./inertial-frame";
export {
  Worldline,
  INERTIAL,
  acceleration,
  eventAtTimeOffset,
  eventKindFromData,
  eventKindsEqual,
  eventToData,
  type WorldlineEvent,
  type WorldlineEventKind,
  type WorldlineOptions,
} from "./worldline";
export {
  Universe,
  createEntity,
  type Entity,
  type EntityOptions,
  type UniverseOptions,
} from "./universe";
export {
  apparentStateToData,
  findRetardedEvent,
  observeEntity,
  observeUniverse,
  type ApparentState,
  type ObservationOptions,
  type RetardedEvent,
} from "./observation";
export { default as PilotController } from "./pilot-controller";
export {
  default as UniverseSimulation,
  entityFromSpawnData,
  type UniverseSimulationOptions,
} from "./universe-simulation";
