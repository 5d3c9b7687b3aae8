// Spacetime data
export type {
  ApparentStateData,
  FrameData,
  UniverseClock,
  Vector3Data,
  Vector4Data,
  WorldlineEventData,
  WorldlineEventKindData,
} from "./spacetime";

// Worker API
export type {
  PilotInput,
  SharedBuffers,
  TickCallback,
  TickEvent,
  UniverseApi,
  UniverseInitOptions,
} from "./universe-api";

// Entity System
export type { EntityColor, EntityId, EntitySpawnData } from "./entity";
export { createEntityId } from "./entity";
