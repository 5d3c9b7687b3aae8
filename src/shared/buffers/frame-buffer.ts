import type { EntityId } from "../types/entity";
import type { SharedBuffers } from "../types/universe-api";
import { config } from "../config";
import {
  assertBufferIndexInBounds,
  debugAssert,
  validateBufferIndex,
} from "../validation";

/**
 * Layout per entity in Float64Array (10 floats total):
 * [posX, posY, posZ, posT, velX, velY, velZ, scaleX, scaleY, scaleZ]
 * Position and velocity are the light-delayed apparent state in the user's
 * rest frame; scale is the length contraction to apply to the model.
 *
 * Clock buffer (Float64Array):
 * [universeTime, userProperTime]
 *
 * Control Int32Array for synchronization:
 * [frameCounter, slotCount, ...entityIds]
 * slotCount is the high-water mark of slots handed out. A freed slot holds
 * id 0 until a later registration reuses it.
 */

const FLOATS_PER_ENTITY = config.buffers.floatsPerEntity;
const CONTROL_HEADER_SIZE = config.buffers.controlHeaderSize;
const CLOCK_SIZE = config.buffers.clockSize;
const MAX_ENTITIES = config.buffers.maxEntities;

// Control buffer layout
const FRAME_COUNTER_INDEX = 0;
const SLOT_COUNT_INDEX = 1;
const ENTITY_IDS_START = 2;
const FREE_SLOT_ID = 0;

// Clock buffer layout
const CLOCK_TIME_INDEX = 0;
const CLOCK_PROPER_TIME_INDEX = 1;

/**
 * Apparent state of a single entity
 */
export interface ApparentStateSlot {
  posX: number;
  posY: number;
  posZ: number;
  posT: number;
  velX: number;
  velY: number;
  velZ: number;
  scaleX: number;
  scaleY: number;
  scaleZ: number;
}

export interface ClockSlot {
  universeTime: number;
  userProperTime: number;
}

/**
 * SharedFrameBuffer - Zero-copy apparent-state hand-off from the universe
 * worker to a renderer
 *
 * The universe worker writes every slot, then the clock, then bumps the frame
 * counter. Readers poll the counter and read between bumps. Positions are
 * double precision since coordinates grow with light-seconds travelled.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/SharedArrayBuffer
 */
export class SharedFrameBuffer {
  private controlSAB: SharedArrayBuffer;
  private stateSAB: SharedArrayBuffer;
  private clockSAB: SharedArrayBuffer;

  private controlView: Int32Array;
  private stateView: Float64Array;
  private clockView: Float64Array;

  private entityIndexMap: Map<EntityId, number> = new Map();

  // Writer side only
  private freeSlots: number[] = [];

  constructor(existing?: SharedBuffers) {
    if (existing) {
      // Use existing buffers (when receiving in worker)
      this.controlSAB = existing.control;
      this.stateSAB = existing.state;
      this.clockSAB = existing.clock;
    } else {
      // Create new buffers (in main thread)
      this.controlSAB = new SharedArrayBuffer(
        (CONTROL_HEADER_SIZE + MAX_ENTITIES) * Int32Array.BYTES_PER_ELEMENT,
      );
      this.stateSAB = new SharedArrayBuffer(
        MAX_ENTITIES * FLOATS_PER_ENTITY * Float64Array.BYTES_PER_ELEMENT,
      );
      this.clockSAB = new SharedArrayBuffer(
        CLOCK_SIZE * Float64Array.BYTES_PER_ELEMENT,
      );
    }

    this.controlView = new Int32Array(this.controlSAB);
    this.stateView = new Float64Array(this.stateSAB);
    this.clockView = new Float64Array(this.clockSAB);
  }

  /**
   * Get the underlying SharedArrayBuffers for transfer to workers
   */
  getBuffers(): SharedBuffers {
    return {
      control: this.controlSAB,
      state: this.stateSAB,
      clock: this.clockSAB,
    };
  }

  /**
   * Register an entity and get its slot index. Freed slots are reused
   * before new ones are handed out.
   *
   * @returns The buffer index for this entity
   * @throws Error if every slot holds a live entity
   */
  registerEntity(id: EntityId): number {
    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      this.entityIndexMap.set(id, reused);
      Atomics.store(this.controlView, ENTITY_IDS_START + reused, id);
      return reused;
    }

    const slotCount = Atomics.load(this.controlView, SLOT_COUNT_INDEX);

    if (slotCount >= MAX_ENTITIES) {
      throw new Error(
        `Maximum entity count (${MAX_ENTITIES}) exceeded. Cannot register entity ${id}.`,
      );
    }

    const index = slotCount;
    this.entityIndexMap.set(id, index);

    Atomics.store(this.controlView, ENTITY_IDS_START + index, id);
    Atomics.store(this.controlView, SLOT_COUNT_INDEX, slotCount + 1);

    return index;
  }

  /**
   * Unregister an entity and free its slot for the next registration
   */
  unregisterEntity(id: EntityId): void {
    const index = this.entityIndexMap.get(id);
    if (index === undefined) return;

    this.entityIndexMap.delete(id);
    Atomics.store(this.controlView, ENTITY_IDS_START + index, FREE_SLOT_ID);
    this.freeSlots.push(index);
  }

  /**
   * Get entity index from ID, or -1 if not registered here
   */
  getEntityIndex(id: EntityId): number {
    return this.entityIndexMap.get(id) ?? -1;
  }

  /**
   * Rebuild entity index map from control buffer
   * Called on the reading side after the writer registered entities
   */
  rebuildEntityMap(): void {
    this.entityIndexMap.clear();
    const slotCount = Atomics.load(this.controlView, SLOT_COUNT_INDEX);

    for (let i = 0; i < slotCount; i++) {
      const id = this.getEntityIdAt(i);
      if (id !== FREE_SLOT_ID) {
        this.entityIndexMap.set(id, i);
      }
    }
  }

  // ============================================
  // Universe Worker: Write apparent state and clock
  // ============================================

  /**
   * @throws Error if entityIndex is out of bounds
   */
  writeApparentState(entityIndex: number, state: ApparentStateSlot): void {
    assertBufferIndexInBounds(
      entityIndex,
      MAX_ENTITIES,
      "SharedFrameBuffer.writeApparentState",
    );

    debugAssert(
      this.isEntityIndexValid(entityIndex),
      `Entity index ${entityIndex} has no registered entity`,
    );

    const offset = entityIndex * FLOATS_PER_ENTITY;
    const view = this.stateView;
    view[offset + 0] = state.posX;
    view[offset + 1] = state.posY;
    view[offset + 2] = state.posZ;
    view[offset + 3] = state.posT;
    view[offset + 4] = state.velX;
    view[offset + 5] = state.velY;
    view[offset + 6] = state.velZ;
    view[offset + 7] = state.scaleX;
    view[offset + 8] = state.scaleY;
    view[offset + 9] = state.scaleZ;
  }

  writeClock(universeTime: number, userProperTime: number): void {
    this.clockView[CLOCK_TIME_INDEX] = universeTime;
    this.clockView[CLOCK_PROPER_TIME_INDEX] = userProperTime;
  }

  /**
   * Increment frame counter after all slots and the clock are written
   */
  signalFrameComplete(): void {
    Atomics.add(this.controlView, FRAME_COUNTER_INDEX, 1);
  }

  getFrameCounter(): number {
    return Atomics.load(this.controlView, FRAME_COUNTER_INDEX);
  }

  // ============================================
  // Renderer: Read apparent state and clock
  // ============================================

  /**
   * @throws Error if entityIndex is out of bounds
   */
  readApparentState(entityIndex: number): ApparentStateSlot {
    assertBufferIndexInBounds(
      entityIndex,
      MAX_ENTITIES,
      "SharedFrameBuffer.readApparentState",
    );

    const offset = entityIndex * FLOATS_PER_ENTITY;
    const view = this.stateView;
    return {
      posX: view[offset + 0],
      posY: view[offset + 1],
      posZ: view[offset + 2],
      posT: view[offset + 3],
      velX: view[offset + 4],
      velY: view[offset + 5],
      velZ: view[offset + 6],
      scaleX: view[offset + 7],
      scaleY: view[offset + 8],
      scaleZ: view[offset + 9],
    };
  }

  readClock(): ClockSlot {
    return {
      universeTime: this.clockView[CLOCK_TIME_INDEX],
      userProperTime: this.clockView[CLOCK_PROPER_TIME_INDEX],
    };
  }

  private isEntityIndexValid(index: number): boolean {
    const slotCount = Atomics.load(this.controlView, SLOT_COUNT_INDEX);
    return (
      index >= 0 && index < slotCount && this.getEntityIdAt(index) !== FREE_SLOT_ID
    );
  }

  /**
   * Validate a buffer index without throwing
   */
  validateIndex(index: number): ReturnType<typeof validateBufferIndex> {
    return validateBufferIndex(index, MAX_ENTITIES);
  }

  /**
   * Live entities in the buffer
   */
  getEntityCount(): number {
    const slotCount = this.getSlotCount();
    let count = 0;
    for (let i = 0; i < slotCount; i++) {
      if (this.getEntityIdAt(i) !== FREE_SLOT_ID) count++;
    }
    return count;
  }

  /**
   * Slots handed out so far, live or freed. Readers scan `0..slotCount`.
   */
  getSlotCount(): number {
    return Atomics.load(this.controlView, SLOT_COUNT_INDEX);
  }

  getEntityIdAt(index: number): EntityId {
    return Atomics.load(this.controlView, ENTITY_IDS_START + index) as EntityId;
  }
}
