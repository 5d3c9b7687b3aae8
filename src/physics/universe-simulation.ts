import * as THREE from "three";
import type {
  EntityId,
  EntitySpawnData,
  PilotInput,
  TickEvent,
  UniverseClock,
} from "~/shared/types";
import type { SharedFrameBuffer } from "~/shared/buffers";
import { config } from "~/shared/config";
import { EventEmitter } from "~/shared/utils";
import { InertialFrame } from "./inertial-frame";
import { observeUniverse, type ObservationOptions } from "./observation";
import PilotController from "./pilot-controller";
import { createEntity, Universe, type Entity } from "./universe";

type SimulationEvents = {
  tick: TickEvent;
};

export interface UniverseSimulationOptions {
  universe?: Universe;
  frameBuffer?: SharedFrameBuffer | null;
  pilot?: PilotController;
  observation?: ObservationOptions;
}

export function entityFromSpawnData(data: EntitySpawnData): Entity {
  const scale = data.scale ?? { x: 1, y: 1, z: 1 };
  return createEntity({
    frame: InertialFrame.fromData(data.frame),
    model: data.model ?? null,
    modelMatrix: new THREE.Matrix4().makeScale(scale.x, scale.y, scale.z),
    color: data.color,
  });
}

/**
 * UniverseSimulation - fixed-step loop around a Universe
 *
 * Steps the universe at a fixed coordinate resolution, feeds pilot input to
 * the user's worldline, and publishes every entity's light-delayed apparent
 * state to a SharedArrayBuffer for zero-copy reads by a renderer.
 */
export default class UniverseSimulation extends EventEmitter<SimulationEvents> {
  private universe: Universe;
  private frameBuffer: SharedFrameBuffer | null;
  private pilot: PilotController;
  private observationOptions: ObservationOptions;

  // Simulation loop
  private running = false;
  private lastTime = 0;
  private ticksOwed = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly TIME_STEP = config.physics.timeStep;
  private readonly INTERVAL = config.physics.interval;
  private readonly MAX_TICKS_PER_FRAME = config.physics.maxTicksPerFrame;

  constructor(options: UniverseSimulationOptions = {}) {
    super();
    this.universe = options.universe ?? new Universe();
    this.frameBuffer = options.frameBuffer ?? null;
    this.pilot = options.pilot ?? new PilotController();
    this.observationOptions = options.observation ?? {};
  }

  getUniverse(): Universe {
    return this.universe;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * @throws Error if the frame buffer has no free slot; the universe is left
   * as it was
   */
  spawnEntity(data: EntitySpawnData): EntityId {
    const id = this.universe.insertEntity(entityFromSpawnData(data));
    try {
      this.frameBuffer?.registerEntity(id);
    } catch (error) {
      this.universe.removeEntity(id);
      throw error;
    }
    return id;
  }

  /**
   * @returns Whether an entity was removed
   */
  removeEntity(id: EntityId): boolean {
    const removed = this.universe.removeEntity(id);
    if (!removed) return false;

    this.frameBuffer?.unregisterEntity(id);
    return true;
  }

  /**
   * @returns Whether the user's worldline was edited
   */
  setUserInput(input: PilotInput): boolean {
    this.pilot.setInput(input);
    return this.pilot.update(this.universe);
  }

  /**
   * @returns Whether the user's worldline was edited
   */
  setUserAcceleration(properAcceleration: THREE.Vector3): boolean {
    return this.universe.commandUserAcceleration(properAcceleration);
  }

  /**
   * Runs `count` fixed ticks, then publishes once.
   */
  tick(count = 1): TickEvent {
    for (let i = 0; i < count; i++) {
      this.universe.step(this.TIME_STEP);
    }

    this.publish();

    const event: TickEvent = {
      time: this.universe.time,
      userProperTime: this.universe.userEventNow().properTime,
      ticks: count,
    };
    this.emit("tick", event);
    return event;
  }

  /**
   * Fixed-step accumulator: owes one tick per TIME_STEP of elapsed wall
   * time, runs at most MAX_TICKS_PER_FRAME of them and drops whole ticks
   * past that so a stall does not snowball.
   *
   * @returns Number of ticks run
   */
  advance(elapsedSeconds: number): number {
    this.ticksOwed += elapsedSeconds / this.TIME_STEP;

    const ticks = Math.min(Math.floor(this.ticksOwed), this.MAX_TICKS_PER_FRAME);
    this.ticksOwed -= Math.floor(this.ticksOwed);

    if (ticks > 0) {
      this.tick(ticks);
    }
    return ticks;
  }

  getClock(): UniverseClock {
    const userEvent = this.universe.userEventNow();
    return {
      time: this.universe.time,
      userProperTime: userEvent.properTime,
      userFrame: userEvent.frame.toData(),
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastTime = performance.now();
    this.schedule();
  }

  pause(): void {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  resume(): void {
    this.start();
  }

  private schedule(): void {
    this.timer = setTimeout(this.loop, this.INTERVAL);
  }

  private loop = (): void => {
    this.timer = null;
    if (!this.running) return;

    const now = performance.now();
    const elapsedSeconds = (now - this.lastTime) / 1000;
    this.lastTime = now;

    this.advance(elapsedSeconds);
    this.schedule();
  };

  /**
   * Write apparent state of every registered entity, then the clock, then
   * signal the frame.
   */
  private publish(): void {
    const frameBuffer = this.frameBuffer;
    if (!frameBuffer) return;

    const apparent = observeUniverse(this.universe, this.observationOptions);

    for (const [id, state] of apparent) {
      const bufferIndex = frameBuffer.getEntityIndex(id);

      if (bufferIndex === -1) {
        console.error(
          `[UniverseSimulation.publish] Entity ${id} has no frame buffer slot. ` +
            `Entities must be spawned through the simulation to be published. ` +
            `Skipping write.`,
        );
        continue;
      }

      const validation = frameBuffer.validateIndex(bufferIndex);
      if (!validation.success) {
        console.error(
          `[UniverseSimulation.publish] Entity ${id} has invalid buffer index ${bufferIndex}: ` +
            `${validation.error}. Skipping write.`,
        );
        continue;
      }

      const { position, velocity } = state.relativeFrame;
      frameBuffer.writeApparentState(validation.value, {
        posX: position.x,
        posY: position.y,
        posZ: position.z,
        posT: position.w,
        velX: velocity.x,
        velY: velocity.y,
        velZ: velocity.z,
        scaleX: state.contraction.x,
        scaleY: state.contraction.y,
        scaleZ: state.contraction.z,
      });
    }

    frameBuffer.writeClock(
      this.universe.time,
      this.universe.userEventNow().properTime,
    );
    frameBuffer.signalFrameComplete();
  }

  dispose(): void {
    this.pause();
    this.frameBuffer = null;
    super.dispose();
  }
}
