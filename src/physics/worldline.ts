import * as THREE from "three";
import type { WorldlineEventData, WorldlineEventKindData } from "~/shared/types";
import { config } from "~/shared/config";
import { splitSteps } from "~/shared/utils";
import { InertialFrame } from "./inertial-frame";
import { lorentzFactor } from "./lorentz";

const PHYS_TIME_STEP = config.physics.timeStep;

/**
 * The law of motion that holds from an event until the next one.
 */
export type WorldlineEventKind =
  | { type: "inertial" }
  | { type: "acceleration"; properAcceleration: THREE.Vector3 };

export const INERTIAL: WorldlineEventKind = { type: "inertial" };

export function acceleration(properAcceleration: THREE.Vector3): WorldlineEventKind {
  return { type: "acceleration", properAcceleration: properAcceleration.clone() };
}

export function eventKindsEqual(a: WorldlineEventKind, b: WorldlineEventKind): boolean {
  if (a.type === "inertial" || b.type === "inertial") {
    return a.type === b.type;
  }
  return a.properAcceleration.equals(b.properAcceleration);
}

export function eventKindFromData(data: WorldlineEventKindData): WorldlineEventKind {
  if (data.type === "inertial") return INERTIAL;
  const { x, y, z } = data.properAcceleration;
  return acceleration(new THREE.Vector3(x, y, z));
}

/**
 * A keyframe on a worldline
 */
export interface WorldlineEvent {
  frame: InertialFrame;
  /** The entity's own clock, zero at the seed event */
  properTime: number;
  kind: WorldlineEventKind;
}

export function eventToData(event: WorldlineEvent): WorldlineEventData {
  const kind: WorldlineEventKindData =
    event.kind.type === "inertial"
      ? { type: "inertial" }
      : {
          type: "acceleration",
          properAcceleration: {
            x: event.kind.properAcceleration.x,
            y: event.kind.properAcceleration.y,
            z: event.kind.properAcceleration.z,
          },
        };

  return { frame: event.frame.toData(), properTime: event.properTime, kind };
}

/**
 * Extrapolates `event` by `offset` coordinate seconds under its own kind.
 *
 * Inertial motion is closed-form. Acceleration is integrated forward in steps
 * of `timeResolution`, so its cost grows with the offset. An acceleration
 * starts at its event, so a negative offset coasts backward at the event's
 * velocity instead.
 */
export function eventAtTimeOffset(
  event: WorldlineEvent,
  offset: number,
  timeResolution: number,
): WorldlineEvent {
  const { kind } = event;

  if (kind.type === "inertial" || offset < 0) {
    return {
      frame: event.frame.predict(offset),
      properTime: event.properTime + offset / lorentzFactor(event.frame.velocity),
      kind,
    };
  }

  // No exact solution for an arbitrary acceleration on a moving frame
  const frame = event.frame.clone();
  let properTime = event.properTime;

  const { fullSteps, remainder } = splitSteps(offset, timeResolution);
  for (let i = 0; i < fullSteps; i++) {
    properTime += frame.step(timeResolution, kind.properAcceleration);
  }
  if (remainder > 0) {
    properTime += frame.step(remainder, kind.properAcceleration);
  }

  // Summed steps drift from the requested time by rounding
  frame.position.w = event.frame.time + offset;

  return { frame, properTime, kind };
}

function cloneEvent(event: WorldlineEvent): WorldlineEvent {
  const kind =
    event.kind.type === "inertial" ? INERTIAL : acceleration(event.kind.properAcceleration);
  return { frame: event.frame.clone(), properTime: event.properTime, kind };
}

interface NeighborIndices {
  before: number | null;
  after: number | null;
}

export interface WorldlineOptions {
  /** Largest coordinate step used when integrating acceleration */
  timeResolution?: number;
  /** Seconds between baked checkpoints at reference resolution */
  bakeInterval?: number;
}

/**
 * Worldline - the path an entity traces through spacetime
 *
 * An ordered, editable list of keyframe events sorted by coordinate time.
 * There is no notion of "now" on a worldline alone: it is a static path that
 * can be queried at any time and rewritten from any time onward.
 */
export class Worldline {
  private events: WorldlineEvent[];
  timeResolution: number;
  readonly bakeInterval: number;

  constructor(
    startFrame: InertialFrame = new InertialFrame(),
    options: WorldlineOptions = {},
  ) {
    this.events = [{ frame: startFrame.clone(), properTime: 0, kind: INERTIAL }];
    this.timeResolution = options.timeResolution ?? PHYS_TIME_STEP;
    this.bakeInterval = options.bakeInterval ?? config.physics.eventBakeInterval;
  }

  get length(): number {
    return this.events.length;
  }

  // Accessors return copies; edits go through insertEvent to keep the order

  getEvents(): WorldlineEvent[] {
    return this.events.map(cloneEvent);
  }

  get first(): WorldlineEvent {
    return cloneEvent(this.events[0]);
  }

  get last(): WorldlineEvent {
    return cloneEvent(this.events[this.events.length - 1]);
  }

  /**
   * Binary search for the events bracketing `coordTime`. `after` is the
   * first event at or past `coordTime`.
   */
  private getNeighborEventIndices(coordTime: number): NeighborIndices {
    const lastIndex = this.events.length - 1;
    if (this.events[lastIndex].frame.time < coordTime) {
      return { before: lastIndex, after: null };
    }

    let low = 0;
    let high = this.events.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.events[mid].frame.time < coordTime) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return { before: low === 0 ? null : low - 1, after: low };
  }

  /**
   * State of the entity at `coordTime`.
   *
   * Before the first event the entity is assumed to have coasted forever at
   * its first recorded velocity. Past the last event the last event's own
   * kind keeps applying.
   */
  getEventAtTime(coordTime: number): WorldlineEvent {
    const { before } = this.getNeighborEventIndices(coordTime);

    if (before === null) {
      const first = this.events[0];
      const coasting: WorldlineEvent = { ...first, kind: INERTIAL };
      return eventAtTimeOffset(
        coasting,
        coordTime - first.frame.time,
        this.timeResolution,
      );
    }

    const event = this.events[before];
    return eventAtTimeOffset(
      event,
      coordTime - event.frame.time,
      this.timeResolution,
    );
  }

  /**
   * The law of motion in force just after `coordTime`: the kind of the
   * latest event at or before it. Before the first event that is inertial.
   */
  kindAtTime(coordTime: number): WorldlineEventKind {
    let low = 0;
    let high = this.events.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.events[mid].frame.time <= coordTime) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low === 0 ? INERTIAL : this.events[low - 1].kind;
  }

  /**
   * Starts a new law of motion at `coordTime`, discarding every event at or
   * after it. Events before `coordTime` are untouched.
   */
  insertEvent(coordTime: number, kind: WorldlineEventKind): void {
    this.bakeEvents(coordTime);

    // Only events before coordTime feed this, so it survives the truncation
    const event = this.getEventAtTime(coordTime);

    const { after } = this.getNeighborEventIndices(coordTime);
    if (after !== null) {
      this.events.length = after;
    }

    this.events.push({ ...event, kind });
  }

  /**
   * Lays down same-kind checkpoints from the last event up to `coordTime`
   * so later queries never integrate further than one bake interval.
   * The trajectory itself does not change.
   */
  bakeEvents(coordTime: number): void {
    // Inside already-defined events, nothing to bake
    if (this.getNeighborEventIndices(coordTime).after !== null) return;

    const event = this.events[this.events.length - 1];

    // Linear motion extrapolates for free
    if (event.kind.type === "inertial") return;

    const interval = this.bakeInterval * (this.timeResolution / PHYS_TIME_STEP);
    let bakeTime = event.frame.time + interval;
    while (bakeTime < coordTime) {
      this.insertEvent(bakeTime, event.kind);
      bakeTime += interval;
    }
  }
}
