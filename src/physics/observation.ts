import * as THREE from "three";
import type { ApparentStateData, EntityId } from "~/shared/types";
import { config } from "~/shared/config";
import type { InertialFrame } from "./inertial-frame";
import { lorentzBoost, lorentzFactor } from "./lorentz";
import type { Entity, Universe } from "./universe";
import { eventToData, type Worldline, type WorldlineEvent } from "./worldline";

export interface ObservationOptions {
  /** Light-travel residual accepted as converged */
  tolerance?: number;
  /** Worldline re-queries allowed before the last estimate is accepted */
  maxIterations?: number;
}

export interface RetardedEvent {
  /** Emission event whose light reaches the observer at the query time */
  event: WorldlineEvent;
  iterations: number;
  converged: boolean;
  /** `(time - emission time) - distance` of the returned event */
  residual: number;
}

/**
 * Light still in flight: how much longer the emission has been travelling
 * than the distance it had to cover.
 */
function lightDelayResidual(
  event: WorldlineEvent,
  time: number,
  observer: InertialFrame,
): number {
  const travelTime = Math.hypot(
    event.frame.position.x - observer.position.x,
    event.frame.position.y - observer.position.y,
    event.frame.position.z - observer.position.z,
  );
  return time - event.frame.time - travelTime;
}

/**
 * Finds the event on `worldline` whose light arrives at `observer` exactly
 * at `time`.
 *
 * Secant iteration on the light-delay residual. The first step has no
 * previous sample, so the relative Lorentz factor stands in for the slope;
 * that heuristic is not guaranteed to converge for strongly accelerating
 * targets. Each iteration that has not converged re-queries the worldline
 * once; after `maxIterations` of them the last estimate is returned
 * regardless, which only costs visual fidelity.
 */
export function findRetardedEvent(
  worldline: Worldline,
  time: number,
  observer: InertialFrame,
  options: ObservationOptions = {},
): RetardedEvent {
  const tolerance = options.tolerance ?? config.observation.tolerance;
  const maxIterations = Math.max(
    1,
    options.maxIterations ?? config.observation.maxIterations,
  );

  let event = worldline.getEventAtTime(time);
  let previousResidual: number | null = null;
  let previousChange: number | null = null;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const residual = lightDelayResidual(event, time, observer);

    if (Math.abs(residual) < tolerance) {
      return { event, iterations: iteration, converged: true, residual };
    }

    let change = Number.NaN;
    if (previousResidual !== null && previousChange !== null) {
      const derivative = (previousResidual - residual) / previousChange;
      change = residual / derivative;
    }

    // First step, or a flat secant that would send the query to infinity
    if (!Number.isFinite(change)) {
      const relativeGamma = lorentzFactor(
        event.frame.relativeTo(observer).velocity,
      );
      change = residual / relativeGamma;
    }

    previousResidual = residual;
    previousChange = change;

    event = worldline.getEventAtTime(event.frame.time + change);
  }

  const residual = lightDelayResidual(event, time, observer);
  return {
    event,
    iterations: maxIterations,
    converged: Math.abs(residual) < tolerance,
    residual,
  };
}

/**
 * What an entity looks like to an observer, light delay included
 */
export interface ApparentState {
  retarded: RetardedEvent;
  /** The emission event in the observer's rest frame */
  relativeFrame: InertialFrame;
  /** Per-axis length contraction of the entity's model */
  contraction: THREE.Vector3;
  /** translate(relative position) * scale(contraction) * entity model matrix */
  modelMatrix: THREE.Matrix4;
}

export function observeEntity(
  entity: Entity,
  time: number,
  observer: InertialFrame,
  options: ObservationOptions = {},
): ApparentState {
  const retarded = findRetardedEvent(entity.worldline, time, observer, options);
  const relativeFrame = retarded.event.frame.relativeTo(observer);

  const boost = lorentzBoost(relativeFrame.velocity).elements;
  const contraction = new THREE.Vector3(1 / boost[0], 1 / boost[5], 1 / boost[10]);

  const { x, y, z } = relativeFrame.position;
  const modelMatrix = new THREE.Matrix4()
    .makeTranslation(x, y, z)
    .multiply(new THREE.Matrix4().makeScale(contraction.x, contraction.y, contraction.z))
    .multiply(entity.modelMatrix);

  return { retarded, relativeFrame, contraction, modelMatrix };
}

/**
 * Apparent state of every entity except the user, seen from the user's frame
 * at the universe's current time.
 */
export function observeUniverse(
  universe: Universe,
  options: ObservationOptions = {},
): Map<EntityId, ApparentState> {
  const observer = universe.userEventNow().frame;
  const apparent = new Map<EntityId, ApparentState>();

  for (const [id, entity] of universe.entities) {
    if (id === universe.userEntityId) continue;
    apparent.set(id, observeEntity(entity, universe.time, observer, options));
  }

  return apparent;
}

export function apparentStateToData(state: ApparentState): ApparentStateData {
  return {
    event: eventToData(state.retarded.event),
    relativeFrame: state.relativeFrame.toData(),
    contraction: {
      x: state.contraction.x,
      y: state.contraction.y,
      z: state.contraction.z,
    },
    converged: state.retarded.converged,
    iterations: state.retarded.iterations,
  };
}
