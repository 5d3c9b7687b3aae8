/**
 * Simulation configuration constants
 *
 * Centralized config for the relativistic core, the simulation loop and the
 * shared buffers. Units are natural: c = 1, one unit of distance per second.
 * Keep this file free of three.js and worker dependencies.
 */

const PHYS_TIME_STEP = 1 / 240;

export const config = {
  // Physics
  physics: {
    timeStep: PHYS_TIME_STEP, // Coordinate seconds per fixed tick (reference resolution)
    interval: 1000 * PHYS_TIME_STEP, // Loop interval in ms (~4.17ms for 240Hz)
    maxTicksPerFrame: 20, // Cap on catch-up ticks after a stall
    eventBakeInterval: 1.0, // Seconds between baked checkpoints at reference resolution
    maxSpeed: 0.99999999999, // Fraction of c no velocity may reach
  },

  // Universe defaults
  universe: {
    // Starts late so entities have a past to be observed through light delay
    initialTime: 1000,
  },

  // Retarded-time solver
  observation: {
    tolerance: 0.001, // Light-travel residual accepted as converged
    maxIterations: 30,
  },

  // Pilot (user entity) thrust
  pilot: {
    acceleration: 0.25, // Proper acceleration magnitude while a key is held
  },

  // Buffer configuration
  buffers: {
    maxEntities: 1024,
    floatsPerEntity: 10, // position (4) + velocity (3) + contraction (3)
    controlHeaderSize: 2, // frameCounter, slotCount
    clockSize: 2, // universeTime, userProperTime
  },
} as const;

export type Config = typeof config;

