/**
 * worldline-engine
 *
 * Special-relativistic worldline simulation: Lorentz kinematics, piecewise
 * worldlines under constant proper acceleration, and light-delayed
 * observation from a moving user.
 */
export * from "./physics";
export * from "./shared/types";
export { config, type Config } from "./shared/config";
export {
  SharedFrameBuffer,
  type ApparentStateSlot,
  type ClockSlot,
} from "./shared/buffers";
export { createUniverseApi } from "./workers";
