export { default as EventEmitter } from "./event-emitter";
export {
  rungeKuttaStep,
  splitSteps,
  scalarSpace,
  vector3Space,
  type Derivative,
  type VectorSpace,
} from "./numerical-integration";
