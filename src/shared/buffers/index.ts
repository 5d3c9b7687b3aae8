export {
  SharedFrameBuffer,
  type ApparentStateSlot,
  type ClockSlot,
} from "./frame-buffer";
