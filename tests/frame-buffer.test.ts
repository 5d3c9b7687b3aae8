import { describe, expect, it } from "vitest";
import { config } from "../src/shared/config";
import { SharedFrameBuffer, type ApparentStateSlot } from "../src/shared/buffers";
import { createEntityId } from "../src/shared/types";

const slot: ApparentStateSlot = {
  posX: 10,
  posY: -2.5,
  posZ: 0.125,
  posT: -10,
  velX: 0.6,
  velY: 0,
  velZ: -0.1,
  scaleX: 0.8,
  scaleY: 1,
  scaleZ: 1,
};

describe("SharedFrameBuffer", () => {
  it("hands out slots in registration order", () => {
    const buffer = new SharedFrameBuffer();
    const a = createEntityId();
    const b = createEntityId();

    expect(buffer.registerEntity(a)).toBe(0);
    expect(buffer.registerEntity(b)).toBe(1);
    expect(buffer.getEntityCount()).toBe(2);
    expect(buffer.getEntityIndex(b)).toBe(1);
    expect(buffer.getEntityIdAt(0)).toBe(a);
  });

  it("forgets unregistered entities", () => {
    const buffer = new SharedFrameBuffer();
    const id = createEntityId();
    buffer.registerEntity(id);
    buffer.unregisterEntity(id);

    expect(buffer.getEntityIndex(id)).toBe(-1);
  });

  it("reuses the slot of an unregistered entity", () => {
    const buffer = new SharedFrameBuffer();
    const a = createEntityId();
    const b = createEntityId();
    const c = createEntityId();
    buffer.registerEntity(a);
    buffer.registerEntity(b);
    buffer.registerEntity(c);

    buffer.unregisterEntity(b);
    expect(buffer.getEntityCount()).toBe(2);
    expect(buffer.getEntityIdAt(1)).toBe(0);

    const d = createEntityId();
    expect(buffer.registerEntity(d)).toBe(1);
    expect(buffer.getEntityIdAt(1)).toBe(d);
    expect(buffer.getEntityCount()).toBe(3);
    expect(buffer.getSlotCount()).toBe(3);
  });

  it("refuses to write to a freed slot", () => {
    const buffer = new SharedFrameBuffer();
    const id = createEntityId();
    const index = buffer.registerEntity(id);
    buffer.unregisterEntity(id);

    expect(() => buffer.writeApparentState(index, slot)).toThrow(
      `[Debug Assertion Failed] Entity index ${index} has no registered entity`,
    );
  });

  it("reads back the apparent state it wrote", () => {
    const buffer = new SharedFrameBuffer();
    const index = buffer.registerEntity(createEntityId());

    buffer.writeApparentState(index, slot);
    expect(buffer.readApparentState(index)).toEqual(slot);
  });

  it("reads back the clock it wrote", () => {
    const buffer = new SharedFrameBuffer();
    buffer.writeClock(1000.5, 42.25);
    expect(buffer.readClock()).toEqual({ universeTime: 1000.5, userProperTime: 42.25 });
  });

  it("counts completed frames", () => {
    const buffer = new SharedFrameBuffer();
    expect(buffer.getFrameCounter()).toBe(0);
    buffer.signalFrameComplete();
    buffer.signalFrameComplete();
    expect(buffer.getFrameCounter()).toBe(2);
  });

  it("shares memory with a buffer built from its SharedArrayBuffers", () => {
    const writer = new SharedFrameBuffer();
    const id = createEntityId();
    const index = writer.registerEntity(id);
    writer.writeApparentState(index, slot);
    writer.writeClock(7, 3);
    writer.signalFrameComplete();

    const reader = new SharedFrameBuffer(writer.getBuffers());
    expect(reader.getEntityIndex(id)).toBe(-1);
    reader.rebuildEntityMap();

    expect(reader.getEntityIndex(id)).toBe(index);
    expect(reader.readApparentState(index)).toEqual(slot);
    expect(reader.readClock()).toEqual({ universeTime: 7, userProperTime: 3 });
    expect(reader.getFrameCounter()).toBe(1);
  });

  it("drops freed slots from a rebuilt reader map", () => {
    const writer = new SharedFrameBuffer();
    const reader = new SharedFrameBuffer(writer.getBuffers());
    const a = createEntityId();
    const b = createEntityId();
    writer.registerEntity(a);
    writer.registerEntity(b);
    reader.rebuildEntityMap();

    writer.unregisterEntity(a);
    reader.rebuildEntityMap();

    expect(reader.getEntityIndex(a)).toBe(-1);
    expect(reader.getEntityIndex(b)).toBe(1);
    expect(reader.getEntityCount()).toBe(1);
  });

  it("rejects slot indices out of bounds", () => {
    const buffer = new SharedFrameBuffer();
    const max = config.buffers.maxEntities;

    expect(() => buffer.writeApparentState(max, slot)).toThrow(
      `[SharedFrameBuffer.writeApparentState] Buffer index ${max} out of bounds. ` +
        `Valid range: 0-${max - 1}`,
    );
    expect(() => buffer.readApparentState(-1)).toThrow("out of bounds");
    expect(buffer.validateIndex(max).success).toBe(false);
    expect(buffer.validateIndex(0)).toEqual({ success: true, value: 0 });
  });

  it("refuses to write to a slot nobody registered", () => {
    const buffer = new SharedFrameBuffer();
    expect(() => buffer.writeApparentState(3, slot)).toThrow(
      "[Debug Assertion Failed] Entity index 3 has no registered entity",
    );
  });

  it("throws once every slot is taken", () => {
    const buffer = new SharedFrameBuffer();
    for (let i = 0; i < config.buffers.maxEntities; i++) {
      buffer.registerEntity(createEntityId());
    }

    const overflow = createEntityId();
    expect(() => buffer.registerEntity(overflow)).toThrow(
      `Maximum entity count (${config.buffers.maxEntities}) exceeded. Cannot register entity ${overflow}.`,
    );
  });

  it("takes new entities again once one is unregistered", () => {
    const buffer = new SharedFrameBuffer();
    const ids = Array.from({ length: config.buffers.maxEntities }, () => {
      const id = createEntityId();
      buffer.registerEntity(id);
      return id;
    });

    buffer.unregisterEntity(ids[7]);

    expect(buffer.registerEntity(createEntityId())).toBe(7);
    expect(buffer.getEntityCount()).toBe(config.buffers.maxEntities);
  });
});
