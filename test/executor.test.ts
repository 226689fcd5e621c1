import { describe, expect, it } from "vitest";
import { ActionExecutor, swipeVector } from "../src/executor/executor.js";
import { DeviceConnectionError, DeviceError } from "../src/utils/errors.js";
import { FakeClock, FakeDevice } from "./helpers.js";

describe("swipeVector", () => {
  it("moves the finger between 70% and 30% of the height for vertical swipes", () => {
    expect(swipeVector("up", { width: 1080, height: 1920, orientation: "portrait" })).toEqual({
      start: { x: 540, y: 1344 },
      end: { x: 540, y: 576 },
    });
    expect(swipeVector("down")).toEqual({ start: { x: 540, y: 576 }, end: { x: 540, y: 1344 } });
  });

  it("moves between 80% and 20% of the width for horizontal swipes", () => {
    expect(swipeVector("left")).toEqual({ start: { x: 864, y: 960 }, end: { x: 216, y: 960 } });
    expect(swipeVector("right")).toEqual({ start: { x: 216, y: 960 }, end: { x: 864, y: 960 } });
  });
});

describe("ActionExecutor", () => {
  it("taps and waits for the screen to settle", async () => {
    const device = new FakeDevice();
    const clock = new FakeClock();
    const executor = new ActionExecutor({ clock });

    const outcome = await executor.execute({ type: "tap", point: { x: 5, y: 6 } }, device);

    expect(outcome).toEqual({ success: true, data: { x: 5, y: 6 }, needsRecovery: false });
    expect(device.calls).toEqual([{ type: "tap", point: { x: 5, y: 6 } }]);
    expect(clock.sleeps).toEqual([300]);
  });

  it("taps the focus point before typing", async () => {
    const device = new FakeDevice();
    const clock = new FakeClock();
    const executor = new ActionExecutor({ clock, settleDelayMs: 50 });

    await executor.execute({ type: "input", text: "123", focus: { x: 1, y: 2 } }, device);

    expect(device.calls).toEqual([
      { type: "tap", point: { x: 1, y: 2 } },
      { type: "input", text: "123" },
    ]);
    expect(clock.sleeps).toEqual([50, 50]);
  });

  it("rejects empty input without touching the device", async () => {
    const device = new FakeDevice();
    const outcome = await new ActionExecutor({ clock: new FakeClock() }).execute(
      { type: "input", text: "" },
      device
    );
    expect(outcome).toEqual({
      success: false,
      error: "input action requires text",
      needsRecovery: true,
      errorKind: "execution",
    });
    expect(device.calls).toEqual([]);
  });

  it("sends swipes along the vector for the current screen", async () => {
    const device = new FakeDevice();
    await new ActionExecutor({ clock: new FakeClock() }).execute(
      { type: "swipe", direction: "up", durationMs: 400 },
      device,
      { width: 1000, height: 2000, orientation: "portrait" }
    );
    expect(device.calls).toEqual([
      { type: "swipe", start: { x: 500, y: 1400 }, end: { x: 500, y: 600 }, durationMs: 400 },
    ]);
  });

  it("waits on the clock for wait commands", async () => {
    const clock = new FakeClock();
    await new ActionExecutor({ clock, settleDelayMs: 0 }).execute(
      { type: "wait", durationMs: 1500 },
      new FakeDevice()
    );
    expect(clock.sleeps).toEqual([1500, 0]);
  });

  it("classifies device refusals as execution failures", async () => {
    const device = new FakeDevice();
    device.failNext("pressKey", new DeviceError("Unknown key: FOO"));
    const outcome = await new ActionExecutor({ clock: new FakeClock() }).execute(
      { type: "key", key: "FOO" },
      device
    );
    expect(outcome).toEqual({
      success: false,
      error: "Unknown key: FOO",
      needsRecovery: true,
      errorKind: "execution",
    });
  });

  it("classifies a lost link as a transport failure", async () => {
    const device = new FakeDevice();
    device.failNext("tap", new DeviceConnectionError("adb tap: device offline"));
    const outcome = await new ActionExecutor({ clock: new FakeClock() }).execute(
      { type: "tap", point: { x: 1, y: 1 } },
      device
    );
    expect(outcome).toEqual({
      success: false,
      error: "adb tap: device offline",
      needsRecovery: false,
      errorKind: "transport",
    });
  });

  it("launches apps by package id", async () => {
    const device = new FakeDevice();
    const outcome = await new ActionExecutor({ clock: new FakeClock() }).execute(
      { type: "launch", packageId: "com.example.music" },
      device
    );
    expect(outcome.data).toEqual({ packageId: "com.example.music" });
    expect(device.calls).toEqual([{ type: "launch", packageId: "com.example.music" }]);
  });
});
