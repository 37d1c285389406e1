/**
 * Unit tests for TriggerSensor: the sensor wrapper for devices that report
 * activation but never report it ended.
 */

import { TriggerSensor } from "../../adapters/zwave/adapter/sensors.js";
import { SimulatedZWaveNetwork } from "../../packages/daemon/src/devices/providers/simulated-zwave.js";
import { ManualScheduler, PHILIO_NODE, motionValue } from "../setup.js";

describe("TriggerSensor", () => {
  let scheduler: ManualScheduler;
  let sink: jest.Mock<void, [string, number]>;
  let sensor: TriggerSensor;

  beforeEach(() => {
    const network = new SimulatedZWaveNetwork([PHILIO_NODE], [motionValue("m-7")]);
    scheduler = new ManualScheduler(1_000);
    sink = jest.fn<void, [string, number]>();
    sensor = new TriggerSensor(network.getValue("m-7"), 32, scheduler, sink);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("starts off", () => {
    expect(sensor.computeState(1_000)).toEqual({ kind: "off" });
    expect(sensor.kind).toBe("trigger_sensor");
  });

  it("turns on and schedules a re-check at the expiry", () => {
    const changed = sensor.handle({ type: "value_changed", key: "m-7", data: true }, 1_000);

    expect(changed).toBe(true);
    expect(sensor.computeState(1_000)).toEqual({ kind: "on" });
    expect(sensor.window.expiresAt).toBe(33_000);
    expect(scheduler.pending).toBe(1);

    scheduler.advance(32_000);
    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink).toHaveBeenCalledWith("m-7", 33_000);
  });

  it("computes off once the window has run out", () => {
    sensor.handle({ type: "value_changed", key: "m-7", data: true }, 1_000);
    expect(sensor.computeState(32_999)).toEqual({ kind: "on" });
    expect(sensor.computeState(33_000)).toEqual({ kind: "off" });
  });

  it("extends the window on repeated activations", () => {
    sensor.handle({ type: "value_changed", key: "m-7", data: true }, 1_000);
    sensor.handle({ type: "value_changed", key: "m-7", data: true }, 11_000);

    expect(sensor.window.expiresAt).toBe(43_000);
    expect(sensor.computeState(33_000)).toEqual({ kind: "on" });
    expect(scheduler.pending).toBe(2);
  });

  it("treats a superseded re-check as a no-op", () => {
    sensor.handle({ type: "value_changed", key: "m-7", data: true }, 1_000);
    sensor.handle({ type: "value_changed", key: "m-7", data: true }, 11_000);

    expect(sensor.handle({ type: "reevaluate", key: "m-7", scheduledFor: 33_000 }, 33_000)).toBe(false);
    expect(sensor.computeState(33_000)).toEqual({ kind: "on" });
  });

  it("goes back to armed when a due re-check arrives", () => {
    sensor.handle({ type: "value_changed", key: "m-7", data: true }, 1_000);

    expect(sensor.handle({ type: "reevaluate", key: "m-7", scheduledFor: 33_000 }, 33_000)).toBe(true);
    expect(sensor.window.expiresAt).toBeNull();
    expect(sensor.computeState(33_000)).toEqual({ kind: "off" });
  });

  it("turns off immediately on an explicit off report", () => {
    sensor.handle({ type: "value_changed", key: "m-7", data: true }, 1_000);

    expect(sensor.handle({ type: "value_changed", key: "m-7", data: false }, 2_000)).toBe(true);
    expect(sensor.computeState(2_000)).toEqual({ kind: "off" });
    expect(sensor.window.expiresAt).toBeNull();
  });

  it("logs a warning and stays on when the re-check cannot be scheduled", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    scheduler.failScheduling = true;

    expect(sensor.handle({ type: "value_changed", key: "m-7", data: true }, 1_000)).toBe(true);

    expect(sensor.computeState(1_000)).toEqual({ kind: "on" });
    expect(warn).toHaveBeenCalledWith(
      "[Z-Wave] Could not schedule re-arm for Hallway Multi Sensor:",
      "timer facility unavailable",
    );
    expect(sink).not.toHaveBeenCalled();
  });
});
