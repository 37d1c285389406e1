/**
 * Integration-style tests for ZWaveAdapter: notifications flow from the
 * simulated network through the channel and registry into host pushes.
 */

import {
  COMMAND_CLASS_SENSOR_BINARY,
  COMMAND_CLASS_SENSOR_MULTILEVEL,
  ZWaveAdapter,
  type ZWaveNotification,
} from "@homesync/adapter-zwave";
import { NotificationChannel, SubscriptionRegistry } from "@homesync/adapter-sdk";
import {
  SimulatedZWaveNetwork,
  type SimulatedNodeSpec,
  type SimulatedValueSpec,
} from "../../packages/daemon/src/devices/providers/simulated-zwave.js";
import {
  DOOR_NODE,
  ManualScheduler,
  PHILIO_NODE,
  createZWaveFixture,
  flushMicrotasks,
  motionValue,
  silenceConsole,
  type ZWaveFixture,
} from "../setup.js";

const LANDING_NODE: SimulatedNodeSpec = { ...PHILIO_NODE, nodeId: 9, name: "Landing Multi", location: "Landing" };

const VALUES: SimulatedValueSpec[] = [
  motionValue("m-7"),
  motionValue("m-9", 9),
  { valueId: "d-8", nodeId: 8, commandClass: COMMAND_CLASS_SENSOR_BINARY, type: "bool", index: 0, label: "Contact", data: false },
  { valueId: "t-7", nodeId: 7, commandClass: COMMAND_CLASS_SENSOR_MULTILEVEL, type: "decimal", index: 1, label: "Temperature", units: "C", data: 21.46 },
  { valueId: "s-8", nodeId: 8, commandClass: 0x25, type: "bool", index: 0, label: "Switch", data: true },
];

describe("ZWaveAdapter", () => {
  let fx: ZWaveFixture;

  beforeEach(async () => {
    silenceConsole();
    fx = await createZWaveFixture([PHILIO_NODE, DOOR_NODE, LANDING_NODE], VALUES);
  });

  afterEach(async () => {
    await fx.registry.stop();
    jest.restoreAllMocks();
  });

  describe("register", () => {
    it("registers one entity per classified value", async () => {
      const adapter = new ZWaveAdapter(
        {},
        {
          network: new SimulatedZWaveNetwork([PHILIO_NODE, DOOR_NODE, LANDING_NODE], VALUES),
          channel: new NotificationChannel<ZWaveNotification>(),
          registry: new SubscriptionRegistry(new NotificationChannel<ZWaveNotification>(), "test"),
          scheduler: new ManualScheduler(),
        },
      );
      const { entities } = await adapter.register();

      expect(entities).toEqual([
        { entityId: "zwave-7-m-7", displayName: "Hallway Multi Sensor", kind: "trigger_sensor", unit: null },
        { entityId: "zwave-9-m-9", displayName: "Landing Multi Sensor", kind: "trigger_sensor", unit: null },
        { entityId: "zwave-8-d-8", displayName: "Back Door Contact", kind: "binary_sensor", unit: null },
        { entityId: "zwave-7-t-7", displayName: "Hallway Multi Temperature", kind: "multilevel_sensor", unit: "°C" },
      ]);
    });

    it("turns off change verification on classified values only", () => {
      expect(fx.network.getValue("m-7").changeVerified).toBe(false);
      expect(fx.network.getValue("t-7").changeVerified).toBe(false);
      expect(fx.network.getValue("s-8").changeVerified).toBe(true);
    });

    it("does not register anything twice", async () => {
      const { entities } = await fx.adapter.register();
      expect(entities).toEqual([]);
      expect(fx.registry.size).toBe(4);
      expect(fx.network.listenerCount).toBe(1);
    });

    it("rejects an invalid config", () => {
      expect(
        () =>
          new ZWaveAdapter(
            { default_re_arm_multiplier: 0 },
            {
              network: fx.network,
              channel: fx.channel,
              registry: fx.registry,
              scheduler: fx.scheduler,
            },
          ),
      ).toThrow();
    });
  });

  describe("observe", () => {
    it("reports normalized readings with node attributes", async () => {
      await expect(fx.adapter.observe("zwave-7-t-7")).resolves.toEqual({
        entityId: "zwave-7-t-7",
        state: { kind: "numeric", value: 21.5, unit: "°C" },
        unit: "°C",
        attributes: { node_id: 7, battery_level: 90, location: "Hall" },
        timestamp: 1_000,
      });
    });

    it("throws for an unknown entity", async () => {
      await expect(fx.adapter.observe("zwave-1-nope")).rejects.toThrow("Unknown entity: zwave-1-nope");
    });
  });

  describe("trigger sensors", () => {
    /**
     * An activation followed by silence reads on for the whole re-arm time
     * and off from the expiry on.
     */
    it("turns off once the re-arm time has passed", async () => {
      fx.network.report("m-7", true);
      await flushMicrotasks();

      expect(fx.pushes).toHaveLength(1);
      expect(fx.pushes[0]).toEqual({
        entityId: "zwave-7-m-7",
        state: { kind: "on" },
        unit: null,
        attributes: { node_id: 7, battery_level: 90, location: "Hall" },
        timestamp: 1_000,
      });

      fx.scheduler.advance(31_999);
      await flushMicrotasks();
      expect(fx.pushes).toHaveLength(1);
      expect((await fx.adapter.observe("zwave-7-m-7")).state).toEqual({ kind: "on" });

      fx.scheduler.advance(1);
      await flushMicrotasks();
      expect(fx.pushes).toHaveLength(2);
      expect(fx.pushes[1].state).toEqual({ kind: "off" });
      expect(fx.pushes[1].timestamp).toBe(33_000);
    });

    it("stays on while activations keep arriving", async () => {
      fx.network.report("m-7", true);
      await flushMicrotasks();
      fx.scheduler.advance(10_000);
      fx.network.report("m-7", true);
      await flushMicrotasks();

      // First timer fires at 33 000, superseded by the 43 000 expiry
      fx.scheduler.advance(22_000);
      await flushMicrotasks();
      expect(fx.pushes.map((p) => p.state.kind)).toEqual(["on", "on"]);
      expect((await fx.adapter.observe("zwave-7-m-7")).state).toEqual({ kind: "on" });

      fx.scheduler.advance(10_000);
      await flushMicrotasks();
      expect(fx.pushes.map((p) => p.state.kind)).toEqual(["on", "on", "off"]);
      expect(fx.pushes[2].timestamp).toBe(43_000);
    });

    it("uses the configured default multiplier", async () => {
      await fx.registry.stop();
      fx = await createZWaveFixture([PHILIO_NODE], [motionValue("m-7")], { default_re_arm_multiplier: 2 });

      fx.network.report("m-7", true);
      await flushMicrotasks();
      fx.scheduler.advance(16_000);
      await flushMicrotasks();

      expect(fx.pushes.map((p) => p.state.kind)).toEqual(["on", "off"]);
    });

    it("can be re-checked by hand after a lost timer", async () => {
      fx.scheduler.failScheduling = true;
      fx.network.report("m-7", true);
      await flushMicrotasks();

      fx.scheduler.advance(40_000);
      await flushMicrotasks();
      expect(fx.pushes.map((p) => p.state.kind)).toEqual(["on"]);

      fx.adapter.reevaluate("zwave-7-m-7");
      await flushMicrotasks();
      expect(fx.pushes.map((p) => p.state.kind)).toEqual(["on", "off"]);
    });
  });

  describe("routing", () => {
    it("never updates one device from another device's notification", async () => {
      fx.network.report("m-7", true);
      await flushMicrotasks();

      expect(fx.pushes.map((p) => p.entityId)).toEqual(["zwave-7-m-7"]);
      expect((await fx.adapter.observe("zwave-9-m-9")).state).toEqual({ kind: "off" });

      fx.network.report("m-9", true);
      fx.network.report("d-8", true);
      await flushMicrotasks();

      expect(fx.pushes.map((p) => p.entityId)).toEqual(["zwave-7-m-7", "zwave-9-m-9", "zwave-8-d-8"]);
      expect((await fx.adapter.observe("zwave-7-t-7")).state).toEqual({ kind: "numeric", value: 21.5, unit: "°C" });
    });

    it("drops notifications for values without a sensor", async () => {
      fx.network.report("s-8", false);
      await flushMicrotasks();
      expect(fx.pushes).toEqual([]);
    });

    it("pushes rounded multilevel updates", async () => {
      fx.network.report("t-7", 22.04);
      await flushMicrotasks();
      expect(fx.pushes[0].state).toEqual({ kind: "numeric", value: 22, unit: "°C" });
    });
  });

  describe("destroy", () => {
    it("detaches from the network", async () => {
      await fx.adapter.destroy();
      expect(fx.network.listenerCount).toBe(0);
      await expect(fx.adapter.observe("zwave-7-m-7")).rejects.toThrow("Unknown entity: zwave-7-m-7");
    });
  });
});
