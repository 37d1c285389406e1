import {
  COMMAND_CLASS_ALARM,
  COMMAND_CLASS_METER,
  COMMAND_CLASS_SENSOR_BINARY,
  COMMAND_CLASS_SENSOR_MULTILEVEL,
} from "@homesync/adapter-zwave";
import { SimulatedZWaveNetwork, type SimulatedNodeSpec, type SimulatedValueSpec } from "./simulated-zwave.js";
import { SimulatedWemoNetwork, type SimulatedWemoSpec } from "./simulated-wemo.js";

const COMMAND_CLASS_SWITCH_BINARY = 0x25;

const DEMO_NODES: SimulatedNodeSpec[] = [
  {
    nodeId: 2,
    manufacturerId: "013c",
    productId: "0002",
    manufacturerName: "Philio Technology Corporation",
    productName: "PSM02 Slim Multi Sensor",
    location: "Hallway",
    batteryLevel: 87,
  },
  {
    nodeId: 3,
    name: "Front Door",
    manufacturerId: "0086",
    productId: "0070",
    manufacturerName: "AEON Labs",
    productName: "Door/Window Sensor",
    location: "Entrance",
    batteryLevel: 64,
  },
  {
    nodeId: 4,
    name: "Washing Machine Plug",
    manufacturerId: "0060",
    productId: "0004",
    manufacturerName: "Everspring",
    productName: "Smart Plug",
    location: "Utility Room",
  },
  {
    nodeId: 5,
    name: "Kitchen Smoke Detector",
    manufacturerId: "0138",
    productId: "0001",
    manufacturerName: "First Alert",
    productName: "ZCOMBO",
    location: "Kitchen",
    batteryLevel: 100,
  },
];

const DEMO_VALUES: SimulatedValueSpec[] = [
  { valueId: "72057594076495872", nodeId: 2, commandClass: COMMAND_CLASS_SENSOR_BINARY, type: "bool", index: 0, label: "Sensor", data: false },
  { valueId: "72057594076495890", nodeId: 2, commandClass: COMMAND_CLASS_SENSOR_MULTILEVEL, type: "decimal", index: 1, label: "Temperature", units: "C", data: 21.46 },
  { valueId: "72057594076495906", nodeId: 2, commandClass: COMMAND_CLASS_SENSOR_MULTILEVEL, type: "decimal", index: 3, label: "Luminance", units: "lux", data: 118.0 },
  { valueId: "72057594093273088", nodeId: 3, commandClass: COMMAND_CLASS_SENSOR_BINARY, type: "bool", index: 0, label: "Sensor", data: false },
  { valueId: "72057594110050304", nodeId: 4, commandClass: COMMAND_CLASS_METER, type: "decimal", index: 8, label: "Power", units: "W", data: 2.731 },
  { valueId: "72057594110050320", nodeId: 4, commandClass: COMMAND_CLASS_METER, type: "bool", index: 32, label: "Exporting", data: false },
  { valueId: "72057594110050336", nodeId: 4, commandClass: COMMAND_CLASS_SWITCH_BINARY, type: "bool", index: 0, label: "Switch", data: true },
  { valueId: "72057594126827520", nodeId: 5, commandClass: COMMAND_CLASS_ALARM, type: "byte", index: 1, label: "Alarm Level", data: 0 },
];

const DEMO_WEMO: SimulatedWemoSpec[] = [
  { serialNumber: "221517K0101769", name: "Desk Lamp", modelName: "Socket", host: "192.168.1.40", on: false },
  {
    serialNumber: "221521K0102246",
    name: "Dishwasher",
    modelName: "Insight",
    host: "192.168.1.41",
    on: true,
    insight: {
      state: "8",
      lastchange: 1_700_000_000,
      onfor: 1800,
      ontoday: 5400,
      ontotal: 98_000,
      currentpower: 1_850,
      todaymw: 212_000,
      totalmw: 9_800_000,
      powerthreshold: 8_000,
    },
  },
  {
    serialNumber: "221530K0103388",
    name: "Garage Door",
    modelName: "Maker",
    host: "192.168.1.42",
    on: false,
    maker: { switchstate: 0, sensorstate: 1, switchmode: 1, hassensor: 1 },
  },
  { serialNumber: "231104B0104417", name: "Living Room Bridge", modelName: "Bridge", host: "192.168.1.43" },
];

export function createDemoZWaveNetwork(): SimulatedZWaveNetwork {
  return new SimulatedZWaveNetwork(DEMO_NODES, DEMO_VALUES);
}

export function createDemoWemoNetwork(): SimulatedWemoNetwork {
  return new SimulatedWemoNetwork(DEMO_WEMO);
}

/** Drives the demo networks with plausible activity. */
export class DemoActivity {
  private intervals: ReturnType<typeof setInterval>[] = [];

  constructor(
    private zwave: SimulatedZWaveNetwork | null,
    private wemo: SimulatedWemoNetwork | null,
    private intervalMs: number,
  ) {}

  start(): void {
    const zwave = this.zwave;
    if (zwave) {
      // Motion: the slim sensor only ever reports "detected"
      this.every(this.intervalMs * 2, () => zwave.report("72057594076495872", true));

      this.every(this.intervalMs, () => {
        const temp = zwave.getValue("72057594076495890");
        const current = typeof temp.data === "number" ? temp.data : 21;
        zwave.report(temp.valueId, current + (Math.random() - 0.5) * 0.4);
      });

      this.every(this.intervalMs * 3, () => {
        const door = zwave.getValue("72057594093273088");
        zwave.report(door.valueId, !door.data);
      });
    }

    const wemo = this.wemo;
    if (wemo) {
      this.every(this.intervalMs * 4, () => {
        const lamp = wemo.getDevice("221517K0101769");
        lamp.setBinaryState(!lamp.on).catch((err) => {
          console.error("[Demo] Desk lamp toggle failed:", err);
        });
      });
    }
  }

  stop(): void {
    for (const interval of this.intervals) {
      clearInterval(interval);
    }
    this.intervals = [];
  }

  private every(ms: number, fn: () => void): void {
    const interval = setInterval(fn, ms);
    this.intervals.push(interval);
  }
}
