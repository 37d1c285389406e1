import type {
  InsightParams,
  MakerParams,
  WemoDevice,
  WemoEvent,
  WemoNetwork,
} from "@homesync/adapter-wemo";

export interface SimulatedWemoSpec {
  serialNumber: string;
  name: string;
  modelName: string;
  host: string;
  on?: boolean;
  insight?: InsightParams;
  maker?: MakerParams;
}

export class SimulatedWemoDevice implements WemoDevice {
  readonly serialNumber: string;
  readonly name: string;
  readonly modelName: string;
  readonly host: string;
  on: boolean;
  insight: InsightParams | null;
  maker: MakerParams | null;
  /** While set, every query rejects, like a device that has not answered yet. */
  unreachable = false;

  constructor(
    spec: SimulatedWemoSpec,
    private onChange: (event: WemoEvent) => void,
  ) {
    this.serialNumber = spec.serialNumber;
    this.name = spec.name;
    this.modelName = spec.modelName;
    this.host = spec.host;
    this.on = spec.on ?? false;
    this.insight = spec.insight ?? null;
    this.maker = spec.maker ?? null;
  }

  async getBinaryState(): Promise<boolean> {
    this.assertReachable();
    return this.on;
  }

  async setBinaryState(on: boolean): Promise<void> {
    this.assertReachable();
    this.on = on;
    if (this.insight) {
      this.insight = { ...this.insight, state: on ? "1" : "0" };
    }
    this.onChange({ serialNumber: this.serialNumber, variable: "BinaryState", value: on ? "1" : "0" });
  }

  async getInsightParams(): Promise<InsightParams> {
    this.assertReachable();
    if (!this.insight) throw new Error(`${this.name} has no insight params yet`);
    return { ...this.insight };
  }

  async getMakerParams(): Promise<MakerParams> {
    this.assertReachable();
    if (!this.maker) throw new Error(`${this.name} has no maker params yet`);
    return { ...this.maker };
  }

  private assertReachable(): void {
    if (this.unreachable) {
      throw new Error(`${this.name} (${this.host}) did not respond`);
    }
  }
}

/** In-process stand-in for WeMo discovery and UPnP event subscriptions. */
export class SimulatedWemoNetwork implements WemoNetwork {
  private devices = new Map<string, SimulatedWemoDevice>();
  private listeners = new Set<(event: WemoEvent) => void>();

  constructor(specs: SimulatedWemoSpec[]) {
    for (const spec of specs) {
      this.devices.set(spec.serialNumber, new SimulatedWemoDevice(spec, (e) => this.publish(e)));
    }
  }

  async discover(): Promise<SimulatedWemoDevice[]> {
    return Array.from(this.devices.values());
  }

  getDevice(serialNumber: string): SimulatedWemoDevice {
    const device = this.devices.get(serialNumber);
    if (!device) throw new Error(`Unknown WeMo device: ${serialNumber}`);
    return device;
  }

  onEvent(listener: (event: WemoEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: WemoEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
