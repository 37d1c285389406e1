import type {
  ZWaveNetwork,
  ZWaveNode,
  ZWaveValue,
  ZWaveValueData,
  ZWaveValueType,
} from "@homesync/adapter-zwave";

export interface SimulatedNodeSpec {
  nodeId: number;
  name?: string;
  manufacturerId: string;
  productId: string;
  manufacturerName: string;
  productName: string;
  location?: string;
  batteryLevel?: number | null;
  config?: Record<number, number>;
}

export interface SimulatedValueSpec {
  valueId: string;
  nodeId: number;
  commandClass: number;
  type: ZWaveValueType;
  index: number;
  label: string;
  units?: string;
  data: ZWaveValueData;
}

export class SimulatedNode implements ZWaveNode {
  readonly nodeId: number;
  readonly name: string;
  readonly manufacturerId: string;
  readonly productId: string;
  readonly manufacturerName: string;
  readonly productName: string;
  location: string;
  batteryLevel: number | null;
  private readonly config: Map<number, number>;

  constructor(spec: SimulatedNodeSpec) {
    this.nodeId = spec.nodeId;
    this.name = spec.name ?? "";
    this.manufacturerId = spec.manufacturerId;
    this.productId = spec.productId;
    this.manufacturerName = spec.manufacturerName;
    this.productName = spec.productName;
    this.location = spec.location ?? "";
    this.batteryLevel = spec.batteryLevel ?? null;
    this.config = new Map(Object.entries(spec.config ?? {}).map(([k, v]) => [Number(k), v]));
  }

  getBatteryLevel(): number | null {
    return this.batteryLevel;
  }

  getConfigValue(parameter: number): number | null {
    return this.config.get(parameter) ?? null;
  }
}

export class SimulatedValue implements ZWaveValue {
  readonly valueId: string;
  readonly commandClass: number;
  readonly type: ZWaveValueType;
  readonly index: number;
  readonly label: string;
  readonly units: string;
  data: ZWaveValueData;
  changeVerified = true;

  constructor(
    spec: SimulatedValueSpec,
    readonly node: SimulatedNode,
  ) {
    this.valueId = spec.valueId;
    this.commandClass = spec.commandClass;
    this.type = spec.type;
    this.index = spec.index;
    this.label = spec.label;
    this.units = spec.units ?? "";
    this.data = spec.data;
  }

  setChangeVerified(verified: boolean): void {
    this.changeVerified = verified;
  }
}

/** In-process stand-in for a Z-Wave controller. */
export class SimulatedZWaveNetwork implements ZWaveNetwork {
  private nodes = new Map<number, SimulatedNode>();
  private values = new Map<string, SimulatedValue>();
  private listeners = new Set<(value: ZWaveValue) => void>();

  constructor(nodes: SimulatedNodeSpec[], values: SimulatedValueSpec[]) {
    for (const spec of nodes) {
      this.nodes.set(spec.nodeId, new SimulatedNode(spec));
    }
    for (const spec of values) {
      const node = this.nodes.get(spec.nodeId);
      if (!node) throw new Error(`Value ${spec.valueId} references unknown node ${spec.nodeId}`);
      this.values.set(spec.valueId, new SimulatedValue(spec, node));
    }
  }

  getValues(): SimulatedValue[] {
    return Array.from(this.values.values());
  }

  getValue(valueId: string): SimulatedValue {
    const value = this.values.get(valueId);
    if (!value) throw new Error(`Unknown value: ${valueId}`);
    return value;
  }

  getNode(nodeId: number): SimulatedNode {
    const node = this.nodes.get(nodeId);
    if (!node) throw new Error(`Unknown node: ${nodeId}`);
    return node;
  }

  onValueChanged(listener: (value: ZWaveValue) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Updates a value the way a device report would, notifying every listener. */
  report(valueId: string, data: ZWaveValueData): void {
    const value = this.getValue(valueId);
    value.data = data;
    for (const listener of this.listeners) {
      listener(value);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
