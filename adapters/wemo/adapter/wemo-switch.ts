import type { CanonicalState, SwitchAttributes } from "@homesync/shared";
import type { Clock } from "@homesync/adapter-sdk";
import type { TelemetrySnapshot, WemoDevice } from "./types.js";
import { switchAttributes, switchState } from "./translators.js";

export class WemoSwitch {
  readonly entityId: string;
  private snapshot: TelemetrySnapshot = {
    isOn: null,
    insight: null,
    maker: null,
    refreshedAt: null,
  };
  private queue: Promise<boolean> = Promise.resolve(true);

  constructor(
    readonly device: WemoDevice,
    private clock: Clock,
  ) {
    this.entityId = `wemo-${device.serialNumber}`;
  }

  get name(): string {
    return this.device.name;
  }

  get telemetry(): Readonly<TelemetrySnapshot> {
    return this.snapshot;
  }

  computeState(): CanonicalState {
    return switchState(this.snapshot);
  }

  attributes(): SwitchAttributes {
    return switchAttributes(this.snapshot);
  }

  /**
   * Re-reads state and model-specific telemetry. On failure the previous
   * readings stay as they were and false is returned. Refreshes run one at a
   * time in call order, so a slow reply never overwrites a newer one.
   */
  refresh(): Promise<boolean> {
    const run = this.queue.then(() => this.readTelemetry());
    this.queue = run;
    return run;
  }

  private async readTelemetry(): Promise<boolean> {
    try {
      const isOn = await this.device.getBinaryState();

      const next: TelemetrySnapshot = { ...this.snapshot, isOn };
      if (this.device.modelName === "Insight") {
        next.insight = await this.device.getInsightParams();
      } else if (this.device.modelName === "Maker") {
        next.maker = await this.device.getMakerParams();
      }
      next.refreshedAt = this.clock.now();

      this.snapshot = next;
      return true;
    } catch (err) {
      console.warn(
        `[WeMo] Could not update status for ${this.name}:`,
        err instanceof Error ? err.message : String(err),
      );
      return false;
    }
  }

  async turnOn(): Promise<void> {
    await this.device.setBinaryState(true);
  }

  async turnOff(): Promise<void> {
    await this.device.setBinaryState(false);
  }
}
