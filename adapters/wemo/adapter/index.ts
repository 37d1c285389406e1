import type {
  Adapter,
  Clock,
  EntityRegistration,
  NotificationChannel,
  RegistrationResult,
  SnapshotListener,
  SubscriptionRegistry,
  SwitchCommand,
} from "@homesync/adapter-sdk";
import type { EntitySnapshot } from "@homesync/shared";
import {
  isSwitchModel,
  wemoConfigSchema,
  type WemoAdapterConfig,
  type WemoNetwork,
  type WemoNotification,
} from "./types.js";
import { WemoSwitch } from "./wemo-switch.js";

export interface WemoAdapterDeps {
  network: WemoNetwork;
  channel: NotificationChannel<WemoNotification>;
  registry: SubscriptionRegistry<WemoNotification>;
  clock: Clock;
}

export class WemoAdapter implements Adapter {
  readonly id = "wemo";
  private config: WemoAdapterConfig;
  private network: WemoNetwork;
  private channel: NotificationChannel<WemoNotification>;
  private registry: SubscriptionRegistry<WemoNotification>;
  private clock: Clock;

  /** entity ID → switch */
  private switches = new Map<string, WemoSwitch>();
  private listener: SnapshotListener | null = null;
  private detach: (() => void) | null = null;

  constructor(config: Record<string, unknown>, deps: WemoAdapterDeps) {
    this.config = wemoConfigSchema.parse(config);
    this.network = deps.network;
    this.channel = deps.channel;
    this.registry = deps.registry;
    this.clock = deps.clock;
  }

  async register(): Promise<RegistrationResult> {
    console.log("[WeMo] Scanning for WeMo devices.");
    const devices = await this.network.discover();
    const ignored = new Set(this.config.ignore);
    const entities: EntityRegistration[] = [];

    for (const device of devices) {
      if (!isSwitchModel(device.modelName) || ignored.has(device.serialNumber)) continue;

      const sw = new WemoSwitch(device, this.clock);
      if (!this.registry.register(device.serialNumber, () => this.onNotification(sw))) continue;

      this.switches.set(sw.entityId, sw);
      await sw.refresh();
      entities.push({ entityId: sw.entityId, displayName: sw.name, kind: "switch", unit: null });
    }

    if (!this.detach) {
      this.detach = this.network.onEvent((event) => {
        this.channel.send({
          type: "state_changed",
          key: event.serialNumber,
          variable: event.variable,
          value: event.value,
        });
      });
    }

    console.log(`[WeMo] Registered ${entities.length} switches`);
    return { entities };
  }

  async observe(entityId: string): Promise<EntitySnapshot> {
    return this.snapshot(this.getSwitch(entityId));
  }

  async execute(entityId: string, command: SwitchCommand): Promise<void> {
    const sw = this.getSwitch(entityId);
    if (command.on) {
      await sw.turnOn();
    } else {
      await sw.turnOff();
    }
  }

  async subscribe(cb: SnapshotListener): Promise<void> {
    this.listener = cb;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async destroy(): Promise<void> {
    this.detach?.();
    this.detach = null;
    this.listener = null;
    this.switches.clear();
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private onNotification(sw: WemoSwitch): void {
    console.log(`[WeMo] Subscription update for ${sw.name}`);
    this.refreshAndPush(sw).catch((err) => {
      console.error(`[WeMo] Update for ${sw.name} failed:`, err);
    });
  }

  private async refreshAndPush(sw: WemoSwitch): Promise<void> {
    await sw.refresh();
    this.listener?.(this.snapshot(sw));
  }

  private snapshot(sw: WemoSwitch): EntitySnapshot {
    return {
      entityId: sw.entityId,
      state: sw.computeState(),
      unit: null,
      attributes: sw.attributes(),
      timestamp: this.clock.now(),
    };
  }

  private getSwitch(entityId: string): WemoSwitch {
    const sw = this.switches.get(entityId);
    if (!sw) throw new Error(`Unknown entity: ${entityId}`);
    return sw;
  }
}

export { WemoSwitch } from "./wemo-switch.js";
export { switchState, switchAttributes, isStandby, sensorState } from "./translators.js";
export * from "./types.js";
