import type {
  Adapter,
  EntityRegistration,
  NotificationChannel,
  RegistrationResult,
  Scheduler,
  SnapshotListener,
  SubscriptionRegistry,
} from "@homesync/adapter-sdk";
import type { EntitySnapshot } from "@homesync/shared";
import { zwaveConfigSchema, type ZWaveAdapterConfig, type ZWaveNetwork, type ZWaveNotification } from "./types.js";
import { createSensor } from "./classify.js";
import type { ZWaveSensorDevice } from "./sensors.js";

export interface ZWaveAdapterDeps {
  network: ZWaveNetwork;
  channel: NotificationChannel<ZWaveNotification>;
  registry: SubscriptionRegistry<ZWaveNotification>;
  scheduler: Scheduler;
}

export class ZWaveAdapter implements Adapter {
  readonly id = "zwave";
  private config: ZWaveAdapterConfig;
  private network: ZWaveNetwork;
  private channel: NotificationChannel<ZWaveNotification>;
  private registry: SubscriptionRegistry<ZWaveNotification>;
  private scheduler: Scheduler;

  /** entity ID → sensor */
  private sensors = new Map<string, ZWaveSensorDevice>();
  private listener: SnapshotListener | null = null;
  private detach: (() => void) | null = null;

  constructor(config: Record<string, unknown>, deps: ZWaveAdapterDeps) {
    this.config = zwaveConfigSchema.parse(config);
    this.network = deps.network;
    this.channel = deps.channel;
    this.registry = deps.registry;
    this.scheduler = deps.scheduler;
  }

  async register(): Promise<RegistrationResult> {
    const entities: EntityRegistration[] = [];

    for (const value of this.network.getValues()) {
      const sensor = createSensor(value, {
        scheduler: this.scheduler,
        defaultReArmMultiplier: this.config.default_re_arm_multiplier,
        requestReevaluation: (valueId, scheduledFor) => {
          this.channel.send({ type: "reevaluate", key: valueId, scheduledFor });
        },
      });
      if (!sensor) continue;

      // Already registered (register() called twice, or a duplicate value from the SDK)
      if (!this.registry.register(value.valueId, (n) => this.onNotification(sensor, n))) continue;

      value.setChangeVerified(false);
      this.sensors.set(sensor.entityId, sensor);
      entities.push({
        entityId: sensor.entityId,
        displayName: sensor.displayName,
        kind: sensor.kind,
        unit: sensor.unitOfMeasurement(),
      });
    }

    if (!this.detach) {
      this.detach = this.network.onValueChanged((value) => {
        this.channel.send({ type: "value_changed", key: value.valueId, data: value.data });
      });
    }

    console.log(`[Z-Wave] Registered ${entities.length} sensors`);
    return { entities };
  }

  async observe(entityId: string): Promise<EntitySnapshot> {
    return this.snapshot(this.getSensor(entityId), this.scheduler.now());
  }

  async subscribe(cb: SnapshotListener): Promise<void> {
    this.listener = cb;
  }

  /** Queues a re-check of a sensor's state, e.g. after a missed re-arm timer. */
  reevaluate(entityId: string): void {
    const sensor = this.getSensor(entityId);
    this.channel.send({ type: "reevaluate", key: sensor.value.valueId, scheduledFor: this.scheduler.now() });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async destroy(): Promise<void> {
    this.detach?.();
    this.detach = null;
    this.listener = null;
    this.sensors.clear();
  }

  // ── Private Helpers ───────────────────────────────────────────────────────

  private onNotification(sensor: ZWaveSensorDevice, notification: ZWaveNotification): void {
    const now = this.scheduler.now();
    if (!sensor.handle(notification, now)) return;
    this.listener?.(this.snapshot(sensor, now));
  }

  private snapshot(sensor: ZWaveSensorDevice, now: number): EntitySnapshot {
    return {
      entityId: sensor.entityId,
      state: sensor.computeState(now),
      unit: sensor.unitOfMeasurement(),
      attributes: sensor.attributes(),
      timestamp: now,
    };
  }

  private getSensor(entityId: string): ZWaveSensorDevice {
    const sensor = this.sensors.get(entityId);
    if (!sensor) throw new Error(`Unknown entity: ${entityId}`);
    return sensor;
  }
}

export { createSensor, classifyValue, reArmSecondsFor } from "./classify.js";
export { normalize, TEMP_CELSIUS, TEMP_FAHRENHEIT } from "./translators.js";
export * from "./types.js";
