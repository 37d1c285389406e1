import {
  STATE_OFF,
  STATE_ON,
  type CanonicalState,
  type EntityKind,
  type SensorAttributes,
} from "@homesync/shared";
import type { Scheduler } from "@homesync/adapter-sdk";
import type { ZWaveNotification, ZWaveValue, ZWaveValueData } from "./types.js";
import { TriggerWindow } from "./trigger-window.js";
import {
  canonicalUnit,
  displayNameFor,
  entityIdFor,
  isTruthy,
  nodeAttributes,
  normalize,
  rawUnit,
} from "./translators.js";

/** Uniform capability every sensor variant offers to the adapter. */
export interface SensorCapability {
  readonly entityId: string;
  readonly displayName: string;
  readonly value: ZWaveValue;
  computeState(now: number): CanonicalState;
  unitOfMeasurement(): string | null;
  attributes(): SensorAttributes;
  /** Applies a routed notification; returns true when the host should be told. */
  handle(notification: ZWaveNotification, now: number): boolean;
}

abstract class ZWaveSensor implements SensorCapability {
  abstract readonly kind: EntityKind;
  readonly entityId: string;
  readonly displayName: string;
  protected raw: ZWaveValueData;

  constructor(readonly value: ZWaveValue) {
    this.entityId = entityIdFor(value);
    this.displayName = displayNameFor(value);
    this.raw = value.data;
  }

  abstract computeState(now: number): CanonicalState;

  unitOfMeasurement(): string | null {
    return rawUnit(this.value.units);
  }

  attributes(): SensorAttributes {
    return nodeAttributes(this.value.node);
  }

  handle(notification: ZWaveNotification, _now: number): boolean {
    if (notification.type !== "value_changed") return false;
    this.raw = notification.data;
    return true;
  }
}

export class BinarySensor extends ZWaveSensor {
  readonly kind = "binary_sensor" as const;

  computeState(_now: number): CanonicalState {
    return normalize("binary", this.raw, this.value.units);
  }
}

export class MultilevelSensor extends ZWaveSensor {
  readonly kind = "multilevel_sensor" as const;

  computeState(_now: number): CanonicalState {
    return normalize("multilevel", this.raw, this.value.units);
  }

  unitOfMeasurement(): string | null {
    return canonicalUnit(this.value.units);
  }
}

/**
 * Alarm reports (smoke, flood, burglar, ...). The value is passed through;
 * what an alarm level means is up to whoever consumes it.
 */
export class AlarmSensor extends ZWaveSensor {
  readonly kind = "alarm_sensor" as const;

  computeState(_now: number): CanonicalState {
    return normalize("alarm", this.raw, this.value.units);
  }
}

export type ReevaluateSink = (valueId: string, scheduledFor: number) => void;

/**
 * Stateless sensor that only ever reports "on". The reported value stays on
 * for `reArmSeconds` after the last activation, then falls back to off.
 */
export class TriggerSensor extends ZWaveSensor {
  readonly kind = "trigger_sensor" as const;
  readonly window: TriggerWindow;

  constructor(
    value: ZWaveValue,
    reArmSeconds: number,
    private scheduler: Scheduler,
    private requestReevaluation: ReevaluateSink,
  ) {
    super(value);
    this.window = new TriggerWindow(reArmSeconds);
  }

  computeState(now: number): CanonicalState {
    if (!isTruthy(this.raw) || !this.window.isOpen(now)) return STATE_OFF;
    return STATE_ON;
  }

  handle(notification: ZWaveNotification, now: number): boolean {
    if (notification.type === "reevaluate") {
      return this.window.expire(now);
    }

    this.raw = notification.data;
    if (!isTruthy(notification.data)) {
      this.window.reset();
      return true;
    }

    const expiresAt = this.window.arm(now);
    this.scheduleReevaluation(expiresAt);
    return true;
  }

  private scheduleReevaluation(at: number): void {
    const valueId = this.value.valueId;
    try {
      this.scheduler.scheduleAt(at, () => this.requestReevaluation(valueId, at));
    } catch (err) {
      // Stays on until the next activation or manual re-check
      console.warn(
        `[Z-Wave] Could not schedule re-arm for ${this.displayName}:`,
        err instanceof Error ? err.message : String(err),
      );
    }
  }
}

export type ZWaveSensorDevice = TriggerSensor | BinarySensor | MultilevelSensor | AlarmSensor;
