import {
  STATE_OFF,
  STATE_ON,
  STATE_STANDBY,
  STATE_UNKNOWN,
  type CanonicalState,
  type SwitchAttributes,
} from "@homesync/shared";
import type { InsightParams, MakerParams, TelemetrySnapshot } from "./types.js";

// ── Telemetry → Canonical State ─────────────────────────────────────────────

export function switchState(snapshot: TelemetrySnapshot): CanonicalState {
  if (snapshot.isOn === null) return STATE_UNKNOWN;
  if (!snapshot.isOn) return STATE_OFF;
  if (isStandby(snapshot.insight)) return STATE_STANDBY;
  return STATE_ON;
}

/** Standby is reported as "8"; anything that is not plainly on or off counts. */
export function isStandby(insight: InsightParams | null): boolean {
  if (!insight) return false;
  return insight.state !== "0" && insight.state !== "1";
}

export function hasSensor(maker: MakerParams | null): boolean | undefined {
  if (!maker) return undefined;
  return Boolean(maker.hassensor);
}

export function sensorState(maker: MakerParams | null): "on" | "off" | undefined {
  if (!maker || !maker.hassensor) return undefined;
  // 1 is "not triggered"
  return maker.sensorstate ? "off" : "on";
}

export function switchAttributes(snapshot: TelemetrySnapshot): SwitchAttributes {
  const attrs: SwitchAttributes = {};

  if (snapshot.insight) {
    attrs.current_power_mwh = snapshot.insight.currentpower;
    attrs.today_power_mw = snapshot.insight.todaymw;
  }

  const sensor = sensorState(snapshot.maker);
  if (sensor !== undefined) {
    attrs.sensor_state = sensor;
  }

  if (snapshot.maker) {
    attrs.switch_mode = snapshot.maker.switchmode;
  }

  const present = hasSensor(snapshot.maker);
  if (present !== undefined) {
    attrs.has_sensor = present;
  }

  return attrs;
}
