// ── Canonical State ──

export type CanonicalState =
  | { kind: "off" }
  | { kind: "on" }
  | { kind: "standby" }
  | { kind: "numeric"; value: number; unit: string | null }
  | { kind: "text"; value: string; unit: string | null }
  | { kind: "unknown" };

export const STATE_OFF: CanonicalState = { kind: "off" };
export const STATE_ON: CanonicalState = { kind: "on" };
export const STATE_STANDBY: CanonicalState = { kind: "standby" };
export const STATE_UNKNOWN: CanonicalState = { kind: "unknown" };

/** Host-facing string form of a canonical state ("on", "off", "21.3", ...). */
export function formatState(state: CanonicalState): string {
  switch (state.kind) {
    case "numeric":
      return String(state.value);
    case "text":
      return state.value;
    default:
      return state.kind;
  }
}

export function statesEqual(a: CanonicalState, b: CanonicalState): boolean {
  if (a.kind !== b.kind) return false;
  if ((a.kind === "numeric" && b.kind === "numeric") || (a.kind === "text" && b.kind === "text")) {
    return a.value === b.value && a.unit === b.unit;
  }
  return true;
}

// ── Entity Attributes ──

export interface SensorAttributes {
  node_id: number;
  battery_level?: number;
  location?: string;
}

export interface SwitchAttributes {
  current_power_mwh?: number;
  today_power_mw?: number;
  sensor_state?: "on" | "off";
  switch_mode?: number;
  has_sensor?: boolean;
}

export type EntityAttributes = SensorAttributes | SwitchAttributes;

// ── Entities ──

export type EntityKind =
  | "trigger_sensor"
  | "binary_sensor"
  | "multilevel_sensor"
  | "alarm_sensor"
  | "switch";

export interface EntitySnapshot {
  entityId: string;
  state: CanonicalState;
  unit: string | null;
  attributes: EntityAttributes;
  timestamp: number;
}

export interface EntityInfo {
  entityId: string;
  adapterId: string;
  displayName: string;
  kind: EntityKind;
  unit: string | null;
}
