import {
  STATE_OFF,
  STATE_ON,
  STATE_UNKNOWN,
  type CanonicalState,
  type SensorAttributes,
} from "@homesync/shared";
import type { ZWaveNode, ZWaveValue, ZWaveValueData } from "./types.js";

export const TEMP_CELSIUS = "°C";
export const TEMP_FAHRENHEIT = "°F";

export type SensorClass = "binary" | "multilevel" | "alarm";

// ── Raw Value → Canonical State ────────────────────────────────────────────

export function normalize(sensorClass: SensorClass, raw: ZWaveValueData, unit: string): CanonicalState {
  switch (sensorClass) {
    case "binary":
      return normalizeBinary(raw);
    case "multilevel":
      return normalizeMultilevel(raw, unit);
    case "alarm":
      return passthrough(raw, rawUnit(unit));
  }
}

export function normalizeBinary(raw: ZWaveValueData): CanonicalState {
  return isTruthy(raw) ? STATE_ON : STATE_OFF;
}

export function normalizeMultilevel(raw: ZWaveValueData, unit: string): CanonicalState {
  const canonical = canonicalUnit(unit);
  if (typeof raw !== "number") return passthrough(raw, canonical);

  if (isTemperatureUnit(unit)) {
    return { kind: "numeric", value: roundTo(raw, 1), unit: canonical };
  }
  if (!Number.isInteger(raw)) {
    return { kind: "numeric", value: roundTo(raw, 2), unit: canonical };
  }
  return { kind: "numeric", value: raw, unit: canonical };
}

function passthrough(raw: ZWaveValueData, unit: string | null): CanonicalState {
  if (raw === null) return STATE_UNKNOWN;
  if (typeof raw === "boolean") return raw ? STATE_ON : STATE_OFF;
  if (typeof raw === "number") return { kind: "numeric", value: raw, unit };
  return { kind: "text", value: raw, unit };
}

/** Truthiness as the controller means it: non-zero, non-empty, true. */
export function isTruthy(raw: ZWaveValueData): boolean {
  return Boolean(raw);
}

export function isTemperatureUnit(unit: string): boolean {
  return unit === "C" || unit === "F";
}

/** The unit as the controller reports it; an empty unit is none. */
export function rawUnit(unit: string): string | null {
  return unit === "" ? null : unit;
}

export function canonicalUnit(unit: string): string | null {
  if (unit === "C") return TEMP_CELSIUS;
  if (unit === "F") return TEMP_FAHRENHEIT;
  return rawUnit(unit);
}

/**
 * Rounds to `digits` decimal places. Values exactly halfway between two
 * candidates go to the even one: 21.25 -> 21.2, 21.75 -> 21.8.
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  // toFixed(100) spells out the exact binary value for anything a sensor reports
  const [whole, fraction = ""] = Math.abs(value).toFixed(100).split(".");
  const tail = fraction.slice(digits);
  if (!/^50*$/.test(tail)) {
    return Number(value.toFixed(digits));
  }

  const kept = whole + fraction.slice(0, digits);
  if (Number(kept[kept.length - 1]) % 2 === 1) {
    return Number(value.toFixed(digits));
  }
  const sign = value < 0 ? "-" : "";
  return Number(digits > 0 ? `${sign}${whole}.${fraction.slice(0, digits)}` : `${sign}${whole}`);
}

// ── Node → Attributes ──────────────────────────────────────────────────────

export function nodeAttributes(node: ZWaveNode): SensorAttributes {
  const attrs: SensorAttributes = { node_id: node.nodeId };

  const batteryLevel = node.getBatteryLevel();
  if (batteryLevel !== null) {
    attrs.battery_level = batteryLevel;
  }

  if (node.location) {
    attrs.location = node.location;
  }

  return attrs;
}

export function entityIdFor(value: ZWaveValue): string {
  return `zwave-${value.node.nodeId}-${value.valueId}`;
}

export function displayNameFor(value: ZWaveValue): string {
  const node = value.node;
  const name = node.name || `${node.manufacturerName} ${node.productName}`;
  return `${name} ${value.label}`;
}
