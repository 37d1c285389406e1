import { z } from "zod";

// ── Adapter Config ──────────────────────────────────────────────────────────

export const zwaveConfigSchema = z.object({
  default_re_arm_multiplier: z.number().int().positive().default(4),
});

export type ZWaveAdapterConfig = z.infer<typeof zwaveConfigSchema>;

// ── Command Classes ─────────────────────────────────────────────────────────

export const COMMAND_CLASS_SENSOR_BINARY = 0x30;
export const COMMAND_CLASS_SENSOR_MULTILEVEL = 0x31;
export const COMMAND_CLASS_METER = 0x32;
export const COMMAND_CLASS_ALARM = 0x71;
export const COMMAND_CLASS_BATTERY = 0x80;

export type ZWaveValueType =
  | "bool"
  | "byte"
  | "decimal"
  | "int"
  | "list"
  | "schedule"
  | "short"
  | "string"
  | "button"
  | "raw";

export type ZWaveValueData = number | string | boolean | null;

// ── SDK Objects ─────────────────────────────────────────────────────────────

export interface ZWaveNode {
  readonly nodeId: number;
  readonly name: string;
  /** Hex string as reported by the controller, e.g. "013c". */
  readonly manufacturerId: string;
  readonly productId: string;
  readonly manufacturerName: string;
  readonly productName: string;
  readonly location: string;
  getBatteryLevel(): number | null;
  /** Reads a configuration parameter, null when the node never reported it. */
  getConfigValue(parameter: number): number | null;
}

export interface ZWaveValue {
  readonly valueId: string;
  readonly node: ZWaveNode;
  readonly commandClass: number;
  readonly type: ZWaveValueType;
  readonly index: number;
  readonly label: string;
  readonly units: string;
  readonly data: ZWaveValueData;
  setChangeVerified(verified: boolean): void;
}

/** The part of the Z-Wave SDK this adapter talks to. */
export interface ZWaveNetwork {
  getValues(): ZWaveValue[];
  /** Returns an unsubscribe function. */
  onValueChanged(listener: (value: ZWaveValue) => void): () => void;
}

// ── Notifications ───────────────────────────────────────────────────────────

export interface ValueChangedNotification {
  type: "value_changed";
  key: string;
  data: ZWaveValueData;
}

/** Deferred re-check of a trigger sensor, addressed to the sensor's own value id. */
export interface ReevaluateNotification {
  type: "reevaluate";
  key: string;
  scheduledFor: number;
}

export type ZWaveNotification = ValueChangedNotification | ReevaluateNotification;
