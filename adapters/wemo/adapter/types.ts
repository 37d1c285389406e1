import { z } from "zod";

// ── Adapter Config ──────────────────────────────────────────────────────────

export const wemoConfigSchema = z.object({
  /** Serial numbers to leave alone even if discovered. */
  ignore: z.array(z.string()).default([]),
});

export type WemoAdapterConfig = z.infer<typeof wemoConfigSchema>;

// ── Device Models ───────────────────────────────────────────────────────────

/** Models that behave as a relay switch; everything else is skipped. */
export const SWITCH_MODELS = ["Socket", "Insight", "Maker", "LightSwitch"] as const;

export type WemoSwitchModel = (typeof SWITCH_MODELS)[number];

export function isSwitchModel(model: string): model is WemoSwitchModel {
  return (SWITCH_MODELS as readonly string[]).includes(model);
}

// ── SDK Payloads ────────────────────────────────────────────────────────────

/**
 * Insight power readings. `state` is the raw binary state as the device
 * reports it: "0" off, "1" on, "8" on but drawing standby power.
 */
export interface InsightParams {
  state: string;
  lastchange: number;
  onfor: number;
  ontoday: number;
  ontotal: number;
  /** Instantaneous draw, mW. */
  currentpower: number;
  /** Energy used today, mW·min as the device counts it. */
  todaymw: number;
  totalmw: number;
  powerthreshold: number;
}

/**
 * Maker relay/sensor block. `sensorstate` is 1 when the sensor is NOT
 * triggered, matching what the vendor app shows.
 */
export interface MakerParams {
  switchstate: number;
  sensorstate: number;
  /** 0 toggle, 1 momentary. */
  switchmode: number;
  hassensor: number;
}

// ── SDK Objects ─────────────────────────────────────────────────────────────

export interface WemoDevice {
  readonly serialNumber: string;
  readonly name: string;
  readonly modelName: string;
  readonly host: string;
  getBinaryState(): Promise<boolean>;
  setBinaryState(on: boolean): Promise<void>;
  /** Rejects until the device has answered an Insight query. */
  getInsightParams(): Promise<InsightParams>;
  getMakerParams(): Promise<MakerParams>;
}

export interface WemoEvent {
  serialNumber: string;
  /** UPnP state variable name, e.g. "BinaryState" or "InsightParams". */
  variable: string;
  value: string;
}

/** The part of the WeMo SDK this adapter talks to. */
export interface WemoNetwork {
  discover(): Promise<WemoDevice[]>;
  /** Returns an unsubscribe function. */
  onEvent(listener: (event: WemoEvent) => void): () => void;
}

// ── Notifications ───────────────────────────────────────────────────────────

export interface WemoNotification {
  type: "state_changed";
  /** Serial number of the device the event came from. */
  key: string;
  variable: string;
  value: string;
}

// ── Telemetry ───────────────────────────────────────────────────────────────

/** Last successful readings; each part stays null until first read. */
export interface TelemetrySnapshot {
  isOn: boolean | null;
  insight: InsightParams | null;
  maker: MakerParams | null;
  refreshedAt: number | null;
}
