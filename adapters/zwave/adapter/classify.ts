import type { Scheduler } from "@homesync/adapter-sdk";
import {
  COMMAND_CLASS_ALARM,
  COMMAND_CLASS_METER,
  COMMAND_CLASS_SENSOR_BINARY,
  COMMAND_CLASS_SENSOR_MULTILEVEL,
  type ZWaveValue,
} from "./types.js";
import {
  DEFAULT_RE_ARM_MULTIPLIER,
  RE_ARM_MULTIPLIER_PARAMETER,
  RE_ARM_SECONDS_PER_STEP,
  lookupWorkaround,
} from "./device-mappings.js";
import {
  AlarmSensor,
  BinarySensor,
  MultilevelSensor,
  TriggerSensor,
  type ReevaluateSink,
  type ZWaveSensorDevice,
} from "./sensors.js";

export type SensorVariant = "trigger_workaround" | "binary" | "multilevel" | "alarm";

/**
 * Picks the handler for a value. A workaround-table hit beats the generic
 * command-class rules; values no rule covers get no sensor at all.
 */
export function classifyValue(value: ZWaveValue): SensorVariant | null {
  const workaround = lookupWorkaround(value.node.manufacturerId, value.node.productId, value.index);
  if (workaround) {
    switch (workaround) {
      case "trigger_no_off_event":
        return "trigger_workaround";
    }
  }

  switch (value.commandClass) {
    case COMMAND_CLASS_SENSOR_BINARY:
      return "binary";
    case COMMAND_CLASS_SENSOR_MULTILEVEL:
      return "multilevel";
    case COMMAND_CLASS_METER:
      return value.type === "decimal" ? "multilevel" : null;
    case COMMAND_CLASS_ALARM:
      return "alarm";
    default:
      return null;
  }
}

export function reArmSecondsFor(value: ZWaveValue, fallbackMultiplier = DEFAULT_RE_ARM_MULTIPLIER): number {
  const configured = value.node.getConfigValue(RE_ARM_MULTIPLIER_PARAMETER);
  // 0 means "not set" on these devices
  const multiplier = configured !== null && configured > 0 ? configured : fallbackMultiplier;
  return multiplier * RE_ARM_SECONDS_PER_STEP;
}

export interface SensorFactoryDeps {
  scheduler: Scheduler;
  requestReevaluation: ReevaluateSink;
  defaultReArmMultiplier?: number;
}

export function createSensor(value: ZWaveValue, deps: SensorFactoryDeps): ZWaveSensorDevice | null {
  const variant = classifyValue(value);
  switch (variant) {
    case "trigger_workaround":
      return new TriggerSensor(
        value,
        reArmSecondsFor(value, deps.defaultReArmMultiplier),
        deps.scheduler,
        deps.requestReevaluation,
      );
    case "binary":
      return new BinarySensor(value);
    case "multilevel":
      return new MultilevelSensor(value);
    case "alarm":
      return new AlarmSensor(value);
    case null:
      return null;
  }
}
