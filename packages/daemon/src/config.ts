import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  HOMESYNC_ZWAVE_ENABLED: booleanFlag.optional(),
  HOMESYNC_WEMO_ENABLED: booleanFlag.optional(),
  HOMESYNC_REARM_MULTIPLIER: z.coerce.number().int().positive().optional(),
  HOMESYNC_WEMO_IGNORE: z.string().optional(),
  HOMESYNC_SIMULATION_INTERVAL_MS: z.coerce.number().int().min(100).optional(),
});

export interface HomesyncConfig {
  zwave: {
    enabled: boolean;
    defaultReArmMultiplier: number;
  };
  wemo: {
    enabled: boolean;
    ignore: string[];
  };
  simulation: {
    intervalMs: number; // ms between simulated device events
  };
}

const defaults: HomesyncConfig = {
  zwave: {
    enabled: true,
    defaultReArmMultiplier: 4,
  },
  wemo: {
    enabled: true,
    ignore: [],
  },
  simulation: {
    intervalMs: 15_000,
  },
};

/** Throws a ZodError naming the offending variable when the environment is invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HomesyncConfig {
  const parsed = envSchema.parse(env);
  return {
    ...defaults,
    zwave: {
      enabled: parsed.HOMESYNC_ZWAVE_ENABLED ?? defaults.zwave.enabled,
      defaultReArmMultiplier: parsed.HOMESYNC_REARM_MULTIPLIER ?? defaults.zwave.defaultReArmMultiplier,
    },
    wemo: {
      enabled: parsed.HOMESYNC_WEMO_ENABLED ?? defaults.wemo.enabled,
      ignore: parsed.HOMESYNC_WEMO_IGNORE
        ? parsed.HOMESYNC_WEMO_IGNORE.split(",").map((s) => s.trim()).filter(Boolean)
        : defaults.wemo.ignore,
    },
    simulation: {
      intervalMs: parsed.HOMESYNC_SIMULATION_INTERVAL_MS ?? defaults.simulation.intervalMs,
    },
  };
}
