import {
  NotificationChannel,
  SubscriptionRegistry,
  TimerScheduler,
  type Adapter,
} from "@homesync/adapter-sdk";
import { ZWaveAdapter, type ZWaveNotification } from "@homesync/adapter-zwave";
import { WemoAdapter, type WemoNotification } from "@homesync/adapter-wemo";
import type { HomesyncConfig } from "./config.js";
import { EventBus } from "./event-bus.js";
import { EntityManager } from "./devices/entity-manager.js";
import {
  createDemoWemoNetwork,
  createDemoZWaveNetwork,
} from "./devices/providers/demo-home.js";
import type { SimulatedZWaveNetwork } from "./devices/providers/simulated-zwave.js";
import type { SimulatedWemoNetwork } from "./devices/providers/simulated-wemo.js";

export interface Runtime {
  config: HomesyncConfig;
  eventBus: EventBus;
  entityManager: EntityManager;
  scheduler: TimerScheduler;
  zwaveNetwork: SimulatedZWaveNetwork | null;
  wemoNetwork: SimulatedWemoNetwork | null;
  /** Idempotent; every registry is stopped exactly once. */
  shutdown(): Promise<void>;
}

/**
 * Composition root. Owns the registries, channels and scheduler and hands
 * them to the adapters; nothing here is a module-level global.
 */
export async function createRuntime(config: HomesyncConfig): Promise<Runtime> {
  const eventBus = new EventBus();
  const scheduler = new TimerScheduler();
  const entityManager = new EntityManager(eventBus);
  const registries: Array<{ stop(): Promise<void> }> = [];
  const adapters: Adapter[] = [];

  let zwaveNetwork: SimulatedZWaveNetwork | null = null;
  let wemoNetwork: SimulatedWemoNetwork | null = null;

  if (config.zwave.enabled) {
    zwaveNetwork = createDemoZWaveNetwork();
    const channel = new NotificationChannel<ZWaveNotification>();
    const registry = new SubscriptionRegistry(channel, "zwave");
    registries.push(registry);
    registry.start();

    adapters.push(
      new ZWaveAdapter(
        { default_re_arm_multiplier: config.zwave.defaultReArmMultiplier },
        { network: zwaveNetwork, channel, registry, scheduler },
      ),
    );
  }

  if (config.wemo.enabled) {
    wemoNetwork = createDemoWemoNetwork();
    const channel = new NotificationChannel<WemoNotification>();
    const registry = new SubscriptionRegistry(channel, "wemo");
    registries.push(registry);
    registry.start();

    adapters.push(
      new WemoAdapter(
        { ignore: config.wemo.ignore },
        { network: wemoNetwork, channel, registry, clock: scheduler },
      ),
    );
  }

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        await entityManager.destroyAll();
        await Promise.all(registries.map((r) => r.stop()));
        scheduler.dispose();
      })();
    }
    return stopping;
  };

  try {
    for (const adapter of adapters) {
      await entityManager.addAdapter(adapter);
    }
  } catch (err) {
    await shutdown();
    throw err;
  }

  return { config, eventBus, entityManager, scheduler, zwaveNetwork, wemoNetwork, shutdown };
}
