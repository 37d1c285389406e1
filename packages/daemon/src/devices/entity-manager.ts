import {
  statesEqual,
  type EntityInfo,
  type EntitySnapshot,
} from "@homesync/shared";
import type { Adapter, SwitchCommand } from "@homesync/adapter-sdk";
import type { EventBus } from "../event-bus.js";

function sameSnapshot(a: EntitySnapshot, b: EntitySnapshot): boolean {
  return (
    statesEqual(a.state, b.state) &&
    a.unit === b.unit &&
    JSON.stringify(a.attributes) === JSON.stringify(b.attributes)
  );
}

/**
 * Host side of the adapters: keeps the last pushed snapshot of every entity
 * and republishes changes on the event bus.
 */
export class EntityManager {
  private adapters = new Map<string, Adapter>();
  private entities = new Map<string, EntityInfo>();
  private snapshots = new Map<string, EntitySnapshot>();

  constructor(private eventBus: EventBus) {}

  async addAdapter(adapter: Adapter): Promise<EntityInfo[]> {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Adapter already added: ${adapter.id}`);
    }
    this.adapters.set(adapter.id, adapter);

    const { entities } = await adapter.register();
    const added: EntityInfo[] = [];

    for (const reg of entities) {
      const info: EntityInfo = { ...reg, adapterId: adapter.id };
      this.entities.set(reg.entityId, info);
      this.snapshots.set(reg.entityId, await adapter.observe(reg.entityId));
      this.eventBus.emit("entity:registered", info);
      added.push(info);
    }

    await adapter.subscribe((snapshot) => this.handleSnapshot(adapter.id, snapshot));

    console.log(`[EntityManager] ${adapter.id}: ${added.length} entities`);
    return added;
  }

  getEntities(): EntityInfo[] {
    return Array.from(this.entities.values());
  }

  getSnapshot(entityId: string): EntitySnapshot | undefined {
    return this.snapshots.get(entityId);
  }

  async execute(entityId: string, command: SwitchCommand): Promise<void> {
    const adapter = this.adapterFor(entityId);
    if (!adapter.execute) {
      throw new Error(`Entity ${entityId} does not accept commands`);
    }
    await adapter.execute(entityId, command);
  }

  /** Asks the adapter directly instead of returning the cached snapshot. */
  async refresh(entityId: string): Promise<EntitySnapshot> {
    const adapter = this.adapterFor(entityId);
    const snapshot = await adapter.observe(entityId);
    this.handleSnapshot(adapter.id, snapshot);
    return snapshot;
  }

  async destroyAll(): Promise<void> {
    const results = await Promise.allSettled(
      Array.from(this.adapters.values()).map((a) => a.destroy()),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        console.error("[EntityManager] Adapter shutdown failed:", result.reason);
      }
    }
    this.adapters.clear();
  }

  private handleSnapshot(adapterId: string, snapshot: EntitySnapshot): void {
    if (!this.entities.has(snapshot.entityId)) return;

    const previous = this.snapshots.get(snapshot.entityId);
    this.snapshots.set(snapshot.entityId, snapshot);

    if (previous && sameSnapshot(previous, snapshot)) return;
    this.eventBus.emit("entity:updated", { adapterId, snapshot, previous });
  }

  private adapterFor(entityId: string): Adapter {
    const info = this.entities.get(entityId);
    const adapter = info ? this.adapters.get(info.adapterId) : undefined;
    if (!adapter) throw new Error(`Unknown entity: ${entityId}`);
    return adapter;
  }
}
