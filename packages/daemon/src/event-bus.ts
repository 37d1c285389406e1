import { EventEmitter } from "events";
import type { EntityInfo, EntitySnapshot } from "@homesync/shared";

export interface EventBusEvents {
  "entity:registered": (entity: EntityInfo) => void;
  "entity:updated": (data: {
    adapterId: string;
    snapshot: EntitySnapshot;
    previous?: EntitySnapshot;
  }) => void;
}

export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.on(event, listener as (...args: unknown[]) => void);
  }

  off<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
  }

  emit<K extends keyof EventBusEvents>(
    event: K,
    ...args: Parameters<EventBusEvents[K]>
  ): void {
    this.emitter.emit(event, ...args);
  }
}
