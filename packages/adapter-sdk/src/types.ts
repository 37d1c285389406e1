import type { EntityKind, EntitySnapshot } from "@homesync/shared";

// ── Entity Registration ────────────────────────────────────────────────────

export interface EntityRegistration {
  entityId: string;
  displayName: string;
  kind: EntityKind;
  unit: string | null;
}

export interface RegistrationResult {
  entities: EntityRegistration[];
}

// ── Commands ──────────────────────────────────────────────────────────────

export interface SwitchCommand {
  on: boolean;
}

// ── Adapter Interface ──────────────────────────────────────────────────────

export type SnapshotListener = (snapshot: EntitySnapshot) => void;

/**
 * Facade an integration exposes to the host. State is pushed through the
 * `subscribe` callback; the host never polls.
 */
export interface Adapter {
  readonly id: string;
  register(): Promise<RegistrationResult>;
  observe(entityId: string): Promise<EntitySnapshot>;
  execute?(entityId: string, command: SwitchCommand): Promise<void>;
  subscribe(cb: SnapshotListener): Promise<void>;
  ping(): Promise<boolean>;
  destroy(): Promise<void>;
}

// ── Notifications ──────────────────────────────────────────────────────────

/** Anything routed through a SubscriptionRegistry carries the identity key of its target. */
export interface KeyedNotification {
  key: string;
}
