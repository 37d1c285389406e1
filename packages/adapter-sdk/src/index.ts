export type {
  EntityRegistration,
  RegistrationResult,
  SwitchCommand,
  SnapshotListener,
  Adapter,
  KeyedNotification,
} from "./types.js";

export type { Clock, Scheduler } from "./scheduler.js";
export { TimerScheduler, systemClock } from "./scheduler.js";

export { NotificationChannel } from "./channel.js";

export type { NotificationCallback } from "./subscription-registry.js";
export { SubscriptionRegistry } from "./subscription-registry.js";
