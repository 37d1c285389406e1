import type { NotificationChannel } from "./channel.js";
import type { KeyedNotification } from "./types.js";

export type NotificationCallback<N extends KeyedNotification> = (notification: N) => void;

interface SubscriptionEntry<N extends KeyedNotification> {
  key: string;
  callback: NotificationCallback<N>;
}

/**
 * Routes notifications from a channel to the one subscriber registered for
 * the notification's key. Notifications for keys nobody registered are
 * dropped without a trace: sources broadcast and most of what they send is
 * for somebody else.
 */
export class SubscriptionRegistry<N extends KeyedNotification> {
  private entries = new Map<string, SubscriptionEntry<N>>();
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private channel: NotificationChannel<N>,
    private label: string,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  get running(): boolean {
    return this.loop !== null && this.stopping === null;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /** Returns false if the key already has a subscriber; the first one stays. */
  register(key: string, callback: NotificationCallback<N>): boolean {
    if (this.entries.has(key)) return false;
    this.entries.set(key, { key, callback });
    return true;
  }

  dispatch(notification: N): boolean {
    const entry = this.entries.get(notification.key);
    if (!entry) return false;

    try {
      entry.callback(notification);
    } catch (err) {
      console.error(`[SubscriptionRegistry:${this.label}] Handler for ${entry.key} failed:`, err);
    }
    return true;
  }

  start(): void {
    if (this.loop || this.stopping) return;
    this.loop = this.consume();
    console.log(`[SubscriptionRegistry:${this.label}] Started`);
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    console.log(`[SubscriptionRegistry:${this.label}] Shutting down subscriptions`);
    this.channel.close();
    if (this.loop) {
      await this.loop;
    }
    this.entries.clear();
  }

  private async consume(): Promise<void> {
    try {
      for await (const notification of this.channel) {
        this.dispatch(notification);
      }
    } catch (err) {
      console.error(`[SubscriptionRegistry:${this.label}] Consumer stopped:`, err);
    }
  }
}
